/**
 * Create bucket command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createBucket, getBucketWebsiteUrl } from '../../core/aws/s3-bucket.js';
import * as logger from '../utils/logger.js';
import { createContext, requireBucket, type GlobalOptions } from '../utils/context.js';
import { reportCommandError } from '../utils/errors.js';

/**
 * Create create-bucket command
 */
export function createCreateBucketCommand(): Command {
  const command = new Command('create-bucket');

  command
    .description('Create an S3 bucket (in --region, or the default region)')
    .argument('[bucket]', 'Bucket name')
    .action(async (bucket: string | undefined, _options: unknown, cmd: Command) => {
      try {
        await createBucketCommand(bucket, cmd.optsWithGlobals<GlobalOptions>());
      } catch (error: unknown) {
        reportCommandError(error);
      }
    });

  return command;
}

async function createBucketCommand(
  bucketArg: string | undefined,
  options: GlobalOptions
): Promise<void> {
  const { config, client } = await createContext(options, bucketArg);
  const bucket = requireBucket(config);

  const spinner = ora(`Creating bucket ${chalk.cyan(bucket)}...`).start();

  try {
    const { created, region } = await createBucket(client, bucket, config.region);
    if (created) {
      spinner.succeed(`Bucket created: ${chalk.cyan(bucket)} (${region})`);
    } else {
      spinner.info(`Bucket already exists and is owned by you: ${chalk.cyan(bucket)}`);
    }
    logger.keyValue('Website URL', getBucketWebsiteUrl(bucket, region));
  } catch (error) {
    spinner.fail('Could not create bucket');
    throw error;
  }
}
