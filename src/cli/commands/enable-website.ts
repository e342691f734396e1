/**
 * Enable website command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import {
  configureBucketWebsite,
  getBucketRegion,
  getBucketWebsiteUrl,
} from '../../core/aws/s3-bucket.js';
import * as logger from '../utils/logger.js';
import { createContext, requireBucket, type GlobalOptions } from '../utils/context.js';
import { reportCommandError } from '../utils/errors.js';

interface EnableWebsiteOptions extends GlobalOptions {
  index?: string;
  error?: string;
}

/**
 * Create enable-website command
 */
export function createEnableWebsiteCommand(): Command {
  const command = new Command('enable-website');

  command
    .description('Enable static website hosting on a bucket')
    .argument('[bucket]', 'Bucket name')
    .option('--index <document>', 'Index document suffix')
    .option('--error <document>', 'Error document key')
    .action(async (bucket: string | undefined, _options: unknown, cmd: Command) => {
      try {
        await enableWebsiteCommand(bucket, cmd.optsWithGlobals<EnableWebsiteOptions>());
      } catch (error: unknown) {
        reportCommandError(error);
      }
    });

  return command;
}

async function enableWebsiteCommand(
  bucketArg: string | undefined,
  options: EnableWebsiteOptions
): Promise<void> {
  const { config, client } = await createContext(options, bucketArg);
  const bucket = requireBucket(config);

  const indexDocument = options.index ?? config.website.indexDocument;
  const errorDocument = options.error ?? config.website.errorDocument;

  const spinner = ora(`Enabling website hosting on ${chalk.cyan(bucket)}...`).start();

  try {
    await configureBucketWebsite(client, bucket, indexDocument, errorDocument);
    spinner.succeed('Website hosting enabled');
  } catch (error) {
    spinner.fail('Could not enable website configuration');
    throw error;
  }

  logger.keyValue('Index document', indexDocument);
  logger.keyValue('Error document', errorDocument);

  const region = await getBucketRegion(client, bucket);
  logger.keyValue('Website URL', chalk.cyan(getBucketWebsiteUrl(bucket, region)));
}
