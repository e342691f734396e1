/**
 * Make public command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { setBucketPublicReadPolicy } from '../../core/aws/s3-bucket.js';
import { createContext, requireBucket, type GlobalOptions } from '../utils/context.js';
import { reportCommandError } from '../utils/errors.js';

/**
 * Create make-public command
 */
export function createMakePublicCommand(): Command {
  const command = new Command('make-public');

  command
    .description('Attach a public-read policy to a bucket')
    .argument('[bucket]', 'Bucket name')
    .action(async (bucket: string | undefined, _options: unknown, cmd: Command) => {
      try {
        await makePublicCommand(bucket, cmd.optsWithGlobals<GlobalOptions>());
      } catch (error: unknown) {
        reportCommandError(error);
      }
    });

  return command;
}

async function makePublicCommand(
  bucketArg: string | undefined,
  options: GlobalOptions
): Promise<void> {
  const { config, client } = await createContext(options, bucketArg);
  const bucket = requireBucket(config);

  const spinner = ora(`Updating bucket policy for ${chalk.cyan(bucket)}...`).start();

  try {
    await setBucketPublicReadPolicy(client, bucket);
    spinner.succeed(`Objects in ${chalk.cyan(bucket)} are now publicly readable`);
  } catch (error) {
    spinner.fail('Could not update the bucket policy');
    throw error;
  }
}
