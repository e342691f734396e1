/**
 * List objects command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { listBucketObjects } from '../../core/aws/s3-bucket.js';
import { formatBytes } from '../../core/sync/report.js';
import * as logger from '../utils/logger.js';
import { createContext, requireBucket, type GlobalOptions } from '../utils/context.js';
import { reportCommandError } from '../utils/errors.js';

/**
 * Create list-objects command
 */
export function createListObjectsCommand(): Command {
  const command = new Command('list-objects');

  command
    .description('List the objects in a bucket')
    .argument('[bucket]', 'Bucket name')
    .action(async (bucket: string | undefined, _options: unknown, cmd: Command) => {
      try {
        await listObjectsCommand(bucket, cmd.optsWithGlobals<GlobalOptions>());
      } catch (error: unknown) {
        reportCommandError(error);
      }
    });

  return command;
}

async function listObjectsCommand(
  bucketArg: string | undefined,
  options: GlobalOptions
): Promise<void> {
  const { config, client } = await createContext(options, bucketArg);
  const bucket = requireBucket(config);

  const objects = await listBucketObjects(client, bucket);

  if (objects.length === 0) {
    logger.info(`Bucket ${chalk.cyan(bucket)} is empty`);
    return;
  }

  for (const object of objects) {
    console.log(
      object.key,
      chalk.gray(formatBytes(object.size)),
      chalk.gray(object.etag ?? '')
    );
  }

  logger.newline();
  logger.info(`${objects.length} objects`);
}
