/**
 * List buckets command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { listBuckets } from '../../core/aws/s3-bucket.js';
import * as logger from '../utils/logger.js';
import { createContext, type GlobalOptions } from '../utils/context.js';
import { reportCommandError } from '../utils/errors.js';

/**
 * Create list-buckets command
 */
export function createListBucketsCommand(): Command {
  const command = new Command('list-buckets');

  command
    .description('List all buckets')
    .action(async (_options: unknown, cmd: Command) => {
      try {
        await listBucketsCommand(cmd.optsWithGlobals<GlobalOptions>());
      } catch (error: unknown) {
        reportCommandError(error);
      }
    });

  return command;
}

async function listBucketsCommand(options: GlobalOptions): Promise<void> {
  const { client } = await createContext(options);
  const buckets = await listBuckets(client);

  if (buckets.length === 0) {
    logger.info('No buckets found');
    return;
  }

  for (const bucket of buckets) {
    const created = bucket.creationDate ? chalk.gray(bucket.creationDate.toISOString()) : '';
    console.log(bucket.name, created);
  }
}
