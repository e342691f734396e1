/**
 * Sync command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { getBucketRegion, getBucketWebsiteUrl } from '../../core/aws/s3-bucket.js';
import { syncDirectory } from '../../core/sync/sync-engine.js';
import { MAX_CONCURRENCY } from '../../core/config/schema.js';
import { ValidationError } from '../../core/errors.js';
import * as logger from '../utils/logger.js';
import { createContext, requireBucket, type GlobalOptions } from '../utils/context.js';
import { exitCodeForReport, reportCommandError } from '../utils/errors.js';
import { createTransferProgress, printTransferReport } from '../utils/progress.js';

interface SyncCommandOptions extends GlobalOptions {
  dryRun?: boolean;
  exclude?: string[];
  concurrency?: string;
  progress?: boolean;
}

/**
 * Create sync command
 */
export function createSyncCommand(): Command {
  const command = new Command('sync');

  command
    .description('Upload new and changed files from a directory to a bucket')
    .argument('[bucket]', 'Bucket name')
    .argument('[dir]', 'Local directory (defaults to sync.root from config)')
    .option('--dry-run', 'Show what would be uploaded without uploading', false)
    .option('--exclude <patterns...>', 'Glob patterns to leave out')
    .option('--concurrency <n>', 'Number of parallel uploads')
    .option('--no-progress', 'Hide the progress bar')
    .action(
      async (
        bucket: string | undefined,
        dir: string | undefined,
        _options: unknown,
        cmd: Command
      ) => {
        try {
          await syncCommand(bucket, dir, cmd.optsWithGlobals<SyncCommandOptions>());
        } catch (error: unknown) {
          reportCommandError(error);
        }
      }
    );

  return command;
}

function parseConcurrency(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const concurrency = Number(value);
  if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > MAX_CONCURRENCY) {
    throw new ValidationError(
      `--concurrency must be an integer from 1 to ${MAX_CONCURRENCY}, got: ${value}`
    );
  }
  return concurrency;
}

async function syncCommand(
  bucketArg: string | undefined,
  dir: string | undefined,
  options: SyncCommandOptions
): Promise<void> {
  const { config, client } = await createContext(options, bucketArg);
  const bucket = requireBucket(config);
  const dryRun = options.dryRun ?? false;
  const concurrency = parseConcurrency(options.concurrency) ?? config.sync.concurrency;

  logger.info(
    `Syncing ${chalk.cyan(dir ?? config.sync.root)} to ${chalk.cyan(bucket)}${
      dryRun ? chalk.yellow(' (dry run)') : ''
    }`
  );

  const spinner = ora('Loading bucket contents...').start();
  const progress = createTransferProgress(options.progress !== false && !dryRun);

  try {
    const report = await syncDirectory(client, {
      bucket,
      root: dir ?? config.sync.root,
      chunkSize: config.sync.chunkSize,
      exclude: [...config.sync.exclude, ...(options.exclude ?? [])],
      concurrency,
      dryRun,
      onFile: (result, completed, total) => {
        if (spinner.isSpinning) {
          spinner.stop();
        }
        progress.onFile(result, completed, total);
      },
    });

    spinner.stop();
    progress.stop();

    printTransferReport(report, dryRun);
    process.exitCode = exitCodeForReport(report);
  } catch (error) {
    if (spinner.isSpinning) {
      spinner.fail('Sync failed');
    }
    progress.stop();
    throw error;
  }

  const region = await getBucketRegion(client, bucket);
  logger.newline();
  logger.success(`Website URL: ${chalk.cyan(getBucketWebsiteUrl(bucket, region))}`);
}
