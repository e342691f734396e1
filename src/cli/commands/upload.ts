/**
 * Upload command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { uploadPath } from '../../core/sync/upload.js';
import * as logger from '../utils/logger.js';
import { createContext, requireBucket, type GlobalOptions } from '../utils/context.js';
import { exitCodeForReport, reportCommandError } from '../utils/errors.js';
import { createTransferProgress, printTransferReport } from '../utils/progress.js';

interface UploadCommandOptions extends GlobalOptions {
  exclude?: string[];
  progress?: boolean;
}

/**
 * Create upload command
 */
export function createUploadCommand(): Command {
  const command = new Command('upload');

  command
    .description('Upload a file or a directory without comparing against the bucket')
    .argument('<bucket>', 'Bucket name')
    .argument('<path>', 'Local file or directory')
    .argument('<kind>', 'Object type: file or dir')
    .option('--exclude <patterns...>', 'Glob patterns to leave out (dir only)')
    .option('--no-progress', 'Hide the progress bar')
    .action(
      async (bucket: string, path: string, kind: string, _options: unknown, cmd: Command) => {
        try {
          await uploadCommand(bucket, path, kind, cmd.optsWithGlobals<UploadCommandOptions>());
        } catch (error: unknown) {
          reportCommandError(error);
        }
      }
    );

  return command;
}

async function uploadCommand(
  bucketArg: string,
  path: string,
  kind: string,
  options: UploadCommandOptions
): Promise<void> {
  const { config, client } = await createContext(options, bucketArg);
  const bucket = requireBucket(config);

  logger.info(`Uploading ${chalk.cyan(path)} (${kind}) to ${chalk.cyan(bucket)}`);

  const progress = createTransferProgress(options.progress !== false);

  try {
    const report = await uploadPath(client, {
      bucket,
      path,
      kind,
      chunkSize: config.sync.chunkSize,
      exclude: [...config.sync.exclude, ...(options.exclude ?? [])],
      concurrency: config.sync.concurrency,
      onFile: progress.onFile,
    });
    progress.stop();

    printTransferReport(report);
    process.exitCode = exitCodeForReport(report);
  } catch (error) {
    progress.stop();
    throw error;
  }
}
