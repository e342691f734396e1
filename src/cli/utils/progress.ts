/**
 * Transfer progress bar
 */

import chalk from 'chalk';
import cliProgress from 'cli-progress';
import type { FileProgressCallback, TransferReport } from '../../types/sync.js';
import { formatBytes } from '../../core/sync/report.js';
import * as logger from './logger.js';

/**
 * Progress bar that starts on the first finished file, once the total is known
 */
export function createTransferProgress(enabled: boolean): {
  onFile: FileProgressCallback;
  stop: () => void;
} {
  let progressBar: cliProgress.SingleBar | null = null;

  const onFile: FileProgressCallback = (result, completed, total) => {
    if (!enabled) {
      return;
    }

    if (!progressBar) {
      progressBar = new cliProgress.SingleBar(
        {
          format:
            'Progress |' +
            chalk.cyan('{bar}') +
            '| {percentage}% | {value}/{total} files | {current}',
          barCompleteChar: '█',
          barIncompleteChar: '░',
          hideCursor: true,
        },
        cliProgress.Presets.shades_classic
      );
      progressBar.start(total, 0, { current: '' });
    }

    progressBar.update(completed, { current: result.key });
  };

  const stop = (): void => {
    progressBar?.stop();
  };

  return { onFile, stop };
}

/**
 * Per-file lines and totals for a finished transfer
 */
export function printTransferReport(report: TransferReport, dryRun: boolean = false): void {
  for (const result of report.results) {
    logger.fileResult(result, dryRun);
  }

  logger.section(dryRun ? 'Dry Run Summary' : 'Summary');
  logger.keyValue('Bucket', report.bucket);
  logger.keyValue('Total files', String(report.totalFiles));
  logger.keyValue(dryRun ? 'Would upload' : 'Uploaded', chalk.green(String(report.uploaded)));
  logger.keyValue('Unchanged', String(report.skipped));
  if (report.failed > 0) {
    logger.keyValue('Failed', chalk.red(String(report.failed)));
  }
  logger.keyValue('Transferred', formatBytes(report.uploadedBytes));
  logger.keyValue('Duration', `${(report.duration / 1000).toFixed(2)}s`);

  if (report.ignored > 0) {
    logger.newline();
    logger.warn(`${report.ignored} symbolic links or special files were not uploaded`);
  }
}
