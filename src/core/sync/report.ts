/**
 * Transfer report helpers
 */

import type { FileResult, IgnoredEntry, TransferReport } from '../../types/sync.js';

/**
 * Result entry for a walk entry that was not a regular file
 */
export function toIgnoredResult(entry: IgnoredEntry): FileResult {
  return {
    key: entry.key,
    absolutePath: entry.absolutePath,
    status: 'ignored',
    size: 0,
    reason: entry.reason,
  };
}

/**
 * Count results by status
 */
export function summarizeResults(
  bucketName: string,
  results: FileResult[],
  startTime: number
): TransferReport {
  const count = (status: FileResult['status']) =>
    results.filter((result) => result.status === status).length;

  return {
    bucket: bucketName,
    totalFiles: results.length - count('ignored'),
    uploaded: count('uploaded'),
    skipped: count('skipped'),
    failed: count('failed'),
    ignored: count('ignored'),
    uploadedBytes: results.reduce((sum, result) => sum + result.size, 0),
    duration: Date.now() - startTime,
    results,
  };
}

/**
 * Whether any file in the report failed
 */
export function hasFailures(report: TransferReport): boolean {
  return report.failed > 0;
}

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);

  return Math.round((bytes / Math.pow(k, i)) * 100) / 100 + ' ' + sizes[i];
}
