/**
 * Exit code mapping
 */

import { RemoteCallError, ValidationError, getErrorMessage } from '../../core/errors.js';
import { hasFailures } from '../../core/sync/report.js';
import type { TransferReport } from '../../types/sync.js';
import * as logger from './logger.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_VALIDATION = 2;

/**
 * Exit code for an error thrown by a command
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ValidationError) {
    return EXIT_VALIDATION;
  }
  return EXIT_FAILURE;
}

/**
 * Exit code for a finished transfer
 */
export function exitCodeForReport(report: TransferReport): number {
  return hasFailures(report) ? EXIT_FAILURE : EXIT_SUCCESS;
}

/**
 * Print a command error and set the process exit code
 */
export function reportCommandError(error: unknown): void {
  logger.error(getErrorMessage(error));

  if (error instanceof RemoteCallError && error.httpStatusCode) {
    logger.verbose(`HTTP status: ${error.httpStatusCode}`);
  }

  process.exitCode = exitCodeFor(error);
}
