/**
 * CLI logging utilities
 */

import chalk from 'chalk';
import type { FileResult } from '../../types/sync.js';

let verboseEnabled = process.env.SITEPUSH_DEBUG === 'true';

/**
 * Turn verbose output on or off (--verbose)
 */
export function setVerbose(enabled: boolean): void {
  verboseEnabled = enabled || process.env.SITEPUSH_DEBUG === 'true';
}

export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Log error message (stderr)
 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Log verbose message (only with --verbose or SITEPUSH_DEBUG=true)
 */
export function verbose(message: string): void {
  if (verboseEnabled) {
    console.log(chalk.gray('[verbose]'), message);
  }
}

export function section(title: string): void {
  console.log();
  console.log(chalk.bold.cyan(`━━━ ${title} ━━━`));
  console.log();
}

export function keyValue(key: string, value: string): void {
  console.log(chalk.gray(`${key}:`), chalk.white(value));
}

export function newline(): void {
  console.log();
}

/**
 * One line per file result
 */
export function fileResult(result: FileResult, dryRun: boolean = false): void {
  switch (result.status) {
    case 'uploaded':
      console.log(chalk.green(dryRun ? '  ↑ would upload' : '  ↑ uploaded'), result.key);
      break;
    case 'skipped':
      verbose(`skipped ${result.key} (${result.reason ?? 'unchanged'}, ${result.digest ?? ''})`);
      break;
    case 'ignored':
      console.log(chalk.gray('  ○ ignored'), result.key, chalk.gray('(not a regular file)'));
      break;
    case 'failed':
      console.error(chalk.red('  ✗ failed'), result.key, chalk.red(result.error ?? ''));
      break;
  }
}
