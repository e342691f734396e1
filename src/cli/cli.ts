/**
 * CLI configuration
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { createCreateBucketCommand } from './commands/create-bucket.js';
import { createEnableWebsiteCommand } from './commands/enable-website.js';
import { createMakePublicCommand } from './commands/make-public.js';
import { createListBucketsCommand } from './commands/list-buckets.js';
import { createListObjectsCommand } from './commands/list-objects.js';
import { createUploadCommand } from './commands/upload.js';
import { createSyncCommand } from './commands/sync.js';

/**
 * Get package version
 */
function getVersion(): string {
  try {
    const packageJsonPath = join(__dirname, '../../package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      packageJson &&
      typeof packageJson === 'object' &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

/**
 * Create CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('sitepush')
    .description('Incremental S3 static site sync and bucket website setup')
    .version(getVersion())
    .option('-p, --profile <name>', 'AWS profile to use')
    .option('-r, --region <region>', 'AWS region')
    .option('-c, --config <path>', 'Config file path')
    .option('-e, --env <name>', 'Load .env.<name> files')
    .option('-v, --verbose', 'Verbose output', false);

  program.addCommand(createCreateBucketCommand());
  program.addCommand(createEnableWebsiteCommand());
  program.addCommand(createMakePublicCommand());
  program.addCommand(createListBucketsCommand());
  program.addCommand(createListObjectsCommand());
  program.addCommand(createUploadCommand());
  program.addCommand(createSyncCommand());

  return program;
}
