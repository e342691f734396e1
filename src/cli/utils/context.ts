/**
 * Shared command setup: configuration, client and verbosity
 */

import type { S3Client } from '@aws-sdk/client-s3';
import { createS3ClientFromConfig } from '../../core/aws/client.js';
import { loadConfig } from '../../core/config/index.js';
import { ValidationError } from '../../core/errors.js';
import type { ResolvedConfig } from '../../types/config.js';
import * as logger from './logger.js';

/**
 * Options defined on the root program
 */
export interface GlobalOptions {
  profile?: string;
  region?: string;
  config?: string;
  env?: string;
  verbose?: boolean;
}

/**
 * Everything a command handler needs
 */
export interface CommandContext {
  config: ResolvedConfig;
  client: S3Client;
}

/**
 * Load configuration and create the S3 client for a command
 */
export async function createContext(
  options: GlobalOptions,
  bucket?: string
): Promise<CommandContext> {
  logger.setVerbose(options.verbose ?? false);

  const { config, configPath, envFiles } = await loadConfig({
    configPath: options.config,
    env: options.env,
    overrides: { bucket, region: options.region, profile: options.profile },
  });

  if (envFiles.length > 0) {
    logger.verbose(`Loaded environment files: ${envFiles.join(', ')}`);
  }
  logger.verbose(configPath ? `Loaded config from: ${configPath}` : 'No config file found');

  return { config, client: createS3ClientFromConfig(config) };
}

/**
 * Bucket from the command line or configuration
 */
export function requireBucket(config: ResolvedConfig): string {
  if (!config.bucket) {
    throw new ValidationError(
      'No bucket given. Pass it as an argument, set "bucket" in sitepush.config.ts or SITEPUSH_BUCKET.'
    );
  }
  return config.bucket;
}
