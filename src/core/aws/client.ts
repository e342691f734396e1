/**
 * AWS client creation helpers
 */

import { S3Client } from '@aws-sdk/client-s3';
import { fromIni } from '@aws-sdk/credential-providers';
import type { ResolvedConfig } from '../../types/config.js';

/**
 * Client options
 */
export interface S3ClientOptions {
  /** Region override; the SDK default chain is used when absent */
  region?: string;

  /** Named profile from ~/.aws/credentials */
  profile?: string;
}

/**
 * Create the S3 client every operation receives
 */
export function createS3Client(options: S3ClientOptions = {}): S3Client {
  const { region, profile } = options;

  return new S3Client({
    ...(region && { region }),
    ...(profile && { credentials: fromIni({ profile }) }),
  });
}

/**
 * Create S3 client from resolved configuration
 */
export function createS3ClientFromConfig(config: ResolvedConfig): S3Client {
  return createS3Client({ region: config.region, profile: config.profile });
}
