/**
 * Zod schemas for sitepush configuration validation
 */

import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { DEFAULT_CHUNK_SIZE } from '../sync/etag.js';
import type { ResolvedConfig } from '../../types/config.js';

const MIB = 1024 * 1024;

/**
 * Parts are at least 5 MiB (S3 multipart minimum). The multipart uploader holds
 * one part in memory, so the upper bound stays well below Node's Buffer limit.
 */
export const MIN_CHUNK_SIZE = 5 * MIB;
export const MAX_CHUNK_SIZE = 1024 * MIB;

/**
 * Parallel digests and uploads
 */
export const MAX_CONCURRENCY = 16;

/**
 * Bucket name schema (S3 naming rules)
 */
export const bucketNameSchema = z
  .string()
  .min(3, 'Bucket name must be at least 3 characters')
  .max(63, 'Bucket name must be at most 63 characters')
  .regex(/^[a-z0-9][a-z0-9.-]*[a-z0-9]$/, 'Bucket name must follow S3 naming rules');

/**
 * Region schema (e.g. us-east-1, us-gov-west-1)
 */
export const regionSchema = z
  .string()
  .regex(/^[a-z]{2}(-[a-z]+)+-\d+$/, 'Must be a valid AWS region (e.g., us-east-1)');

const syncConfigSchema = z
  .object({
    root: z.string().min(1, 'Sync root cannot be empty').default('.'),
    chunkSize: z
      .number()
      .int()
      .min(MIN_CHUNK_SIZE, 'Chunk size must be at least 5 MiB')
      .max(MAX_CHUNK_SIZE, 'Chunk size must be at most 1 GiB')
      .default(DEFAULT_CHUNK_SIZE),
    concurrency: z.number().int().min(1).max(MAX_CONCURRENCY).default(1),
    exclude: z.array(z.string()).default([]),
  })
  .default({});

const websiteConfigSchema = z
  .object({
    indexDocument: z.string().min(1).default('index.html'),
    errorDocument: z.string().min(1).default('error.html'),
  })
  .default({});

/**
 * Main sitepush configuration schema
 */
export const configSchema = z.object({
  bucket: bucketNameSchema.optional(),
  region: regionSchema.optional(),
  profile: z.string().min(1).optional(),
  sync: syncConfigSchema,
  website: websiteConfigSchema,
});

/**
 * Validate config and apply defaults
 *
 * @throws ValidationError listing every issue
 */
export function validateConfig(config: unknown): ResolvedConfig {
  const result = configSchema.safeParse(config);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `  - ${path}: ${issue.message}`;
    });
    throw new ValidationError(`Config validation failed:\n${issues.join('\n')}`, {
      cause: result.error,
    });
  }

  return result.data;
}
