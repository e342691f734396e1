/**
 * Config system entry point
 */

import type {
  ConfigOverrides,
  LoadConfigOptions,
  ResolvedConfig,
  SitePushConfig,
} from '../../types/config.js';
import { ValidationError } from '../errors.js';
import { loadEnvFiles } from './env-loader.js';
import { findConfigFile, loadConfigFile } from './loader.js';
import { validateConfig } from './schema.js';

/**
 * Loaded configuration and where it came from
 */
export interface LoadedConfig {
  config: ResolvedConfig;

  /** Config file used, or null when none was found */
  configPath: string | null;

  /** .env files applied, highest priority first */
  envFiles: string[];
}

/**
 * Values read from environment variables
 */
function configFromEnv(): ConfigOverrides {
  return {
    bucket: process.env.SITEPUSH_BUCKET || undefined,
    region: process.env.AWS_REGION || undefined,
    profile: process.env.AWS_PROFILE || undefined,
  };
}

/**
 * Drop undefined values so they don't mask lower-priority sources
 */
function definedOnly(values: ConfigOverrides = {}): ConfigOverrides {
  return Object.fromEntries(
    Object.entries(values).filter(([, value]) => value !== undefined)
  );
}

/**
 * Load and validate sitepush configuration
 *
 * Priority (highest first): overrides (CLI flags), config file, environment
 * variables (SITEPUSH_BUCKET, AWS_REGION, AWS_PROFILE). The config file is
 * optional unless `configPath` is given.
 *
 * @example
 * ```ts
 * // Discover sitepush.config.ts from the current directory upwards
 * const { config } = await loadConfig();
 *
 * // Load .env.prod and a specific file, with a CLI override
 * const { config } = await loadConfig({
 *   env: 'prod',
 *   configPath: './deploy/sitepush.config.ts',
 *   overrides: { bucket: 'my-site' },
 * });
 * ```
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const { configPath, env, cwd = process.cwd(), overrides } = options;

  // .env files first so the config file can reference process.env
  const envFiles = loadEnvFiles(env, cwd);

  const resolvedPath = configPath ?? findConfigFile(cwd);
  const fileConfig = resolvedPath ? await loadConfigFile(resolvedPath) : {};

  if (!fileConfig || typeof fileConfig !== 'object' || Array.isArray(fileConfig)) {
    throw new ValidationError(
      `Config file must export an object: ${resolvedPath ?? '(none)'}`
    );
  }

  const config = validateConfig({
    ...definedOnly(configFromEnv()),
    ...fileConfig,
    ...definedOnly(overrides),
  });

  return { config, configPath: resolvedPath, envFiles };
}

export { findConfigFile, loadConfigFile, CONFIG_FILE_NAMES } from './loader.js';
export { loadEnvFiles, getEnvFileNames } from './env-loader.js';
export {
  configSchema,
  validateConfig,
  bucketNameSchema,
  regionSchema,
  MIN_CHUNK_SIZE,
  MAX_CHUNK_SIZE,
  MAX_CONCURRENCY,
} from './schema.js';

// Re-export types
export type { SitePushConfig, ResolvedConfig, LoadConfigOptions, ConfigOverrides };
