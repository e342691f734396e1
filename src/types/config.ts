/**
 * Configuration types for sitepush
 */

/**
 * Sync settings
 */
export interface SyncConfig {
  /** Local directory synced when none is given on the command line (default: '.') */
  root?: string;

  /**
   * Digest chunk size and multipart part size in bytes (default: 8 MiB)
   *
   * Must match the part size the objects were uploaded with, otherwise
   * multipart entity tags never compare equal and every large file is re-uploaded.
   */
  chunkSize?: number;

  /** Files digested and uploaded at once (default: 1) */
  concurrency?: number;

  /** Glob patterns to leave out of syncs and directory uploads */
  exclude?: string[];
}

/**
 * Static website hosting settings
 */
export interface WebsiteConfig {
  /** Index document suffix (default: index.html) */
  indexDocument?: string;

  /** Error document key (default: error.html) */
  errorDocument?: string;
}

/**
 * Main sitepush configuration interface
 */
export interface SitePushConfig {
  /** Default bucket for commands that take one */
  bucket?: string;

  /** AWS region (falls back to the SDK's default chain) */
  region?: string;

  /** Named profile from ~/.aws/credentials */
  profile?: string;

  sync?: SyncConfig;

  website?: WebsiteConfig;
}

/**
 * Configuration after validation and defaults
 */
export interface ResolvedConfig {
  bucket?: string;
  region?: string;
  profile?: string;
  sync: Required<SyncConfig>;
  website: Required<WebsiteConfig>;
}

/**
 * Values that take precedence over the config file (usually CLI flags)
 */
export type ConfigOverrides = Pick<SitePushConfig, 'bucket' | 'region' | 'profile'>;

/**
 * Load config options
 */
export interface LoadConfigOptions {
  /** Config file path (default: auto-discover) */
  configPath?: string;

  /** Environment name selecting .env.<env> files */
  env?: string;

  /** Directory to start discovery and .env lookup from (default: process.cwd()) */
  cwd?: string;

  overrides?: ConfigOverrides;
}

/**
 * Helper function to define config with type safety
 */
export function defineConfig(config: SitePushConfig): SitePushConfig {
  return config;
}
