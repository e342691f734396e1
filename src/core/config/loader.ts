/**
 * Config file loader using jiti for TypeScript runtime execution
 */

import jiti from 'jiti';
import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { ValidationError, getErrorMessage } from '../errors.js';

/**
 * Config file names to search for (in order of priority)
 */
export const CONFIG_FILE_NAMES = [
  'sitepush.config.ts',
  'sitepush.config.js',
  'sitepush.config.mjs',
  'sitepush.config.cjs',
] as const;

/**
 * Find config file in directory and parent directories
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = join(currentDir, fileName);
      if (existsSync(configPath)) {
        return configPath;
      }
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Unwrap the shapes a config module can take: an object, a default export,
 * or a function (possibly behind a default export) returning the object
 */
function unwrapConfigModule(configModule: unknown): unknown {
  let value = configModule;

  if (value && typeof value === 'object' && 'default' in value) {
    value = value.default;
  }

  if (typeof value === 'function') {
    value = value();
  }

  return value;
}

/**
 * Load config file using jiti
 *
 * The result is not validated yet; see validateConfig.
 */
export async function loadConfigFile(configPath: string): Promise<unknown> {
  const absoluteConfigPath = resolve(configPath);

  if (!existsSync(absoluteConfigPath)) {
    throw new ValidationError(`Config file not found: ${configPath}`);
  }

  try {
    const jitiInstance = jiti(__filename, {
      interopDefault: true,
      requireCache: false,
      esmResolve: true,
      cache: false,
    });

    return unwrapConfigModule(jitiInstance(absoluteConfigPath));
  } catch (error: unknown) {
    throw new ValidationError(
      `Failed to load config file: ${configPath}\n${getErrorMessage(error)}`,
      { cause: error }
    );
  }
}
