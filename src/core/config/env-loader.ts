/**
 * Environment variables loader
 */

import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

/**
 * .env files for an environment, highest priority first
 *
 * @example
 * ```ts
 * getEnvFileNames('prod');
 * // ['.env.prod.local', '.env.prod', '.env.local', '.env']
 * ```
 */
export function getEnvFileNames(environment?: string): string[] {
  return [
    ...(environment ? [`.env.${environment}.local`, `.env.${environment}`] : []),
    '.env.local',
    '.env',
  ];
}

/**
 * Load .env files so config files can read process.env
 *
 * Files are applied from lowest to highest priority with override on, so
 * `.env.<env>.local` wins over `.env`.
 *
 * @returns Names of the files that were loaded, highest priority first
 */
export function loadEnvFiles(
  environment?: string,
  configDir: string = process.cwd()
): string[] {
  const loaded: string[] = [];

  for (const file of [...getEnvFileNames(environment)].reverse()) {
    const filePath = resolve(configDir, file);

    if (existsSync(filePath)) {
      dotenvConfig({ path: filePath, override: true });
      loaded.unshift(file);
    }
  }

  return loaded;
}
