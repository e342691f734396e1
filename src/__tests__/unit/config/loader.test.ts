/**
 * Config loader tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { join } from 'node:path';
import { mkdirSync } from 'node:fs';
import { findConfigFile, loadConfigFile } from '../../../core/config/loader.js';
import { loadConfig } from '../../../core/config/index.js';
import { ValidationError } from '../../../core/errors.js';
import { createTestSite, type TestSite } from '../../helpers/integration-helpers.js';

const fixturesDir = join(__dirname, '../../fixtures/configs');

const ENV_KEYS = ['SITEPUSH_BUCKET', 'AWS_REGION', 'AWS_PROFILE'] as const;

describe('Config Loader', () => {
  let site: TestSite;
  const savedEnv: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};

  beforeEach(() => {
    site = createTestSite();
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    site.cleanup();
    for (const key of ENV_KEYS) {
      const value = savedEnv[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  describe('findConfigFile', () => {
    it('should find a config file in the start directory', () => {
      const path = site.write('sitepush.config.ts', 'export default {};');

      expect(findConfigFile(site.rootDir)).toBe(path);
    });

    it('should look in parent directories', () => {
      const path = site.write('sitepush.config.js', 'module.exports = {};');
      const nested = join(site.rootDir, 'a', 'b');
      mkdirSync(nested, { recursive: true });

      expect(findConfigFile(nested)).toBe(path);
    });

    it('should prefer .ts over .js', () => {
      site.write('sitepush.config.js', 'module.exports = {};');
      const tsPath = site.write('sitepush.config.ts', 'export default {};');

      expect(findConfigFile(site.rootDir)).toBe(tsPath);
    });
  });

  describe('loadConfigFile', () => {
    it('should load a TypeScript default export', async () => {
      const config = await loadConfigFile(join(fixturesDir, 'valid-basic.config.ts'));

      expect(config).toEqual({ bucket: 'test-bucket' });
    });

    it('should call a function export', async () => {
      const config = await loadConfigFile(join(fixturesDir, 'function-export.config.ts'));

      expect(config).toEqual({ bucket: 'function-bucket' });
    });

    it('should call a CommonJS function export that reads beside itself', async () => {
      site.write('bucket.txt', 'from-file\n');
      const path = site.write(
        'sitepush.config.js',
        [
          "const { readFileSync } = require('fs');",
          "const { join } = require('path');",
          "module.exports = () => ({ bucket: readFileSync(join(__dirname, 'bucket.txt'), 'utf-8').trim() });",
        ].join('\n')
      );

      const config = await loadConfigFile(path);

      expect(config).toEqual({ bucket: 'from-file' });
    });

    it('should reject a missing file', async () => {
      await expect(loadConfigFile(join(site.rootDir, 'nope.config.ts'))).rejects.toThrow(
        'Config file not found'
      );
    });

    it('should wrap syntax errors', async () => {
      const path = site.write('sitepush.config.ts', 'export default {');

      await expect(loadConfigFile(path)).rejects.toThrow('Failed to load config file');
    });
  });

  describe('loadConfig', () => {
    it('should return defaults when there is no config file', async () => {
      const { config, configPath, envFiles } = await loadConfig({ cwd: site.rootDir });

      expect(configPath).toBeNull();
      expect(envFiles).toEqual([]);
      expect(config.bucket).toBeUndefined();
      expect(config.sync.root).toBe('.');
    });

    it('should load every section of a full config', async () => {
      const { config } = await loadConfig({
        cwd: site.rootDir,
        configPath: join(fixturesDir, 'valid-full.config.ts'),
      });

      expect(config).toEqual({
        bucket: 'test-bucket-full',
        region: 'ap-northeast-2',
        profile: 'deploy',
        sync: {
          root: './public',
          chunkSize: 16777216,
          concurrency: 4,
          exclude: ['**/*.map'],
        },
        website: {
          indexDocument: 'home.html',
          errorDocument: '404.html',
        },
      });
    });

    it('should let the config file override environment variables', async () => {
      process.env.SITEPUSH_BUCKET = 'env-bucket';
      process.env.AWS_REGION = 'eu-west-1';

      const { config } = await loadConfig({
        cwd: site.rootDir,
        configPath: join(fixturesDir, 'valid-basic.config.ts'),
      });

      expect(config.bucket).toBe('test-bucket');
      expect(config.region).toBe('eu-west-1');
    });

    it('should let overrides win over the config file', async () => {
      const { config } = await loadConfig({
        cwd: site.rootDir,
        configPath: join(fixturesDir, 'valid-basic.config.ts'),
        overrides: { bucket: 'cli-bucket', region: undefined },
      });

      expect(config.bucket).toBe('cli-bucket');
      expect(config.region).toBeUndefined();
    });

    it('should read SITEPUSH_BUCKET from a .env file', async () => {
      site.write('.env', 'SITEPUSH_BUCKET=dotenv-bucket\n');

      const { config, envFiles } = await loadConfig({ cwd: site.rootDir });

      expect(envFiles).toEqual(['.env']);
      expect(config.bucket).toBe('dotenv-bucket');
    });

    it('should reject an invalid bucket name', async () => {
      await expect(
        loadConfig({ cwd: site.rootDir, configPath: join(fixturesDir, 'invalid-bucket-name.config.ts') })
      ).rejects.toThrow('bucket: Bucket name must follow S3 naming rules');
    });

    it('should reject a chunk size below 5 MiB', async () => {
      await expect(
        loadConfig({ cwd: site.rootDir, configPath: join(fixturesDir, 'invalid-chunk-size.config.ts') })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('should reject a config that is not an object', async () => {
      const path = site.write('sitepush.config.js', 'module.exports = 42;');

      await expect(loadConfig({ cwd: site.rootDir, configPath: path })).rejects.toThrow(
        'Config file must export an object'
      );
    });
  });
});
