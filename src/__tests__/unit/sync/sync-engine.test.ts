/**
 * Incremental sync tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mockClient } from 'aws-sdk-client-mock';
import {
  S3Client,
  PutObjectCommand,
  ListObjectsV2Command,
  CreateMultipartUploadCommand,
  UploadPartCommand,
} from '@aws-sdk/client-s3';
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import { syncDirectory, syncFile } from '../../../core/sync/sync-engine.js';
import { RemoteCallError, ValidationError } from '../../../core/errors.js';
import { validateConfig } from '../../../core/config/schema.js';
import {
  createTestSite,
  binaryContent,
  singlePartETag,
  multipartETag,
  useInMemoryBucket,
  type TestSite,
} from '../../helpers/integration-helpers.js';

const MIB = 1024 * 1024;

describe('Sync Engine', () => {
  const s3Mock = mockClient(S3Client);
  let client: S3Client;
  let site: TestSite;

  beforeEach(() => {
    s3Mock.reset();
    client = new S3Client({ region: 'us-east-1' });
    site = createTestSite({
      'index.html': '<h1>Hi</h1>',
      'about.html': '<h1>About</h1>',
      'css/app.css': 'body { margin: 0 }',
    });
  });

  afterEach(() => {
    s3Mock.restore();
    site.cleanup();
  });

  const putKeys = () =>
    s3Mock.commandCalls(PutObjectCommand).map((call) => call.args[0].input.Key);

  describe('syncDirectory', () => {
    it('should upload every file to an empty bucket', async () => {
      const bucket = useInMemoryBucket(s3Mock);

      const report = await syncDirectory(client, { bucket: 'my-bucket', root: site.rootDir });

      expect(putKeys()).toEqual(['about.html', 'css/app.css', 'index.html']);
      expect(report).toMatchObject({
        bucket: 'my-bucket',
        root: site.rootDir,
        dryRun: false,
        totalFiles: 3,
        uploaded: 3,
        skipped: 0,
        failed: 0,
        ignored: 0,
      });
      expect(bucket.get('index.html')).toBe(singlePartETag('<h1>Hi</h1>'));
    });

    it('should sync with the largest chunk size the config accepts', async () => {
      const config = validateConfig({ sync: { chunkSize: 1024 * MIB } });
      const bucket = useInMemoryBucket(s3Mock);

      const report = await syncDirectory(client, {
        bucket: 'my-bucket',
        root: site.rootDir,
        chunkSize: config.sync.chunkSize,
      });

      expect(report.uploaded).toBe(3);
      expect(report.failed).toBe(0);
      expect(bucket.get('index.html')).toBe(singlePartETag('<h1>Hi</h1>'));
      expect(s3Mock.commandCalls(CreateMultipartUploadCommand)).toHaveLength(0);
    });

    it('should fail only the file removed while the sync runs', async () => {
      useInMemoryBucket(s3Mock);

      const report = await syncDirectory(client, {
        bucket: 'my-bucket',
        root: site.rootDir,
        onFile: (result) => {
          if (result.key === 'about.html') {
            rmSync(join(site.rootDir, 'index.html'));
          }
        },
      });

      expect(putKeys()).toEqual(['about.html', 'css/app.css']);
      expect(report.uploaded).toBe(2);
      expect(report.failed).toBe(1);
      const failed = report.results.find((result) => result.key === 'index.html');
      expect(failed?.status).toBe('failed');
      expect(failed?.error).toMatch(/^Could not read file: ENOENT/);
    });

    it('should upload nothing when run twice without changes', async () => {
      useInMemoryBucket(s3Mock);
      await syncDirectory(client, { bucket: 'my-bucket', root: site.rootDir });
      s3Mock.resetHistory();

      const report = await syncDirectory(client, { bucket: 'my-bucket', root: site.rootDir });

      expect(putKeys()).toEqual([]);
      expect(report.uploaded).toBe(0);
      expect(report.skipped).toBe(3);
      expect(report.results.every((result) => result.reason === 'unchanged')).toBe(true);
    });

    it('should upload exactly the one file that changed', async () => {
      useInMemoryBucket(s3Mock);
      await syncDirectory(client, { bucket: 'my-bucket', root: site.rootDir });
      s3Mock.resetHistory();

      site.write('about.html', '<h1>About us</h1>');
      const report = await syncDirectory(client, { bucket: 'my-bucket', root: site.rootDir });

      expect(putKeys()).toEqual(['about.html']);
      expect(report.uploaded).toBe(1);
      expect(report.skipped).toBe(2);
      expect(report.uploadedBytes).toBe(17);
    });

    it('should upload a new file and leave remote-only objects alone', async () => {
      const bucket = useInMemoryBucket(s3Mock, {
        initial: { 'old/page.html': '"0123456789abcdef0123456789abcdef"' },
      });
      await syncDirectory(client, { bucket: 'my-bucket', root: site.rootDir });
      s3Mock.resetHistory();

      site.write('contact.html', '<h1>Contact</h1>');
      await syncDirectory(client, { bucket: 'my-bucket', root: site.rootDir });

      expect(putKeys()).toEqual(['contact.html']);
      expect(bucket.has('old/page.html')).toBe(true);
    });

    it('should skip a small file and a multipart file that already match the bucket', async () => {
      const logo = binaryContent(9 * MIB);
      const small = createTestSite({ 'index.html': '0123456789', 'img/logo.png': logo });
      try {
        useInMemoryBucket(s3Mock, {
          initial: {
            'index.html': singlePartETag('0123456789'),
            'img/logo.png': multipartETag(logo, 8 * MIB),
          },
        });

        const report = await syncDirectory(client, { bucket: 'my-bucket', root: small.rootDir });

        expect(report.uploaded).toBe(0);
        expect(report.skipped).toBe(2);
        expect(s3Mock.commandCalls(PutObjectCommand)).toHaveLength(0);
        expect(s3Mock.commandCalls(CreateMultipartUploadCommand)).toHaveLength(0);
      } finally {
        small.cleanup();
      }
    });

    it('should store a multipart file under the tag the next sync computes', async () => {
      const logo = binaryContent(9 * MIB);
      const small = createTestSite({ 'index.html': '0123456789', 'img/logo.png': logo });
      try {
        const bucket = useInMemoryBucket(s3Mock);

        const first = await syncDirectory(client, { bucket: 'my-bucket', root: small.rootDir });

        expect(first.uploaded).toBe(2);
        expect(first.uploadedBytes).toBe(10 + 9 * MIB);
        expect(putKeys()).toEqual(['index.html']);
        expect(s3Mock.commandCalls(UploadPartCommand)).toHaveLength(2);
        expect(bucket.get('img/logo.png')).toBe(multipartETag(logo, 8 * MIB));

        s3Mock.resetHistory();
        const second = await syncDirectory(client, { bucket: 'my-bucket', root: small.rootDir });

        expect(second.uploaded).toBe(0);
        expect(s3Mock.commandCalls(UploadPartCommand)).toHaveLength(0);
      } finally {
        small.cleanup();
      }
    });

    it('should abort before any upload when the listing fails', async () => {
      s3Mock.on(ListObjectsV2Command).rejects({
        name: 'AccessDenied',
        message: 'Access Denied',
        $metadata: { httpStatusCode: 403 },
      });

      await expect(
        syncDirectory(client, { bucket: 'my-bucket', root: site.rootDir })
      ).rejects.toBeInstanceOf(RemoteCallError);
      expect(s3Mock.commandCalls(PutObjectCommand)).toHaveLength(0);
    });

    it('should reject a root that is not a directory before calling S3', async () => {
      await expect(
        syncDirectory(client, { bucket: 'my-bucket', root: `${site.rootDir}/index.html` })
      ).rejects.toBeInstanceOf(ValidationError);
      expect(s3Mock.calls()).toHaveLength(0);
    });

    it('should record a failed upload and continue with the rest', async () => {
      useInMemoryBucket(s3Mock, { failOnce: ['about.html'] });

      const report = await syncDirectory(client, { bucket: 'my-bucket', root: site.rootDir });

      expect(report.failed).toBe(1);
      expect(report.uploaded).toBe(2);
      const failed = report.results.find((result) => result.status === 'failed');
      expect(failed?.key).toBe('about.html');
      expect(failed?.error).toBe('Upload about.html failed (bucket: my-bucket): connection reset');
    });

    it('should report what would be uploaded without uploading in dry run mode', async () => {
      useInMemoryBucket(s3Mock);

      const report = await syncDirectory(client, {
        bucket: 'my-bucket',
        root: site.rootDir,
        dryRun: true,
      });

      expect(report.dryRun).toBe(true);
      expect(report.uploaded).toBe(3);
      expect(s3Mock.commandCalls(PutObjectCommand)).toHaveLength(0);
    });

    it('should leave out excluded files', async () => {
      useInMemoryBucket(s3Mock);

      const report = await syncDirectory(client, {
        bucket: 'my-bucket',
        root: site.rootDir,
        exclude: ['css/**'],
      });

      expect(report.totalFiles).toBe(2);
      expect(putKeys()).toEqual(['about.html', 'index.html']);
    });

    it('should call onFile once per file with a running count', async () => {
      useInMemoryBucket(s3Mock);
      const seen: [string, number, number][] = [];

      await syncDirectory(client, {
        bucket: 'my-bucket',
        root: site.rootDir,
        onFile: (result, completed, total) => seen.push([result.key, completed, total]),
      });

      expect(seen).toEqual([
        ['about.html', 1, 3],
        ['css/app.css', 2, 3],
        ['index.html', 3, 3],
      ]);
    });
  });

  describe('syncFile', () => {
    it('should report a file that vanished after the walk as failed', async () => {
      const result = await syncFile(
        client,
        'my-bucket',
        {
          absolutePath: `${site.rootDir}/gone.html`,
          relativePath: 'gone.html',
          key: 'gone.html',
          size: 4,
          contentType: 'text/html',
        },
        new Map()
      );

      expect(result.status).toBe('failed');
      expect(result.size).toBe(0);
      expect(result.error).toMatch(/^Could not read file: ENOENT/);
      expect(s3Mock.calls()).toHaveLength(0);
    });

    it('should skip a file whose tag is in the manifest', async () => {
      const path = site.write('hello.txt', 'hello');

      const result = await syncFile(
        client,
        'my-bucket',
        { absolutePath: path, relativePath: 'hello.txt', key: 'hello.txt', size: 5, contentType: 'text/plain' },
        new Map([['hello.txt', '"5d41402abc4b2a76b9719d911017c592"']])
      );

      expect(result).toMatchObject({
        key: 'hello.txt',
        status: 'skipped',
        reason: 'unchanged',
        digest: '"5d41402abc4b2a76b9719d911017c592"',
        size: 0,
      });
    });
  });
});
