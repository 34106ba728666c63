import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import path from 'path';
import fs from 'fs/promises';
import { Syncer } from '../../../../../src/features/local/sync/Syncer.js';
import type { IObjectStore } from '../../../../../src/features/aws/ObjectStore.js';
import type { EnvironmentDetails } from '../../../../../src/features/aws/EnvironmentClient.js';
import { FileSystemAdapter } from '../../../../../src/platform/FileSystemAdapter.js';
import {
  ArchiveEntryTooLargeError,
  ConfigurationError,
  UnsafePathError,
} from '../../../../../src/shared/utils/errors.js';
import { createTempDir, createTestLogger } from '../../../../helpers/fakes.js';
import { createZip } from '../../../../helpers/zip.js';

const BUCKET_ARN = 'arn:aws:s3:::test-airflow-bucket';

describe('Syncer', () => {
  let cwd: string;
  let objects: Map<string, Uint8Array>;
  let store: { getObject: Mock<IObjectStore['getObject']> };

  const environment = (overrides: Partial<EnvironmentDetails> = {}): EnvironmentDetails => ({
    name: 'test-env',
    sourceBucketArn: BUCKET_ARN,
    airflowConfigurationOptions: {},
    logGroupArns: {},
    ...overrides,
  });

  const createSyncer = (maxEntryBytes?: number) =>
    new Syncer(
      { clonePath: './runner', dagsPath: '.', cwd, maxEntryBytes },
      { fs: new FileSystemAdapter(), store, logger: createTestLogger() }
    );

  beforeEach(async () => {
    cwd = await createTempDir();
    objects = new Map();
    store = {
      getObject: vi.fn<IObjectStore['getObject']>().mockImplementation(async (_bucket, key) => {
        const object = objects.get(key);
        if (!object) {
          throw new Error(`NoSuchKey: ${key}`);
        }
        return object;
      }),
    };
  });

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true });
  });

  it('should download requirements and the startup script at their versions', async () => {
    objects.set('requirements.txt', Buffer.from('apache-airflow-providers-amazon\n'));
    objects.set('scripts/startup.sh', Buffer.from('#!/bin/sh\nexport FOO=bar\n'));

    const results = await createSyncer().sync(
      environment({
        requirementsS3Path: 'requirements.txt',
        requirementsS3ObjectVersion: 'v-req',
        startupScriptS3Path: 'scripts/startup.sh',
      })
    );

    const requirements = path.join(cwd, 'runner', 'requirements', 'requirements.txt');
    const startup = path.join(cwd, 'runner', 'startup_script', 'startup.sh');
    expect(results).toEqual([
      { item: 'requirements', status: 'synced', target: requirements },
      { item: 'startup-script', status: 'synced', target: startup },
      { item: 'plugins', status: 'not-configured' },
    ]);
    expect(store.getObject).toHaveBeenCalledWith(
      'test-airflow-bucket',
      'requirements.txt',
      'v-req'
    );
    expect(store.getObject).toHaveBeenCalledWith(
      'test-airflow-bucket',
      'scripts/startup.sh',
      undefined
    );
    expect(await fs.readFile(requirements, 'utf-8')).toBe('apache-airflow-providers-amazon\n');
    expect(await fs.readFile(startup, 'utf-8')).toBe('#!/bin/sh\nexport FOO=bar\n');
  });

  it('should report every item as not configured on a bare environment', async () => {
    const results = await createSyncer().sync(environment());

    expect(results.map((result) => result.status)).toEqual([
      'not-configured',
      'not-configured',
      'not-configured',
    ]);
    expect(store.getObject).not.toHaveBeenCalled();
  });

  it('should extract the plugins archive', async () => {
    objects.set(
      'plugins.zip',
      createZip([
        { name: 'operators/' },
        { name: 'operators/custom.py', content: 'class CustomOperator: ...\n' },
        { name: '__init__.py', content: '' },
      ])
    );

    const [, , plugins] = await createSyncer().sync(
      environment({ pluginsS3Path: 'plugins.zip' })
    );

    const pluginsDir = path.join(cwd, 'runner', 'plugins');
    expect(plugins).toEqual({
      item: 'plugins',
      status: 'synced',
      target: pluginsDir,
      files: 2,
    });
    expect(await fs.readFile(path.join(pluginsDir, 'operators', 'custom.py'), 'utf-8')).toBe(
      'class CustomOperator: ...\n'
    );
  });

  it('should refuse an archive entry that escapes the plugins directory', async () => {
    objects.set(
      'plugins.zip',
      createZip([
        { name: 'ok.py', content: 'ok\n' },
        { name: '../../escaped.py', content: 'bad\n' },
      ])
    );

    await expect(
      createSyncer().sync(environment({ pluginsS3Path: 'plugins.zip' }))
    ).rejects.toThrow(UnsafePathError);
    await expect(fs.access(path.join(cwd, 'runner', 'plugins', 'ok.py'))).rejects.toThrow();
    await expect(fs.access(path.join(cwd, 'escaped.py'))).rejects.toThrow();
  });

  it('should refuse an archive entry larger than the limit', async () => {
    objects.set(
      'plugins.zip',
      createZip([{ name: 'huge.bin', content: 'x', declaredSize: 100 * 1024 * 1024 + 1 }])
    );

    await expect(
      createSyncer().sync(environment({ pluginsS3Path: 'plugins.zip' }))
    ).rejects.toThrow(ArchiveEntryTooLargeError);
  });

  it('should count inflated bytes when an entry under-declares its size', async () => {
    objects.set(
      'plugins.zip',
      createZip([
        { name: 'small.py', content: 'ok\n' },
        { name: 'bomb.bin', content: 'x'.repeat(4096), declaredSize: 10 },
      ])
    );

    const error = await createSyncer(1024)
      .sync(environment({ pluginsS3Path: 'plugins.zip' }))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ArchiveEntryTooLargeError);
    await expect(fs.access(path.join(cwd, 'runner', 'plugins', 'bomb.bin'))).rejects.toThrow();
  });

  it('should require a source bucket', async () => {
    await expect(
      createSyncer().sync(environment({ sourceBucketArn: undefined }))
    ).rejects.toThrow(new ConfigurationError('environment test-env has no source bucket'));
  });
});
