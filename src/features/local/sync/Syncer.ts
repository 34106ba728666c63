/**
 * Pulls an environment's requirements, startup script and plugins into the clone
 */

import path from 'path';
import unzipper from 'unzipper';
import type { File as ArchiveFile } from 'unzipper';
import type { IFileSystem } from '../../../platform/IFileSystem.js';
import type { ILogger } from '../../../shared/utils/logger.js';
import { ArchiveEntryTooLargeError, ConfigurationError } from '../../../shared/utils/errors.js';
import { resolveInside } from '../../../shared/utils/paths.js';
import { bucketNameFromArn } from '../../aws/arn.js';
import type { EnvironmentDetails } from '../../aws/EnvironmentClient.js';
import type { IObjectStore } from '../../aws/ObjectStore.js';
import { resolveRunnerPaths } from '../runner/types.js';

export const MAX_ARCHIVE_ENTRY_BYTES = 100 * 1024 * 1024;

export type SyncItem = 'requirements' | 'startup-script' | 'plugins';

export interface SyncResult {
  item: SyncItem;
  status: 'synced' | 'not-configured';
  /** Written file, or the extraction directory for plugins */
  target?: string;
  /** Files extracted from the plugins archive */
  files?: number;
}

export interface SyncerOptions {
  clonePath: string;
  dagsPath: string;
  cwd?: string;
  /** Per-entry cap on inflated bytes; defaults to MAX_ARCHIVE_ENTRY_BYTES */
  maxEntryBytes?: number;
}

export interface SyncerDeps {
  fs: IFileSystem;
  store: IObjectStore;
  logger: ILogger;
}

export class Syncer {
  private readonly fs: IFileSystem;
  private readonly store: IObjectStore;
  private readonly logger: ILogger;
  private readonly requirementsDir: string;
  private readonly startupScriptDir: string;
  private readonly pluginsDir: string;
  private readonly maxEntryBytes: number;

  constructor(options: SyncerOptions, deps: SyncerDeps) {
    this.fs = deps.fs;
    this.store = deps.store;
    this.logger = deps.logger;
    const paths = resolveRunnerPaths(options.cwd ?? process.cwd(), options);
    this.requirementsDir = paths.requirements;
    this.startupScriptDir = paths.startupScript;
    this.pluginsDir = paths.plugins;
    this.maxEntryBytes = options.maxEntryBytes ?? MAX_ARCHIVE_ENTRY_BYTES;
  }

  async sync(environment: EnvironmentDetails): Promise<SyncResult[]> {
    if (!environment.sourceBucketArn) {
      throw new ConfigurationError(`environment ${environment.name} has no source bucket`);
    }
    const bucket = bucketNameFromArn(environment.sourceBucketArn);

    return [
      await this.syncFile(
        'requirements',
        bucket,
        environment.requirementsS3Path,
        environment.requirementsS3ObjectVersion,
        path.join(this.requirementsDir, 'requirements.txt')
      ),
      await this.syncFile(
        'startup-script',
        bucket,
        environment.startupScriptS3Path,
        environment.startupScriptS3ObjectVersion,
        path.join(this.startupScriptDir, 'startup.sh')
      ),
      await this.syncPlugins(
        bucket,
        environment.pluginsS3Path,
        environment.pluginsS3ObjectVersion
      ),
    ];
  }

  private async syncFile(
    item: SyncItem,
    bucket: string,
    key: string | undefined,
    versionId: string | undefined,
    target: string
  ): Promise<SyncResult> {
    if (!key) {
      this.logger.info(`${item} not configured, skipping`);
      return { item, status: 'not-configured' };
    }

    const content = await this.store.getObject(bucket, key, versionId);
    await this.fs.mkdir(path.dirname(target), { recursive: true });
    await this.fs.writeFile(target, content);
    this.logger.info(`Synced s3://${bucket}/${key} to ${target}`);
    return { item, status: 'synced', target };
  }

  private async syncPlugins(
    bucket: string,
    key: string | undefined,
    versionId: string | undefined
  ): Promise<SyncResult> {
    if (!key) {
      this.logger.info('plugins not configured, skipping');
      return { item: 'plugins', status: 'not-configured' };
    }

    const archive = await this.store.getObject(bucket, key, versionId);
    const files = await this.extract(Buffer.from(archive), this.pluginsDir);
    this.logger.info(`Extracted ${files} plugin files from s3://${bucket}/${key}`);
    return { item: 'plugins', status: 'synced', target: this.pluginsDir, files };
  }

  /**
   * Unzip into `targetDir`. Paths and declared sizes are checked before anything
   * is written; the inflated size is counted again while each entry is read.
   */
  private async extract(archive: Buffer, targetDir: string): Promise<number> {
    const directory = await unzipper.Open.buffer(archive);

    const entries = directory.files.map((file) => {
      if (file.uncompressedSize > this.maxEntryBytes) {
        throw new ArchiveEntryTooLargeError(file.path, file.uncompressedSize);
      }
      return { file, target: resolveInside(targetDir, file.path) };
    });

    await this.fs.mkdir(targetDir, { recursive: true });
    let written = 0;
    for (const { file, target } of entries) {
      if (file.type === 'Directory') {
        await this.fs.mkdir(target, { recursive: true });
        continue;
      }
      await this.fs.mkdir(path.dirname(target), { recursive: true });
      await this.fs.writeFile(target, await this.readEntry(file));
      written++;
    }
    return written;
  }

  private async readEntry(file: ArchiveFile): Promise<Buffer> {
    const stream = file.stream();
    const chunks: Buffer[] = [];
    let size = 0;
    for await (const chunk of stream) {
      const data: unknown = chunk;
      const buffer = Buffer.isBuffer(data) ? data : Buffer.from(String(data));
      size += buffer.length;
      if (size > this.maxEntryBytes) {
        stream.destroy();
        throw new ArchiveEntryTooLargeError(file.path, size);
      }
      chunks.push(buffer);
    }
    return Buffer.concat(chunks);
  }
}
