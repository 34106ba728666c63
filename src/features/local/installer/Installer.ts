/**
 * Local installer
 *
 * Lays out one version of the local-runner repository: DAGs next to the
 * invoking shell, everything else under the clone path, CI and tooling skipped.
 */

import path from 'path';
import type { IFileSystem } from '../../../platform/IFileSystem.js';
import type { ILogger } from '../../../shared/utils/logger.js';
import { NonEmptyTargetError } from '../../../shared/utils/errors.js';
import { resolveInside } from '../../../shared/utils/paths.js';
import type { ITreeFetcher } from './GitTreeFetcher.js';

const SKIPPED = /^(mwaa-local-env|\.github)/;
const DAGS = /^dags/;

export interface InstallerOptions {
  version: string;
  repoUrl: string;
  clonePath: string;
  dagsPath: string;
  /** Base for relative paths. Default process.cwd() */
  cwd?: string;
}

export interface InstallerDeps {
  fs: IFileSystem;
  fetcher: ITreeFetcher;
  logger: ILogger;
}

export interface InstallSummary {
  clonePath: string;
  written: number;
  dags: number;
  skipped: number;
}

export type EntryTarget = 'skip' | 'dags' | 'clone';

export function classifyEntry(entryPath: string): EntryTarget {
  if (SKIPPED.test(entryPath)) {
    return 'skip';
  }
  return DAGS.test(entryPath) ? 'dags' : 'clone';
}

export class Installer {
  private readonly fs: IFileSystem;
  private readonly fetcher: ITreeFetcher;
  private readonly logger: ILogger;
  private readonly clonePath: string;
  private readonly dagsRoot: string;

  constructor(
    private readonly options: InstallerOptions,
    deps: InstallerDeps
  ) {
    this.fs = deps.fs;
    this.fetcher = deps.fetcher;
    this.logger = deps.logger;
    const cwd = options.cwd ?? process.cwd();
    this.clonePath = path.resolve(cwd, options.clonePath);
    this.dagsRoot = path.resolve(cwd, options.dagsPath);
  }

  async run(): Promise<InstallSummary> {
    await this.ensureEmptyTarget();

    const entries = await this.fetcher.fetch(this.options.repoUrl, this.options.version);

    // Resolve every target first so an unsafe entry aborts before anything is written
    const summary: InstallSummary = { clonePath: this.clonePath, written: 0, dags: 0, skipped: 0 };
    const writes: Array<{ target: string; content: Buffer }> = [];
    for (const entry of entries) {
      const kind = classifyEntry(entry.path);
      if (kind === 'skip') {
        summary.skipped++;
        continue;
      }
      const base = kind === 'dags' ? this.dagsRoot : this.clonePath;
      writes.push({ target: resolveInside(base, entry.path), content: entry.content });
      if (kind === 'dags') {
        summary.dags++;
      }
    }

    for (const { target, content } of writes) {
      await this.fs.mkdir(path.dirname(target), { recursive: true });
      await this.fs.writeFile(target, content);
      summary.written++;
    }

    await this.fs.mkdir(path.join(this.clonePath, 'db-data'), { recursive: true });

    this.logger.info(`Installed local runner ${this.options.version} into ${this.clonePath}`, {
      written: summary.written,
      skipped: summary.skipped,
    });
    return summary;
  }

  private async ensureEmptyTarget(): Promise<void> {
    if (!(await this.fs.exists(this.clonePath))) {
      return;
    }
    const entries = await this.fs.readdir(this.clonePath);
    if (entries.length > 0) {
      throw new NonEmptyTargetError(this.clonePath);
    }
  }
}
