/**
 * Fetches one revision of a git repository as an in-memory file tree
 */

import os from 'os';
import path from 'path';
import type { IFileSystem } from '../../../platform/IFileSystem.js';
import type { IProcessExecutor } from '../../../platform/IProcessExecutor.js';
import type { ILogger } from '../../../shared/utils/logger.js';
import { RepositoryFetchError } from '../../../shared/utils/errors.js';

export interface TreeEntry {
  /** Repository-relative, forward slashes */
  path: string;
  content: Buffer;
}

export interface ITreeFetcher {
  fetch(repoUrl: string, ref: string): Promise<TreeEntry[]>;
}

export class GitTreeFetcher implements ITreeFetcher {
  constructor(
    private readonly executor: IProcessExecutor,
    private readonly fs: IFileSystem,
    private readonly logger: ILogger,
    private readonly timeoutMs = 5 * 60_000
  ) {}

  async fetch(repoUrl: string, ref: string): Promise<TreeEntry[]> {
    const workDir = await this.fs.mkdtemp(path.join(os.tmpdir(), 'mwaa-local-clone-'));

    try {
      this.logger.info(`Cloning ${repoUrl} at ${ref}`);
      const result = await this.executor.execute(
        'git',
        ['clone', '--depth', '1', '--branch', ref, '--single-branch', repoUrl, workDir],
        { timeout: this.timeoutMs }
      );
      if (result.exitCode !== 0) {
        const reason = result.timedOut ? 'timed out' : result.stderr.trim();
        throw new RepositoryFetchError(`failed to clone ${repoUrl} at ${ref}: ${reason}`);
      }

      const files = await this.fs.glob('**/*', { cwd: workDir, dot: true, ignore: ['.git/**'] });
      const entries: TreeEntry[] = [];
      for (const file of files.sort()) {
        const content = await this.fs.readFileBuffer(path.join(workDir, file));
        entries.push({ path: file, content });
      }
      this.logger.debug(`Fetched ${entries.length} files from ${repoUrl}`);
      return entries;
    } finally {
      await this.fs.remove(workDir);
    }
  }
}
