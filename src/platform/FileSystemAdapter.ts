/**
 * FileSystemAdapter - Cross-platform file system implementation
 * Uses Node.js fs/promises + fast-glob for file operations
 */

import { GlobOptions, IFileSystem, Stats } from './IFileSystem.js';
import fs from 'fs/promises';
import fg from 'fast-glob';

export class FileSystemAdapter implements IFileSystem {
  async readFile(path: string, encoding: BufferEncoding = 'utf-8'): Promise<string> {
    return fs.readFile(path, encoding);
  }

  async readFileBuffer(path: string): Promise<Buffer> {
    return fs.readFile(path);
  }

  async writeFile(
    path: string,
    content: string | Uint8Array,
    encoding: BufferEncoding = 'utf-8'
  ): Promise<void> {
    if (typeof content === 'string') {
      await fs.writeFile(path, content, encoding);
      return;
    }
    await fs.writeFile(path, content);
  }

  async exists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }

  async mkdir(path: string, options?: { recursive?: boolean }): Promise<void> {
    await fs.mkdir(path, options);
  }

  async mkdtemp(prefix: string): Promise<string> {
    return fs.mkdtemp(prefix);
  }

  async readdir(path: string): Promise<string[]> {
    return fs.readdir(path);
  }

  async stat(path: string): Promise<Stats> {
    const stats = await fs.stat(path);
    return {
      isFile: () => stats.isFile(),
      isDirectory: () => stats.isDirectory(),
      size: stats.size,
      mtime: stats.mtime,
    };
  }

  async remove(path: string): Promise<void> {
    await fs.rm(path, { recursive: true, force: true });
  }

  async glob(pattern: string, options?: GlobOptions): Promise<string[]> {
    return fg(pattern, {
      cwd: options?.cwd,
      ignore: options?.ignore,
      dot: options?.dot ?? false,
    });
  }
}
