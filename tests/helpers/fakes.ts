/**
 * In-process stand-ins for the container engine and the logger
 */

import { vi } from 'vitest';
import { Readable } from 'stream';
import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import type { IDockerClient } from '../../src/platform/IDockerClient.js';
import type { ILogger } from '../../src/shared/utils/logger.js';

export function createTestLogger() {
  return {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  } satisfies ILogger;
}

/**
 * Every engine call succeeds: no containers, no images, containers run and exit 0
 */
export function createFakeDocker() {
  return {
    ping: vi.fn<IDockerClient['ping']>().mockResolvedValue(undefined),
    listContainers: vi.fn<IDockerClient['listContainers']>().mockResolvedValue([]),
    createContainer: vi
      .fn<IDockerClient['createContainer']>()
      .mockImplementation(async (name) => `id-${name}`),
    startContainer: vi.fn<IDockerClient['startContainer']>().mockResolvedValue(undefined),
    stopContainer: vi.fn<IDockerClient['stopContainer']>().mockResolvedValue(undefined),
    removeContainer: vi.fn<IDockerClient['removeContainer']>().mockResolvedValue(undefined),
    inspectContainer: vi
      .fn<IDockerClient['inspectContainer']>()
      .mockResolvedValue({ status: 'running', exitCode: 0 }),
    waitContainer: vi.fn<IDockerClient['waitContainer']>().mockResolvedValue(0),
    attachContainer: vi.fn<IDockerClient['attachContainer']>().mockResolvedValue(() => {}),
    followLogs: vi
      .fn<IDockerClient['followLogs']>()
      .mockImplementation(async () => Readable.from([])),
    listImages: vi.fn<IDockerClient['listImages']>().mockResolvedValue([]),
    pullImage: vi.fn<IDockerClient['pullImage']>().mockResolvedValue(undefined),
    buildImage: vi.fn<IDockerClient['buildImage']>().mockResolvedValue(undefined),
    listNetworks: vi.fn<IDockerClient['listNetworks']>().mockResolvedValue([]),
    createNetwork: vi.fn<IDockerClient['createNetwork']>().mockResolvedValue('net-1'),
  } satisfies IDockerClient;
}

export type FakeDocker = ReturnType<typeof createFakeDocker>;

export async function createTempDir(prefix = 'mwaa-local-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
}
