/**
 * Container engine gateway
 *
 * Stateless façade over IDockerClient with the semantics the runner relies on:
 * create-fresh containers, on-demand image pulls, readiness waits, idempotent
 * networks and label-scoped bulk operations.
 */

import readline from 'readline';
import { setTimeout as sleep } from 'timers/promises';
import type { Readable, Writable } from 'stream';
import type {
  ContainerSpec,
  ContainerSummary,
  IDockerClient,
  ProgressEvent,
} from '../../../platform/IDockerClient.js';
import type { ILogger } from '../../../shared/utils/logger.js';
import {
  ContainerCreationError,
  ContainerExitedError,
  ContainerStartError,
  ContainerTimeoutError,
  ImageBuildError,
  ImagePullError,
  errorMessage,
} from '../../../shared/utils/errors.js';
import { shortId, stripNonPrintable } from '../../../shared/utils/strings.js';

export type LogStreamResult = 'ended' | 'cancelled';

export interface StreamLogsOptions {
  signal?: AbortSignal;
  onLine: (line: string) => void;
}

export interface GatewayOptions {
  /** Poll interval of waitForContainerReady */
  pollIntervalMs?: number;
}

/**
 * Fully qualified form of an image reference ("postgres" -> "postgres:latest")
 */
export function withDefaultTag(image: string): string {
  const lastSegment = image.slice(image.lastIndexOf('/') + 1);
  return lastSegment.includes(':') || lastSegment.includes('@') ? image : `${image}:latest`;
}

export class ContainerGateway {
  private readonly pollIntervalMs: number;

  constructor(
    private readonly docker: IDockerClient,
    private readonly logger: ILogger,
    options: GatewayOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
  }

  /**
   * Create a fresh container named `name`, removing any existing one first
   */
  async ensureContainer(spec: ContainerSpec, name: string): Promise<string> {
    const existing = await this.listContainersByName(name, true);
    for (const container of existing) {
      this.logger.debug(`Removing existing container ${name} (${shortId(container.id)})`);
      await this.docker.removeContainer(container.id, { force: true });
    }

    await this.ensureImage(spec.image);

    let id: string;
    try {
      id = await this.docker.createContainer(name, spec);
    } catch (error) {
      throw new ContainerCreationError(
        `failed to create container ${name}: ${errorMessage(error)}`,
        name,
        error
      );
    }

    this.logger.info(`Created container ${name} with ID ${shortId(id)}`);
    return id;
  }

  /**
   * ensureContainer, then start
   */
  async runContainer(spec: ContainerSpec, name: string): Promise<string> {
    const id = await this.ensureContainer(spec, name);
    await this.startContainer(id);
    return id;
  }

  /**
   * Run a one-shot container in the foreground: attach, start and wait for it to exit.
   * Returns the exit code.
   */
  async runAttached(
    spec: ContainerSpec,
    name: string,
    stdout: Writable,
    stderr: Writable,
    stdin?: Readable
  ): Promise<number> {
    const id = await this.ensureContainer(spec, name);
    const detach = await this.docker.attachContainer(id, stdout, stderr, stdin);

    try {
      // Registered before start so an auto-removed container cannot exit unobserved
      const exited = this.docker.waitContainer(id, 'next-exit');
      try {
        await this.startContainer(id);
      } catch (error) {
        void exited.catch((waitError: unknown) =>
          this.logger.debug(`Wait on unstarted container ${shortId(id)} ended`, {
            error: errorMessage(waitError),
          })
        );
        throw error;
      }
      return await exited;
    } finally {
      detach();
    }
  }

  /**
   * Poll until the container is running.
   *
   * Restarting counts as pending; dead or a non-zero exit code fails with that code.
   */
  async waitForContainerReady(id: string, timeoutSeconds: number): Promise<void> {
    const deadline = Date.now() + timeoutSeconds * 1000;

    for (;;) {
      await sleep(this.pollIntervalMs);

      if (Date.now() > deadline) {
        throw new ContainerTimeoutError(
          `timeout waiting for container ${shortId(id)} to be ready`,
          timeoutSeconds
        );
      }

      const state = await this.docker.inspectContainer(id);
      if (state.status === 'running') {
        this.logger.info(`Container ${shortId(id)} is running`);
        return;
      }
      if (state.status === 'restarting') {
        this.logger.info(`Container ${shortId(id)} is restarting...`);
        continue;
      }
      if (state.status === 'dead' || state.exitCode !== 0) {
        throw new ContainerExitedError(
          `container ${shortId(id)} exited unexpectedly with code ${state.exitCode}`,
          state.exitCode
        );
      }
    }
  }

  /**
   * Id of the network called `name`, creating a bridge network if there is none
   */
  async createNetwork(name: string): Promise<string> {
    const networks = await this.docker.listNetworks();
    const existing = networks.find((network) => network.name === name);
    if (existing) {
      this.logger.debug(`Network ${name} already exists`);
      return existing.id;
    }

    const id = await this.docker.createNetwork(name, 'bridge');
    this.logger.info(`Created network ${name}`);
    return id;
  }

  async listContainersByName(name: string, includeStopped: boolean): Promise<ContainerSummary[]> {
    const containers = await this.docker.listContainers({
      all: includeStopped,
      filters: { name: [name] },
    });
    // The engine's name filter matches substrings
    return containers.filter((container) => container.names.includes(name));
  }

  /**
   * `label` is either `key` or `key=value`
   */
  async listContainersByLabel(label: string, includeStopped: boolean): Promise<ContainerSummary[]> {
    return this.docker.listContainers({ all: includeStopped, filters: { label: [label] } });
  }

  /**
   * Stop every running container carrying `label`. Returns the names stopped;
   * nothing to stop is not an error.
   */
  async stopContainersByLabel(label: string): Promise<string[]> {
    const containers = await this.listContainersByLabel(label, false);
    if (containers.length === 0) {
      this.logger.info('No running containers found for the specified label');
      return [];
    }

    const stopped: string[] = [];
    for (const container of containers) {
      const name = container.names[0] ?? shortId(container.id);
      this.logger.info(`Stopping container ${name}`);
      await this.docker.stopContainer(container.id);
      stopped.push(name);
    }
    return stopped;
  }

  /**
   * Attach to a started container and block until it stops; returns the exit code
   */
  async attachToContainer(
    id: string,
    stdout: Writable,
    stderr: Writable,
    stdin?: Readable
  ): Promise<number> {
    const detach = await this.docker.attachContainer(id, stdout, stderr, stdin);
    try {
      return await this.docker.waitContainer(id, 'not-running');
    } finally {
      detach();
    }
  }

  /**
   * Follow the container's logs line by line until the stream ends or `signal` aborts
   */
  async streamLogs(id: string, options: StreamLogsOptions): Promise<LogStreamResult> {
    const { signal, onLine } = options;
    if (signal?.aborted) {
      return 'cancelled';
    }

    const stream = await this.docker.followLogs(id);
    if (signal?.aborted) {
      stream.destroy();
      return 'cancelled';
    }

    return new Promise<LogStreamResult>((resolve, reject) => {
      let cancelled = false;
      let settled = false;

      const onAbort = (): void => {
        cancelled = true;
        stream.destroy();
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const settle = (error?: Error): void => {
        if (settled) {
          return;
        }
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        if (error && !cancelled) {
          reject(error);
        } else {
          resolve(cancelled ? 'cancelled' : 'ended');
        }
      };

      const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
      lines.on('line', (line) => onLine(stripNonPrintable(line)));
      stream.on('error', (error) => settle(error));
      stream.on('close', () => settle());
    });
  }

  async ensureImage(image: string): Promise<void> {
    const wanted = withDefaultTag(image);
    const tags = await this.docker.listImages();
    if (tags.includes(wanted)) {
      this.logger.debug(`Image ${wanted} found locally, skipping pull`);
      return;
    }

    this.logger.info(`Image ${wanted} not found locally, pulling...`);
    try {
      await this.docker.pullImage(wanted, (event) => this.logProgress(event));
    } catch (error) {
      throw new ImagePullError(
        `failed to pull image ${wanted}: ${errorMessage(error)}`,
        wanted,
        error
      );
    }
    this.logger.info(`Pulled image ${wanted}`);
  }

  async buildImage(contextDir: string, tag: string): Promise<void> {
    this.logger.info(`Building image ${tag} from ${contextDir}`);
    try {
      await this.docker.buildImage(contextDir, tag, (event) => this.logProgress(event));
    } catch (error) {
      throw new ImageBuildError(`failed to build image ${tag}: ${errorMessage(error)}`, tag, error);
    }
    this.logger.info(`Built image ${tag}`);
  }

  private async startContainer(id: string): Promise<void> {
    try {
      await this.docker.startContainer(id);
    } catch (error) {
      throw new ContainerStartError(
        `failed to start container ${shortId(id)}: ${errorMessage(error)}`,
        id,
        error
      );
    }
    this.logger.info(`Started container ${shortId(id)}`);
  }

  private logProgress(event: ProgressEvent): void {
    const text =
      event.stream?.trimEnd() ||
      [event.id, event.status, event.progress].filter(Boolean).join(' ');
    if (text) {
      this.logger.debug(stripNonPrintable(text));
    }
  }
}
