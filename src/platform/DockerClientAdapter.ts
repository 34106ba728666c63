/**
 * DockerClientAdapter - IDockerClient backed by dockerode
 */

import Docker from 'dockerode';
import tar from 'tar-fs';
import os from 'os';
import path from 'path';
import { PassThrough, Readable, Writable } from 'stream';
import { DockerUnavailableError } from '../shared/utils/errors.js';
import {
  ContainerListOptions,
  ContainerSpec,
  ContainerState,
  ContainerStatus,
  ContainerSummary,
  IDockerClient,
  NetworkSummary,
  ProgressEvent,
  WaitCondition,
} from './IDockerClient.js';

const NANOS_PER_MS = 1_000_000;

const CONTAINER_STATUSES: readonly ContainerStatus[] = [
  'created',
  'running',
  'paused',
  'restarting',
  'removing',
  'exited',
  'dead',
];

function toContainerStatus(value: string): ContainerStatus {
  const match = CONTAINER_STATUSES.find((status) => status === value);
  return match ?? 'dead';
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

export function toProgressEvent(value: unknown): ProgressEvent {
  if (typeof value !== 'object' || value === null) {
    return {};
  }
  return {
    status: readString(value, 'status'),
    progress: readString(value, 'progress'),
    id: readString(value, 'id'),
    stream: readString(value, 'stream'),
    error: readString(value, 'error'),
  };
}

export class DockerClientAdapter implements IDockerClient {
  private docker: Docker;

  constructor(docker?: Docker) {
    // Honours DOCKER_HOST and friends
    this.docker = docker ?? new Docker();
  }

  async ping(): Promise<void> {
    await this.docker.ping();
  }

  async listContainers(options: ContainerListOptions = {}): Promise<ContainerSummary[]> {
    const filters: Record<string, string[]> = {};
    if (options.filters?.name) {
      filters.name = options.filters.name;
    }
    if (options.filters?.label) {
      filters.label = options.filters.label;
    }

    const containers = await this.docker.listContainers({ all: options.all ?? false, filters });
    return containers.map((c) => ({
      id: c.Id,
      names: c.Names.map((n) => n.replace(/^\//, '')),
      state: c.State,
      labels: c.Labels,
    }));
  }

  async createContainer(name: string, spec: ContainerSpec): Promise<string> {
    const exposedPorts: Record<string, object> = {};
    const portBindings: Record<string, Array<{ HostPort: string }>> = {};
    for (const [containerPort, hostPort] of Object.entries(spec.portBindings ?? {})) {
      exposedPorts[containerPort] = {};
      portBindings[containerPort] = [{ HostPort: String(hostPort) }];
    }

    const container = await this.docker.createContainer({
      name,
      Image: spec.image,
      Cmd: spec.cmd,
      Env: spec.env,
      Labels: spec.labels,
      Tty: spec.tty ?? false,
      OpenStdin: spec.openStdin ?? false,
      StdinOnce: spec.openStdin ?? false,
      AttachStdin: spec.openStdin ?? false,
      AttachStdout: true,
      AttachStderr: true,
      ExposedPorts: exposedPorts,
      Healthcheck: spec.healthcheck
        ? {
            Test: spec.healthcheck.test,
            Interval: spec.healthcheck.intervalMs * NANOS_PER_MS,
            Timeout: spec.healthcheck.timeoutMs * NANOS_PER_MS,
            Retries: spec.healthcheck.retries,
          }
        : undefined,
      HostConfig: {
        Binds: spec.binds,
        PortBindings: portBindings,
        RestartPolicy: spec.restartPolicy ? { Name: spec.restartPolicy } : undefined,
        AutoRemove: spec.autoRemove ?? false,
        NetworkMode: spec.networkName,
      },
      NetworkingConfig: spec.networkName
        ? {
            EndpointsConfig: {
              [spec.networkName]: { Aliases: spec.networkAliases },
            },
          }
        : undefined,
    });

    return container.id;
  }

  async startContainer(id: string): Promise<void> {
    await this.docker.getContainer(id).start();
  }

  async stopContainer(id: string): Promise<void> {
    await this.docker.getContainer(id).stop();
  }

  async removeContainer(id: string, options: { force?: boolean } = {}): Promise<void> {
    await this.docker.getContainer(id).remove({ force: options.force ?? false });
  }

  async inspectContainer(id: string): Promise<ContainerState> {
    const info = await this.docker.getContainer(id).inspect();
    return {
      status: toContainerStatus(info.State.Status),
      exitCode: info.State.ExitCode,
    };
  }

  async waitContainer(id: string, condition: WaitCondition = 'not-running'): Promise<number> {
    const result: unknown = await this.docker.getContainer(id).wait({ condition });
    if (typeof result === 'object' && result !== null) {
      const statusCode: unknown = Reflect.get(result, 'StatusCode');
      if (typeof statusCode === 'number') {
        return statusCode;
      }
    }
    throw new Error(`unexpected wait response for container ${id}`);
  }

  async attachContainer(
    id: string,
    stdout: Writable,
    stderr: Writable,
    stdin?: Readable
  ): Promise<() => void> {
    const container = this.docker.getContainer(id);
    const info = await container.inspect();
    const stream = await container.attach({
      stream: true,
      stdin: stdin !== undefined,
      stdout: true,
      stderr: true,
      hijack: stdin !== undefined,
    });

    if (info.Config.Tty) {
      stream.pipe(stdout, { end: false });
    } else {
      this.docker.modem.demuxStream(stream, stdout, stderr);
    }

    if (!stdin) {
      return () => {};
    }
    stdin.pipe(stream);
    return () => {
      stdin.unpipe(stream);
      stdin.pause();
    };
  }

  async followLogs(id: string): Promise<Readable> {
    const container = this.docker.getContainer(id);
    const info = await container.inspect();
    const source = await container.logs({ follow: true, stdout: true, stderr: true });

    const output = new PassThrough();
    if (info.Config.Tty) {
      source.pipe(output);
    } else {
      this.docker.modem.demuxStream(source, output, output);
      source.on('end', () => output.end());
    }
    source.on('error', (error: Error) => output.destroy(error));

    output.on('close', () => {
      if (source instanceof Readable) {
        source.destroy();
      }
    });

    return output;
  }

  async listImages(): Promise<string[]> {
    const images = await this.docker.listImages();
    return images.flatMap((image) => image.RepoTags ?? []);
  }

  async pullImage(image: string, onProgress?: (event: ProgressEvent) => void): Promise<void> {
    const stream: NodeJS.ReadableStream = await this.docker.pull(image);
    await this.followProgress(stream, onProgress);
  }

  async buildImage(
    contextDir: string,
    tag: string,
    onProgress?: (event: ProgressEvent) => void
  ): Promise<void> {
    const context = tar.pack(contextDir);
    const stream = await this.docker.buildImage(context, { t: tag, dockerfile: 'Dockerfile' });
    await this.followProgress(stream, onProgress);
  }

  async listNetworks(): Promise<NetworkSummary[]> {
    const networks = await this.docker.listNetworks();
    return networks.map((n) => ({ id: n.Id, name: n.Name }));
  }

  async createNetwork(name: string, driver: string): Promise<string> {
    const network = await this.docker.createNetwork({
      Name: name,
      Driver: driver,
      CheckDuplicate: true,
    });
    return network.id;
  }

  /**
   * Drain a pull/build progress stream; an event carrying an error fails the whole operation
   */
  private followProgress(
    stream: NodeJS.ReadableStream,
    onProgress?: (event: ProgressEvent) => void
  ): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let failure: string | undefined;

      this.docker.modem.followProgress(
        stream,
        (err: Error | null) => {
          if (err) {
            reject(err);
          } else if (failure) {
            reject(new Error(failure));
          } else {
            resolve();
          }
        },
        (raw: unknown) => {
          const event = toProgressEvent(raw);
          if (event.error) {
            failure = event.error;
          }
          onProgress?.(event);
        }
      );
    });
  }
}

/**
 * Connect to the engine from the environment; on macOS fall back to the Colima socket
 */
export async function connectDocker(): Promise<DockerClientAdapter> {
  const client = new DockerClientAdapter();
  try {
    await client.ping();
    return client;
  } catch (error) {
    if (process.platform !== 'darwin') {
      throw new DockerUnavailableError('docker is not installed or not running', error);
    }
  }

  const socketPath = path.join(os.homedir(), '.colima', 'docker.sock');
  const colima = new DockerClientAdapter(new Docker({ socketPath }));
  try {
    await colima.ping();
  } catch (error) {
    throw new DockerUnavailableError(
      `docker is not running and the Colima socket at ${socketPath} did not answer`,
      error
    );
  }
  return colima;
}
