/**
 * Platform-agnostic Docker client interface
 * Implementation uses dockerode
 */

import type { Readable, Writable } from 'stream';

export type RestartPolicy = 'no' | 'always' | 'unless-stopped' | 'on-failure';

export interface HealthcheckSpec {
  test: string[];
  intervalMs: number;
  timeoutMs: number;
  retries: number;
}

export interface ContainerSpec {
  image: string;
  cmd?: string[];
  env?: string[];
  labels?: Record<string, string>;
  binds?: string[]; // Volume mounts ["host:container"]
  /** Container port ("8080/tcp") to host port */
  portBindings?: Record<string, number>;
  networkName?: string;
  networkAliases?: string[];
  restartPolicy?: RestartPolicy;
  autoRemove?: boolean;
  tty?: boolean;
  /** Keep stdin open so an attached client can type into the container */
  openStdin?: boolean;
  healthcheck?: HealthcheckSpec;
}

export interface ContainerSummary {
  id: string;
  names: string[];
  state: string;
  labels: Record<string, string>;
}

export type ContainerStatus =
  | 'created'
  | 'running'
  | 'paused'
  | 'restarting'
  | 'removing'
  | 'exited'
  | 'dead';

export interface ContainerState {
  status: ContainerStatus;
  exitCode: number;
}

export interface ContainerListOptions {
  all?: boolean;
  filters?: {
    name?: string[];
    label?: string[];
  };
}

export type WaitCondition = 'not-running' | 'next-exit';

export interface NetworkSummary {
  id: string;
  name: string;
}

/**
 * One line of pull/build progress reported by the engine
 */
export interface ProgressEvent {
  status?: string;
  progress?: string;
  id?: string;
  stream?: string;
  error?: string;
}

export interface IDockerClient {
  /**
   * Check the engine answers; throws when it does not
   */
  ping(): Promise<void>;

  listContainers(options?: ContainerListOptions): Promise<ContainerSummary[]>;

  /**
   * Create container; returns its id
   */
  createContainer(name: string, spec: ContainerSpec): Promise<string>;

  startContainer(id: string): Promise<void>;

  stopContainer(id: string): Promise<void>;

  removeContainer(id: string, options?: { force?: boolean }): Promise<void>;

  inspectContainer(id: string): Promise<ContainerState>;

  /**
   * Block until the container is no longer running (or, with 'next-exit', until it
   * next exits, for registering before start); returns its exit code
   */
  waitContainer(id: string, condition?: WaitCondition): Promise<number>;

  /**
   * Pipe the container's stdout/stderr into the given writables, and `stdin` into
   * the container when given. Resolves to a function that releases `stdin`.
   */
  attachContainer(
    id: string,
    stdout: Writable,
    stderr: Writable,
    stdin?: Readable
  ): Promise<() => void>;

  /**
   * Follow combined stdout/stderr as a plain text stream
   */
  followLogs(id: string): Promise<Readable>;

  /**
   * Repo tags of every local image
   */
  listImages(): Promise<string[]>;

  pullImage(image: string, onProgress?: (event: ProgressEvent) => void): Promise<void>;

  /**
   * Build image from a directory containing a Dockerfile
   */
  buildImage(
    contextDir: string,
    tag: string,
    onProgress?: (event: ProgressEvent) => void
  ): Promise<void>;

  listNetworks(): Promise<NetworkSummary[]>;

  /**
   * Create network; returns its id
   */
  createNetwork(name: string, driver: string): Promise<string>;
}
