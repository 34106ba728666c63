/**
 * Local runner lifecycle controller
 *
 * Provisions one session: build the image, start the database container,
 * wait for it, start the Airflow container with the assembled environment,
 * poll its health endpoint, optionally follow its logs, and stop it all again.
 *
 * Every container of a session carries the session label; the label is the only
 * coordination between invocations.
 */

import type { Readable, Writable } from 'stream';
import type { ContainerSpec } from '../../../platform/IDockerClient.js';
import type { IFileSystem } from '../../../platform/IFileSystem.js';
import type { ILogger } from '../../../shared/utils/logger.js';
import {
  AlreadyRunningError,
  ContainerExitedError,
  LifecyclePhase,
  LifecyclePhaseError,
  PortInUseError,
  errorMessage,
} from '../../../shared/utils/errors.js';
import { ContainerGateway } from '../container/ContainerGateway.js';
import {
  getServiceEnvironment,
  getServiceImage,
  readComposeFile,
} from '../compose/ComposeReader.js';
import { mergeEnv, parseEnvFile } from '../env/EnvParser.js';
import { Envs, renderEnvs } from '../env/Envs.js';
import type { IReadinessProbe } from './ReadinessPoller.js';
import { PortProbe, isPortInUse } from './portProbe.js';
import {
  AIRFLOW_HOME,
  DEPENDENCY_SERVICE,
  RunnerOptions,
  RunnerPaths,
  RunnerState,
  SESSION_LABEL_KEY,
  StartOptions,
  imageTag,
  resolveRunnerPaths,
  sessionLabelFilter,
} from './types.js';

/** Container-level file probe; the webserver writes its pid file once it serves */
const PRIMARY_HEALTHCHECK = {
  test: ['CMD-SHELL', `[ -f ${AIRFLOW_HOME}/airflow-webserver.pid ]`],
  intervalMs: 30_000,
  timeoutMs: 30_000,
  retries: 3,
};

const FIXED_OVERRIDES = ['LOAD_EX=n', 'EXECUTOR=Local'];

export interface RunnerDeps {
  gateway: ContainerGateway;
  fs: IFileSystem;
  logger: ILogger;
  readiness: IReadinessProbe;
  portProbe?: PortProbe;
  /** Base for relative paths. Default process.cwd() */
  cwd?: string;
  /** Budget for the database container to reach running. Default 300 */
  dependencyTimeoutSeconds?: number;
  /** Pause between health polls. Default 5 seconds */
  readinessIntervalMs?: number;
  stdout?: Writable;
  stderr?: Writable;
  /** Fed to interactive throwaway containers. Default process.stdin */
  stdin?: Readable;
}

export interface StartResult {
  url: string;
  dependencyId: string;
  primaryId: string;
  /** How serving ended; absent when logs were not followed */
  logs?: 'ended' | 'cancelled';
}

export class Runner {
  private readonly gateway: ContainerGateway;
  private readonly fs: IFileSystem;
  private readonly logger: ILogger;
  private readonly readiness: IReadinessProbe;
  private readonly portProbe: PortProbe;
  private readonly dependencyTimeoutSeconds: number;
  private readonly readinessIntervalMs: number;
  private readonly stdout: Writable;
  private readonly stderr: Writable;
  private readonly stdin: Readable;
  private readonly paths: RunnerPaths;
  private state: RunnerState = 'uninitialized';

  constructor(
    private readonly options: RunnerOptions,
    deps: RunnerDeps
  ) {
    this.gateway = deps.gateway;
    this.fs = deps.fs;
    this.logger = deps.logger;
    this.readiness = deps.readiness;
    this.portProbe = deps.portProbe ?? isPortInUse;
    this.dependencyTimeoutSeconds = deps.dependencyTimeoutSeconds ?? 300;
    this.readinessIntervalMs = deps.readinessIntervalMs ?? 5_000;
    this.stdout = deps.stdout ?? process.stdout;
    this.stderr = deps.stderr ?? process.stderr;
    this.stdin = deps.stdin ?? process.stdin;
    this.paths = resolveRunnerPaths(deps.cwd ?? process.cwd(), options);
  }

  getState(): RunnerState {
    return this.state;
  }

  getPaths(): RunnerPaths {
    return this.paths;
  }

  get imageTag(): string {
    return imageTag(this.options.version);
  }

  async buildImage(): Promise<void> {
    await this.gateway.buildImage(this.paths.buildContext, this.imageTag);
  }

  /**
   * Bring a session up. Resolves once the UI answers, or, with followLogs,
   * once the log stream ends or the signal aborts (which also stops the session).
   */
  async start(options: StartOptions): Promise<StartResult> {
    try {
      return await this.provision(options);
    } catch (error) {
      this.state = 'failed';
      throw error;
    }
  }

  /**
   * Stop every container of this session. Nothing running is fine.
   */
  async stop(): Promise<string[]> {
    const stopped = await this.gateway.stopContainersByLabel(
      sessionLabelFilter(this.options.label)
    );
    this.state = 'stopped';
    return stopped;
  }

  async isRunning(): Promise<boolean> {
    const running = await this.gateway.listContainersByLabel(
      sessionLabelFilter(this.options.label),
      false
    );
    return running.length > 0;
  }

  /**
   * Install requirements.txt in a throwaway container
   */
  async testRequirements(): Promise<void> {
    await this.runEphemeral('test-requirements', {
      image: this.imageTag,
      cmd: ['test-requirements'],
      tty: true,
      openStdin: true,
      autoRemove: true,
      binds: this.workspaceBinds(),
    });
  }

  /**
   * Run startup.sh in a throwaway container with the given overlay
   */
  async testStartupScript(envs: Envs): Promise<void> {
    await this.runEphemeral('test-startup-script', {
      image: this.imageTag,
      cmd: ['test-startup-script'],
      env: renderEnvs(this.withDefaultCredentials(envs)),
      tty: true,
      openStdin: true,
      autoRemove: true,
      binds: [`${this.paths.startupScript}:${AIRFLOW_HOME}/startup`],
    });
  }

  /**
   * Download requirements as wheels into requirements/plugins.zip
   */
  async packageRequirements(): Promise<void> {
    await this.runEphemeral('package-requirements', {
      image: this.imageTag,
      cmd: ['package-requirements'],
      autoRemove: true,
      binds: this.workspaceBinds(),
    });
  }

  private async provision(options: StartOptions): Promise<StartResult> {
    const labelFilter = sessionLabelFilter(this.options.label);

    await this.phase('build', () => this.buildImage());
    this.state = 'image-built';

    if (await this.phase('preflight', () => this.isRunning())) {
      throw new AlreadyRunningError(this.options.label);
    }

    if (await this.portProbe(options.port)) {
      throw new PortInUseError(options.port);
    }

    await this.phase('network', () => this.gateway.createNetwork(this.options.networkName));

    if (options.resetDb) {
      await this.phase('reset', () => this.resetDatabase());
    }

    const dependencyId = await this.withCompensation(() =>
      this.phase('dependency', async () => {
        const id = await this.startDependency();
        this.state = 'dependency-running';
        await this.gateway.waitForContainerReady(id, this.dependencyTimeoutSeconds);
        return id;
      })
    );
    this.state = 'dependency-ready';

    const primaryId = await this.withCompensation(async () => {
      const env = await this.phase('environment', () => this.buildEnvironment(options.envs));
      return this.phase('primary', () =>
        this.gateway.runContainer(
          this.primarySpec(env, options.port),
          this.containerName('local-runner')
        )
      );
    });
    this.state = 'primary-running';

    const url = `http://localhost:${options.port}`;
    await this.withCompensation(() =>
      this.phase('readiness', () =>
        this.readiness.waitForReady(`${url}/health`, {
          timeoutMs: options.waitTimeoutMs,
          intervalMs: this.readinessIntervalMs,
        })
      )
    );
    this.state = 'serving';
    this.logger.info(`Local runner is ready at ${url}`, { label: labelFilter });

    await options.onReady?.(url);

    if (!options.followLogs) {
      return { url, dependencyId, primaryId };
    }

    const onLine = options.onLogLine ?? ((line: string) => this.stdout.write(`${line}\n`));
    const logs = await this.phase('logs', () =>
      this.gateway.streamLogs(primaryId, { signal: options.signal, onLine })
    );
    if (logs === 'cancelled') {
      this.logger.info('Interrupted, stopping local runner');
      await this.stop();
    }

    return { url, dependencyId, primaryId, logs };
  }

  private async startDependency(): Promise<string> {
    const compose = await readComposeFile(this.paths.composeFile, this.fs);
    const image = getServiceImage(compose, DEPENDENCY_SERVICE);
    const env = getServiceEnvironment(compose, DEPENDENCY_SERVICE);

    return this.gateway.runContainer(
      {
        image,
        env,
        labels: { [SESSION_LABEL_KEY]: this.options.label },
        binds: [`${this.paths.dbData}:/var/lib/postgresql/data`],
        networkName: this.options.networkName,
        networkAliases: [DEPENDENCY_SERVICE],
        restartPolicy: 'always',
      },
      this.containerName(DEPENDENCY_SERVICE)
    );
  }

  /**
   * .env defaults, then fixed overrides, then the session overlay; empty values never win
   */
  private async buildEnvironment(envs: Envs): Promise<string[]> {
    const defaults = await parseEnvFile(this.paths.envFile, this.fs);
    const overlay = renderEnvs(this.withDefaultCredentials(envs));
    return mergeEnv([defaults, FIXED_OVERRIDES, overlay], true);
  }

  private primarySpec(env: string[], port: number): ContainerSpec {
    return {
      image: this.imageTag,
      cmd: ['local-runner'],
      env,
      labels: { [SESSION_LABEL_KEY]: this.options.label },
      binds: [...this.workspaceBinds(), `${this.paths.startupScript}:${AIRFLOW_HOME}/startup`],
      portBindings: { '8080/tcp': port },
      networkName: this.options.networkName,
      networkAliases: ['local-runner'],
      restartPolicy: 'always',
      healthcheck: PRIMARY_HEALTHCHECK,
    };
  }

  private workspaceBinds(): string[] {
    return [
      `${this.paths.dags}:${AIRFLOW_HOME}/dags`,
      `${this.paths.plugins}:${AIRFLOW_HOME}/plugins`,
      `${this.paths.requirements}:${AIRFLOW_HOME}/requirements`,
    ];
  }

  private async resetDatabase(): Promise<void> {
    this.logger.info(`Resetting database directory ${this.paths.dbData}`);
    await this.fs.remove(this.paths.dbData);
    await this.fs.mkdir(this.paths.dbData, { recursive: true });
  }

  private async runEphemeral(command: string, spec: ContainerSpec): Promise<void> {
    const exitCode = await this.gateway.runAttached(
      spec,
      this.containerName(command),
      this.stdout,
      this.stderr,
      spec.openStdin ? this.stdin : undefined
    );
    if (exitCode !== 0) {
      throw new ContainerExitedError(`${command} exited with code ${exitCode}`, exitCode);
    }
  }

  private withDefaultCredentials(envs: Envs): Envs {
    return { ...envs, credentials: envs.credentials ?? this.options.credentials };
  }

  private containerName(suffix: string): string {
    return `${this.options.label}-${suffix}`;
  }

  private async phase<T>(phase: LifecyclePhase, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (error instanceof LifecyclePhaseError) {
        throw error;
      }
      throw new LifecyclePhaseError(phase, error);
    }
  }

  /**
   * On failure, stop whatever this session started before rethrowing
   */
  private async withCompensation<T>(work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      this.logger.warn('Stopping session containers after failed start', {
        error: errorMessage(error),
      });
      try {
        await this.gateway.stopContainersByLabel(sessionLabelFilter(this.options.label));
      } catch (stopError) {
        this.logger.error('Failed to stop session containers', { error: errorMessage(stopError) });
      }
      throw error;
    }
  }
}
