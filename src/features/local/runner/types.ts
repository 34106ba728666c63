/**
 * Local runner types
 */

import path from 'path';
import type { AwsCredentials } from '../../aws/types.js';
import type { Envs } from '../env/Envs.js';
import { normalizeVersion } from '../../../shared/utils/strings.js';

/** Docker label grouping every container of one session */
export const SESSION_LABEL_KEY = 'mwaa-local.session';

/** Compose service the primary container depends on */
export const DEPENDENCY_SERVICE = 'postgres';

export const AIRFLOW_HOME = '/usr/local/airflow';

export type RunnerState =
  | 'uninitialized'
  | 'image-built'
  | 'dependency-running'
  | 'dependency-ready'
  | 'primary-running'
  | 'serving'
  | 'stopped'
  | 'failed';

export interface RunnerOptions {
  version: string;
  /** Relative paths resolve against the runner's working directory */
  clonePath: string;
  dagsPath: string;
  networkName: string;
  /** Session label value; one label = one session */
  label: string;
  credentials?: AwsCredentials;
}

export interface StartOptions {
  port: number;
  resetDb: boolean;
  envs: Envs;
  followLogs: boolean;
  /** HTTP readiness budget */
  waitTimeoutMs?: number;
  signal?: AbortSignal;
  onReady?: (url: string) => void | Promise<void>;
  onLogLine?: (line: string) => void;
}

export interface RunnerPaths {
  clonePath: string;
  buildContext: string;
  composeFile: string;
  envFile: string;
  airflowCfg: string;
  dbData: string;
  dags: string;
  plugins: string;
  requirements: string;
  startupScript: string;
}

export function resolveRunnerPaths(
  cwd: string,
  options: { clonePath: string; dagsPath: string }
): RunnerPaths {
  const clonePath = path.resolve(cwd, options.clonePath);
  const dockerDir = path.join(clonePath, 'docker');
  return {
    clonePath,
    buildContext: dockerDir,
    composeFile: path.join(dockerDir, 'docker-compose-local.yml'),
    envFile: path.join(dockerDir, 'config', '.env.localrunner'),
    airflowCfg: path.join(dockerDir, 'config', 'airflow.cfg'),
    dbData: path.join(clonePath, 'db-data'),
    dags: path.join(path.resolve(cwd, options.dagsPath), 'dags'),
    plugins: path.join(clonePath, 'plugins'),
    requirements: path.join(clonePath, 'requirements'),
    startupScript: path.join(clonePath, 'startup_script'),
  };
}

export function imageTag(version: string): string {
  return `amazon/mwaa-local:${normalizeVersion(version)}`;
}

export function defaultSessionLabel(version: string): string {
  return `mwaa-local-runner-${normalizeVersion(version)}`;
}

export function sessionLabelFilter(label: string): string {
  return `${SESSION_LABEL_KEY}=${label}`;
}
