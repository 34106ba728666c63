/**
 * Main entry point for mwaa-local
 * Exports public API
 */

export * from './platform/index.js';
export * from './shared/config/ConfigLoader.js';
export * from './shared/config/schemas.js';
export * from './shared/utils/logger.js';
export * from './shared/utils/errors.js';

export { ContainerGateway } from './features/local/container/ContainerGateway.js';
export type { LogStreamResult, StreamLogsOptions } from './features/local/container/ContainerGateway.js';
export { mergeEnv, parseEnv, parseEnvFile, serializeEnv } from './features/local/env/EnvParser.js';
export { renderEnvs } from './features/local/env/Envs.js';
export type { Envs } from './features/local/env/Envs.js';
export {
  getServiceEnvironment,
  getServiceImage,
  parseCompose,
  readComposeFile,
} from './features/local/compose/ComposeReader.js';
export { Runner } from './features/local/runner/Runner.js';
export type { RunnerDeps, StartResult } from './features/local/runner/Runner.js';
export { ReadinessPoller } from './features/local/runner/ReadinessPoller.js';
export type { IReadinessProbe, ReadinessOptions } from './features/local/runner/ReadinessPoller.js';
export * from './features/local/runner/types.js';
export { Installer } from './features/local/installer/Installer.js';
export type { InstallSummary } from './features/local/installer/Installer.js';
export { GitTreeFetcher } from './features/local/installer/GitTreeFetcher.js';
export { Syncer } from './features/local/sync/Syncer.js';
export type { SyncResult } from './features/local/sync/Syncer.js';
export * from './features/local/diff/ConfigDiff.js';

export * from './features/aws/EnvironmentClient.js';
export * from './features/aws/CredentialResolver.js';
export * from './features/aws/ObjectStore.js';
export type { AwsCredentials } from './features/aws/types.js';
export * from './features/secrets/SecretsBackend.js';
export * from './features/secrets/SecretStores.js';
export * from './features/aws/LogsClient.js';
export * from './features/aws/AirflowCli.js';
export * from './features/airflow/AirflowRestApi.js';
