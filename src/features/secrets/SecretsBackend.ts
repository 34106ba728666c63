/**
 * Airflow secrets backend as configured on an environment
 *
 * `secrets.backend` picks the store, `secrets.backend_kwargs` the prefixes and
 * lookup patterns connections and variables live under.
 */

import { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { SSMClient } from '@aws-sdk/client-ssm';
import { z } from 'zod';
import {
  ConfigurationError,
  UnsupportedBackendError,
  errorMessage,
} from '../../shared/utils/errors.js';
import { AwsContext, awsClientConfig } from '../aws/clients.js';
import { ISecretStore, ParameterStore, SecretsManagerStore } from './SecretStores.js';

export const SECRETS_MANAGER_BACKEND =
  'airflow.providers.amazon.aws.secrets.secrets_manager.SecretsManagerBackend';
export const PARAMETER_STORE_BACKEND =
  'airflow.providers.amazon.aws.secrets.systems_manager.SystemsManagerParameterStoreBackend';

const BackendKwargsSchema = z.object({
  connections_prefix: z.string().optional(),
  connections_lookup_pattern: z.string().optional(),
  variables_prefix: z.string().optional(),
  variables_lookup_pattern: z.string().optional(),
});

export interface BackendKwargs {
  connectionsPrefix: string;
  connectionsLookupPattern?: string;
  variablesPrefix: string;
  variablesLookupPattern?: string;
}

export type SecretsBackendConfig =
  | { kind: 'secrets-manager'; kwargs: BackendKwargs }
  | { kind: 'parameter-store'; kwargs: BackendKwargs };

// Provider defaults when backend_kwargs leaves a prefix out
const DEFAULT_PREFIXES: Record<SecretsBackendConfig['kind'], [string, string]> = {
  'secrets-manager': ['airflow/connections', 'airflow/variables'],
  'parameter-store': ['/airflow/connections', '/airflow/variables'],
};

function parseKwargs(kind: SecretsBackendConfig['kind'], raw: string | undefined): BackendKwargs {
  let json: unknown = {};
  if (raw) {
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ConfigurationError(
        `secrets.backend_kwargs is not valid JSON: ${errorMessage(error)}`
      );
    }
  }

  const result = BackendKwargsSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigurationError(`invalid secrets.backend_kwargs: ${result.error.message}`);
  }

  const [connections, variables] = DEFAULT_PREFIXES[kind];
  return {
    connectionsPrefix: result.data.connections_prefix ?? connections,
    connectionsLookupPattern: result.data.connections_lookup_pattern,
    variablesPrefix: result.data.variables_prefix ?? variables,
    variablesLookupPattern: result.data.variables_lookup_pattern,
  };
}

/**
 * Backend variant from an environment's Airflow configuration options
 */
export function parseBackendConfig(options: Record<string, string>): SecretsBackendConfig {
  const backend = options['secrets.backend'];
  if (!backend) {
    throw new ConfigurationError('environment has no secrets backend configured');
  }

  const rawKwargs = options['secrets.backend_kwargs'];
  switch (backend) {
    case SECRETS_MANAGER_BACKEND:
      return { kind: 'secrets-manager', kwargs: parseKwargs('secrets-manager', rawKwargs) };
    case PARAMETER_STORE_BACKEND:
      return { kind: 'parameter-store', kwargs: parseKwargs('parameter-store', rawKwargs) };
    default:
      throw new UnsupportedBackendError(backend);
  }
}

export function createSecretStore(config: SecretsBackendConfig, context: AwsContext): ISecretStore {
  switch (config.kind) {
    case 'secrets-manager':
      return new SecretsManagerStore(new SecretsManagerClient(awsClientConfig(context)));
    case 'parameter-store':
      return new ParameterStore(new SSMClient(awsClientConfig(context)));
  }
}

function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new ConfigurationError(`invalid lookup pattern ${pattern}: ${errorMessage(error)}`);
  }
}

export class SecretsBackend {
  constructor(
    private readonly config: SecretsBackendConfig,
    private readonly store: ISecretStore
  ) {}

  get kind(): SecretsBackendConfig['kind'] {
    return this.config.kind;
  }

  async listConnections(): Promise<string[]> {
    const { connectionsPrefix, connectionsLookupPattern } = this.config.kwargs;
    return this.list(connectionsPrefix, connectionsLookupPattern);
  }

  async listVariables(): Promise<string[]> {
    const { variablesPrefix, variablesLookupPattern } = this.config.kwargs;
    return this.list(variablesPrefix, variablesLookupPattern);
  }

  async getConnection(id: string): Promise<string> {
    return this.store.get(`${this.config.kwargs.connectionsPrefix}/${id}`);
  }

  async getVariable(id: string): Promise<string> {
    return this.store.get(`${this.config.kwargs.variablesPrefix}/${id}`);
  }

  async setConnection(id: string, value: string): Promise<void> {
    await this.store.put(`${this.config.kwargs.connectionsPrefix}/${id}`, value);
  }

  async setVariable(id: string, value: string): Promise<void> {
    await this.store.put(`${this.config.kwargs.variablesPrefix}/${id}`, value);
  }

  private async list(prefix: string, pattern: string | undefined): Promise<string[]> {
    const matcher = pattern ? compilePattern(pattern) : undefined;
    const names = await this.store.list(prefix);
    return matcher ? names.filter((name) => matcher.test(name)) : names;
  }
}
