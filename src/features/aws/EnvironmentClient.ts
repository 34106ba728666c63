/**
 * MWAA control-plane client
 */

import {
  CreateCliTokenCommand,
  CreateWebLoginTokenCommand,
  Environment,
  GetEnvironmentCommand,
  InvokeRestApiCommand,
  ListEnvironmentsCommand,
  LoggingConfiguration,
  MWAAClient,
  ModuleLoggingConfiguration,
  RestApiClientException,
  RestApiServerException,
} from '@aws-sdk/client-mwaa';
import { ConfigurationError, MwaaLocalError, RestApiError } from '../../shared/utils/errors.js';

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type RestApiMethod = 'GET' | 'PUT' | 'POST' | 'PATCH' | 'DELETE';

export const LOG_TYPES = ['dag-processing', 'scheduler', 'task', 'webserver', 'worker'] as const;

export type LogType = (typeof LOG_TYPES)[number];

export interface EnvironmentDetails {
  name: string;
  arn?: string;
  status?: string;
  airflowVersion?: string;
  webserverUrl?: string;
  executionRoleArn?: string;
  sourceBucketArn?: string;
  dagS3Path?: string;
  requirementsS3Path?: string;
  requirementsS3ObjectVersion?: string;
  pluginsS3Path?: string;
  pluginsS3ObjectVersion?: string;
  startupScriptS3Path?: string;
  startupScriptS3ObjectVersion?: string;
  airflowConfigurationOptions: Record<string, string>;
  /** CloudWatch log group of every enabled log type */
  logGroupArns: Partial<Record<LogType, string>>;
}

export interface Token {
  token: string;
  hostname: string;
}

export interface RestApiRequest {
  name: string;
  method: RestApiMethod;
  /** Airflow REST path, e.g. /dags */
  path: string;
  query?: { [key: string]: JsonValue };
  body?: JsonValue;
}

export interface RestApiResponse {
  statusCode: number;
  body: unknown;
}

export interface IEnvironmentClient {
  listEnvironments(): Promise<string[]>;
  getEnvironment(name: string): Promise<EnvironmentDetails>;
  createCliToken(name: string): Promise<Token>;
  createWebLoginToken(name: string): Promise<Token>;
  invokeRestApi(request: RestApiRequest): Promise<RestApiResponse>;
}

function enabledLogGroups(
  logging: LoggingConfiguration | undefined
): Partial<Record<LogType, string>> {
  const modules: Record<LogType, ModuleLoggingConfiguration | undefined> = {
    'dag-processing': logging?.DagProcessingLogs,
    scheduler: logging?.SchedulerLogs,
    task: logging?.TaskLogs,
    webserver: logging?.WebserverLogs,
    worker: logging?.WorkerLogs,
  };

  const groups: Partial<Record<LogType, string>> = {};
  for (const type of LOG_TYPES) {
    const config = modules[type];
    if (config?.Enabled && config.CloudWatchLogGroupArn) {
      groups[type] = config.CloudWatchLogGroupArn;
    }
  }
  return groups;
}

export function toEnvironmentDetails(environment: Environment): EnvironmentDetails {
  return {
    name: environment.Name ?? '',
    arn: environment.Arn,
    status: environment.Status,
    airflowVersion: environment.AirflowVersion,
    webserverUrl: environment.WebserverUrl,
    executionRoleArn: environment.ExecutionRoleArn,
    sourceBucketArn: environment.SourceBucketArn,
    dagS3Path: environment.DagS3Path,
    requirementsS3Path: environment.RequirementsS3Path,
    requirementsS3ObjectVersion: environment.RequirementsS3ObjectVersion,
    pluginsS3Path: environment.PluginsS3Path,
    pluginsS3ObjectVersion: environment.PluginsS3ObjectVersion,
    startupScriptS3Path: environment.StartupScriptS3Path,
    startupScriptS3ObjectVersion: environment.StartupScriptS3ObjectVersion,
    airflowConfigurationOptions: environment.AirflowConfigurationOptions ?? {},
    logGroupArns: enabledLogGroups(environment.LoggingConfiguration),
  };
}

function readText(source: unknown, key: string): string | undefined {
  if (typeof source !== 'object' || source === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

export class MwaaEnvironmentClient implements IEnvironmentClient {
  constructor(private readonly client: MWAAClient) {}

  async listEnvironments(): Promise<string[]> {
    const names: string[] = [];
    let nextToken: string | undefined;
    do {
      const page = await this.client.send(new ListEnvironmentsCommand({ NextToken: nextToken }));
      names.push(...(page.Environments ?? []));
      nextToken = page.NextToken;
    } while (nextToken);
    return names;
  }

  async getEnvironment(name: string): Promise<EnvironmentDetails> {
    const output = await this.client.send(new GetEnvironmentCommand({ Name: name }));
    if (!output.Environment) {
      throw new MwaaLocalError(`environment ${name} not found`);
    }
    return toEnvironmentDetails(output.Environment);
  }

  async createCliToken(name: string): Promise<Token> {
    const output = await this.client.send(new CreateCliTokenCommand({ Name: name }));
    return {
      token: output.CliToken ?? '',
      hostname: output.WebServerHostname ?? '',
    };
  }

  async createWebLoginToken(name: string): Promise<Token> {
    const output = await this.client.send(new CreateWebLoginTokenCommand({ Name: name }));
    return {
      token: output.WebToken ?? '',
      hostname: output.WebServerHostname ?? '',
    };
  }

  async invokeRestApi(request: RestApiRequest): Promise<RestApiResponse> {
    try {
      const output = await this.client.send(
        new InvokeRestApiCommand({
          Name: request.name,
          Method: request.method,
          Path: request.path,
          QueryParameters: request.query,
          Body: request.body,
        })
      );
      return { statusCode: output.RestApiStatusCode ?? 0, body: output.RestApiResponse };
    } catch (error) {
      if (error instanceof RestApiClientException || error instanceof RestApiServerException) {
        const response: unknown = error.RestApiResponse;
        throw new RestApiError(
          readText(response, 'title') ?? error.name,
          readText(response, 'detail') ?? error.message,
          error.RestApiStatusCode ?? error.$metadata.httpStatusCode ?? 0
        );
      }
      throw error;
    }
  }
}

/**
 * Airflow UI address that signs in with a web login token
 */
export function webLoginUrl(token: Token): string {
  return `https://${token.hostname}/aws_mwaa/aws-console-sso?login=true#${token.token}`;
}

/**
 * The explicit name, or the only environment in the account/region
 */
export async function resolveEnvironmentName(
  client: Pick<IEnvironmentClient, 'listEnvironments'>,
  explicit?: string
): Promise<string> {
  if (explicit) {
    return explicit;
  }

  const environments = await client.listEnvironments();
  if (environments.length === 0) {
    throw new ConfigurationError('no MWAA environments found; pass --env');
  }
  if (environments.length > 1) {
    throw new ConfigurationError(
      `multiple MWAA environments found, pass --env to pick one: ${environments.join(', ')}`
    );
  }
  return environments[0];
}
