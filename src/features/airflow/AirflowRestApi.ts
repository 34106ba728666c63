/**
 * Airflow stable REST API calls proxied through the MWAA control plane
 */

import { z } from 'zod';
import { ConfigurationError, MwaaLocalError } from '../../shared/utils/errors.js';
import type { IEnvironmentClient, JsonValue } from '../aws/EnvironmentClient.js';

type Query = { [key: string]: JsonValue };

const RecordSchema = z.record(z.unknown());

const DagCollectionSchema = z.object({ dags: z.array(RecordSchema).default([]) });
const RoleCollectionSchema = z.object({ roles: z.array(RecordSchema).default([]) });
const VariableCollectionSchema = z.object({ variables: z.array(RecordSchema).default([]) });
const FileTokenSchema = z.object({ file_token: z.string() });
const DagSourceSchema = z.union([z.string(), z.object({ content: z.string() })]);

export type ApiRecord = z.infer<typeof RecordSchema>;

export interface PageOptions {
  limit?: number;
  offset?: number;
  orderBy?: string;
}

export interface DagListOptions extends PageOptions {
  tags?: string[];
  onlyActive?: boolean;
  /** true: paused only, false: unpaused only, undefined: both */
  paused?: boolean;
  fields?: string[];
  dagIdPattern?: string;
}

export type RoleAction = {
  resource: { name: string };
  action: { name: string };
};

function pageQuery(options: PageOptions): Query {
  const query: Query = {
    limit: options.limit ?? 100,
    offset: options.offset ?? 0,
  };
  if (options.orderBy) {
    query.order_by = options.orderBy;
  }
  return query;
}

export function dagListQuery(options: DagListOptions): Query {
  const query = pageQuery(options);
  query.only_active = options.onlyActive ?? true;
  if (options.tags?.length) {
    query.tags = options.tags;
  }
  if (options.fields?.length) {
    query.fields = options.fields;
  }
  if (options.paused !== undefined) {
    query.paused = options.paused;
  }
  if (options.dagIdPattern) {
    query.dag_id_pattern = options.dagIdPattern;
  }
  return query;
}

/**
 * Permissions written as resource.action, e.g. DAGs.can_read or DAG:example.can_edit
 */
export function parseRoleActions(actions: readonly string[]): RoleAction[] {
  return actions.map((entry) => {
    const separator = entry.lastIndexOf('.');
    const resource = entry.slice(0, separator);
    const action = entry.slice(separator + 1);
    if (separator < 0 || !resource || !action) {
      throw new ConfigurationError(
        `invalid action format: ${entry}, expected resource.action`
      );
    }
    return { resource: { name: resource }, action: { name: action } };
  });
}

function decode<S extends z.ZodTypeAny>(schema: S, body: unknown, path: string): z.infer<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new MwaaLocalError(`unexpected response from ${path}`);
  }
  return result.data;
}

export class AirflowRestApi {
  constructor(
    private readonly client: Pick<IEnvironmentClient, 'invokeRestApi'>,
    private readonly environment: string
  ) {}

  async listDags(options: DagListOptions = {}): Promise<ApiRecord[]> {
    const body = await this.get('/dags', dagListQuery(options));
    return decode(DagCollectionSchema, body, '/dags').dags;
  }

  async getDag(dagId: string, fields: string[] = []): Promise<ApiRecord> {
    const path = `/dags/${dagId}`;
    const body = await this.get(path, fields.length ? { fields } : undefined);
    return decode(RecordSchema, body, path);
  }

  async getDagSource(dagId: string): Promise<string> {
    const path = `/dags/${dagId}`;
    const dag = decode(FileTokenSchema, await this.get(path, { fields: 'file_token' }), path);

    const sourcePath = `/dagSources/${dag.file_token}`;
    const source = decode(DagSourceSchema, await this.get(sourcePath), sourcePath);
    return typeof source === 'string' ? source : source.content;
  }

  async listRoles(): Promise<ApiRecord[]> {
    return decode(RoleCollectionSchema, await this.get('/roles'), '/roles').roles;
  }

  async getRole(name: string): Promise<ApiRecord> {
    const path = `/roles/${name}`;
    return decode(RecordSchema, await this.get(path), path);
  }

  async createRole(name: string, actions: readonly string[]): Promise<ApiRecord> {
    const response = await this.client.invokeRestApi({
      name: this.environment,
      method: 'POST',
      path: '/roles',
      body: { name, actions: parseRoleActions(actions) },
    });
    return decode(RecordSchema, response.body, '/roles');
  }

  async listVariables(options: PageOptions = {}): Promise<ApiRecord[]> {
    const body = await this.get('/variables', pageQuery(options));
    return decode(VariableCollectionSchema, body, '/variables').variables;
  }

  private async get(path: string, query?: Query): Promise<unknown> {
    const response = await this.client.invokeRestApi({
      name: this.environment,
      method: 'GET',
      path,
      query,
    });
    return response.body;
  }
}
