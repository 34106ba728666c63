/**
 * Secret store variants behind the Airflow secrets backend
 */

import {
  GetSecretValueCommand,
  ListSecretsCommand,
  SecretsManagerClient,
  UpdateSecretCommand,
} from '@aws-sdk/client-secrets-manager';
import {
  GetParameterCommand,
  GetParametersByPathCommand,
  PutParameterCommand,
  SSMClient,
} from '@aws-sdk/client-ssm';
import { MwaaLocalError } from '../../shared/utils/errors.js';

export interface ISecretStore {
  /** Names of every secret under `prefix` */
  list(prefix: string): Promise<string[]>;
  get(id: string): Promise<string>;
  put(id: string, value: string): Promise<void>;
}

export class SecretsManagerStore implements ISecretStore {
  constructor(private readonly client: SecretsManagerClient) {}

  async list(prefix: string): Promise<string[]> {
    const names: string[] = [];
    let nextToken: string | undefined;
    do {
      const page = await this.client.send(
        new ListSecretsCommand({
          Filters: [{ Key: 'name', Values: [prefix] }],
          NextToken: nextToken,
        })
      );
      for (const secret of page.SecretList ?? []) {
        if (secret.Name) {
          names.push(secret.Name);
        }
      }
      nextToken = page.NextToken;
    } while (nextToken);
    return names;
  }

  async get(id: string): Promise<string> {
    const output = await this.client.send(new GetSecretValueCommand({ SecretId: id }));
    if (output.SecretString === undefined) {
      throw new MwaaLocalError(`secret ${id} has no string value`);
    }
    return output.SecretString;
  }

  async put(id: string, value: string): Promise<void> {
    await this.client.send(new UpdateSecretCommand({ SecretId: id, SecretString: value }));
  }
}

export class ParameterStore implements ISecretStore {
  constructor(private readonly client: SSMClient) {}

  async list(prefix: string): Promise<string[]> {
    const names: string[] = [];
    let nextToken: string | undefined;
    do {
      const page = await this.client.send(
        new GetParametersByPathCommand({ Path: prefix, Recursive: true, NextToken: nextToken })
      );
      for (const parameter of page.Parameters ?? []) {
        if (parameter.Name) {
          names.push(parameter.Name);
        }
      }
      nextToken = page.NextToken;
    } while (nextToken);
    return names;
  }

  async get(id: string): Promise<string> {
    const output = await this.client.send(
      new GetParameterCommand({ Name: id, WithDecryption: true })
    );
    const value = output.Parameter?.Value;
    if (value === undefined) {
      throw new MwaaLocalError(`parameter ${id} has no value`);
    }
    return value;
  }

  async put(id: string, value: string): Promise<void> {
    await this.client.send(
      new PutParameterCommand({ Name: id, Value: value, Type: 'SecureString', Overwrite: true })
    );
  }
}
