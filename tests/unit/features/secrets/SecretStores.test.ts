/**
 * Tests for the Secrets Manager and Parameter Store adapters
 */

import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { setupServer } from 'msw/node';
import { http, HttpResponse, type JsonBodyType } from 'msw';
import { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { SSMClient } from '@aws-sdk/client-ssm';
import {
  ParameterStore,
  SecretsManagerStore,
} from '../../../../src/features/secrets/SecretStores.js';

const SECRETS_ENDPOINT = 'http://secretsmanager.test';
const SSM_ENDPOINT = 'http://ssm.test';

const testClientConfig = (endpoint: string) => ({
  region: 'us-east-1',
  endpoint,
  maxAttempts: 1,
  credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' },
});

interface RecordedCall {
  target: string | null;
  body: unknown;
}

const server = setupServer();
let calls: RecordedCall[] = [];

/**
 * Answers JSON 1.1 calls by their X-Amz-Target
 */
function jsonRpc(endpoint: string, responses: Record<string, (body: unknown) => JsonBodyType>) {
  return http.post(`${endpoint}/`, async ({ request }) => {
    const target = request.headers.get('x-amz-target');
    const body: unknown = await request.json();
    calls.push({ target, body });
    const respond = target ? responses[target] : undefined;
    if (!respond) {
      return HttpResponse.json({ message: `unexpected ${target}` }, { status: 400 });
    }
    return HttpResponse.json(respond(body), {
      headers: { 'content-type': 'application/x-amz-json-1.1' },
    });
  });
}

beforeAll(() => server.listen({ onUnhandledRequest: 'error' }));
afterEach(() => {
  server.resetHandlers();
  calls = [];
});
afterAll(() => server.close());

describe('SecretsManagerStore', () => {
  const store = () =>
    new SecretsManagerStore(new SecretsManagerClient(testClientConfig(SECRETS_ENDPOINT)));

  it('should list secret names under a prefix across pages', async () => {
    server.use(
      jsonRpc(SECRETS_ENDPOINT, {
        'secretsmanager.ListSecrets': (body) =>
          typeof body === 'object' && body !== null && 'NextToken' in body
            ? { SecretList: [{ Name: 'airflow/connections/b' }] }
            : { SecretList: [{ Name: 'airflow/connections/a' }], NextToken: 'page-2' },
      })
    );

    expect(await store().list('airflow/connections')).toEqual([
      'airflow/connections/a',
      'airflow/connections/b',
    ]);
    expect(calls[0]).toEqual({
      target: 'secretsmanager.ListSecrets',
      body: { Filters: [{ Key: 'name', Values: ['airflow/connections'] }] },
    });
  });

  it('should read a secret string', async () => {
    server.use(
      jsonRpc(SECRETS_ENDPOINT, {
        'secretsmanager.GetSecretValue': () => ({
          Name: 'airflow/variables/env',
          SecretString: 'staging',
        }),
      })
    );

    expect(await store().get('airflow/variables/env')).toBe('staging');
    expect(calls[0]?.body).toEqual({ SecretId: 'airflow/variables/env' });
  });

  it('should update an existing secret', async () => {
    server.use(
      jsonRpc(SECRETS_ENDPOINT, {
        'secretsmanager.UpdateSecret': () => ({ Name: 'airflow/variables/env' }),
      })
    );

    await store().put('airflow/variables/env', 'prod');

    expect(calls[0]?.target).toBe('secretsmanager.UpdateSecret');
    expect(calls[0]?.body).toMatchObject({
      SecretId: 'airflow/variables/env',
      SecretString: 'prod',
    });
  });
});

describe('ParameterStore', () => {
  const store = () => new ParameterStore(new SSMClient(testClientConfig(SSM_ENDPOINT)));

  it('should list parameters recursively under a path', async () => {
    server.use(
      jsonRpc(SSM_ENDPOINT, {
        'AmazonSSM.GetParametersByPath': () => ({
          Parameters: [{ Name: '/airflow/variables/env' }, { Name: '/airflow/variables/team' }],
        }),
      })
    );

    expect(await store().list('/airflow/variables')).toEqual([
      '/airflow/variables/env',
      '/airflow/variables/team',
    ]);
    expect(calls[0]?.body).toEqual({ Path: '/airflow/variables', Recursive: true });
  });

  it('should read a decrypted parameter', async () => {
    server.use(
      jsonRpc(SSM_ENDPOINT, {
        'AmazonSSM.GetParameter': () => ({
          Parameter: { Name: '/airflow/connections/db', Value: 'postgres://db' },
        }),
      })
    );

    expect(await store().get('/airflow/connections/db')).toBe('postgres://db');
    expect(calls[0]?.body).toEqual({ Name: '/airflow/connections/db', WithDecryption: true });
  });

  it('should overwrite parameters as secure strings', async () => {
    server.use(jsonRpc(SSM_ENDPOINT, { 'AmazonSSM.PutParameter': () => ({ Version: 2 }) }));

    await store().put('/airflow/variables/env', 'prod');

    expect(calls[0]?.body).toEqual({
      Name: '/airflow/variables/env',
      Value: 'prod',
      Type: 'SecureString',
      Overwrite: true,
    });
  });
});
