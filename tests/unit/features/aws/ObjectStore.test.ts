import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { setupServer } from 'msw/node';
import { http, HttpResponse } from 'msw';
import { S3Client } from '@aws-sdk/client-s3';
import { S3ObjectStore } from '../../../../src/features/aws/ObjectStore.js';

const ENDPOINT = 'http://s3.test';

const server = setupServer();

beforeAll(() => server.listen({ onUnhandledRequest: 'error' }));
afterEach(() => server.resetHandlers());
afterAll(() => server.close());

function createStore(): S3ObjectStore {
  return new S3ObjectStore(
    new S3Client({
      region: 'us-east-1',
      endpoint: ENDPOINT,
      forcePathStyle: true,
      maxAttempts: 1,
      credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' },
    })
  );
}

describe('S3ObjectStore', () => {
  it('should read an object at a given version', async () => {
    let versionId: string | null = null;
    server.use(
      http.get(`${ENDPOINT}/test-airflow-bucket/requirements.txt`, ({ request }) => {
        versionId = new URL(request.url).searchParams.get('versionId');
        return new HttpResponse('boto3\n', { headers: { 'content-type': 'text/plain' } });
      })
    );

    const body = await createStore().getObject('test-airflow-bucket', 'requirements.txt', 'v-req');

    expect(Buffer.from(body).toString()).toBe('boto3\n');
    expect(versionId).toBe('v-req');
  });

  it('should read the latest version when none is given', async () => {
    let versionId: string | null = 'unset';
    server.use(
      http.get(`${ENDPOINT}/test-airflow-bucket/startup.sh`, ({ request }) => {
        versionId = new URL(request.url).searchParams.get('versionId');
        return new HttpResponse('#!/bin/sh\n');
      })
    );

    await createStore().getObject('test-airflow-bucket', 'startup.sh', '');

    expect(versionId).toBeNull();
  });

  it('should surface a missing key', async () => {
    server.use(
      http.get(
        `${ENDPOINT}/test-airflow-bucket/missing.txt`,
        () =>
          new HttpResponse(
            '<?xml version="1.0" encoding="UTF-8"?><Error><Code>NoSuchKey</Code><Message>The specified key does not exist.</Message></Error>',
            { status: 404, headers: { 'content-type': 'application/xml' } }
          )
      )
    );

    await expect(createStore().getObject('test-airflow-bucket', 'missing.txt')).rejects.toMatchObject(
      { name: 'NoSuchKey' }
    );
  });
});
