/**
 * Tests for the CloudWatch Logs reader
 */

import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { setupServer } from 'msw/node';
import { http, HttpResponse } from 'msw';
import { CloudWatchLogsClient } from '@aws-sdk/client-cloudwatch-logs';
import {
  CloudWatchLogsReader,
  logGroupNameFromArn,
  resolveTimeRange,
  selectLogGroups,
} from '../../../../src/features/aws/LogsClient.js';
import type { LogType } from '../../../../src/features/aws/EnvironmentClient.js';
import { ConfigurationError, InvalidArnError } from '../../../../src/shared/utils/errors.js';

const ENDPOINT = 'http://logs.test';
const TASK_ARN = 'arn:aws:logs:us-east-1:123456789012:log-group:airflow-dev-Task';
const SCHEDULER_ARN = 'arn:aws:logs:us-east-1:123456789012:log-group:airflow-dev-Scheduler:*';

const server = setupServer();
let requests: Array<Record<string, unknown>> = [];

beforeAll(() => server.listen({ onUnhandledRequest: 'error' }));
afterEach(() => {
  server.resetHandlers();
  requests = [];
});
afterAll(() => server.close());

function createReader(): CloudWatchLogsReader {
  return new CloudWatchLogsReader(
    new CloudWatchLogsClient({
      region: 'us-east-1',
      endpoint: ENDPOINT,
      maxAttempts: 1,
      credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' },
    })
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

describe('logGroupNameFromArn', () => {
  it('should take the name after log-group', () => {
    expect(logGroupNameFromArn(TASK_ARN)).toBe('airflow-dev-Task');
    expect(logGroupNameFromArn(SCHEDULER_ARN)).toBe('airflow-dev-Scheduler');
  });

  it('should reject other ARNs', () => {
    expect(() => logGroupNameFromArn('arn:aws:s3:::test-airflow-bucket')).toThrow(InvalidArnError);
  });
});

describe('selectLogGroups', () => {
  it('should list enabled groups in a fixed order and skip ignored types', () => {
    const environment = {
      logGroupArns: { task: TASK_ARN, scheduler: SCHEDULER_ARN },
    };

    expect(selectLogGroups(environment)).toEqual([SCHEDULER_ARN, TASK_ARN]);
    expect(selectLogGroups(environment, new Set<LogType>(['scheduler']))).toEqual([TASK_ARN]);
  });
});

describe('resolveTimeRange', () => {
  const now = Date.parse('2026-03-01T12:00:00Z');

  it('should default to the last hour', () => {
    expect(resolveTimeRange(undefined, undefined, now)).toEqual({
      startTime: Date.parse('2026-03-01T11:00:00Z'),
      endTime: now,
    });
  });

  it('should parse ISO 8601 bounds', () => {
    expect(resolveTimeRange('2026-03-01T10:00:00Z', '2026-03-01T10:30:00Z', now)).toEqual({
      startTime: Date.parse('2026-03-01T10:00:00Z'),
      endTime: Date.parse('2026-03-01T10:30:00Z'),
    });
  });

  it('should reject unparsable or inverted bounds', () => {
    expect(() => resolveTimeRange('yesterday', undefined, now)).toThrow(
      new ConfigurationError('invalid --start-time: yesterday (expected an ISO 8601 timestamp)')
    );
    expect(() => resolveTimeRange('2026-03-01T12:30:00Z', undefined, now)).toThrow(
      new ConfigurationError('start time must be before end time')
    );
  });
});

describe('CloudWatchLogsReader', () => {
  it('should follow pages per group and merge events by timestamp', async () => {
    server.use(
      http.post(`${ENDPOINT}/`, async ({ request }) => {
        expect(request.headers.get('x-amz-target')).toBe('Logs_20140328.FilterLogEvents');
        const body: unknown = await request.json();
        if (!isRecord(body)) {
          return HttpResponse.json({ message: 'bad request' }, { status: 400 });
        }
        requests.push(body);

        const events =
          body.logGroupName === 'airflow-dev-Task'
            ? body.nextToken === 'task-2'
              ? { events: [{ timestamp: 30, message: 'task finished' }] }
              : { events: [{ timestamp: 10, message: 'task started' }], nextToken: 'task-2' }
            : { events: [{ timestamp: 20, message: 'scheduler heartbeat' }] };
        return HttpResponse.json(events, {
          headers: { 'content-type': 'application/x-amz-json-1.1' },
        });
      })
    );

    const events = await createReader().fetchLogs([TASK_ARN, SCHEDULER_ARN], {
      startTime: 1,
      endTime: 100,
      filterPattern: 'ERROR',
    });

    expect(events).toEqual([
      { timestamp: 10, message: 'task started', logGroup: 'airflow-dev-Task' },
      { timestamp: 20, message: 'scheduler heartbeat', logGroup: 'airflow-dev-Scheduler' },
      { timestamp: 30, message: 'task finished', logGroup: 'airflow-dev-Task' },
    ]);
    expect(requests).toEqual([
      { logGroupName: 'airflow-dev-Task', startTime: 1, endTime: 100, filterPattern: 'ERROR' },
      {
        logGroupName: 'airflow-dev-Task',
        startTime: 1,
        endTime: 100,
        filterPattern: 'ERROR',
        nextToken: 'task-2',
      },
      {
        logGroupName: 'airflow-dev-Scheduler',
        startTime: 1,
        endTime: 100,
        filterPattern: 'ERROR',
      },
    ]);
  });

  it('should leave out an empty filter pattern', async () => {
    server.use(
      http.post(`${ENDPOINT}/`, async ({ request }) => {
        const body: unknown = await request.json();
        if (isRecord(body)) {
          requests.push(body);
        }
        return HttpResponse.json(
          { events: [] },
          { headers: { 'content-type': 'application/x-amz-json-1.1' } }
        );
      })
    );

    expect(
      await createReader().fetchLogs([TASK_ARN], { startTime: 1, endTime: 2, filterPattern: '' })
    ).toEqual([]);
    expect(requests).toEqual([{ logGroupName: 'airflow-dev-Task', startTime: 1, endTime: 2 }]);
  });
});
