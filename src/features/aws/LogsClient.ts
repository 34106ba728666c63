/**
 * CloudWatch Logs reader for an environment's Airflow log groups
 */

import { CloudWatchLogsClient, FilterLogEventsCommand } from '@aws-sdk/client-cloudwatch-logs';
import { ConfigurationError, InvalidArnError } from '../../shared/utils/errors.js';
import { LOG_TYPES, type EnvironmentDetails, type LogType } from './EnvironmentClient.js';

export interface LogEvent {
  /** Milliseconds since the epoch */
  timestamp: number;
  message: string;
  logGroup: string;
}

export interface LogFilter {
  startTime: number;
  endTime: number;
  filterPattern?: string;
}

export interface ILogsClient {
  fetchLogs(logGroupArns: readonly string[], filter: LogFilter): Promise<LogEvent[]>;
}

/**
 * Log group name of arn:aws:logs:<region>:<account>:log-group:<name>[:*]
 */
export function logGroupNameFromArn(arn: string): string {
  const parts = arn.split(':');
  if (parts.length < 7 || parts[0] !== 'arn' || parts[2] !== 'logs' || parts[5] !== 'log-group') {
    throw new InvalidArnError(arn);
  }
  const name = parts[6];
  if (!name) {
    throw new InvalidArnError(arn);
  }
  return name;
}

/**
 * Log group ARNs of the environment, minus the ignored log types
 */
export function selectLogGroups(
  environment: Pick<EnvironmentDetails, 'logGroupArns'>,
  ignored: ReadonlySet<LogType> = new Set()
): string[] {
  return LOG_TYPES.flatMap((type) => {
    const arn = environment.logGroupArns[type];
    return arn && !ignored.has(type) ? [arn] : [];
  });
}

function parseTime(value: string | undefined, fallback: number, flag: string): number {
  if (!value) {
    return fallback;
  }
  const time = Date.parse(value);
  if (Number.isNaN(time)) {
    throw new ConfigurationError(`invalid ${flag}: ${value} (expected an ISO 8601 timestamp)`);
  }
  return time;
}

/**
 * Window between `start` and `end`; defaults to the last hour
 */
export function resolveTimeRange(
  start: string | undefined,
  end: string | undefined,
  now: number = Date.now()
): { startTime: number; endTime: number } {
  const startTime = parseTime(start, now - 60 * 60 * 1000, '--start-time');
  const endTime = parseTime(end, now, '--end-time');
  if (startTime > endTime) {
    throw new ConfigurationError('start time must be before end time');
  }
  return { startTime, endTime };
}

export class CloudWatchLogsReader implements ILogsClient {
  constructor(private readonly client: CloudWatchLogsClient) {}

  /**
   * Every matching event of every group, oldest first
   */
  async fetchLogs(logGroupArns: readonly string[], filter: LogFilter): Promise<LogEvent[]> {
    const events: LogEvent[] = [];
    for (const arn of logGroupArns) {
      events.push(...(await this.filterGroup(logGroupNameFromArn(arn), filter)));
    }
    return events.sort((a, b) => a.timestamp - b.timestamp);
  }

  private async filterGroup(logGroup: string, filter: LogFilter): Promise<LogEvent[]> {
    const events: LogEvent[] = [];
    let nextToken: string | undefined;
    do {
      const page = await this.client.send(
        new FilterLogEventsCommand({
          logGroupName: logGroup,
          startTime: filter.startTime,
          endTime: filter.endTime,
          filterPattern: filter.filterPattern || undefined,
          nextToken,
        })
      );
      for (const event of page.events ?? []) {
        events.push({
          timestamp: event.timestamp ?? 0,
          message: event.message ?? '',
          logGroup,
        });
      }
      nextToken = page.nextToken;
    } while (nextToken);
    return events;
  }
}
