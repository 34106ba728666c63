/**
 * mwaa-local logs - Print an environment's CloudWatch logs, oldest first
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { MWAAClient } from '@aws-sdk/client-mwaa';
import { CloudWatchLogsClient } from '@aws-sdk/client-cloudwatch-logs';
import { createContext } from '../../../cli/context.js';
import { Output } from '../../../cli/Output.js';
import { logger } from '../../../shared/utils/logger.js';
import { awsClientConfig } from '../../aws/clients.js';
import {
  type LogType,
  MwaaEnvironmentClient,
  resolveEnvironmentName,
} from '../../aws/EnvironmentClient.js';
import { CloudWatchLogsReader, resolveTimeRange, selectLogGroups } from '../../aws/LogsClient.js';

const output = new Output(logger);

interface LogsCommandOptions {
  env?: string;
  startTime?: string;
  endTime?: string;
  filterPattern?: string;
  ignoreDagProcessing?: boolean;
  ignoreScheduler?: boolean;
  ignoreTask?: boolean;
  ignoreWebserver?: boolean;
  ignoreWorker?: boolean;
}

export function ignoredLogTypes(options: LogsCommandOptions): Set<LogType> {
  const flags: Array<[LogType, boolean | undefined]> = [
    ['dag-processing', options.ignoreDagProcessing],
    ['scheduler', options.ignoreScheduler],
    ['task', options.ignoreTask],
    ['webserver', options.ignoreWebserver],
    ['worker', options.ignoreWorker],
  ];
  return new Set(flags.filter(([, ignored]) => ignored).map(([type]) => type));
}

export function createLogsCommand(): Command {
  return new Command('logs')
    .description('Fetch CloudWatch logs of an MWAA environment')
    .option('--env <name>', 'MWAA environment name')
    .option('--start-time <time>', 'ISO 8601 start (default: one hour ago)')
    .option('--end-time <time>', 'ISO 8601 end (default: now)')
    .option('--filter-pattern <pattern>', 'CloudWatch filter pattern')
    .option('--ignore-dag-processing', 'skip DAG processing logs')
    .option('--ignore-scheduler', 'skip scheduler logs')
    .option('--ignore-task', 'skip task logs')
    .option('--ignore-webserver', 'skip webserver logs')
    .option('--ignore-worker', 'skip worker logs')
    .action(async (options: LogsCommandOptions, command: Command) => {
      try {
        const range = resolveTimeRange(options.startTime, options.endTime);
        const ctx = await createContext(command);
        const client = new MwaaEnvironmentClient(new MWAAClient(awsClientConfig(ctx.aws)));
        const environment = await output.task('Loading environment...', async () =>
          client.getEnvironment(await resolveEnvironmentName(client, options.env))
        );

        const groups = selectLogGroups(environment, ignoredLogTypes(options));
        if (groups.length === 0) {
          output.warn(`No CloudWatch log groups enabled for ${environment.name}.`);
          return;
        }

        const reader = new CloudWatchLogsReader(new CloudWatchLogsClient(awsClientConfig(ctx.aws)));
        const events = await output.task('Fetching logs...', () =>
          reader.fetchLogs(groups, { ...range, filterPattern: options.filterPattern })
        );
        for (const event of events) {
          output.line(`${chalk.gray(`[${event.logGroup}]`)} ${event.message}`);
        }
      } catch (error) {
        output.fail('Logs', error);
      }
    });
}
