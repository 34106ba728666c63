/**
 * DAG commands against an environment's Airflow REST API
 *
 * Commands:
 * - mwaa-local dags list - List DAGs
 * - mwaa-local dags get <dag-id> - Show one DAG
 * - mwaa-local dags source <dag-id> - Print a DAG's source file
 */

import { Command } from 'commander';
import { MWAAClient } from '@aws-sdk/client-mwaa';
import { createContext } from '../../../cli/context.js';
import { Output } from '../../../cli/Output.js';
import { collectList, parseCount } from '../../../cli/utils/options.js';
import { logger } from '../../../shared/utils/logger.js';
import { awsClientConfig } from '../../aws/clients.js';
import { MwaaEnvironmentClient, resolveEnvironmentName } from '../../aws/EnvironmentClient.js';
import { AirflowRestApi } from '../AirflowRestApi.js';

const output = new Output(logger);

interface DagListCommandOptions {
  env?: string;
  limit: number;
  offset: number;
  orderBy?: string;
  tags?: string[];
  onlyActive: boolean;
  paused?: boolean;
  unpaused?: boolean;
  fields?: string[];
  dagIdPattern?: string;
}

/**
 * --paused and --unpaused narrow the listing; both or neither list every DAG
 */
export function pausedFilter(options: { paused?: boolean; unpaused?: boolean }): boolean | undefined {
  const paused = options.paused ?? false;
  const unpaused = options.unpaused ?? false;
  return paused === unpaused ? undefined : paused;
}

async function connect(command: Command, env?: string): Promise<AirflowRestApi> {
  const ctx = await createContext(command);
  const client = new MwaaEnvironmentClient(new MWAAClient(awsClientConfig(ctx.aws)));
  return new AirflowRestApi(client, await resolveEnvironmentName(client, env));
}

export function createDagsCommand(): Command {
  const dags = new Command('dags').description('DAGs of an MWAA environment');

  dags
    .command('list')
    .description('List DAGs')
    .option('--env <name>', 'MWAA environment name')
    .option('--limit <count>', 'number of DAGs to return', parseCount, 100)
    .option('--offset <count>', 'number of DAGs to skip', parseCount, 0)
    .option('--order-by <field>', 'field to order by; prefix with - to reverse')
    .option('--tags <tags>', 'only DAGs with these tags (comma-separated)', collectList)
    .option('--no-only-active', 'include inactive DAGs')
    .option('--paused', 'only paused DAGs')
    .option('--unpaused', 'only unpaused DAGs')
    .option('--fields <fields>', 'fields to return (comma-separated)', collectList)
    .option('--dag-id-pattern <pattern>', 'only DAGs whose id matches the pattern')
    .action(async (options: DagListCommandOptions, command: Command) => {
      try {
        const api = await connect(command, options.env);
        const list = await output.task('Loading DAGs...', () =>
          api.listDags({
            limit: options.limit,
            offset: options.offset,
            orderBy: options.orderBy,
            tags: options.tags,
            onlyActive: options.onlyActive,
            paused: pausedFilter(options),
            fields: options.fields,
            dagIdPattern: options.dagIdPattern,
          })
        );
        output.json(list);
      } catch (error) {
        output.fail('Dags list', error);
      }
    });

  dags
    .command('get <dag-id>')
    .description('Show a DAG')
    .option('--env <name>', 'MWAA environment name')
    .option('--fields <fields>', 'fields to return (comma-separated)', collectList)
    .action(
      async (dagId: string, options: { env?: string; fields?: string[] }, command: Command) => {
        try {
          const api = await connect(command, options.env);
          const dag = await output.task('Loading DAG...', () =>
            api.getDag(dagId, options.fields)
          );
          output.json(dag);
        } catch (error) {
          output.fail('Dags get', error);
        }
      }
    );

  dags
    .command('source <dag-id>')
    .description("Print a DAG's source file")
    .option('--env <name>', 'MWAA environment name')
    .action(async (dagId: string, options: { env?: string }, command: Command) => {
      try {
        const api = await connect(command, options.env);
        const source = await output.task('Loading DAG source...', () => api.getDagSource(dagId));
        output.line(source);
      } catch (error) {
        output.fail('Dags source', error);
      }
    });

  return dags;
}
