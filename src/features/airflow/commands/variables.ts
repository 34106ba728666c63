/**
 * Airflow variable commands
 *
 * Commands:
 * - mwaa-local variables list - List variables
 */

import { Command } from 'commander';
import { MWAAClient } from '@aws-sdk/client-mwaa';
import { createContext } from '../../../cli/context.js';
import { Output } from '../../../cli/Output.js';
import { parseCount } from '../../../cli/utils/options.js';
import { logger } from '../../../shared/utils/logger.js';
import { awsClientConfig } from '../../aws/clients.js';
import { MwaaEnvironmentClient, resolveEnvironmentName } from '../../aws/EnvironmentClient.js';
import { AirflowRestApi } from '../AirflowRestApi.js';

const output = new Output(logger);

interface VariableListCommandOptions {
  env?: string;
  limit: number;
  offset: number;
  orderBy?: string;
}

export function createVariablesCommand(): Command {
  const variables = new Command('variables').description('Airflow variables of an MWAA environment');

  variables
    .command('list')
    .description('List variables')
    .option('--env <name>', 'MWAA environment name')
    .option('--limit <count>', 'number of variables to return', parseCount, 100)
    .option('--offset <count>', 'number of variables to skip', parseCount, 0)
    .option('--order-by <field>', 'field to order by; prefix with - to reverse')
    .action(async (options: VariableListCommandOptions, command: Command) => {
      try {
        const ctx = await createContext(command);
        const client = new MwaaEnvironmentClient(new MWAAClient(awsClientConfig(ctx.aws)));
        const api = new AirflowRestApi(client, await resolveEnvironmentName(client, options.env));
        const list = await output.task('Loading variables...', () =>
          api.listVariables({
            limit: options.limit,
            offset: options.offset,
            orderBy: options.orderBy,
          })
        );
        output.json(list);
      } catch (error) {
        output.fail('Variables list', error);
      }
    });

  return variables;
}
