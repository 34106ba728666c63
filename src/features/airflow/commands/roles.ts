/**
 * Airflow role commands
 *
 * Commands:
 * - mwaa-local roles list - List roles
 * - mwaa-local roles get <name> - Show one role
 * - mwaa-local roles create <name> --actions DAGs.can_read,... - Create a role
 */

import { Command } from 'commander';
import { MWAAClient } from '@aws-sdk/client-mwaa';
import { createContext } from '../../../cli/context.js';
import { Output } from '../../../cli/Output.js';
import { collectList } from '../../../cli/utils/options.js';
import { logger } from '../../../shared/utils/logger.js';
import { awsClientConfig } from '../../aws/clients.js';
import { MwaaEnvironmentClient, resolveEnvironmentName } from '../../aws/EnvironmentClient.js';
import { AirflowRestApi } from '../AirflowRestApi.js';

const output = new Output(logger);

async function connect(command: Command, env?: string): Promise<AirflowRestApi> {
  const ctx = await createContext(command);
  const client = new MwaaEnvironmentClient(new MWAAClient(awsClientConfig(ctx.aws)));
  return new AirflowRestApi(client, await resolveEnvironmentName(client, env));
}

export function createRolesCommand(): Command {
  const roles = new Command('roles').description('Airflow roles of an MWAA environment');

  roles
    .command('list')
    .description('List roles')
    .option('--env <name>', 'MWAA environment name')
    .action(async (options: { env?: string }, command: Command) => {
      try {
        const api = await connect(command, options.env);
        output.json(await output.task('Loading roles...', () => api.listRoles()));
      } catch (error) {
        output.fail('Roles list', error);
      }
    });

  roles
    .command('get <name>')
    .description('Show a role')
    .option('--env <name>', 'MWAA environment name')
    .action(async (name: string, options: { env?: string }, command: Command) => {
      try {
        const api = await connect(command, options.env);
        output.json(await output.task('Loading role...', () => api.getRole(name)));
      } catch (error) {
        output.fail('Roles get', error);
      }
    });

  roles
    .command('create <name>')
    .description('Create a role')
    .option('--env <name>', 'MWAA environment name')
    .option(
      '--actions <actions>',
      'permissions as resource.action, comma-separated (e.g. DAGs.can_read)',
      collectList,
      []
    )
    .action(
      async (name: string, options: { env?: string; actions: string[] }, command: Command) => {
        try {
          const api = await connect(command, options.env);
          const role = await output.task(`Creating role ${name}...`, () =>
            api.createRole(name, options.actions)
          );
          output.json(role);
        } catch (error) {
          output.fail('Roles create', error);
        }
      }
    );

  return roles;
}
