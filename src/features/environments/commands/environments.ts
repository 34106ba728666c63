/**
 * MWAA environment commands
 *
 * Commands:
 * - mwaa-local environments list - List environment names
 * - mwaa-local environments get [name] - Show one environment as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { MWAAClient } from '@aws-sdk/client-mwaa';
import { createContext } from '../../../cli/context.js';
import { Output } from '../../../cli/Output.js';
import { logger } from '../../../shared/utils/logger.js';
import { awsClientConfig } from '../../aws/clients.js';
import { MwaaEnvironmentClient, resolveEnvironmentName } from '../../aws/EnvironmentClient.js';

const output = new Output(logger);

export function createEnvironmentsCommand(): Command {
  const environments = new Command('environments').description('MWAA environments');

  environments
    .command('list')
    .description('List MWAA environments')
    .action(async (_options: unknown, command: Command) => {
      try {
        const ctx = await createContext(command);
        const client = new MwaaEnvironmentClient(new MWAAClient(awsClientConfig(ctx.aws)));
        const names = await output.task('Loading environments...', () => client.listEnvironments());

        if (names.length === 0) {
          console.log(chalk.yellow('No environments found.'));
          return;
        }
        for (const name of names) {
          console.log(`  ${chalk.bold.white(name)}`);
        }
      } catch (error) {
        output.fail('Environments list', error);
      }
    });

  environments
    .command('get [name]')
    .description('Show an MWAA environment')
    .action(async (name: string | undefined, _options: unknown, command: Command) => {
      try {
        const ctx = await createContext(command);
        const client = new MwaaEnvironmentClient(new MWAAClient(awsClientConfig(ctx.aws)));
        const environment = await output.task('Loading environment...', async () =>
          client.getEnvironment(await resolveEnvironmentName(client, name))
        );
        output.json(environment);
      } catch (error) {
        output.fail('Environments get', error);
      }
    });

  return environments;
}
