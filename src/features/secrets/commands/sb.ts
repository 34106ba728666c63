/**
 * Secrets backend commands
 *
 * Commands:
 * - mwaa-local sb list-connections | list-variables
 * - mwaa-local sb get-connection <id> | get-variable <id>
 * - mwaa-local sb set-connection <id> <value> | set-variable <id> <value>
 */

import { Command } from 'commander';
import { MWAAClient } from '@aws-sdk/client-mwaa';
import { CommandContext, createContext } from '../../../cli/context.js';
import { Output } from '../../../cli/Output.js';
import { logger } from '../../../shared/utils/logger.js';
import { awsClientConfig } from '../../aws/clients.js';
import { MwaaEnvironmentClient, resolveEnvironmentName } from '../../aws/EnvironmentClient.js';
import { SecretsBackend, createSecretStore, parseBackendConfig } from '../SecretsBackend.js';

const output = new Output(logger);

interface EnvOption {
  env?: string;
}

async function loadBackend(ctx: CommandContext, env?: string): Promise<SecretsBackend> {
  const client = new MwaaEnvironmentClient(new MWAAClient(awsClientConfig(ctx.aws)));
  const environment = await output.task('Loading environment...', async () =>
    client.getEnvironment(await resolveEnvironmentName(client, env))
  );
  const config = parseBackendConfig(environment.airflowConfigurationOptions);
  logger.debug(`Using ${config.kind} secrets backend`);
  return new SecretsBackend(config, createSecretStore(config, ctx.aws));
}

export function createSecretsBackendCommand(): Command {
  const sb = new Command('sb').description("Inspect an environment's Airflow secrets backend");

  sb.command('list-connections')
    .description('List connections stored in the secrets backend')
    .option('--env <name>', 'MWAA environment name')
    .action(async (options: EnvOption, command: Command) => {
      try {
        const backend = await loadBackend(await createContext(command), options.env);
        const names = await output.task('Listing connections...', () => backend.listConnections());
        names.forEach((name) => output.line(name));
      } catch (error) {
        output.fail('Sb list-connections', error);
      }
    });

  sb.command('list-variables')
    .description('List variables stored in the secrets backend')
    .option('--env <name>', 'MWAA environment name')
    .action(async (options: EnvOption, command: Command) => {
      try {
        const backend = await loadBackend(await createContext(command), options.env);
        const names = await output.task('Listing variables...', () => backend.listVariables());
        names.forEach((name) => output.line(name));
      } catch (error) {
        output.fail('Sb list-variables', error);
      }
    });

  sb.command('get-connection <id>')
    .description('Print a connection')
    .option('--env <name>', 'MWAA environment name')
    .action(async (id: string, options: EnvOption, command: Command) => {
      try {
        const backend = await loadBackend(await createContext(command), options.env);
        output.line(await backend.getConnection(id));
      } catch (error) {
        output.fail('Sb get-connection', error);
      }
    });

  sb.command('get-variable <id>')
    .description('Print a variable')
    .option('--env <name>', 'MWAA environment name')
    .action(async (id: string, options: EnvOption, command: Command) => {
      try {
        const backend = await loadBackend(await createContext(command), options.env);
        output.line(await backend.getVariable(id));
      } catch (error) {
        output.fail('Sb get-variable', error);
      }
    });

  sb.command('set-connection <id> <value>')
    .description('Update a connection')
    .option('--env <name>', 'MWAA environment name')
    .action(async (id: string, value: string, options: EnvOption, command: Command) => {
      try {
        const backend = await loadBackend(await createContext(command), options.env);
        await backend.setConnection(id, value);
        output.success(`Connection ${id} updated.`);
      } catch (error) {
        output.fail('Sb set-connection', error);
      }
    });

  sb.command('set-variable <id> <value>')
    .description('Update a variable')
    .option('--env <name>', 'MWAA environment name')
    .action(async (id: string, value: string, options: EnvOption, command: Command) => {
      try {
        const backend = await loadBackend(await createContext(command), options.env);
        await backend.setVariable(id, value);
        output.success(`Variable ${id} updated.`);
      } catch (error) {
        output.fail('Sb set-variable', error);
      }
    });

  return sb;
}
