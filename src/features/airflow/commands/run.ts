/**
 * mwaa-local run <command...> - Run an Airflow CLI command on an MWAA environment
 */

import { Command } from 'commander';
import { MWAAClient } from '@aws-sdk/client-mwaa';
import { createContext } from '../../../cli/context.js';
import { Output } from '../../../cli/Output.js';
import { logger } from '../../../shared/utils/logger.js';
import { AirflowCli, filterCliOutput } from '../../aws/AirflowCli.js';
import { awsClientConfig } from '../../aws/clients.js';
import { MwaaEnvironmentClient, resolveEnvironmentName } from '../../aws/EnvironmentClient.js';

const output = new Output(logger);

export function createRunCommand(): Command {
  return new Command('run')
    .description('Run an Airflow CLI command on an MWAA environment (e.g. run dags list)')
    .argument('<command...>', 'Airflow CLI command and its arguments')
    .option('-e, --env <name>', 'MWAA environment name')
    .allowUnknownOption()
    .action(async (args: string[], options: { env?: string }, command: Command) => {
      try {
        const ctx = await createContext(command);
        const client = new MwaaEnvironmentClient(new MWAAClient(awsClientConfig(ctx.aws)));
        const environment = await resolveEnvironmentName(client, options.env);
        const result = await output.task(`Running ${args[0]} on ${environment}...`, () =>
          new AirflowCli(client).run(environment, args.join(' '))
        );

        const stdout = filterCliOutput(result.stdout);
        if (stdout) {
          output.line(stdout);
        }
        const stderr = filterCliOutput(result.stderr);
        if (stderr) {
          console.error(stderr);
        }
      } catch (error) {
        output.fail('Run', error);
      }
    });
}
