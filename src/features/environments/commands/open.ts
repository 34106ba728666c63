/**
 * mwaa-local open [name] - Sign in to an environment's Airflow UI in the browser
 */

import { Command } from 'commander';
import { MWAAClient } from '@aws-sdk/client-mwaa';
import { createContext } from '../../../cli/context.js';
import { Output } from '../../../cli/Output.js';
import { logger } from '../../../shared/utils/logger.js';
import { openBrowser } from '../../../shared/utils/browser.js';
import { awsClientConfig } from '../../aws/clients.js';
import {
  MwaaEnvironmentClient,
  resolveEnvironmentName,
  webLoginUrl,
} from '../../aws/EnvironmentClient.js';

const output = new Output(logger);

export function createOpenCommand(): Command {
  return new Command('open')
    .description('Open the Airflow UI of an MWAA environment')
    .argument('[name]', 'MWAA environment name')
    .action(async (name: string | undefined, _options: unknown, command: Command) => {
      try {
        const ctx = await createContext(command);
        const client = new MwaaEnvironmentClient(new MWAAClient(awsClientConfig(ctx.aws)));
        const token = await output.task('Creating web login token...', async () =>
          client.createWebLoginToken(await resolveEnvironmentName(client, name))
        );

        const url = webLoginUrl(token);
        output.info(`Opening webserver at: ${url}`);
        await openBrowser(url, ctx.executor);
      } catch (error) {
        output.fail('Open', error);
      }
    });
}
