#!/usr/bin/env node
/**
 * mwaa-local CLI entry point
 */

import { Command, Option } from 'commander';
import { createLocalCommand } from './features/local/commands/local.js';
import { createEnvironmentsCommand } from './features/environments/commands/environments.js';
import { createLogsCommand } from './features/environments/commands/logs.js';
import { createOpenCommand } from './features/environments/commands/open.js';
import { createDagsCommand } from './features/airflow/commands/dags.js';
import { createRolesCommand } from './features/airflow/commands/roles.js';
import { createVariablesCommand } from './features/airflow/commands/variables.js';
import { createRunCommand } from './features/airflow/commands/run.js';
import { createSecretsBackendCommand } from './features/secrets/commands/sb.js';
import { LOG_LEVELS } from './shared/config/schemas.js';

const program = new Command();

program
  .name('mwaa-local')
  .description('Run and inspect Amazon MWAA environments, locally and in AWS')
  // --version belongs to `local init`
  .version('0.1.0', '-V, --cli-version', 'output the CLI version')
  .option('--profile <profile>', 'AWS profile')
  .option('--region <region>', 'AWS region')
  .addOption(new Option('--log-level <level>', 'log level').choices(LOG_LEVELS));

program.addCommand(createLocalCommand());
program.addCommand(createEnvironmentsCommand());
program.addCommand(createLogsCommand());
program.addCommand(createOpenCommand());
program.addCommand(createDagsCommand());
program.addCommand(createRolesCommand());
program.addCommand(createVariablesCommand());
program.addCommand(createRunCommand());
program.addCommand(createSecretsBackendCommand());

await program.parseAsync();
