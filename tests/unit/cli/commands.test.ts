import { describe, it, expect } from 'vitest';
import type { Command } from 'commander';
import { createLocalCommand } from '../../../src/features/local/commands/local.js';
import { createEnvironmentsCommand } from '../../../src/features/environments/commands/environments.js';
import { createSecretsBackendCommand } from '../../../src/features/secrets/commands/sb.js';
import {
  createLogsCommand,
  ignoredLogTypes,
} from '../../../src/features/environments/commands/logs.js';
import { createOpenCommand } from '../../../src/features/environments/commands/open.js';
import { createDagsCommand, pausedFilter } from '../../../src/features/airflow/commands/dags.js';
import { createRolesCommand } from '../../../src/features/airflow/commands/roles.js';
import { createVariablesCommand } from '../../../src/features/airflow/commands/variables.js';
import { createRunCommand } from '../../../src/features/airflow/commands/run.js';

const names = (command: Command) => command.commands.map((sub) => sub.name());

function find(parent: Command, name: string): Command {
  const command = parent.commands.find((sub) => sub.name() === name);
  if (!command) {
    throw new Error(`no ${name} command`);
  }
  return command;
}

describe('command tree', () => {
  it('should register the local runner commands', () => {
    expect(names(createLocalCommand())).toEqual([
      'init',
      'build-image',
      'start',
      'stop',
      'test-requirements',
      'package-requirements',
      'test-startup-script',
      'sync',
      'diff',
    ]);
  });

  it('should register environment and secrets commands', () => {
    expect(names(createEnvironmentsCommand())).toEqual(['list', 'get']);
    expect(names(createSecretsBackendCommand())).toEqual([
      'list-connections',
      'list-variables',
      'get-connection',
      'get-variable',
      'set-connection',
      'set-variable',
    ]);
  });

  it('should register the Airflow commands', () => {
    expect(names(createDagsCommand())).toEqual(['list', 'get', 'source']);
    expect(names(createRolesCommand())).toEqual(['list', 'get', 'create']);
    expect(names(createVariablesCommand())).toEqual(['list']);
    expect(createRunCommand().name()).toBe('run');
    expect(createOpenCommand().name()).toBe('open');
    expect(createLogsCommand().name()).toBe('logs');
  });

  it('should parse dags list flags', () => {
    const list = find(createDagsCommand(), 'list');

    list.parseOptions(['--limit', '5', '--tags', 'etl,daily', '--tags', 'hourly', '--no-only-active']);

    expect(list.opts()).toEqual({
      limit: 5,
      offset: 0,
      tags: ['etl', 'daily', 'hourly'],
      onlyActive: false,
    });
  });

  it('should keep Airflow CLI flags as run arguments', () => {
    const run = createRunCommand();

    const parsed = run.parseOptions(['-e', 'dev', 'dags', 'list', '-o', 'json']);

    expect(run.opts()).toEqual({ env: 'dev' });
    expect([...parsed.operands, ...parsed.unknown]).toEqual(['dags', 'list', '-o', 'json']);
  });

  it('should filter on pause state only when one side is asked for', () => {
    expect(pausedFilter({})).toBeUndefined();
    expect(pausedFilter({ paused: true, unpaused: true })).toBeUndefined();
    expect(pausedFilter({ paused: true })).toBe(true);
    expect(pausedFilter({ unpaused: true })).toBe(false);
  });

  it('should collect ignored log types', () => {
    expect([...ignoredLogTypes({ ignoreTask: true, ignoreWorker: true })]).toEqual([
      'task',
      'worker',
    ]);
  });

  it('should expose the start flags', () => {
    const start = find(createLocalCommand(), 'start');

    expect(start.options.map((option) => option.long)).toEqual([
      '--port',
      '--reset-db',
      '--aws-creds',
      '--role-arn',
      '--no-browser',
      '--follow-logs',
      '--wait',
    ]);
  });
});
