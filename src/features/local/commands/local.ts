/**
 * Local runner commands
 *
 * Commands:
 * - mwaa-local local init - Lay out the local-runner repository
 * - mwaa-local local build-image - Build the local-runner image
 * - mwaa-local local start - Start a local environment
 * - mwaa-local local stop - Stop it
 * - mwaa-local local test-requirements / package-requirements / test-startup-script
 * - mwaa-local local sync - Pull requirements, startup script and plugins from an environment
 * - mwaa-local local diff - Compare airflow.cfg with an environment's configuration
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { MWAAClient } from '@aws-sdk/client-mwaa';
import { S3Client } from '@aws-sdk/client-s3';
import { connectDocker } from '../../../platform/DockerClientAdapter.js';
import { CommandContext, createContext } from '../../../cli/context.js';
import { Output } from '../../../cli/Output.js';
import { installSignalHandlers } from '../../../cli/utils/signalHandler.js';
import { logger } from '../../../shared/utils/logger.js';
import { openBrowser } from '../../../shared/utils/browser.js';
import { errorMessage } from '../../../shared/utils/errors.js';
import { parseDuration } from '../../../shared/utils/strings.js';
import { awsClientConfig } from '../../aws/clients.js';
import { CredentialResolver } from '../../aws/CredentialResolver.js';
import { MwaaEnvironmentClient, resolveEnvironmentName } from '../../aws/EnvironmentClient.js';
import { S3ObjectStore } from '../../aws/ObjectStore.js';
import type { AwsCredentials } from '../../aws/types.js';
import { ContainerGateway } from '../container/ContainerGateway.js';
import { diffConfig, formatDiffs, readLocalConfig } from '../diff/ConfigDiff.js';
import { GitTreeFetcher } from '../installer/GitTreeFetcher.js';
import { Installer } from '../installer/Installer.js';
import { ReadinessPoller } from '../runner/ReadinessPoller.js';
import { Runner } from '../runner/Runner.js';
import { defaultSessionLabel, resolveRunnerPaths } from '../runner/types.js';
import { Syncer } from '../sync/Syncer.js';

const output = new Output(logger);

interface CredentialOptions {
  awsCreds?: boolean;
  roleArn?: string;
}

interface StartCommandOptions extends CredentialOptions {
  port?: number;
  resetDb?: boolean;
  browser: boolean;
  followLogs?: boolean;
  wait?: number;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Not a valid port.');
  }
  return port;
}

function parseWait(value: string): number {
  try {
    return parseDuration(value);
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }
}

async function createRunner(ctx: CommandContext, credentials?: AwsCredentials): Promise<Runner> {
  const docker = await connectDocker();
  const { local } = ctx.config;
  const label = defaultSessionLabel(local.version);

  return new Runner(
    {
      version: local.version,
      clonePath: local.clonePath,
      dagsPath: local.dagsPath,
      networkName: local.networkName ?? `${label}_default`,
      label,
      credentials,
    },
    {
      gateway: new ContainerGateway(docker, logger),
      fs: ctx.fs,
      logger,
      readiness: new ReadinessPoller(logger),
      dependencyTimeoutSeconds: local.dependencyTimeoutSeconds,
    }
  );
}

/**
 * Credentials for the containers, only when asked for
 */
async function resolveCredentials(
  ctx: CommandContext,
  options: CredentialOptions
): Promise<AwsCredentials | undefined> {
  if (!options.awsCreds && !options.roleArn) {
    return undefined;
  }
  const resolver = new CredentialResolver(ctx.aws, { logger });
  return output.task('Resolving AWS credentials...', () =>
    resolver.resolve({ roleArn: options.roleArn })
  );
}

export function createLocalCommand(): Command {
  const local = new Command('local').description('Run an MWAA environment locally');

  // mwaa-local local init
  local
    .command('init')
    .description('Download the local runner into the clone path')
    .option('--version <version>', 'local runner version (branch or tag)')
    .option('--repo-url <url>', 'local runner repository URL')
    .action(async (options: { version?: string; repoUrl?: string }, command: Command) => {
      try {
        const ctx = await createContext(command, {
          version: options.version,
          repoUrl: options.repoUrl,
        });
        const { local: config } = ctx.config;
        output.info(`Installing local runner ${config.version}...`);

        const installer = new Installer(
          {
            version: config.version,
            repoUrl: config.repoUrl,
            clonePath: config.clonePath,
            dagsPath: config.dagsPath,
          },
          { fs: ctx.fs, fetcher: new GitTreeFetcher(ctx.executor, ctx.fs, logger), logger }
        );
        const summary = await installer.run();

        output.success(
          `Local runner installed into ${summary.clonePath} (${summary.written} files, ${summary.dags} DAG files)`
        );
      } catch (error) {
        output.fail('Local init', error);
      }
    });

  // mwaa-local local build-image
  local
    .command('build-image')
    .description('Build the local runner image')
    .action(async (_options: unknown, command: Command) => {
      try {
        const ctx = await createContext(command);
        const runner = await createRunner(ctx);
        output.info(`Building ${runner.imageTag}...`);
        await runner.buildImage();
        output.success('Docker image built successfully.');
      } catch (error) {
        output.fail('Local build-image', error);
      }
    });

  // mwaa-local local start
  local
    .command('start')
    .description('Start the local runner environment')
    .option('--port <port>', 'host port of the Airflow UI', parsePort)
    .option('--reset-db', 'reset the Airflow database before starting')
    .option('--aws-creds', 'pass AWS credentials to the containers')
    .option('--role-arn <arn>', 'assume this IAM role for the container credentials')
    .option('--no-browser', 'do not open the Airflow UI')
    .option('--follow-logs', 'follow the Airflow logs until interrupted')
    .option('--wait <duration>', 'how long to wait for the UI, e.g. 90, 30s, 5m', parseWait)
    .action(async (options: StartCommandOptions, command: Command) => {
      try {
        const ctx = await createContext(command, { port: options.port });
        const credentials = await resolveCredentials(ctx, options);
        const runner = await createRunner(ctx, credentials);
        const controller = new AbortController();

        output.info('Starting the local runner environment...');
        const started = runner.start({
          port: ctx.config.local.port,
          resetDb: options.resetDb ?? false,
          envs: { credentials },
          followLogs: options.followLogs ?? false,
          waitTimeoutMs: options.wait ?? ctx.config.local.waitSeconds * 1000,
          signal: controller.signal,
          onReady: async (url) => {
            output.success(`Airflow UI is available at ${chalk.cyan(url)}`);
            if (options.browser) {
              await openBrowser(url, ctx.executor).catch((error: unknown) =>
                output.warn(`Could not open a browser: ${errorMessage(error)}`)
              );
            }
            if (options.followLogs) {
              output.info('Following logs, press Ctrl+C to stop...');
              installSignalHandlers({
                onCleanup: async () => {
                  controller.abort();
                  await started;
                },
              });
            }
          },
        });

        const result = await started;
        if (result.logs === 'cancelled') {
          output.success('Local runner environment stopped.');
        }
      } catch (error) {
        output.fail('Local start', error);
      }
    });

  // mwaa-local local stop
  local
    .command('stop')
    .description('Stop the local runner environment')
    .action(async (_options: unknown, command: Command) => {
      try {
        const ctx = await createContext(command);
        const runner = await createRunner(ctx);
        const stopped = await runner.stop();
        if (stopped.length === 0) {
          output.info('Nothing to stop.');
          return;
        }
        output.success(`Stopped ${stopped.join(', ')}`);
      } catch (error) {
        output.fail('Local stop', error);
      }
    });

  // mwaa-local local test-requirements
  local
    .command('test-requirements')
    .description('Install requirements.txt in an ephemeral container')
    .action(async (_options: unknown, command: Command) => {
      try {
        const ctx = await createContext(command);
        const runner = await createRunner(ctx);
        await runner.buildImage();
        output.info('Testing requirements installation...');
        await runner.testRequirements();
        output.success('Requirements installed successfully in the test container.');
      } catch (error) {
        output.fail('Local test-requirements', error);
      }
    });

  // mwaa-local local package-requirements
  local
    .command('package-requirements')
    .description('Download requirements as wheels into requirements/plugins.zip')
    .action(async (_options: unknown, command: Command) => {
      try {
        const ctx = await createContext(command);
        const runner = await createRunner(ctx);
        await runner.buildImage();
        output.info('Packaging Python requirements...');
        await runner.packageRequirements();
        output.success('Python requirements packaged successfully.');
      } catch (error) {
        output.fail('Local package-requirements', error);
      }
    });

  // mwaa-local local test-startup-script
  local
    .command('test-startup-script')
    .description('Run startup.sh in an ephemeral container')
    .option('--aws-creds', 'pass AWS credentials to the container')
    .option('--role-arn <arn>', 'assume this IAM role for the container credentials')
    .action(async (options: CredentialOptions, command: Command) => {
      try {
        const ctx = await createContext(command);
        const credentials = await resolveCredentials(ctx, options);
        const runner = await createRunner(ctx, credentials);
        await runner.buildImage();
        output.info('Testing startup script execution...');
        await runner.testStartupScript({ credentials });
        output.success('Startup script executed successfully in the test container.');
      } catch (error) {
        output.fail('Local test-startup-script', error);
      }
    });

  // mwaa-local local sync
  local
    .command('sync')
    .description('Pull requirements, startup script and plugins from an MWAA environment')
    .option('--env <name>', 'MWAA environment name')
    .action(async (options: { env?: string }, command: Command) => {
      try {
        const ctx = await createContext(command);
        const environments = new MwaaEnvironmentClient(new MWAAClient(awsClientConfig(ctx.aws)));
        const environment = await output.task('Loading environment...', async () =>
          environments.getEnvironment(await resolveEnvironmentName(environments, options.env))
        );

        const syncer = new Syncer(
          { clonePath: ctx.config.local.clonePath, dagsPath: ctx.config.local.dagsPath },
          {
            fs: ctx.fs,
            store: new S3ObjectStore(new S3Client(awsClientConfig(ctx.aws))),
            logger,
          }
        );
        const results = await syncer.sync(environment);

        for (const result of results) {
          if (result.status === 'not-configured') {
            output.info(`No remote ${result.item} configured.`);
          } else {
            output.success(`Synced ${result.item} to ${result.target ?? ''}`);
          }
        }
      } catch (error) {
        output.fail('Local sync', error);
      }
    });

  // mwaa-local local diff
  local
    .command('diff')
    .description('Compare the local airflow.cfg with the remote MWAA configuration')
    .option('--env <name>', 'MWAA environment name')
    .action(async (options: { env?: string }, command: Command) => {
      try {
        const ctx = await createContext(command);
        const environments = new MwaaEnvironmentClient(new MWAAClient(awsClientConfig(ctx.aws)));
        const environment = await output.task('Loading environment...', async () =>
          environments.getEnvironment(await resolveEnvironmentName(environments, options.env))
        );

        const paths = resolveRunnerPaths(process.cwd(), ctx.config.local);
        const localConfig = await readLocalConfig(paths.airflowCfg, ctx.fs);
        output.line(formatDiffs(diffConfig(localConfig, environment.airflowConfigurationOptions)));
      } catch (error) {
        output.fail('Local diff', error);
      }
    });

  return local;
}
