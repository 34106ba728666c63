/**
 * Per-command wiring: global options, loaded configuration and platform adapters
 */

import type { Command } from 'commander';
import { z } from 'zod';
import { FileSystemAdapter } from '../platform/FileSystemAdapter.js';
import { ProcessExecutorAdapter } from '../platform/ProcessExecutorAdapter.js';
import type { IFileSystem } from '../platform/IFileSystem.js';
import type { IProcessExecutor } from '../platform/IProcessExecutor.js';
import { ConfigLoader } from '../shared/config/ConfigLoader.js';
import { Config, LOG_LEVELS, PartialConfig } from '../shared/config/schemas.js';
import { ConfigurationError } from '../shared/utils/errors.js';
import { logger } from '../shared/utils/logger.js';
import type { AwsContext } from '../features/aws/clients.js';

const GlobalOptionsSchema = z.object({
  profile: z.string().optional(),
  region: z.string().optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export interface CommandContext {
  config: Config;
  aws: AwsContext;
  fs: IFileSystem;
  executor: IProcessExecutor;
}

export function readGlobalOptions(command: Command): GlobalOptions {
  const result = GlobalOptionsSchema.safeParse(command.optsWithGlobals());
  if (!result.success) {
    throw new ConfigurationError(
      `invalid global option: ${result.error.issues.map((issue) => issue.message).join('; ')}`
    );
  }
  return result.data;
}

/**
 * Load configuration for `command`, with its global options and `local` overrides on top
 */
export async function createContext(
  command: Command,
  local: PartialConfig['local'] = {}
): Promise<CommandContext> {
  const globals = readGlobalOptions(command);
  const fs = new FileSystemAdapter();

  const config = await new ConfigLoader(fs).load({
    projectRoot: process.cwd(),
    cliFlags: {
      aws: { profile: globals.profile, region: globals.region },
      local,
      logging: { level: globals.logLevel },
    },
  });
  logger.setLevel(config.logging.level);
  logger.debug('Logging configured', {
    level: logger.getLevel(),
    fileLogging: logger.isFileLoggingEnabled(),
  });

  return {
    config,
    aws: { profile: config.aws.profile, region: config.aws.region },
    fs,
    executor: new ProcessExecutorAdapter(),
  };
}
