/**
 * Configuration schemas with Zod validation
 */

import { z } from 'zod';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export const AwsConfigSchema = z.object({
  profile: z.string().min(1).optional(),
  region: z.string().min(1).optional(),
});

export const LocalConfigSchema = z.object({
  /** Branch or tag of the local-runner repository, e.g. v2.10.3 */
  version: z.string().min(1),
  repoUrl: z.string().url(),
  clonePath: z.string().min(1),
  dagsPath: z.string().min(1),
  // Derived from the session label when unset
  networkName: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535),
  waitSeconds: z.number().positive(),
  dependencyTimeoutSeconds: z.number().positive(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS),
});

export const ConfigSchema = z.object({
  aws: AwsConfigSchema,
  local: LocalConfigSchema,
  logging: LoggingConfigSchema,
});

/**
 * Shape of one layer (a config file, the environment, CLI flags)
 */
export const PartialConfigSchema = z.object({
  aws: AwsConfigSchema.partial().optional(),
  local: LocalConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
export type PartialConfig = z.infer<typeof PartialConfigSchema>;

export const DEFAULT_CONFIG: Config = {
  aws: {},
  local: {
    version: 'v2.10.3',
    repoUrl: 'https://github.com/aws/aws-mwaa-local-runner.git',
    clonePath: './.aws-mwaa-local-runner',
    dagsPath: '.',
    port: 8080,
    waitSeconds: 300,
    dependencyTimeoutSeconds: 300,
  },
  logging: {
    level: 'info',
  },
};
