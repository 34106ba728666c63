/**
 * Configuration loader with hierarchy support
 * Priority: CLI flags > env vars > project config > global config > defaults
 */

import yaml from 'yaml';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import type { ZodError } from 'zod';
import type { IFileSystem } from '../../platform/IFileSystem.js';
import { ILogger, logger as defaultLogger } from '../utils/logger.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import {
  Config,
  ConfigSchema,
  DEFAULT_CONFIG,
  PartialConfig,
  PartialConfigSchema,
} from './schemas.js';

export const CONFIG_DIR = '.mwaa-local';
export const CONFIG_FILE = 'config.yml';

export interface ConfigLoadOptions {
  projectRoot?: string;
  cliFlags?: PartialConfig;
  /** Process environment; .env entries fill in what it lacks. Default process.env */
  env?: NodeJS.ProcessEnv;
}

function formatZodError(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

/**
 * Copy of `value` without undefined fields, so a layer never unsets a lower one
 */
function defined<T extends object>(value: T | undefined): Partial<T> {
  if (!value) {
    return {};
  }
  const result: Partial<T> = {};
  for (const key of Object.keys(value)) {
    if (Reflect.get(value, key) !== undefined) {
      Reflect.set(result, key, Reflect.get(value, key));
    }
  }
  return result;
}

function parseNumber(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

export class ConfigLoader {
  constructor(
    private fs: IFileSystem,
    private logger: ILogger = defaultLogger,
    private homeDir: string = os.homedir()
  ) {}

  /**
   * Load configuration with full hierarchy:
   * 1. Defaults
   * 2. Global (~/.mwaa-local/config.yml)
   * 3. Project (.mwaa-local/config.yml)
   * 4. Environment variables (and .env)
   * 5. CLI flags
   */
  async load(options: ConfigLoadOptions = {}): Promise<Config> {
    let config = DEFAULT_CONFIG;

    const globalConfig = await this.loadFile(this.globalConfigPath(), 'global');
    if (globalConfig) {
      config = this.merge(config, globalConfig);
    }

    if (options.projectRoot) {
      const projectConfig = await this.loadFile(
        this.projectConfigPath(options.projectRoot),
        'project'
      );
      if (projectConfig) {
        config = this.merge(config, projectConfig);
      }
    }

    const envConfig = await this.loadEnvConfig(options.projectRoot, options.env ?? process.env);
    if (envConfig) {
      config = this.merge(config, envConfig);
    }

    if (options.cliFlags) {
      const flags = PartialConfigSchema.safeParse(options.cliFlags);
      if (!flags.success) {
        throw new ConfigurationError(`invalid option: ${formatZodError(flags.error)}`);
      }
      config = this.merge(config, flags.data);
    }

    return this.validate(config);
  }

  private async loadFile(configPath: string, scope: string): Promise<PartialConfig | null> {
    try {
      if (!(await this.fs.exists(configPath))) {
        return null;
      }
      const parsed: unknown = yaml.parse(await this.fs.readFile(configPath));
      const result = PartialConfigSchema.safeParse(parsed ?? {});
      if (!result.success) {
        this.logger.warn(`Ignoring invalid ${scope} config ${configPath}`, {
          error: formatZodError(result.error),
        });
        return null;
      }
      return result.data;
    } catch (error) {
      this.logger.warn(`Failed to load ${scope} config`, { error: errorMessage(error) });
      return null;
    }
  }

  private async loadEnvConfig(
    projectRoot: string | undefined,
    processEnv: NodeJS.ProcessEnv
  ): Promise<PartialConfig | null> {
    let env: NodeJS.ProcessEnv = processEnv;
    try {
      // Load .env from project root if provided, otherwise cwd
      const envPath = projectRoot ? path.join(projectRoot, '.env') : '.env';
      if (await this.fs.exists(envPath)) {
        env = { ...dotenv.parse(await this.fs.readFile(envPath)), ...processEnv };
      }
    } catch (error) {
      this.logger.warn('Failed to load .env file', { error: errorMessage(error) });
    }

    const raw = {
      aws: defined({
        profile: env.AWS_PROFILE || undefined,
        region: env.AWS_REGION || env.AWS_DEFAULT_REGION || undefined,
      }),
      local: defined({
        version: env.MWAA_LOCAL_VERSION || undefined,
        clonePath: env.MWAA_LOCAL_CLONE_PATH || undefined,
        dagsPath: env.MWAA_LOCAL_DAGS_PATH || undefined,
        networkName: env.MWAA_LOCAL_NETWORK || undefined,
        port: parseNumber(env.MWAA_LOCAL_PORT),
      }),
      logging: defined({ level: env.LOG_LEVEL || undefined }),
    };

    const result = PartialConfigSchema.safeParse(raw);
    if (!result.success) {
      this.logger.warn('Ignoring invalid environment configuration', {
        error: formatZodError(result.error),
      });
      return null;
    }
    return result.data;
  }

  private merge(base: Config, override: PartialConfig): Config {
    return {
      aws: { ...base.aws, ...defined(override.aws) },
      local: { ...base.local, ...defined(override.local) },
      logging: { ...base.logging, ...defined(override.logging) },
    };
  }

  globalConfigPath(): string {
    return path.join(this.homeDir, CONFIG_DIR, CONFIG_FILE);
  }

  projectConfigPath(projectRoot: string): string {
    return path.join(projectRoot, CONFIG_DIR, CONFIG_FILE);
  }

  async save(
    config: PartialConfig,
    scope: 'global' | 'project',
    projectRoot?: string
  ): Promise<string> {
    const configPath =
      scope === 'global'
        ? this.globalConfigPath()
        : this.projectConfigPath(projectRoot || process.cwd());

    await this.fs.mkdir(path.dirname(configPath), { recursive: true });
    await this.fs.writeFile(configPath, yaml.stringify(config));
    this.logger.info(`Config saved to ${configPath}`);
    return configPath;
  }

  validate(config: unknown): Config {
    const result = ConfigSchema.safeParse(config);
    if (!result.success) {
      throw new ConfigurationError(`invalid configuration: ${formatZodError(result.error)}`);
    }
    return result.data;
  }
}
