/**
 * Terminal presentation for commands: tagged status lines, spinners and JSON.
 * Core modules never print; they log through ILogger.
 */

import chalk from 'chalk';
import ora from 'ora';
import type { ILogger, Logger } from '../shared/utils/logger.js';
import { errorMessage } from '../shared/utils/errors.js';

export type OutputLogger = ILogger & Pick<Logger, 'disableConsole' | 'enableConsole'>;

export class Output {
  constructor(private readonly logger: OutputLogger) {}

  info(message: string): void {
    console.log(chalk.cyan('[INFO]'), message);
  }

  success(message: string): void {
    console.log(chalk.green('[SUCCESS]'), message);
  }

  warn(message: string): void {
    console.log(chalk.yellow('[WARN]'), message);
  }

  error(message: string): void {
    console.error(chalk.red('[ERROR]'), chalk.red(message));
  }

  line(text = ''): void {
    console.log(text);
  }

  json(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
  }

  /**
   * Run `work` behind a spinner. Console logging is paused while it spins.
   */
  async task<T>(text: string, work: () => Promise<T>): Promise<T> {
    const spinner = ora(text).start();
    this.logger.disableConsole();
    try {
      const result = await work();
      spinner.stop();
      return result;
    } catch (error) {
      spinner.fail(chalk.red(text));
      throw error;
    } finally {
      this.logger.enableConsole();
    }
  }

  /**
   * Report a failed command. The process exits 1 once the log transports drain.
   */
  fail(scope: string, error: unknown): void {
    this.error(errorMessage(error));
    this.logger.error(`[${scope}] failed`, { error: errorMessage(error) });
    process.exitCode = 1;
  }
}
