/**
 * Graceful signal handling (SIGINT, SIGTERM)
 *
 * The first signal runs the cleanup callback (stopping the session) and exits;
 * repeated Ctrl+C presses force an exit without cleanup.
 */

import { logger } from '../../shared/utils/logger.js';
import { errorMessage } from '../../shared/utils/errors.js';

export interface SignalHandlerOptions {
  /**
   * Callback to run before exit, e.g. stopping the session's containers
   */
  onCleanup?: () => Promise<void> | void;

  /**
   * Number of Ctrl+C presses before emergency exit
   * Default: 3
   */
  emergencyExitCount?: number;

  /**
   * Timeout in ms for cleanup; a slower cleanup is abandoned.
   * Default: 60000, stopping containers takes a while
   */
  cleanupTimeout?: number;

  /**
   * Time window in ms for counting rapid presses
   * Default: 2000
   */
  rapidPressWindow?: number;

  /** Default: process.exit */
  exit?: (code: number) => void;
}

type Listener = () => void;

export class SignalHandler {
  private sigintCount = 0;
  private cleanupTimeout: NodeJS.Timeout | null = null;
  private rapidPressTimeout: NodeJS.Timeout | null = null;
  private isCleaningUp = false;
  private cleanupPromise: Promise<void> | null = null;
  private listeners: Array<[NodeJS.Signals, Listener]> = [];

  private readonly emergencyExitCount: number;
  private readonly cleanupTimeoutMs: number;
  private readonly rapidPressWindowMs: number;
  private readonly onCleanup?: () => Promise<void> | void;
  private readonly exitProcess: (code: number) => void;

  constructor(options: SignalHandlerOptions = {}) {
    this.emergencyExitCount = options.emergencyExitCount ?? 3;
    this.cleanupTimeoutMs = options.cleanupTimeout ?? 60_000;
    this.rapidPressWindowMs = options.rapidPressWindow ?? 2000;
    this.onCleanup = options.onCleanup;
    this.exitProcess = options.exit ?? ((code: number) => process.exit(code));
  }

  /**
   * Install signal handlers
   */
  install(): void {
    this.listen('SIGINT', () => void this.handleSigint());
    this.listen('SIGTERM', () => void this.handleSigterm());

    // Ctrl+Break on Windows, sometimes sent instead of SIGINT
    if (process.platform === 'win32') {
      this.listen('SIGBREAK', () => void this.handleSigint());
    }

    logger.debug('Signal handlers installed', {
      platform: process.platform,
      emergencyExitCount: this.emergencyExitCount,
      cleanupTimeout: this.cleanupTimeoutMs,
    });
  }

  /**
   * Remove the handlers this instance installed
   */
  uninstall(): void {
    for (const [signal, listener] of this.listeners) {
      process.removeListener(signal, listener);
    }
    this.listeners = [];

    if (this.rapidPressTimeout) {
      clearTimeout(this.rapidPressTimeout);
    }
    if (this.cleanupTimeout) {
      clearTimeout(this.cleanupTimeout);
    }

    logger.debug('Signal handlers removed');
  }

  private listen(signal: NodeJS.Signals, listener: Listener): void {
    process.on(signal, listener);
    this.listeners.push([signal, listener]);
  }

  private async handleSigint(): Promise<void> {
    this.sigintCount++;

    if (this.rapidPressTimeout) {
      clearTimeout(this.rapidPressTimeout);
    }
    this.rapidPressTimeout = setTimeout(() => {
      this.sigintCount = 0;
    }, this.rapidPressWindowMs);

    logger.debug(`SIGINT received (${this.sigintCount}/${this.emergencyExitCount})`);

    if (this.sigintCount >= this.emergencyExitCount) {
      logger.warn('Emergency exit triggered');
      this.emergencyExit();
      return;
    }

    if (this.sigintCount === 1) {
      await this.gracefulExit('SIGINT');
    } else {
      console.error(
        `\nPress Ctrl+C ${this.emergencyExitCount - this.sigintCount} more time(s) to force exit`
      );
    }
  }

  private async handleSigterm(): Promise<void> {
    logger.debug('SIGTERM received');
    await this.gracefulExit('SIGTERM');
  }

  private async gracefulExit(signal: string): Promise<void> {
    if (this.isCleaningUp) {
      logger.debug('Cleanup already in progress');
      if (this.cleanupPromise) {
        await this.cleanupPromise;
      }
      return;
    }

    this.isCleaningUp = true;
    logger.info(`Graceful shutdown initiated (${signal})`);

    this.cleanupTimeout = setTimeout(() => {
      logger.warn('Cleanup timeout exceeded, forcing exit');
      this.exitProcess(1);
    }, this.cleanupTimeoutMs);

    this.cleanupPromise = this.runCleanup();

    try {
      await this.cleanupPromise;
      logger.info('Cleanup completed successfully');
      this.exitProcess(0);
    } catch (error) {
      logger.error('Error during cleanup', { error: errorMessage(error) });
      this.exitProcess(1);
    } finally {
      if (this.cleanupTimeout) {
        clearTimeout(this.cleanupTimeout);
      }
    }
  }

  private async runCleanup(): Promise<void> {
    if (!this.onCleanup) {
      return;
    }
    await this.onCleanup();
  }

  private emergencyExit(): void {
    console.error('\n\nEmergency exit - no cleanup performed');
    this.exitProcess(130);
  }
}

/**
 * Install signal handlers with cleanup callback
 */
export function installSignalHandlers(options: SignalHandlerOptions = {}): SignalHandler {
  const handler = new SignalHandler(options);
  handler.install();
  return handler;
}
