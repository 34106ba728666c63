/**
 * Logging utility using winston
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import fs from 'fs';
import os from 'os';
import path from 'path';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Structured logging sink. Core modules depend on this, never on a console writer.
 */
export interface ILogger {
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

export function defaultLogDir(): string {
  return process.env.MWAA_LOCAL_LOG_DIR || path.join(os.homedir(), '.mwaa-local', 'logs');
}

export class Logger implements ILogger {
  private logger: winston.Logger;
  private fileLoggingEnabled = false;
  private consoleTransport: winston.transport;

  constructor(logDir = defaultLogDir()) {
    const absoluteLogDir = path.resolve(process.cwd(), logDir);

    // Synchronous so the constructor can decide on transports; falls back to console only
    try {
      if (!fs.existsSync(absoluteLogDir)) {
        fs.mkdirSync(absoluteLogDir, { recursive: true });
      }
      this.fileLoggingEnabled = true;
    } catch (error) {
      console.warn(
        `[Logger] Warning: Failed to create log directory at ${absoluteLogDir}. File logging disabled. Error: ${error}`
      );
      this.fileLoggingEnabled = false;
    }

    this.consoleTransport = new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    });

    const transports: winston.transport[] = [this.consoleTransport];

    if (this.fileLoggingEnabled) {
      transports.push(
        new DailyRotateFile({
          dirname: absoluteLogDir,
          filename: '%DATE%-error.log',
          datePattern: 'YYYYMMDD',
          level: 'error',
          maxSize: '10m',
          maxFiles: '14d',
          zippedArchive: true,
        }),
        new DailyRotateFile({
          dirname: absoluteLogDir,
          filename: '%DATE%.log',
          datePattern: 'YYYYMMDD',
          maxSize: '10m',
          maxFiles: '14d',
          zippedArchive: true,
        })
      );
    }

    this.logger = winston.createLogger({
      level: process.env.LOG_LEVEL || 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports,
    });
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  setLevel(level: LogLevel): void {
    this.logger.level = level;
  }

  getLevel(): string {
    return this.logger.level;
  }

  isFileLoggingEnabled(): boolean {
    return this.fileLoggingEnabled;
  }

  /**
   * Disable console logging (while a spinner owns the terminal)
   */
  disableConsole(): void {
    this.logger.remove(this.consoleTransport);
  }

  /**
   * Enable console logging
   */
  enableConsole(): void {
    if (!this.logger.transports.includes(this.consoleTransport)) {
      this.logger.add(this.consoleTransport);
    }
  }
}

// Singleton instance
export const logger = new Logger();
