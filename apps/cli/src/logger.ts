import winston from 'winston';
import type { Logger } from '@agentshell/core';

export interface WinstonLoggerOptions {
  level?: string;
  // Directory the log files are written to; defaults to the current directory
  directory?: string;
}

/**
 * Winston-based logger for the CLI. Logs go to rotating JSON files only, since the console
 * belongs to the panes.
 */
export class WinstonLoggerAdapter implements Logger {
  private logger: winston.Logger;

  constructor(options: WinstonLoggerOptions = {}) {
    const directory = options.directory ?? '.';
    const fileFormat = winston.format.combine(winston.format.timestamp(), winston.format.json());
    this.logger = winston.createLogger({
      level: options.level ?? 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json(),
      ),
      transports: [
        new winston.transports.File({
          filename: `${directory}/agentshell.log`,
          maxsize: 10 * 1024 * 1024,
          maxFiles: 5,
          format: fileFormat,
        }),
        new winston.transports.File({
          filename: `${directory}/agentshell-error.log`,
          level: 'error',
          maxsize: 10 * 1024 * 1024,
          maxFiles: 5,
          format: fileFormat,
        }),
      ],
    });
  }

  error(message: string, ...args: unknown[]): void {
    this.logger.error(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.logger.warn(message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.logger.info(message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.logger.debug(message, ...args);
  }
}
