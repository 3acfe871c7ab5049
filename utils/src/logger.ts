import winston from 'winston';
import chalk from 'chalk';

const { combine, timestamp, printf, colorize } = winston.format;

export type LogMeta = Record<string, unknown>;

// Custom format for console output
const consoleFormat = printf(({ level, message, timestamp, ...meta }) => {
  const ts = new Date(String(timestamp)).toISOString().split('T')[1].split('.')[0];
  let output = `${chalk.gray(ts)} ${level}: ${String(message)}`;

  if (Object.keys(meta).length > 0) {
    output += `\n${chalk.gray(JSON.stringify(meta, null, 2))}`;
  }

  return output;
});

export class Logger {
  private winston: winston.Logger;

  constructor(options?: {
    level?: string;
    logFile?: string;
  }) {
    const level = options?.level || process.env.LOG_LEVEL || 'info';

    this.winston = winston.createLogger({
      level: level === 'silent' ? 'error' : level,
      silent: level === 'silent',
      format: combine(
        timestamp(),
        winston.format.errors({ stack: true }),
      ),
      transports: [
        new winston.transports.Console({
          format: combine(
            colorize({ all: true }),
            consoleFormat
          ),
        }),
      ],
    });

    // Add file transport in production
    if (process.env.NODE_ENV === 'production') {
      this.winston.add(new winston.transports.File({
        filename: options?.logFile || process.env.LOG_FILE || 'cfupdater.log',
        format: combine(
          timestamp(),
          winston.format.json()
        ),
      }));
    }
  }

  setLevel(level: string) {
    if (level === 'silent') {
      this.winston.silent = true;
      return;
    }
    this.winston.silent = false;
    this.winston.level = level;
  }

  get level(): string {
    return this.winston.silent ? 'silent' : this.winston.level;
  }

  debug(message: string, meta?: LogMeta) {
    this.winston.debug(message, meta);
  }

  info(message: string, meta?: LogMeta) {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: LogMeta) {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta) {
    if (error instanceof Error) {
      this.winston.error(message, {
        error: error.message,
        stack: error.stack,
        ...meta,
      });
    } else if (error !== undefined) {
      this.winston.error(message, { error, ...meta });
    } else {
      this.winston.error(message, meta);
    }
  }

  success(message: string, meta?: LogMeta) {
    this.winston.info(chalk.green(message), meta);
  }
}

// Default logger instance
export const logger = new Logger();
