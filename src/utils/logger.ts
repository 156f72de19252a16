import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getConfigManager } from '../core/config';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerInitOptions {
  /** Log directory; defaults to the config manager's logs directory */
  logsDir?: string;
  level?: LogLevel;
  /** Mirror log records to the console at debug level */
  verbose?: boolean;
}

const isDev = process.env.NODE_ENV === 'development';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    let log = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    if (stack) {
      log += `\n${stack}`;
    }
    return log;
  })
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let log = `[${timestamp}] ${level}: ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    return log;
  })
);

// Console-only until initialize(); quiet under the test runner
function createConsoleLogger(): winston.Logger {
  return winston.createLogger({
    level: 'warn',
    format: logFormat,
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
        stderrLevels: ['error', 'warn', 'info', 'debug'],
        silent: process.env.NODE_ENV === 'test',
      }),
    ],
  });
}

class Logger {
  private logger: winston.Logger;
  private initialized = false;

  constructor() {
    this.logger = createConsoleLogger();
  }

  /**
   * Switches to rotated log files in the logs directory.
   */
  async initialize(options: LoggerInitOptions = {}): Promise<void> {
    if (this.initialized) return;

    const configManager = getConfigManager();
    await configManager.ensureDirectories();
    const logsDir = options.logsDir ?? configManager.getLogsDir();
    const verbose = options.verbose === true || isDev;

    const fileTransport = new DailyRotateFile({
      dirname: logsDir,
      filename: 'app-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      format: logFormat,
    });

    const errorFileTransport = new DailyRotateFile({
      dirname: logsDir,
      filename: 'error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      level: 'error',
      format: logFormat,
    });

    const transports: winston.transport[] = [fileTransport, errorFileTransport];

    if (verbose) {
      transports.push(
        new winston.transports.Console({
          format: consoleFormat,
          stderrLevels: ['error', 'warn', 'info', 'debug'],
        })
      );
    }

    this.logger = winston.createLogger({
      level: verbose ? 'debug' : options.level ?? 'info',
      format: logFormat,
      transports,
    });

    this.initialized = true;
    this.debug('logger initialized', { logsDir });
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

  logError(error: Error, context?: string): void {
    this.error(context ? `${context}: ${error.message}` : error.message, {
      stack: error.stack,
      name: error.name,
    });
  }

  /**
   * Flushes file transports before the process exits.
   */
  async close(): Promise<void> {
    if (!this.initialized) return;
    await new Promise<void>((resolve) => {
      this.logger.on('finish', () => resolve());
      this.logger.end();
    });
    this.logger = createConsoleLogger();
    this.initialized = false;
  }
}

const logger = new Logger();

export { logger, Logger };
export default logger;
