import winston from 'winston';
import { Logger as ILogger, LogLevel, LogMeta } from '../interfaces/Logger';

const SENSITIVE_KEYS = [
  'password', 'secret', 'token', 'credential',
  'accesskey', 'secretkey', 'access_key', 'secret_key', 'authorization'
];

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(logLevel: LogLevel = LogLevel.INFO) {
    this.winston = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.printf((info) => {
          const { timestamp, level, message, stack, ...meta } = info;
          const logEntry: LogMeta = {
            timestamp,
            level,
            message
          };

          if (stack) {
            logEntry.stack = stack;
          }

          if (Object.keys(meta).length > 0) {
            logEntry.meta = this.sanitizeMeta(meta);
          }

          return JSON.stringify(logEntry);
        })
      ),
      // stdout is reserved for probe results
      transports: [
        new winston.transports.Console({
          stderrLevels: Object.values(LogLevel)
        })
      ]
    });
  }

  /**
   * Sanitize metadata to remove sensitive information
   */
  sanitizeMeta(meta: LogMeta): LogMeta {
    const sanitized: LogMeta = { ...meta };

    for (const [key, value] of Object.entries(sanitized)) {
      const lowerKey = key.toLowerCase();
      const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

      if (isSensitive) {
        sanitized[key] = '[REDACTED]';
      } else if (Logger.isPlainObject(value)) {
        sanitized[key] = this.sanitizeMeta(value);
      }
    }

    return sanitized;
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    const errorMeta: LogMeta = {
      ...meta,
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
          ...('code' in error ? { code: error.code } : {})
        }
      })
    };
    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(message, meta);
  }

  logConfigurationStart(config: LogMeta): void {
    this.info('Probe starting with configuration', {
      operation: 'startup',
      config: this.sanitizeMeta(config)
    });
  }

  logStat(uri: string, length: number, isDirectory: boolean, durationMs: number): void {
    this.info('Stat completed', {
      operation: 'stat',
      uri,
      length,
      isDirectory,
      durationMs: Math.round(durationMs * 100) / 100
    });
  }

  logListing(pattern: string, matchCount: number, pageCount: number, durationMs: number): void {
    this.info('Wildcard listing completed', {
      operation: 'list_matching',
      pattern,
      matchCount,
      pageCount,
      durationMs: Math.round(durationMs * 100) / 100
    });
  }

  logOperationError(operation: string, error: Error, meta?: LogMeta): void {
    this.error(`Probe operation failed: ${operation}`, error, {
      operation: 'probe_error',
      failedOperation: operation,
      ...meta
    });
  }

  private static isPlainObject(value: unknown): value is LogMeta {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
  }

  /**
   * Create a logger instance with the specified log level from environment
   */
  static createFromEnvironment(): Logger {
    const logLevel = Logger.toLogLevel(process.env.LOG_LEVEL);

    if (logLevel === undefined) {
      if (process.env.LOG_LEVEL) {
        console.warn(`Invalid LOG_LEVEL: ${process.env.LOG_LEVEL}. Using INFO level.`);
      }
      return new Logger(LogLevel.INFO);
    }

    return new Logger(logLevel);
  }

  static toLogLevel(value: string | undefined): LogLevel | undefined {
    const normalized = value?.toLowerCase();
    return Object.values(LogLevel).find(level => level === normalized);
  }
}
