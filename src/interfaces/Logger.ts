export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;

  // Specialized logging methods for probe operations
  logConfigurationStart(config: LogMeta): void;
  logStat(uri: string, length: number, isDirectory: boolean, durationMs: number): void;
  logListing(pattern: string, matchCount: number, pageCount: number, durationMs: number): void;
  logOperationError(operation: string, error: Error, meta?: LogMeta): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
