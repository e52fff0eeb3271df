import type winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface LoggerConfig {
  service: string;
  /** Default: 'info' */
  level?: LogLevel;
  /** Default: 'json' in production, 'pretty' otherwise */
  format?: LogFormat;
  /** Write to stdout (default: true) */
  console?: boolean;
  /** Directory for daily rotated files; no file output when unset */
  rotateDir?: string;
  /** Retention of rotated files, winston-daily-rotate-file syntax (default: '14d') */
  maxFiles?: string;
  silent?: boolean;
  /** Merged into every entry */
  metadata?: LogMetadata;
  environment?: string;
  version?: string;
}

export type LogMetadata = Record<string, unknown>;

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
  child(metadata: LogMetadata): Logger;
  /** The backing winston logger, for extra transports */
  getWinstonLogger(): winston.Logger;
}
