/**
 * Winston-backed structured logger
 */

import path from 'path';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { LogFormat, Logger, LoggerConfig, LogLevel, LogMetadata } from './types';

const { combine, timestamp, json, printf, colorize, errors } = winston.format;

/**
 * Errors anywhere in the metadata become their message; the first one's
 * stack is kept under `stack`. winston would otherwise log `{}`.
 */
function flattenErrors(metadata: LogMetadata = {}): LogMetadata {
  let stack: string | undefined;
  const flat: LogMetadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (value instanceof Error) {
      flat[key] = value.message;
      stack = stack ?? value.stack;
    } else {
      flat[key] = value;
    }
  }
  return stack === undefined ? flat : { ...flat, stack };
}

const prettyLine = printf(
  ({ timestamp: time, level, message, service, documentId, environment: _environment, version: _version, ...rest }) => {
    const document = documentId === undefined ? '' : `[${String(documentId)}] `;
    const extra = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
    return `${String(time)} [${level}] [${String(service)}] ${document}${String(message)}${extra}`;
  }
);

function buildFormat(format: LogFormat) {
  return format === 'json'
    ? combine(errors({ stack: true }), timestamp(), json())
    : combine(errors({ stack: true }), colorize(), timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), prettyLine);
}

function buildTransports(config: LoggerConfig): winston.transport[] {
  const transports: winston.transport[] = [];
  if (config.console ?? true) {
    transports.push(new winston.transports.Console());
  }
  if (config.rotateDir) {
    transports.push(
      new DailyRotateFile({
        filename: path.join(config.rotateDir, `${config.service}-%DATE%.log`),
        datePattern: 'YYYY-MM-DD',
        maxFiles: config.maxFiles ?? '14d',
        zippedArchive: true,
      })
    );
  }
  return transports;
}

class WinstonLogger implements Logger {
  constructor(private readonly target: winston.Logger) {}

  debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.write('error', message, metadata);
  }

  child(metadata: LogMetadata): Logger {
    return new WinstonLogger(this.target.child(metadata));
  }

  getWinstonLogger(): winston.Logger {
    return this.target;
  }

  private write(level: LogLevel, message: string, metadata?: LogMetadata): void {
    this.target.log(level, message, flattenErrors(metadata));
  }
}

export function createLogger(config: LoggerConfig): Logger {
  const environment = config.environment ?? process.env.NODE_ENV ?? 'development';
  const format = config.format ?? (environment === 'production' ? 'json' : 'pretty');

  return new WinstonLogger(
    winston.createLogger({
      level: config.level ?? 'info',
      format: buildFormat(format),
      defaultMeta: {
        service: config.service,
        environment,
        version: config.version ?? process.env.SERVICE_VERSION ?? '1.0.0',
        ...config.metadata,
      },
      transports: buildTransports(config),
      silent: config.silent ?? false,
      exitOnError: false,
    })
  );
}
