import { createLogger, LogFormat, Logger, LogLevel } from '@graphfeed/logger';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const LOG_FORMATS: readonly LogFormat[] = ['json', 'pretty'];

export const logger: Logger = createLogger({
  service: 'graphfeed-ingest',
  level: LOG_LEVELS.find((candidate) => candidate === process.env.LOG_LEVEL) ?? 'info',
  format: LOG_FORMATS.find((candidate) => candidate === process.env.LOG_FORMAT),
  silent: process.env.LOG_SILENT === 'true',
  rotateDir: process.env.LOG_DIR || undefined,
});
