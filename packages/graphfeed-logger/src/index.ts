/**
 * @graphfeed/logger
 * Unified logging package for graphfeed workspaces
 */

export { createLogger } from './logger';
export type {
  Logger,
  LoggerConfig,
  LogMetadata,
  LogLevel,
  LogFormat,
} from './types';
