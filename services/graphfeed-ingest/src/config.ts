/**
 * Ingestion Configuration
 * Environment-driven settings for chunking, retry, concurrency and the Graph Loader
 */

import { ConfigLoader, EnvSchema } from '@graphfeed/config';
import { ConfigurationError } from '@graphfeed/errors';
import {
  DEFAULT_RETRYABLE_CODES,
  DEFAULT_RETRYABLE_PATTERNS,
} from '@graphfeed/resilience';
import { BoundaryMode, ChunkUnit, EpisodeFormat } from './types';

export const CHUNK_UNITS: readonly ChunkUnit[] = ['characters', 'tokens'];
export const BOUNDARY_MODES: readonly BoundaryMode[] = ['sentence', 'word', 'none'];
export const EPISODE_FORMATS: readonly EpisodeFormat[] = ['text', 'structured'];

export interface RetrySettings {
  maxAttempts: number;
  initialDelay: number;
  maxDelay: number;
  backoffFactor: number;
  jitterFraction: number;
  retryablePatterns: string[];
  retryableCodes: string[];
}

export interface ChunkingSettings {
  unit: ChunkUnit;
  targetSize: number;
  overlap: number;
  boundaryMode: BoundaryMode;
  lookaheadChars: number;
  lookbackChars: number;
  minSize?: number;
}

export interface GraphLoaderSettings {
  url: string;
  apiKey?: string;
  timeoutMs: number;
  bulk: boolean;
  groupId?: string;
}

export interface IngestionConfig {
  concurrencyLimit: number;
  maxConsecutiveFailures: number;
  circuitBreakerCooldownMs: number;
  retry: RetrySettings;
  chunking: ChunkingSettings;
  bulkMode: boolean;
  episodeFormat: EpisodeFormat;
  graphLoader: GraphLoaderSettings;
  inputDir: string;
  failedDir: string;
  writeMappedOutputs: boolean;
  documentConcurrency: number;
}

const positiveInteger = (value: unknown): true | string =>
  (typeof value === 'number' && Number.isInteger(value) && value >= 1) || 'Must be a positive integer';

const nonNegative = (value: unknown): true | string =>
  (typeof value === 'number' && value >= 0) || 'Must not be negative';

const oneOf = (options: readonly string[]) => (value: unknown): true | string =>
  (typeof value === 'string' && options.includes(value)) || `Must be one of: ${options.join(', ')}`;

export const ingestionEnvSchema: EnvSchema = {
  concurrencyLimit: {
    env: ['INGEST_CONCURRENCY_LIMIT', 'INGEST_SEMAPHORE_MAX'],
    type: 'number',
    default: 1,
    check: positiveInteger,
  },
  maxConsecutiveFailures: {
    env: 'INGEST_MAX_CONSECUTIVE_FAILURES',
    type: 'number',
    default: 3,
    check: positiveInteger,
  },
  circuitBreakerCooldownMs: {
    env: 'INGEST_COOLDOWN_SECONDS',
    type: 'number',
    default: 60000,
    parse: (value) => Number(value) * 1000,
    check: nonNegative,
  },
  retryMaxAttempts: { env: 'RETRY_MAX_ATTEMPTS', type: 'number', default: 6, check: positiveInteger },
  retryInitialDelayMs: { env: 'RETRY_INITIAL_DELAY_MS', type: 'number', default: 500, check: nonNegative },
  retryMaxDelayMs: { env: 'RETRY_MAX_DELAY_MS', type: 'number', default: 30000, check: nonNegative },
  retryBackoffFactor: {
    env: 'RETRY_BACKOFF_FACTOR',
    type: 'number',
    default: 2,
    check: (value) => (typeof value === 'number' && value >= 1) || 'Must be at least 1',
  },
  retryJitterFraction: {
    env: 'RETRY_JITTER_FRACTION',
    type: 'number',
    default: 0.3,
    check: (value) => (typeof value === 'number' && value >= 0 && value <= 1) || 'Must be within [0, 1]',
  },
  retryableErrorPatterns: {
    env: 'RETRYABLE_ERROR_PATTERNS',
    type: 'list',
    default: [...DEFAULT_RETRYABLE_PATTERNS],
  },
  retryableErrorCodes: {
    env: 'RETRYABLE_ERROR_CODES',
    type: 'list',
    default: [...DEFAULT_RETRYABLE_CODES],
  },
  chunkUnit: { env: 'CHUNK_UNIT', type: 'string', default: 'characters', check: oneOf(CHUNK_UNITS) },
  chunkTargetSize: { env: 'CHUNK_TARGET_SIZE', type: 'number', default: 3000, check: positiveInteger },
  chunkOverlap: { env: 'CHUNK_OVERLAP', type: 'number', default: 300, check: nonNegative },
  chunkBoundaryMode: {
    env: 'CHUNK_BOUNDARY_MODE',
    type: 'string',
    default: 'sentence',
    check: oneOf(BOUNDARY_MODES),
  },
  chunkLookahead: { env: 'CHUNK_LOOKAHEAD_CHARS', type: 'number', default: 200, check: nonNegative },
  chunkLookback: { env: 'CHUNK_LOOKBACK_CHARS', type: 'number', default: 40, check: nonNegative },
  chunkMinSize: { env: 'CHUNK_MIN_SIZE', type: 'number', check: positiveInteger },
  bulkMode: { env: 'INGEST_BULK_MODE', type: 'boolean', default: false },
  episodeFormat: { env: 'EPISODE_FORMAT', type: 'string', default: 'text', check: oneOf(EPISODE_FORMATS) },
  graphLoaderUrl: { env: 'GRAPH_LOADER_URL', type: 'url', default: 'http://localhost:8000', required: true },
  graphLoaderApiKey: { env: 'GRAPH_LOADER_API_KEY', type: 'string', secret: true },
  graphLoaderTimeoutMs: { env: 'GRAPH_LOADER_TIMEOUT_MS', type: 'number', default: 120000, check: positiveInteger },
  graphLoaderBulk: {
    env: 'GRAPH_LOADER_BULK',
    type: 'boolean',
    default: false,
  },
  graphGroupId: { env: 'GRAPH_GROUP_ID', type: 'string' },
  inputDir: { env: 'INGEST_INPUT_DIR', type: 'string', default: 'normalized' },
  failedDir: { env: 'INGEST_FAILED_DIR', type: 'string', default: 'failed' },
  writeMappedOutputs: { env: 'INGEST_WRITE_MAPPED', type: 'boolean', default: false },
  documentConcurrency: {
    env: 'INGEST_DOCUMENT_CONCURRENCY',
    type: 'number',
    default: 1,
    check: positiveInteger,
  },
};

function pick<T extends string>(value: string, options: readonly T[], key: string): T {
  const match = options.find((option) => option === value);
  if (match === undefined) {
    throw new ConfigurationError(`Configuration key '${key}' has unsupported value '${value}'`, { key });
  }
  return match;
}

export interface LoadIngestionConfigOptions {
  /** Variables to read instead of process.env */
  source?: Record<string, string | undefined>;
  envFilePath?: string;
}

/**
 * Load and validate the ingestion settings.
 * Throws a single ConfigurationError listing every invalid variable.
 */
export async function loadIngestionConfig(options: LoadIngestionConfigOptions = {}): Promise<IngestionConfig> {
  const loader = new ConfigLoader({
    schema: ingestionEnvSchema,
    source: options.source,
    envFilePath: options.envFilePath,
  });
  await loader.load();

  return {
    concurrencyLimit: loader.getNumber('concurrencyLimit'),
    maxConsecutiveFailures: loader.getNumber('maxConsecutiveFailures'),
    circuitBreakerCooldownMs: loader.getNumber('circuitBreakerCooldownMs'),
    retry: {
      maxAttempts: loader.getNumber('retryMaxAttempts'),
      initialDelay: loader.getNumber('retryInitialDelayMs'),
      maxDelay: loader.getNumber('retryMaxDelayMs'),
      backoffFactor: loader.getNumber('retryBackoffFactor'),
      jitterFraction: loader.getNumber('retryJitterFraction'),
      retryablePatterns: loader.getStringList('retryableErrorPatterns'),
      retryableCodes: loader.getStringList('retryableErrorCodes'),
    },
    chunking: {
      unit: pick(loader.getString('chunkUnit'), CHUNK_UNITS, 'chunkUnit'),
      targetSize: loader.getNumber('chunkTargetSize'),
      overlap: loader.getNumber('chunkOverlap'),
      boundaryMode: pick(loader.getString('chunkBoundaryMode'), BOUNDARY_MODES, 'chunkBoundaryMode'),
      lookaheadChars: loader.getNumber('chunkLookahead'),
      lookbackChars: loader.getNumber('chunkLookback'),
      minSize: loader.getOptionalNumber('chunkMinSize'),
    },
    bulkMode: loader.getBoolean('bulkMode'),
    episodeFormat: pick(loader.getString('episodeFormat'), EPISODE_FORMATS, 'episodeFormat'),
    graphLoader: {
      url: loader.getString('graphLoaderUrl'),
      apiKey: loader.getOptionalString('graphLoaderApiKey'),
      timeoutMs: loader.getNumber('graphLoaderTimeoutMs'),
      bulk: loader.getBoolean('graphLoaderBulk'),
      groupId: loader.getOptionalString('graphGroupId'),
    },
    inputDir: loader.getString('inputDir'),
    failedDir: loader.getString('failedDir'),
    writeMappedOutputs: loader.getBoolean('writeMappedOutputs'),
    documentConcurrency: loader.getNumber('documentConcurrency'),
  };
}
