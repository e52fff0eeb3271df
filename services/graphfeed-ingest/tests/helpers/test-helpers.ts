/**
 * Shared fixtures for ingest unit tests
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { DEFAULT_RETRYABLE_CODES, DEFAULT_RETRYABLE_PATTERNS } from '@graphfeed/resilience';
import { RetrySettings } from '../../src/config';
import { FailureRecorder } from '../../src/ingestion/failure-recorder';
import { IngestionContext } from '../../src/ingestion/ingestion-context';
import { IngestionMetrics } from '../../src/metrics/ingestion-metrics';
import { Document, Segment } from '../../src/types';

export const FIXED_NOW = new Date('2024-05-01T10:00:00.000Z');

export const testRetrySettings: RetrySettings = {
  maxAttempts: 3,
  initialDelay: 10,
  maxDelay: 100,
  backoffFactor: 2,
  jitterFraction: 0,
  retryablePatterns: [...DEFAULT_RETRYABLE_PATTERNS],
  retryableCodes: [...DEFAULT_RETRYABLE_CODES],
};

export async function makeTempDir(prefix: string = 'graphfeed-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function makeDocument(id: string = 'doc-1', overrides: Partial<Document> = {}): Document {
  return {
    id,
    title: 'Quarterly Notice',
    fullText: 'Body of the notice.',
    sourceFile: 'notice.pdf',
    pageCount: 2,
    metadata: { normalizedAt: null, originalFilename: 'notice.pdf', hasSegments: false, hasChunks: true },
    ...overrides,
  };
}

export function makeSegments(documentId: string, count: number): Segment[] {
  return Array.from({ length: count }, (_, index) => ({
    documentId,
    index,
    text: `segment ${index}`,
  }));
}

export interface TestContextOptions {
  failedDir: string;
  concurrencyLimit?: number;
  maxConsecutiveFailures?: number;
  circuitBreakerCooldownMs?: number;
  retry?: Partial<RetrySettings>;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export function makeContext(options: TestContextOptions): {
  context: IngestionContext;
  recorder: FailureRecorder;
  metrics: IngestionMetrics;
} {
  const recorder = new FailureRecorder({ failedDir: options.failedDir, now: () => FIXED_NOW });
  const metrics = new IngestionMetrics('test');
  const context = new IngestionContext({
    concurrencyLimit: options.concurrencyLimit ?? 1,
    maxConsecutiveFailures: options.maxConsecutiveFailures ?? 3,
    circuitBreakerCooldownMs: options.circuitBreakerCooldownMs ?? 5000,
    retry: { ...testRetrySettings, ...options.retry },
    recorder,
    metrics,
    signal: options.signal,
    sleep: options.sleep ?? (async () => undefined),
  });
  return { context, recorder, metrics };
}

/**
 * Resolves on the next macrotask, so concurrent callers get a chance to overlap
 */
export function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
