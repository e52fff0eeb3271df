/**
 * Ingestion Prometheus Metrics
 *
 * Metrics:
 * - Episodes loaded, by load path
 * - Episodes failed, by stage (metadata, bulk, segment)
 * - Retry attempts and circuit breaker pauses
 * - Per-document load duration
 *
 * Each instance owns its registry, so several pipelines (or test cases) never
 * collide on metric names.
 */

import { Counter, Histogram, Registry } from 'prom-client';

export type FailureStage = 'metadata' | 'bulk' | 'segment';

export interface MetricsSnapshot {
  episodesLoaded: Record<string, number>;
  episodesFailed: Record<string, number>;
  retryAttempts: number;
  circuitBreakerPauses: number;
  documentsLoaded: number;
}

export class IngestionMetrics {
  readonly registry: Registry;

  private readonly episodesLoaded: Counter<'path'>;
  private readonly episodesFailed: Counter<'stage'>;
  private readonly retryAttempts: Counter;
  private readonly circuitBreakerPauses: Counter;
  private readonly documentLoadDurationMs: Histogram;

  constructor(prefix: string = 'graphfeed') {
    this.registry = new Registry();

    this.episodesLoaded = new Counter({
      name: `${prefix}_episodes_loaded_total`,
      help: 'Episodes accepted by the Graph Loader',
      labelNames: ['path'],
      registers: [this.registry],
    });

    this.episodesFailed = new Counter({
      name: `${prefix}_episodes_failed_total`,
      help: 'Episodes that failed after retries',
      labelNames: ['stage'],
      registers: [this.registry],
    });

    this.retryAttempts = new Counter({
      name: `${prefix}_retry_attempts_total`,
      help: 'Backoff retries of Graph Loader calls',
      registers: [this.registry],
    });

    this.circuitBreakerPauses = new Counter({
      name: `${prefix}_circuit_breaker_pauses_total`,
      help: 'Cooldown pauses after consecutive segment failures',
      registers: [this.registry],
    });

    this.documentLoadDurationMs = new Histogram({
      name: `${prefix}_document_load_duration_ms`,
      help: 'Time to load one document, metadata episode included',
      buckets: [100, 500, 1000, 5000, 15000, 60000, 300000, 900000],
      registers: [this.registry],
    });
  }

  recordLoaded(path: string, count: number = 1): void {
    if (count > 0) {
      this.episodesLoaded.inc({ path }, count);
    }
  }

  recordFailed(stage: FailureStage, count: number = 1): void {
    if (count > 0) {
      this.episodesFailed.inc({ stage }, count);
    }
  }

  recordRetry(): void {
    this.retryAttempts.inc();
  }

  recordCircuitBreakerPause(): void {
    this.circuitBreakerPauses.inc();
  }

  observeDocumentDuration(durationMs: number): void {
    this.documentLoadDurationMs.observe(durationMs);
  }

  /**
   * Current values, for summary logs and tests
   */
  async snapshot(): Promise<MetricsSnapshot> {
    const byLabel = async (counter: Counter<string>, label: string): Promise<Record<string, number>> => {
      const { values } = await counter.get();
      const result: Record<string, number> = {};
      for (const { labels, value } of values) {
        const key = labels[label];
        if (key !== undefined) {
          result[String(key)] = value;
        }
      }
      return result;
    };

    const total = async (counter: Counter<string>): Promise<number> => {
      const { values } = await counter.get();
      return values.reduce((sum, { value }) => sum + value, 0);
    };

    const histogram = await this.documentLoadDurationMs.get();
    const countEntry = histogram.values.find((entry) => entry.metricName?.endsWith('_count'));

    return {
      episodesLoaded: await byLabel(this.episodesLoaded, 'path'),
      episodesFailed: await byLabel(this.episodesFailed, 'stage'),
      retryAttempts: await total(this.retryAttempts),
      circuitBreakerPauses: await total(this.circuitBreakerPauses),
      documentsLoaded: countEntry?.value ?? 0,
    };
  }

  async metrics(): Promise<string> {
    return this.registry.metrics();
  }
}
