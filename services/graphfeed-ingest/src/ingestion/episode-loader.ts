/**
 * Episode Loader
 *
 * Per document: metadata episode, then one bulk call when bulk mode is on and
 * the client declares the capability, then sequential per-segment loads when
 * bulk is unavailable or failed. Sequential failures are recorded in the
 * failure ledger and feed the consecutive-failure breaker; only an aborted
 * signal stops a document early. A report is produced even when every
 * segment fails.
 */

import { describeError } from '@graphfeed/errors';
import { Logger } from '@graphfeed/logger';
import { EpisodeBuilder } from '../episodic/episode-builder';
import { BulkEpisodeClient, GraphLoaderClient, supportsBulkLoad } from '../episodic/graph-loader';
import { Document, DocumentLoadReport, LoadPath, Segment } from '../types';
import {
  bulkFailureReason,
  metadataFailureReason,
  segmentFailureReason,
} from './failure-recorder';
import { IngestionContext } from './ingestion-context';

export interface EpisodeLoaderOptions {
  client: GraphLoaderClient;
  context: IngestionContext;
  builder?: EpisodeBuilder;
  /** Try one bulk call per document before per-segment loads */
  bulkMode?: boolean;
}

interface SequentialOutcome {
  succeeded: number;
  failed: number;
  pauses: number;
}

export class EpisodeLoader {
  private readonly client: GraphLoaderClient;
  private readonly bulkClient: BulkEpisodeClient | null;
  private readonly context: IngestionContext;
  private readonly builder: EpisodeBuilder;
  private readonly bulkMode: boolean;
  private readonly logger: Logger;

  constructor(options: EpisodeLoaderOptions) {
    this.client = options.client;
    this.context = options.context;
    this.builder = options.builder ?? new EpisodeBuilder();
    this.bulkMode = options.bulkMode ?? false;
    this.logger = options.context.logger.child({ component: 'episode-loader' });

    // capability is decided once, never probed per call
    this.bulkClient = supportsBulkLoad(options.client) ? options.client : null;

    if (this.bulkMode && this.bulkClient === null) {
      this.logger.info('Bulk mode requested but the Graph Loader has no bulk endpoint, loading sequentially');
    }
  }

  async loadDocument(document: Document, segments: readonly Segment[]): Promise<DocumentLoadReport> {
    const startTime = Date.now();
    const log = this.logger.child({ documentId: document.id });
    const total = segments.length;

    const metadataLoaded = await this.loadMetadata(document, log);

    let path: LoadPath;
    let outcome: SequentialOutcome = { succeeded: 0, failed: 0, pauses: 0 };

    if (total === 0) {
      path = 'empty';
    } else if (this.bulkClient !== null && this.bulkMode && await this.loadBulk(this.bulkClient, document, segments, log)) {
      path = 'bulk';
      outcome = { succeeded: total, failed: 0, pauses: 0 };
    } else {
      path = 'sequential';
      outcome = await this.loadSequential(document, segments, log);
    }

    const report: DocumentLoadReport = {
      documentId: document.id,
      succeeded: outcome.succeeded,
      failed: outcome.failed,
      total,
      path,
      metadataLoaded,
      circuitBreakerPauses: outcome.pauses,
      durationMs: Date.now() - startTime,
    };

    this.context.metrics.recordLoaded(path, outcome.succeeded);
    this.context.metrics.observeDocumentDuration(report.durationMs);

    if (report.failed > 0) {
      log.warn('Document loaded with failures', { ...report });
    } else {
      log.info('Document loaded', { ...report });
    }

    return report;
  }

  private async loadMetadata(document: Document, log: Logger): Promise<boolean> {
    const episode = this.builder.buildMetadataEpisode(document);

    try {
      await this.context.call(() => this.client.load(episode));
      this.context.metrics.recordLoaded('metadata');
      return true;
    } catch (error) {
      this.rethrowIfAborted(error);

      const cause = describeError(error);
      log.error('Metadata episode failed', { episode: episode.name, cause });
      this.context.metrics.recordFailed('metadata');
      await this.context.recorder.record(document.id, [], metadataFailureReason(cause));
      return false;
    }
  }

  /**
   * One all-or-nothing bulk call; false sends the document down the sequential path
   */
  private async loadBulk(
    client: BulkEpisodeClient,
    document: Document,
    segments: readonly Segment[],
    log: Logger
  ): Promise<boolean> {
    const episodes = this.builder.buildSegmentEpisodes(document, segments);

    try {
      await this.context.call(() => client.loadBulk(episodes));
      log.debug('Bulk load accepted', { episodes: episodes.length });
      return true;
    } catch (error) {
      this.rethrowIfAborted(error);

      const cause = describeError(error);
      log.warn('Bulk load failed, falling back to sequential loads', { episodes: episodes.length, cause });
      this.context.metrics.recordFailed('bulk');
      await this.context.recorder.record(document.id, [], bulkFailureReason(cause));
      return false;
    }
  }

  private async loadSequential(
    document: Document,
    segments: readonly Segment[],
    log: Logger
  ): Promise<SequentialOutcome> {
    const outcome: SequentialOutcome = { succeeded: 0, failed: 0, pauses: 0 };
    const ordered = [...segments].sort((a, b) => a.index - b.index);

    for (const segment of ordered) {
      const episode = this.builder.buildSegmentEpisode(document, segment);

      try {
        await this.context.call(() => this.client.load(episode));
        this.context.breaker.recordSuccess();
        outcome.succeeded++;
      } catch (error) {
        this.rethrowIfAborted(error);

        outcome.failed++;
        const cause = describeError(error);
        log.error('Segment load failed', { segmentIndex: segment.index, episode: episode.name, cause });
        this.context.metrics.recordFailed('segment');
        await this.context.recorder.record(document.id, [segment], segmentFailureReason(segment.index, cause));

        if (await this.context.breaker.recordFailure(this.context.signal)) {
          outcome.pauses++;
        }
      }
    }

    return outcome;
  }

  private rethrowIfAborted(error: unknown): void {
    if (this.context.signal?.aborted) {
      throw error;
    }
  }
}
