/**
 * Failure Recorder
 * Durable per-document ledger of segments that need to be loaded again.
 *
 * One JSON file per document, replaced atomically (temp file + rename).
 * `record` never rejects: a ledger problem is logged and the pipeline goes on.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { describeError } from '@graphfeed/errors';
import { Logger } from '@graphfeed/logger';
import { FailureEntry, FailureRecord, Segment, SegmentSnapshot } from '../types';
import { logger as defaultLogger } from '../utils/logger';

export const METADATA_FAILURE_KEY = 'metadata';
export const BULK_FAILURE_KEY = 'bulk';

const SEGMENT_INDEX_PATTERN = /^segment_(\d+)_failed/;

export function segmentFailureReason(index: number, cause: string): string {
  return `segment_${index}_failed: ${cause}`;
}

export function metadataFailureReason(cause: string): string {
  return `metadata_episode_failed: ${cause}`;
}

export function bulkFailureReason(cause: string): string {
  return `bulk_load_failed: ${cause}`;
}

const segmentSnapshotSchema = z.object({
  documentId: z.string(),
  index: z.number(),
  text: z.string(),
  id: z.string().optional(),
  pageRef: z.number().nullable().optional(),
  metadata: z
    .object({
      sourceFile: z.string().nullable().optional(),
      blockType: z.string().nullable().optional(),
      format: z.string().nullable().optional(),
      start: z.number().optional(),
      end: z.number().optional(),
    })
    .optional(),
});

const failureEntrySchema = z.object({
  reason: z.string(),
  failedSegment: segmentSnapshotSchema.nullable(),
  timestamp: z.string(),
});

// Fields and entries this version does not know are kept as they are
const storedRecordSchema = z
  .object({
    documentId: z.string().optional(),
    failedSegments: z.record(z.array(z.unknown())).optional(),
    updatedAt: z.string().optional(),
  })
  .passthrough();

type StoredRecord = z.infer<typeof storedRecordSchema>;

export interface FailureRecorderOptions {
  failedDir: string;
  logger?: Logger;
  now?: () => Date;
}

export class FailureRecorder {
  private readonly failedDir: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  // per-document write chains
  private readonly pending = new Map<string, Promise<void>>();

  constructor(options: FailureRecorderOptions) {
    this.failedDir = options.failedDir;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'failure-recorder' });
    this.now = options.now ?? (() => new Date());
  }

  filePathFor(documentId: string): string {
    const safeId = documentId.replace(/[^A-Za-z0-9._-]/g, '_') || 'unknown';
    return path.join(this.failedDir, `${safeId}.failed.json`);
  }

  /**
   * Append one failure entry for the document. Writes for the same document
   * are applied in call order.
   */
  record(documentId: string, segments: readonly Segment[], reason: string): Promise<void> {
    const previous = this.pending.get(documentId) ?? Promise.resolve();

    const current = previous
      .then(() => this.persist(documentId, segments, reason))
      .catch((error: unknown) => {
        this.logger.error('Failed to record failure', { documentId, reason, error });
      });

    this.pending.set(documentId, current);

    return current.then(() => {
      if (this.pending.get(documentId) === current) {
        this.pending.delete(documentId);
      }
    });
  }

  /**
   * Parsed ledger for a document, null when absent or unreadable
   */
  async read(documentId: string): Promise<FailureRecord | null> {
    const raw = await this.readFile(this.filePathFor(documentId));
    if (raw === null) {
      return null;
    }
    try {
      return this.toFailureRecord(documentId, storedRecordSchema.parse(JSON.parse(raw)));
    } catch (error) {
      this.logger.warn('Failure ledger is unreadable', { documentId, error });
      return null;
    }
  }

  private async persist(documentId: string, segments: readonly Segment[], reason: string): Promise<void> {
    const { key, segment } = this.resolveKey(segments, reason);
    const target = this.filePathFor(documentId);
    const timestamp = this.now().toISOString();

    await fs.mkdir(this.failedDir, { recursive: true });

    const stored = await this.load(target);
    const entry: FailureEntry = {
      reason,
      failedSegment: segment ? this.snapshot(segment) : null,
      timestamp,
    };
    const failedSegments = stored.failedSegments ?? {};

    const ledger: StoredRecord = {
      ...stored,
      documentId: stored.documentId ?? documentId,
      failedSegments: { ...failedSegments, [key]: [...(failedSegments[key] ?? []), entry] },
      updatedAt: timestamp,
    };

    await this.writeAtomic(target, JSON.stringify(ledger, null, 2));

    this.logger.info('Recorded failed segment', { documentId, key, file: target });
  }

  /**
   * Key for the entry: the reserved keys for metadata and bulk failures, the
   * segment the reason starts with, the only supplied segment, or a random key
   */
  private resolveKey(segments: readonly Segment[], reason: string): { key: string; segment: Segment | null } {
    if (reason.startsWith(metadataFailureReason(''))) {
      return { key: METADATA_FAILURE_KEY, segment: null };
    }
    if (reason.startsWith(bulkFailureReason(''))) {
      return { key: BULK_FAILURE_KEY, segment: null };
    }

    const match = SEGMENT_INDEX_PATTERN.exec(reason);
    if (match) {
      const index = Number(match[1]);
      const segment = segments.find((candidate) => candidate.index === index)
        ?? (segments.length === 1 ? segments[0] : null);
      return { key: segment?.id ?? `segment_${index}`, segment };
    }

    if (segments.length === 1) {
      const [segment] = segments;
      return { key: segment.id ?? `segment_${segment.index}`, segment };
    }

    return { key: `unkeyed_${uuidv4()}`, segment: null };
  }

  /**
   * Stored ledger as found on disk. Unparseable JSON, or a top level of the
   * wrong shape, is moved aside and an empty ledger returned.
   */
  private async load(target: string): Promise<StoredRecord> {
    const raw = await this.readFile(target);
    if (raw === null) {
      return {};
    }

    try {
      return storedRecordSchema.parse(JSON.parse(raw));
    } catch (error) {
      const backup = `${target}.corrupt-${this.now().toISOString().replace(/[:.]/g, '-')}`;
      await fs.rename(target, backup);
      this.logger.warn('Corrupt failure ledger moved aside', { file: target, backup, error });
      return {};
    }
  }

  /**
   * Typed view for readers; entries that do not match the current shape are
   * left out here but stay in the file
   */
  private toFailureRecord(documentId: string, stored: StoredRecord): FailureRecord {
    const failedSegments: Record<string, FailureEntry[]> = {};

    for (const [key, entries] of Object.entries(stored.failedSegments ?? {})) {
      failedSegments[key] = entries.flatMap((entry) => {
        const result = failureEntrySchema.safeParse(entry);
        return result.success ? [result.data] : [];
      });
    }

    return {
      documentId: stored.documentId ?? documentId,
      failedSegments,
      updatedAt: stored.updatedAt ?? this.now().toISOString(),
    };
  }

  private snapshot(segment: Segment): SegmentSnapshot {
    return {
      documentId: segment.documentId,
      index: segment.index,
      text: segment.text,
      ...(segment.id !== undefined ? { id: segment.id } : {}),
      ...(segment.pageRef !== undefined ? { pageRef: segment.pageRef } : {}),
      ...(segment.metadata !== undefined ? { metadata: { ...segment.metadata } } : {}),
    };
  }

  private async readFile(file: string): Promise<string | null> {
    try {
      return await fs.readFile(file, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  private async writeAtomic(target: string, contents: string): Promise<void> {
    const temp = `${target}.${process.pid}.${uuidv4()}.tmp`;
    try {
      await fs.writeFile(temp, contents, 'utf-8');
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn('Could not remove temporary ledger file', {
          file: temp,
          error: describeError(cleanupError),
        });
      });
      throw error;
    }
  }
}
