/**
 * Document Mapper
 * Turns one normalized-document JSON record into a Document and its ordered
 * Segments. Segment source preference: structured segments, then
 * precomputed chunks, then the chunker.
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import { ValidationError } from '@graphfeed/errors';
import { ChunkingEngine } from '../chunking/chunking-engine';
import { Document, Segment } from '../types';
import { logger } from '../utils/logger';

export const normalizedSegmentSchema = z.object({
  id: z.string().optional(),
  text: z.string().nullable().optional(),
  page: z.number().int().nullable().optional(),
  type: z.string().nullable().optional(),
  format: z.string().nullable().optional(),
});

export const normalizedDocumentSchema = z.object({
  metadata: z
    .object({
      id: z.string().min(1).optional(),
      title: z.string().nullable().optional(),
      filename: z.string().nullable().optional(),
      page_count: z.number().int().nonnegative().nullable().optional(),
      normalized_at: z.string().nullable().optional(),
    })
    .nullable()
    .optional(),
  normalized_text: z.string().nullable().optional(),
  full_text: z.string().nullable().optional(),
  segments: z.array(normalizedSegmentSchema).nullable().optional(),
  chunks: z.array(z.string().nullable()).nullable().optional(),
});

export type NormalizedDocument = z.infer<typeof normalizedDocumentSchema>;

export interface MappedDocument {
  document: Document;
  segments: Segment[];
  segmentSource: 'segments' | 'chunks' | 'chunker';
}

/**
 * Stable id for a source file name
 */
export function documentIdFor(filename: string): string {
  return createHash('sha256').update(filename).digest('hex');
}

export class DocumentMapper {
  constructor(private readonly chunkingEngine: ChunkingEngine) {}

  /**
   * Validate a parsed JSON record. `fallbackName` names the document when the
   * record carries neither an id nor a filename (usually the input file name).
   */
  map(record: unknown, fallbackName: string): MappedDocument {
    const parsed = normalizedDocumentSchema.safeParse(record);
    if (!parsed.success) {
      throw new ValidationError(`Invalid normalized document ${fallbackName}`, {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      });
    }

    const normalized = parsed.data;
    const meta: NonNullable<NormalizedDocument['metadata']> = normalized.metadata ?? {};
    const filename = meta.filename ?? null;
    const fullText = normalized.normalized_text ?? normalized.full_text ?? '';
    const rawSegments = normalized.segments ?? [];
    const rawChunks = normalized.chunks ?? [];

    const document: Document = {
      id: meta.id ?? documentIdFor(filename ?? fallbackName),
      title: meta.title ?? null,
      fullText,
      sourceFile: filename,
      pageCount: meta.page_count ?? null,
      metadata: {
        normalizedAt: meta.normalized_at ?? null,
        originalFilename: filename,
        hasSegments: rawSegments.length > 0,
        hasChunks: rawChunks.length > 0,
      },
    };

    if (rawSegments.length > 0) {
      // blank segments are dropped, indices stay contiguous
      const segments = rawSegments
        .map((segment) => ({ ...segment, text: (segment.text ?? '').trim() }))
        .filter((segment) => segment.text.length > 0)
        .map((segment, index): Segment => ({
          documentId: document.id,
          index,
          text: segment.text,
          ...(segment.id !== undefined ? { id: segment.id } : {}),
          pageRef: segment.page ?? null,
          metadata: {
            sourceFile: filename,
            blockType: segment.type ?? null,
            format: segment.format ?? null,
          },
        }));

      logger.debug('Mapped structured segments', { documentId: document.id, segments: segments.length });
      return { document, segments, segmentSource: 'segments' };
    }

    if (rawChunks.length > 0) {
      const segments = rawChunks
        .map((text) => (text ?? '').trim())
        .filter((text) => text.length > 0)
        .map((text, index): Segment => ({
          documentId: document.id,
          index,
          text,
          pageRef: null,
          metadata: { sourceFile: filename, blockType: 'paragraph' },
        }));

      logger.debug('Mapped precomputed chunks', { documentId: document.id, segments: segments.length });
      return { document, segments, segmentSource: 'chunks' };
    }

    return { document, segments: this.chunkingEngine.chunkDocument(document), segmentSource: 'chunker' };
  }
}
