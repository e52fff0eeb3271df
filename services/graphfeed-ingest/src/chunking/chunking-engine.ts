import { BoundaryMode, ChunkingOptions, Document, Segment, TextWindow, TokenCounter } from '../types';
import { ChunkingSettings } from '../config';
import { logger } from '../utils/logger';
import { SlidingWindowStrategy } from './sliding-window-strategy';

const strategy = new SlidingWindowStrategy();

/**
 * Split text into ordered, bounded, possibly overlapping windows.
 * Deterministic: the same input and options give the same windows.
 */
export function chunk(
  text: string,
  targetSize: number,
  overlap: number,
  boundaryMode: BoundaryMode,
  options: Omit<ChunkingOptions, 'targetSize' | 'overlap' | 'boundaryMode'> = {}
): TextWindow[] {
  return strategy.chunk(text, { ...options, targetSize, overlap, boundaryMode });
}

export class ChunkingEngine {
  private readonly options: ChunkingOptions;

  constructor(settings: ChunkingSettings, tokenCounter?: TokenCounter) {
    this.options = {
      targetSize: settings.targetSize,
      overlap: settings.overlap,
      boundaryMode: settings.boundaryMode,
      unit: settings.unit,
      lookaheadChars: settings.lookaheadChars,
      lookbackChars: settings.lookbackChars,
      minSize: settings.minSize,
      tokenCounter,
    };
  }

  /**
   * Segments for a document without structured segments or precomputed chunks.
   * Whitespace-only windows are dropped and the rest re-indexed from 0.
   */
  chunkDocument(document: Document): Segment[] {
    const startTime = Date.now();
    const windows = strategy.chunk(document.fullText, this.options);

    const segments = windows
      .filter((window) => window.text.trim().length > 0)
      .map((window, index): Segment => ({
        documentId: document.id,
        index,
        text: window.text,
        metadata: {
          sourceFile: document.sourceFile,
          blockType: 'paragraph',
          start: window.start,
          end: window.end,
        },
      }));

    logger.debug('Document chunked', {
      documentId: document.id,
      unit: this.options.unit,
      targetSize: this.options.targetSize,
      segments: segments.length,
      processingTime: Date.now() - startTime,
    });

    return segments;
  }
}
