import { ValidationError } from '@graphfeed/errors';
import { BoundaryMode, ChunkingOptions, ChunkUnit, TextWindow, TokenCounter } from '../types';
import { whitespaceTokenCounter } from './token-counter';

export const DEFAULT_LOOKAHEAD_CHARS = 200;
export const DEFAULT_LOOKBACK_CHARS = 40;

/**
 * Options after defaults are applied and a fractional overlap is made absolute
 */
export interface ResolvedChunkingOptions {
  targetSize: number;
  overlap: number;
  boundaryMode: BoundaryMode;
  unit: ChunkUnit;
  tokenCounter: TokenCounter;
  lookaheadChars: number;
  lookbackChars: number;
  minSize: number;
}

export abstract class ChunkingStrategy {
  abstract chunk(text: string, options: ChunkingOptions): TextWindow[];

  protected resolveOptions(options: ChunkingOptions): ResolvedChunkingOptions {
    const { targetSize, overlap } = options;

    if (!Number.isInteger(targetSize) || targetSize < 1) {
      throw new ValidationError(`targetSize must be a positive integer, got ${targetSize}`, { targetSize });
    }
    if (!Number.isFinite(overlap) || overlap < 0) {
      throw new ValidationError(`overlap must be a non-negative number, got ${overlap}`, { overlap });
    }

    const minSize = options.minSize ?? Math.max(1, Math.floor(targetSize / 4));
    if (!Number.isInteger(minSize) || minSize < 1) {
      throw new ValidationError(`minSize must be a positive integer, got ${minSize}`, { minSize });
    }

    return {
      targetSize,
      // (0, 1) is a share of the target size
      overlap: overlap > 0 && overlap < 1 ? Math.floor(overlap * targetSize) : Math.floor(overlap),
      boundaryMode: options.boundaryMode,
      unit: options.unit ?? 'characters',
      tokenCounter: options.tokenCounter ?? whitespaceTokenCounter,
      lookaheadChars: options.lookaheadChars ?? DEFAULT_LOOKAHEAD_CHARS,
      lookbackChars: options.lookbackChars ?? DEFAULT_LOOKBACK_CHARS,
      minSize: Math.min(minSize, targetSize),
    };
  }

  protected createWindow(text: string, start: number, end: number): TextWindow {
    return { text: text.slice(start, end), start, end };
  }
}
