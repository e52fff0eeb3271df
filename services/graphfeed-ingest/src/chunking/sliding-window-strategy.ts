import { ChunkingError } from '@graphfeed/errors';
import { ChunkingOptions, TextWindow } from '../types';
import { ChunkingStrategy, ResolvedChunkingOptions } from './base-strategy';

const SENTENCE_BREAK = /[.!?]+\s+|\n+/;
const WHITESPACE = /\s/;

function isSpace(text: string, index: number): boolean {
  return index >= 0 && index < text.length && WHITESPACE.test(text[index]);
}

/**
 * Sliding window chunker measured in characters or tokens.
 *
 * Every window is an exact slice of the input and consecutive windows overlap
 * by at most the configured overlap, so the input is recovered by dropping
 * each window's overlap with its predecessor.
 */
export class SlidingWindowStrategy extends ChunkingStrategy {
  chunk(text: string, options: ChunkingOptions): TextWindow[] {
    if (text.trim().length === 0) {
      return [];
    }

    const opts = this.resolveOptions(options);
    const length = text.length;
    const windows: TextWindow[] = [];

    const measure = (start: number, end: number): number =>
      opts.unit === 'characters' ? end - start : opts.tokenCounter(text.slice(start, end));

    // Largest end with measure(start, end) <= size, never less than start + 1
    const advance = (start: number, size: number): number => {
      if (opts.unit === 'characters') {
        return Math.min(length, start + size);
      }
      let lo = start + 1;
      let hi = length;
      while (lo < hi) {
        const mid = Math.ceil((lo + hi) / 2);
        if (measure(start, mid) <= size) {
          lo = mid;
        } else {
          hi = mid - 1;
        }
      }
      return lo;
    };

    // Smallest p >= floor with measure(p, end) <= size
    const retreat = (floor: number, end: number, size: number): number => {
      if (opts.unit === 'characters') {
        return Math.max(floor, end - size);
      }
      let lo = floor;
      let hi = end;
      while (lo < hi) {
        const mid = Math.floor((lo + hi) / 2);
        if (measure(mid, end) <= size) {
          hi = mid;
        } else {
          lo = mid + 1;
        }
      }
      return lo;
    };

    let start = 0;

    for (;;) {
      let end = advance(start, opts.targetSize);

      if (end < length) {
        end = this.adjustBoundary(text, start, end, opts);

        if (measure(start, end) < opts.minSize) {
          end = Math.max(end, advance(start, opts.minSize));
        }
        // a whitespace-only tail joins this window
        if (text.slice(end).trim().length === 0) {
          end = length;
        }
      }

      windows.push(this.createWindow(text, start, end));

      if (end >= length) {
        return windows;
      }

      let next = opts.overlap > 0 ? retreat(start, end, opts.overlap) : end;

      // start the overlap at a word, never inside one
      if (next > 0 && next < end && !isSpace(text, next - 1) && !isSpace(text, next)) {
        let p = next;
        while (p < end && !isSpace(text, p)) p++;
        while (p < end && isSpace(text, p)) p++;
        next = p;
      }

      if (next <= start) {
        next = end;
      }
      if (next <= start) {
        throw new ChunkingError('Chunker cannot advance past offset', { start, end, length });
      }

      start = next;
    }
  }

  /**
   * Move a cut that falls inside a sentence or word. Sentence mode extends to
   * the next terminator or newline within the lookahead, then falls back to
   * the last whitespace within the lookback; word mode only looks back.
   */
  private adjustBoundary(text: string, start: number, end: number, opts: ResolvedChunkingOptions): number {
    if (opts.boundaryMode === 'none') {
      return end;
    }

    if (opts.boundaryMode === 'sentence') {
      const sentenceEnd = this.findSentenceEnd(text, start, end, opts.lookaheadChars);
      if (sentenceEnd !== null) {
        return sentenceEnd;
      }
    }

    if (isSpace(text, end - 1) || isSpace(text, end)) {
      return end;
    }

    const floor = Math.max(start, end - opts.lookbackChars);
    for (let i = end - 1; i >= floor; i--) {
      if (isSpace(text, i) && i + 1 > start) {
        return i + 1;
      }
    }

    return end;
  }

  /**
   * End offset of the sentence break at or after `end`, null when the nearest
   * one lies beyond the lookahead
   */
  private findSentenceEnd(text: string, start: number, end: number, lookahead: number): number | null {
    const limit = Math.min(text.length, end + lookahead);
    const pattern = new RegExp(SENTENCE_BREAK.source, 'g');
    pattern.lastIndex = start;

    let match: RegExpExecArray | null;
    while ((match = pattern.exec(text)) !== null) {
      const matchEnd = match.index + match[0].length;
      if (matchEnd > limit) {
        return null;
      }
      if (matchEnd >= end) {
        return matchEnd;
      }
    }
    return null;
  }
}
