export type ChunkUnit = 'characters' | 'tokens';

export type BoundaryMode = 'sentence' | 'word' | 'none';

export type EpisodeSourceKind = 'text' | 'structured';

export type EpisodeFormat = EpisodeSourceKind;

export type TokenCounter = (text: string) => number;

export interface Document {
  readonly id: string;
  readonly title: string | null;
  readonly fullText: string;
  readonly sourceFile: string | null;
  readonly pageCount: number | null;
  readonly metadata: DocumentProvenance;
}

export interface DocumentProvenance {
  normalizedAt: string | null;
  originalFilename: string | null;
  hasSegments: boolean;
  hasChunks: boolean;
  [key: string]: unknown;
}

export interface SegmentMetadata {
  sourceFile?: string | null;
  blockType?: string | null;
  format?: string | null;
  /** Character offsets into Document.fullText, set when produced by the chunker */
  start?: number;
  end?: number;
}

export interface Segment {
  readonly documentId: string;
  /** 0-based, contiguous, defines delivery order */
  readonly index: number;
  readonly text: string;
  readonly id?: string;
  readonly pageRef?: number | null;
  readonly metadata?: SegmentMetadata;
}

/**
 * Window produced by the chunker, `text === input.slice(start, end)`
 */
export interface TextWindow {
  text: string;
  start: number;
  end: number;
}

export interface ChunkingOptions {
  targetSize: number;
  /** Absolute units, or a fraction of targetSize when in (0, 1) */
  overlap: number;
  boundaryMode: BoundaryMode;
  unit?: ChunkUnit;
  tokenCounter?: TokenCounter;
  lookaheadChars?: number;
  lookbackChars?: number;
  minSize?: number;
}

export interface Episode {
  name: string;
  body: string;
  sourceKind: EpisodeSourceKind;
  description: string;
  referenceTime: Date;
}

export interface SegmentSnapshot {
  documentId: string;
  index: number;
  text: string;
  id?: string;
  pageRef?: number | null;
  metadata?: SegmentMetadata;
}

export interface FailureEntry {
  reason: string;
  failedSegment: SegmentSnapshot | null;
  timestamp: string;
}

export interface FailureRecord {
  documentId: string;
  failedSegments: Record<string, FailureEntry[]>;
  updatedAt: string;
}

export type LoadPath = 'bulk' | 'sequential' | 'empty';

export interface DocumentLoadReport {
  documentId: string;
  succeeded: number;
  failed: number;
  total: number;
  path: LoadPath;
  metadataLoaded: boolean;
  circuitBreakerPauses: number;
  durationMs: number;
}

export interface SkippedFile {
  file: string;
  reason: string;
}

export interface IngestionRunSummary {
  documents: number;
  succeeded: number;
  failed: number;
  total: number;
  skippedFiles: SkippedFile[];
  reports: DocumentLoadReport[];
}
