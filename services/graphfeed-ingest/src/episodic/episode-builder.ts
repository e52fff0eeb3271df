import { Document, Episode, EpisodeFormat, Segment } from '../types';

export const METADATA_PREVIEW_CHARS = 2000;

export interface EpisodeBuilderOptions {
  format?: EpisodeFormat;
  /** Reference time source, ingestion time by default */
  clock?: () => Date;
}

export function segmentEpisodeName(documentId: string, index: number): string {
  return `${documentId}_segment_${index}`;
}

export function metadataEpisodeName(documentId: string): string {
  return `document_meta_${documentId}`;
}

/**
 * Derives Episodes from a Document and its Segments. Names depend only on the
 * document id and segment index, so a retried load reuses the same name.
 */
export class EpisodeBuilder {
  private readonly format: EpisodeFormat;
  private readonly clock: () => Date;

  constructor(options: EpisodeBuilderOptions = {}) {
    this.format = options.format ?? 'text';
    this.clock = options.clock ?? (() => new Date());
  }

  buildMetadataEpisode(document: Document): Episode {
    const preview = document.fullText.slice(0, METADATA_PREVIEW_CHARS);

    const body = this.format === 'structured'
      ? JSON.stringify({
          documentId: document.id,
          title: document.title,
          sourceFile: document.sourceFile,
          pages: document.pageCount,
          preview,
        })
      : [
          'DOCUMENT METADATA:',
          `Title: ${document.title ?? 'unknown'}`,
          `Source File: ${document.sourceFile ?? 'unknown'}`,
          `Pages: ${document.pageCount ?? 'unknown'}`,
          '',
          `Full text (first ${METADATA_PREVIEW_CHARS} chars):`,
          preview,
        ].join('\n');

    return {
      name: metadataEpisodeName(document.id),
      body,
      sourceKind: this.format,
      description: `document metadata ${document.sourceFile ?? document.id}`,
      referenceTime: this.clock(),
    };
  }

  buildSegmentEpisode(document: Document, segment: Segment): Episode {
    const body = this.format === 'structured'
      ? JSON.stringify({
          documentId: document.id,
          index: segment.index,
          text: segment.text,
          page: segment.pageRef ?? null,
          blockType: segment.metadata?.blockType ?? null,
        })
      : segment.text;

    return {
      name: segmentEpisodeName(document.id, segment.index),
      body,
      sourceKind: this.format,
      description: `${document.sourceFile ?? document.id} chunk ${segment.index}`,
      referenceTime: this.clock(),
    };
  }

  buildSegmentEpisodes(document: Document, segments: readonly Segment[]): Episode[] {
    return segments.map((segment) => this.buildSegmentEpisode(document, segment));
  }
}
