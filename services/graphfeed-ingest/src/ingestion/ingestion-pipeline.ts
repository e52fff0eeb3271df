/**
 * Ingestion Pipeline
 *
 * Discovers `*.normalized.json` files, maps each one to a Document and its
 * Segments, and runs the Episode Loader over them. Documents go one at a time
 * unless `documentConcurrency` allows more; all of them share one
 * IngestionContext, so the Graph Loader call bound holds across documents.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { describeError } from '@graphfeed/errors';
import { Logger } from '@graphfeed/logger';
import { ChunkingEngine } from '../chunking/chunking-engine';
import { IngestionConfig } from '../config';
import { EpisodeBuilder } from '../episodic/episode-builder';
import { GraphLoaderClient } from '../episodic/graph-loader';
import { createHttpGraphLoader } from '../episodic/http-graph-loader';
import { DocumentLoadReport, IngestionRunSummary, SkippedFile, TokenCounter } from '../types';
import { DocumentMapper, MappedDocument } from './document-mapper';
import { EpisodeLoader } from './episode-loader';
import { IngestionContext, IngestionContextDependencies } from './ingestion-context';

export const NORMALIZED_SUFFIX = '.normalized.json';
export const MAPPED_OUTPUT_DIR = 'mapped_outputs';

export interface IngestionPipelineOptions {
  context: IngestionContext;
  loader: EpisodeLoader;
  mapper: DocumentMapper;
  inputDir: string;
  writeMappedOutputs?: boolean;
  documentConcurrency?: number;
}

export interface PipelineDependencies extends IngestionContextDependencies {
  /** Graph Loader client, the HTTP client from configuration by default */
  client?: GraphLoaderClient;
  tokenCounter?: TokenCounter;
  clock?: () => Date;
}

type FileOutcome =
  | { status: 'loaded'; report: DocumentLoadReport }
  | { status: 'skipped'; skipped: SkippedFile };

export class IngestionPipeline {
  private readonly context: IngestionContext;
  private readonly loader: EpisodeLoader;
  private readonly mapper: DocumentMapper;
  private readonly inputDir: string;
  private readonly writeMappedOutputs: boolean;
  private readonly documentConcurrency: number;
  private readonly logger: Logger;

  constructor(options: IngestionPipelineOptions) {
    this.context = options.context;
    this.loader = options.loader;
    this.mapper = options.mapper;
    this.inputDir = options.inputDir;
    this.writeMappedOutputs = options.writeMappedOutputs ?? false;
    this.documentConcurrency = Math.max(1, options.documentConcurrency ?? 1);
    this.logger = options.context.logger.child({ component: 'ingestion-pipeline' });
  }

  static fromConfig(config: IngestionConfig, deps: PipelineDependencies = {}): IngestionPipeline {
    const context = IngestionContext.fromConfig(config, deps);
    const client = deps.client ?? createHttpGraphLoader(config.graphLoader);

    return new IngestionPipeline({
      context,
      loader: new EpisodeLoader({
        client,
        context,
        builder: new EpisodeBuilder({ format: config.episodeFormat, clock: deps.clock }),
        bulkMode: config.bulkMode,
      }),
      mapper: new DocumentMapper(new ChunkingEngine(config.chunking, deps.tokenCounter)),
      inputDir: config.inputDir,
      writeMappedOutputs: config.writeMappedOutputs,
      documentConcurrency: config.documentConcurrency,
    });
  }

  /**
   * Normalized input files in name order. Mapped outputs are never picked up.
   */
  async discover(): Promise<string[]> {
    const entries = await fs.readdir(this.inputDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .filter((name) => name.endsWith(NORMALIZED_SUFFIX) && !name.includes('.mapped.'))
      .sort();
  }

  async run(): Promise<IngestionRunSummary> {
    const startTime = Date.now();
    const files = await this.discover();

    this.logger.info('Ingestion run started', {
      inputDir: this.inputDir,
      files: files.length,
      documentConcurrency: this.documentConcurrency,
    });

    const outcomes: FileOutcome[] = [];
    let nextIndex = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < files.length) {
        const index = nextIndex++;
        outcomes[index] = await this.ingestFile(files[index]);
      }
    };

    await Promise.all(
      Array.from({ length: Math.min(this.documentConcurrency, files.length) }, () => worker())
    );

    const reports: DocumentLoadReport[] = [];
    const skippedFiles: SkippedFile[] = [];
    for (const outcome of outcomes) {
      if (outcome.status === 'loaded') {
        reports.push(outcome.report);
      } else {
        skippedFiles.push(outcome.skipped);
      }
    }

    const summary: IngestionRunSummary = {
      documents: reports.length,
      succeeded: reports.reduce((sum, report) => sum + report.succeeded, 0),
      failed: reports.reduce((sum, report) => sum + report.failed, 0),
      total: reports.reduce((sum, report) => sum + report.total, 0),
      skippedFiles,
      reports,
    };

    this.logger.info('Ingestion run finished', {
      documents: summary.documents,
      succeeded: summary.succeeded,
      failed: summary.failed,
      total: summary.total,
      skipped: skippedFiles.length,
      durationMs: Date.now() - startTime,
    });

    return summary;
  }

  private async ingestFile(file: string): Promise<FileOutcome> {
    this.context.signal?.throwIfAborted();

    let mapped: MappedDocument;
    try {
      const raw = await fs.readFile(path.join(this.inputDir, file), 'utf-8');
      mapped = this.mapper.map(JSON.parse(raw), file.slice(0, -NORMALIZED_SUFFIX.length));
    } catch (error) {
      const reason = describeError(error);
      this.logger.warn('Skipping unreadable normalized file', { file, reason });
      return { status: 'skipped', skipped: { file, reason } };
    }

    this.logger.info('Document mapped', {
      file,
      documentId: mapped.document.id,
      segments: mapped.segments.length,
      segmentSource: mapped.segmentSource,
    });

    if (this.writeMappedOutputs) {
      await this.writeMapped(file, mapped);
    }

    const report = await this.loader.loadDocument(mapped.document, mapped.segments);
    return { status: 'loaded', report };
  }

  private async writeMapped(file: string, mapped: MappedDocument): Promise<void> {
    const outputDir = path.join(this.inputDir, MAPPED_OUTPUT_DIR);
    const base = file.slice(0, -NORMALIZED_SUFFIX.length);

    try {
      await fs.mkdir(outputDir, { recursive: true });
      await fs.writeFile(
        path.join(outputDir, `${base}.document.json`),
        JSON.stringify(mapped.document, null, 2),
        'utf-8'
      );
      await fs.writeFile(
        path.join(outputDir, `${base}.segments.json`),
        JSON.stringify(mapped.segments, null, 2),
        'utf-8'
      );
    } catch (error) {
      // inspection output only, loading goes ahead
      this.logger.warn('Could not write mapped outputs', { file, error: describeError(error) });
    }
  }
}
