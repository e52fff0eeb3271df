/**
 * graphfeed ingest service
 * Loads normalized documents into a knowledge-graph store as episodes
 */

import { IngestionRunSummary } from './types';
import { loadIngestionConfig, LoadIngestionConfigOptions } from './config';
import { IngestionPipeline, PipelineDependencies } from './ingestion/ingestion-pipeline';

export * from './types';
export * from './config';
export { chunk, ChunkingEngine } from './chunking/chunking-engine';
export { SlidingWindowStrategy } from './chunking/sliding-window-strategy';
export { ChunkingStrategy } from './chunking/base-strategy';
export { whitespaceTokenCounter } from './chunking/token-counter';
export {
  EpisodeBuilder,
  segmentEpisodeName,
  metadataEpisodeName,
  METADATA_PREVIEW_CHARS,
} from './episodic/episode-builder';
export type { EpisodeBuilderOptions } from './episodic/episode-builder';
export { supportsBulkLoad } from './episodic/graph-loader';
export type {
  GraphLoader,
  SupportsBulkLoad,
  SingleEpisodeClient,
  BulkEpisodeClient,
  GraphLoaderClient,
} from './episodic/graph-loader';
export {
  HttpGraphLoader,
  HttpBulkGraphLoader,
  createHttpGraphLoader,
} from './episodic/http-graph-loader';
export type { EpisodePayload, HttpGraphLoaderOptions } from './episodic/http-graph-loader';
export {
  FailureRecorder,
  segmentFailureReason,
  metadataFailureReason,
  bulkFailureReason,
  METADATA_FAILURE_KEY,
  BULK_FAILURE_KEY,
} from './ingestion/failure-recorder';
export { IngestionContext } from './ingestion/ingestion-context';
export type { IngestionContextOptions, IngestionContextDependencies } from './ingestion/ingestion-context';
export { EpisodeLoader } from './ingestion/episode-loader';
export type { EpisodeLoaderOptions } from './ingestion/episode-loader';
export { DocumentMapper, documentIdFor, normalizedDocumentSchema } from './ingestion/document-mapper';
export type { MappedDocument, NormalizedDocument } from './ingestion/document-mapper';
export { IngestionPipeline, NORMALIZED_SUFFIX, MAPPED_OUTPUT_DIR } from './ingestion/ingestion-pipeline';
export type { IngestionPipelineOptions, PipelineDependencies } from './ingestion/ingestion-pipeline';
export { IngestionMetrics } from './metrics/ingestion-metrics';
export type { MetricsSnapshot, FailureStage } from './metrics/ingestion-metrics';
export { logger } from './utils/logger';

/**
 * Load configuration from the environment and ingest every normalized file
 * in the configured input directory
 */
export async function runIngestion(
  options: LoadIngestionConfigOptions & PipelineDependencies = {}
): Promise<IngestionRunSummary> {
  const { source, envFilePath, ...deps } = options;
  const config = await loadIngestionConfig({ source, envFilePath });
  return IngestionPipeline.fromConfig(config, deps).run();
}
