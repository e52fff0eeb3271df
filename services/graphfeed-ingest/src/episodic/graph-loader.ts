/**
 * Graph Loader client contracts.
 *
 * Bulk loading is a capability a client declares through its `kind`, so the
 * Episode Loader decides the load path once instead of probing per call.
 */

import { Episode } from '../types';

export interface GraphLoader {
  load(episode: Episode): Promise<void>;
}

export interface SupportsBulkLoad {
  /** All-or-nothing: rejection means no episode of the batch counts as loaded */
  loadBulk(episodes: Episode[]): Promise<void>;
}

export interface SingleEpisodeClient extends GraphLoader {
  readonly kind: 'single';
}

export interface BulkEpisodeClient extends GraphLoader, SupportsBulkLoad {
  readonly kind: 'bulk';
}

export type GraphLoaderClient = SingleEpisodeClient | BulkEpisodeClient;

export function supportsBulkLoad(client: GraphLoaderClient): client is BulkEpisodeClient {
  return client.kind === 'bulk';
}
