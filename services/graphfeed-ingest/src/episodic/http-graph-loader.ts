/**
 * HTTP Graph Loader
 * axios client for the Graph Loader service. Every failure surfaces as an
 * AppError so the retry classifier sees structured status and code fields.
 */

import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import {
  AppError,
  DEFAULT_RETRY_AFTER_MS,
  ExternalAPIError,
  RateLimitError,
  describeError,
  errorFromStatus,
} from '@graphfeed/errors';
import { GraphLoaderSettings } from '../config';
import { Episode } from '../types';
import { BulkEpisodeClient, GraphLoaderClient, SingleEpisodeClient } from './graph-loader';

const SERVICE_NAME = 'graph-loader';

export interface EpisodePayload {
  name: string;
  episode_body: string;
  source: 'text' | 'json';
  source_description: string;
  reference_time: string;
  group_id?: string;
}

export interface HttpGraphLoaderOptions {
  /** Replaces the default http adapter, used by tests */
  adapter?: AxiosAdapter;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Milliseconds from a Retry-After header given in seconds
 */
export function parseRetryAfter(value: unknown): number {
  const seconds = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : DEFAULT_RETRY_AFTER_MS;
}

function responseMessage(response: AxiosResponse<unknown>): string {
  const data = response.data;
  if (typeof data === 'string' && data.length > 0) {
    return data;
  }
  if (isRecord(data)) {
    for (const key of ['detail', 'message', 'error']) {
      const value = data[key];
      if (typeof value === 'string') {
        return value;
      }
    }
  }
  return `Graph Loader responded with status ${response.status}`;
}

abstract class HttpGraphLoaderBase {
  protected readonly http: AxiosInstance;
  protected readonly groupId?: string;

  constructor(settings: GraphLoaderSettings, options: HttpGraphLoaderOptions = {}) {
    this.groupId = settings.groupId;
    this.http = axios.create({
      baseURL: settings.url.replace(/\/+$/, ''),
      timeout: settings.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        ...(settings.apiKey ? { Authorization: `Bearer ${settings.apiKey}` } : {}),
      },
      // statuses are mapped onto AppErrors below
      validateStatus: () => true,
      adapter: options.adapter,
    });
  }

  async load(episode: Episode): Promise<void> {
    await this.post('/episodes', this.toPayload(episode), 'load');
  }

  protected toPayload(episode: Episode): EpisodePayload {
    return {
      name: episode.name,
      episode_body: episode.body,
      source: episode.sourceKind === 'structured' ? 'json' : 'text',
      source_description: episode.description,
      reference_time: episode.referenceTime.toISOString(),
      ...(this.groupId ? { group_id: this.groupId } : {}),
    };
  }

  protected async post(path: string, body: unknown, operation: string): Promise<void> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(path, body);
    } catch (error) {
      throw this.transportError(error, operation);
    }

    if (response.status >= 200 && response.status < 300) {
      return;
    }

    throw this.statusError(response, operation);
  }

  private statusError(response: AxiosResponse<unknown>, operation: string): AppError {
    const message = responseMessage(response);
    const context = { service: SERVICE_NAME, operation, status: response.status };

    if (response.status === 429) {
      const retryAfterHeader: unknown = response.headers['retry-after'];
      return new RateLimitError(message, parseRetryAfter(retryAfterHeader), context);
    }

    return errorFromStatus(response.status, message, context);
  }

  private transportError(error: unknown, operation: string): ExternalAPIError {
    if (axios.isAxiosError(error)) {
      return new ExternalAPIError(SERVICE_NAME, operation, error, { code: error.code });
    }
    const cause = error instanceof Error ? error : new Error(describeError(error));
    return new ExternalAPIError(SERVICE_NAME, operation, cause);
  }
}

/**
 * Client for Graph Loader deployments with the single-episode endpoint only
 */
export class HttpGraphLoader extends HttpGraphLoaderBase implements SingleEpisodeClient {
  readonly kind = 'single' as const;
}

/**
 * Client for deployments that also expose `POST /episodes/bulk`
 */
export class HttpBulkGraphLoader extends HttpGraphLoaderBase implements BulkEpisodeClient {
  readonly kind = 'bulk' as const;

  async loadBulk(episodes: Episode[]): Promise<void> {
    await this.post(
      '/episodes/bulk',
      { episodes: episodes.map((episode) => this.toPayload(episode)) },
      'loadBulk'
    );
  }
}

export function createHttpGraphLoader(
  settings: GraphLoaderSettings,
  options?: HttpGraphLoaderOptions
): GraphLoaderClient {
  return settings.bulk ? new HttpBulkGraphLoader(settings, options) : new HttpGraphLoader(settings, options);
}
