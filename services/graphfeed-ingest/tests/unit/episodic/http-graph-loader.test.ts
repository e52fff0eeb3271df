/**
 * HTTP Graph Loader - Unit Tests
 *
 * Requests are answered by an in-process axios adapter, nothing leaves the process.
 */

import { AxiosAdapter, AxiosError, InternalAxiosRequestConfig } from 'axios';
import {
  ExternalAPIError,
  InternalServerError,
  RateLimitError,
  ValidationError,
} from '@graphfeed/errors';
import { defaultErrorClassifier } from '@graphfeed/resilience';
import { GraphLoaderSettings } from '../../../src/config';
import { supportsBulkLoad } from '../../../src/episodic/graph-loader';
import {
  HttpBulkGraphLoader,
  HttpGraphLoader,
  createHttpGraphLoader,
  parseRetryAfter,
} from '../../../src/episodic/http-graph-loader';
import { Episode } from '../../../src/types';
import { FIXED_NOW } from '../../helpers/test-helpers';

interface StubResponse {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
}

function stubAdapter(respond: (config: InternalAxiosRequestConfig) => StubResponse): {
  adapter: AxiosAdapter;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const response = respond(config);
    return {
      data: response.data ?? {},
      status: response.status,
      statusText: String(response.status),
      headers: response.headers ?? {},
      config,
    };
  };
  return { adapter, requests };
}

function bodyOf(config: InternalAxiosRequestConfig): unknown {
  return typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
}

const settings: GraphLoaderSettings = {
  url: 'http://graph.test/',
  apiKey: 'test-secret',
  timeoutMs: 5000,
  bulk: false,
  groupId: 'group-a',
};

const episode: Episode = {
  name: 'doc-1_segment_0',
  body: 'First clause.',
  sourceKind: 'text',
  description: 'notice.pdf chunk 0',
  referenceTime: FIXED_NOW,
};

describe('HttpGraphLoader', () => {
  it('should post one episode with the wire field names', async () => {
    const { adapter, requests } = stubAdapter(() => ({ status: 202 }));
    const loader = new HttpGraphLoader(settings, { adapter });

    await loader.load(episode);

    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe('post');
    expect(requests[0].baseURL).toBe('http://graph.test');
    expect(requests[0].url).toBe('/episodes');
    expect(requests[0].timeout).toBe(5000);
    expect(requests[0].headers.get('Authorization')).toBe('Bearer test-secret');
    expect(bodyOf(requests[0])).toEqual({
      name: 'doc-1_segment_0',
      episode_body: 'First clause.',
      source: 'text',
      source_description: 'notice.pdf chunk 0',
      reference_time: '2024-05-01T10:00:00.000Z',
      group_id: 'group-a',
    });
  });

  it('should send structured episodes as json and omit an unset group', async () => {
    const { adapter, requests } = stubAdapter(() => ({ status: 200 }));
    const loader = new HttpGraphLoader({ ...settings, apiKey: undefined, groupId: undefined }, { adapter });

    await loader.load({ ...episode, sourceKind: 'structured', body: '{"index":0}' });

    expect(requests[0].headers.get('Authorization')).toBeUndefined();
    expect(bodyOf(requests[0])).toEqual({
      name: 'doc-1_segment_0',
      episode_body: '{"index":0}',
      source: 'json',
      source_description: 'notice.pdf chunk 0',
      reference_time: '2024-05-01T10:00:00.000Z',
    });
  });

  // ==========================================================================
  // Failure mapping
  // ==========================================================================

  describe('failures', () => {
    it('should turn 429 into a retryable RateLimitError', async () => {
      const { adapter } = stubAdapter(() => ({
        status: 429,
        data: { detail: 'slow down' },
        headers: { 'retry-after': '3' },
      }));
      const loader = new HttpGraphLoader(settings, { adapter });

      const error = await loader.load(episode).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RateLimitError);
      expect(error).toMatchObject({
        message: 'slow down',
        retryAfter: 3000,
        statusCode: 429,
        context: { service: 'graph-loader', operation: 'load', status: 429 },
      });
      expect(defaultErrorClassifier(error)).toBe('retryable');
    });

    it('should turn a server error into a fatal InternalServerError', async () => {
      const { adapter } = stubAdapter(() => ({ status: 500, data: { message: 'graph store unavailable' } }));
      const loader = new HttpGraphLoader(settings, { adapter });

      const error = await loader.load(episode).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(InternalServerError);
      expect(error).toMatchObject({ message: 'graph store unavailable' });
      expect(defaultErrorClassifier(error)).toBe('fatal');
    });

    it('should turn a rejected payload into a ValidationError', async () => {
      const { adapter } = stubAdapter(() => ({ status: 400, data: 'episode_body is required' }));
      const loader = new HttpGraphLoader(settings, { adapter });

      await expect(loader.load(episode)).rejects.toThrow(ValidationError);
    });

    it('should describe a status without a message body', async () => {
      const { adapter } = stubAdapter(() => ({ status: 502, data: {} }));
      const loader = new HttpGraphLoader(settings, { adapter });

      await expect(loader.load(episode)).rejects.toThrow('Graph Loader responded with status 502');
    });

    it('should wrap transport errors and keep their code', async () => {
      const adapter: AxiosAdapter = async () => {
        throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED');
      };
      const loader = new HttpGraphLoader(settings, { adapter });

      const error = await loader.load(episode).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ExternalAPIError);
      expect(error).toMatchObject({
        message: 'External API error: graph-loader load - connect ECONNREFUSED',
        context: { code: 'ECONNREFUSED', service: 'graph-loader', operation: 'load' },
      });
    });
  });
});

describe('HttpBulkGraphLoader', () => {
  it('should post every episode in one request', async () => {
    const { adapter, requests } = stubAdapter(() => ({ status: 200 }));
    const loader = new HttpBulkGraphLoader(settings, { adapter });

    await loader.loadBulk([episode, { ...episode, name: 'doc-1_segment_1', description: 'notice.pdf chunk 1' }]);

    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('/episodes/bulk');
    expect(bodyOf(requests[0])).toEqual({
      episodes: [
        expect.objectContaining({ name: 'doc-1_segment_0', source_description: 'notice.pdf chunk 0' }),
        expect.objectContaining({ name: 'doc-1_segment_1', source_description: 'notice.pdf chunk 1' }),
      ],
    });
  });

  it('should report bulk failures under the loadBulk operation', async () => {
    const { adapter } = stubAdapter(() => ({ status: 503, data: { error: 'bulk disabled' } }));
    const loader = new HttpBulkGraphLoader(settings, { adapter });

    await expect(loader.loadBulk([episode])).rejects.toMatchObject({
      message: 'bulk disabled',
      context: { operation: 'loadBulk', status: 503 },
    });
  });
});

describe('createHttpGraphLoader', () => {
  it('should declare the bulk capability only when configured', () => {
    expect(supportsBulkLoad(createHttpGraphLoader(settings))).toBe(false);
    expect(supportsBulkLoad(createHttpGraphLoader({ ...settings, bulk: true }))).toBe(true);
  });
});

describe('parseRetryAfter', () => {
  it('should convert seconds to milliseconds and default otherwise', () => {
    expect(parseRetryAfter('3')).toBe(3000);
    expect(parseRetryAfter(0)).toBe(0);
    expect(parseRetryAfter('soon')).toBe(60000);
    expect(parseRetryAfter(undefined)).toBe(60000);
  });
});
