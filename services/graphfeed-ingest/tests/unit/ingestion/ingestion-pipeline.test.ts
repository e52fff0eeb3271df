/**
 * Ingestion Pipeline - Unit Tests
 */

import { promises as fs } from 'fs';
import path from 'path';
import { runIngestion } from '../../../src';
import { loadIngestionConfig } from '../../../src/config';
import { SingleEpisodeClient } from '../../../src/episodic/graph-loader';
import { IngestionPipeline } from '../../../src/ingestion/ingestion-pipeline';
import { Episode } from '../../../src/types';
import { makeTempDir, nextTick, removeDir } from '../../helpers/test-helpers';

describe('IngestionPipeline', () => {
  let workDir: string;
  let inputDir: string;
  let failedDir: string;
  let source: Record<string, string>;

  const sleep = async (): Promise<void> => undefined;

  beforeEach(async () => {
    workDir = await makeTempDir('graphfeed-pipeline-');
    inputDir = path.join(workDir, 'normalized');
    failedDir = path.join(workDir, 'failed');
    await fs.mkdir(inputDir);

    const write = (name: string, contents: unknown) =>
      fs.writeFile(
        path.join(inputDir, name),
        typeof contents === 'string' ? contents : JSON.stringify(contents),
        'utf-8'
      );

    await write('a.normalized.json', { metadata: { id: 'doc-a', filename: 'a.pdf' }, chunks: ['alpha', 'beta'] });
    await write('b.normalized.json', { metadata: { id: 'doc-b' }, segments: [{ text: 'one' }] });
    await write('broken.normalized.json', '{oops');
    await write('c.mapped.normalized.json', { metadata: { id: 'doc-c' }, chunks: ['never'] });
    await write('notes.txt', 'not an input');

    source = { INGEST_INPUT_DIR: inputDir, INGEST_FAILED_DIR: failedDir };
  });

  afterEach(async () => {
    await removeDir(workDir);
  });

  function client(impl: (episode: Episode) => Promise<void> = async () => undefined): {
    client: SingleEpisodeClient;
    load: jest.Mock<Promise<void>, [Episode]>;
  } {
    const load = jest.fn(impl);
    return { client: { kind: 'single', load }, load };
  }

  async function pipeline(extra: Record<string, string> = {}, loader = client().client): Promise<IngestionPipeline> {
    const config = await loadIngestionConfig({ source: { ...source, ...extra } });
    return IngestionPipeline.fromConfig(config, { client: loader, sleep });
  }

  it('should discover normalized inputs in name order', async () => {
    await expect((await pipeline()).discover()).resolves.toEqual([
      'a.normalized.json',
      'b.normalized.json',
      'broken.normalized.json',
    ]);
  });

  it('should load every readable document and skip the rest', async () => {
    const { client: loader, load } = client();

    const summary = await (await pipeline({}, loader)).run();

    expect(summary).toMatchObject({ documents: 2, succeeded: 3, failed: 0, total: 3 });
    expect(summary.reports.map((report) => report.documentId)).toEqual(['doc-a', 'doc-b']);
    expect(summary.skippedFiles).toEqual([{ file: 'broken.normalized.json', reason: expect.any(String) }]);
    expect(load.mock.calls.map(([episode]) => episode.name)).toEqual([
      'document_meta_doc-a',
      'doc-a_segment_0',
      'doc-a_segment_1',
      'document_meta_doc-b',
      'doc-b_segment_0',
    ]);
  });

  it('should total failures and leave a ledger per failing document', async () => {
    const { client: loader } = client(async (episode) => {
      if (episode.name === 'doc-a_segment_1') {
        throw new Error('rejected by graph store');
      }
    });

    const summary = await (await pipeline({}, loader)).run();

    expect(summary).toMatchObject({ succeeded: 2, failed: 1, total: 3 });
    expect(await fs.readdir(failedDir)).toEqual(['doc-a.failed.json']);
  });

  it('should write mapped outputs when enabled', async () => {
    await (await pipeline({ INGEST_WRITE_MAPPED: 'true' })).run();

    const outputDir = path.join(inputDir, 'mapped_outputs');
    expect((await fs.readdir(outputDir)).sort()).toEqual([
      'a.document.json',
      'a.segments.json',
      'b.document.json',
      'b.segments.json',
    ]);
    const segments = JSON.parse(await fs.readFile(path.join(outputDir, 'a.segments.json'), 'utf-8'));
    expect(segments).toHaveLength(2);
  });

  it('should keep the call limit across concurrently processed documents', async () => {
    let active = 0;
    let peak = 0;
    const { client: loader } = client(async () => {
      active++;
      peak = Math.max(peak, active);
      await nextTick();
      active--;
    });

    const summary = await (
      await pipeline({ INGEST_DOCUMENT_CONCURRENCY: '2', INGEST_CONCURRENCY_LIMIT: '1' }, loader)
    ).run();

    expect(peak).toBe(1);
    expect(summary.reports.map((report) => report.documentId)).toEqual(['doc-a', 'doc-b']);
  });

  it('should report nothing for an empty input directory', async () => {
    const emptyDir = path.join(workDir, 'empty');
    await fs.mkdir(emptyDir);

    const summary = await (await pipeline({ INGEST_INPUT_DIR: emptyDir })).run();

    expect(summary).toEqual({ documents: 0, succeeded: 0, failed: 0, total: 0, skippedFiles: [], reports: [] });
  });
});

describe('runIngestion', () => {
  it('should load configuration and run the pipeline', async () => {
    const workDir = await makeTempDir('graphfeed-run-');
    try {
      await fs.writeFile(
        path.join(workDir, 'x.normalized.json'),
        JSON.stringify({ metadata: { id: 'doc-x' }, chunks: ['only chunk'] }),
        'utf-8'
      );
      const load = jest.fn(async (_episode: Episode): Promise<void> => undefined);

      const summary = await runIngestion({
        source: { INGEST_INPUT_DIR: workDir, INGEST_FAILED_DIR: path.join(workDir, 'failed') },
        client: { kind: 'single', load },
        sleep: async () => undefined,
      });

      expect(summary).toMatchObject({ documents: 1, succeeded: 1, failed: 0, total: 1 });
      expect(load).toHaveBeenCalledTimes(2);
    } finally {
      await removeDir(workDir);
    }
  });
});
