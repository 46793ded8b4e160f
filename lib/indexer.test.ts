import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { computeChunkHash } from './chunking';
import { EmbeddingServiceError } from './errors';
import { buildChunkMetadata, chunkId, Indexer, loadDocumentsConfig } from './indexer';
import { IndexManifestStore } from './manifest';
import { createTestRegistry, FakeEmbeddingClient } from './test-utils';
import { JsonVectorStore } from './vector-store';

const LAW_TEXT =
  'Artículo 7. Primer parrafo de la norma.\n\nSegundo parrafo sin marcador.\n\nTercer parrafo sin marcador.';

const AMENDED_LAW_TEXT = 'Artículo 8. Nueva redacción de la norma.\n\nOtro parrafo nuevo.';

describe('chunkId', () => {
  it('is stable for the same source and content', () => {
    expect(chunkId('codigo_transito', 'abc123abc123')).toBe(chunkId('codigo_transito', 'abc123abc123'));
  });

  it('differs between sources', () => {
    expect(chunkId('codigo_transito', 'abc123abc123')).not.toBe(chunkId('decreto_2106', 'abc123abc123'));
  });
});

describe('buildChunkMetadata', () => {
  it('describes unknown sources with defaults', () => {
    const [chunk] = buildChunkMetadata(
      [{ text: 'Texto libre', index: 0, hash: computeChunkHash('Texto libre') }],
      'desconocida',
      createTestRegistry(),
      undefined,
      '2024-01-01T00:00:00.000Z'
    );

    expect(chunk.metadata).toEqual({
      source: 'desconocida',
      sourceName: 'desconocida',
      sourceType: 'unknown',
      sourcePriority: 5,
      chunkIndex: 0,
      chunkHash: computeChunkHash('Texto libre'),
      filePath: undefined,
      indexedAt: '2024-01-01T00:00:00.000Z',
    });
  });
});

describe('Indexer', () => {
  let dir: string;
  let docPath: string;
  let embeddings: FakeEmbeddingClient;
  let store: JsonVectorStore;
  let manifest: IndexManifestStore;
  let indexer: Indexer;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'indexer-'));
    docPath = path.join(dir, 'codigo.txt');
    await fs.writeFile(docPath, LAW_TEXT, 'utf-8');

    embeddings = new FakeEmbeddingClient();
    store = new JsonVectorStore();
    manifest = new IndexManifestStore(path.join(dir, 'index_state.json'));
    indexer = new Indexer({
      registry: createTestRegistry(),
      embeddings,
      store,
      manifest,
      chunking: { chunkSize: 50, overlap: 0 },
    });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('indexes every chunk of a document', async () => {
    const outcome = await indexer.indexDocumentDetailed(docPath, 'codigo_transito');

    expect(outcome).toEqual({
      status: 'indexed',
      filePath: docPath,
      sourceId: 'codigo_transito',
      chunkCount: 3,
    });
    expect(await store.count({ source: 'codigo_transito' })).toBe(3);
  });

  it('propagates the article to following chunks without a marker', async () => {
    await indexer.indexDocument(docPath, 'codigo_transito');

    const records = (await store.get({ source: 'codigo_transito' })).sort(
      (a, b) => a.metadata.chunkIndex - b.metadata.chunkIndex
    );

    expect(records.map(r => r.text)).toEqual([
      'Artículo 7. Primer parrafo de la norma.',
      'Segundo parrafo sin marcador.',
      'Tercer parrafo sin marcador.',
    ]);
    expect(records.map(r => r.metadata.article)).toEqual(['Artículo 7', 'Artículo 7', 'Artículo 7']);
    expect(records[0].metadata).toMatchObject({
      sourceName: 'Ley 769 de 2002 (Código Nacional de Tránsito Terrestre)',
      sourceType: 'ley',
      sourcePriority: 1,
      filePath: docPath,
    });
  });

  it('skips an unchanged document and keeps the store intact', async () => {
    const first = await indexer.indexDocument(docPath, 'codigo_transito');
    const callsAfterFirst = embeddings.calls.length;

    const second = await indexer.indexDocumentDetailed(docPath, 'codigo_transito');

    expect(first).toBe(3);
    expect(second.status).toBe('skipped');
    expect(second.chunkCount).toBe(3);
    expect(await store.count()).toBe(3);
    expect(embeddings.calls).toHaveLength(callsAfterFirst);
  });

  it('skips an unchanged document for concurrent calls after a restart', async () => {
    await indexer.indexDocument(docPath, 'codigo_transito');
    const callsAfterFirst = embeddings.calls.length;
    const restarted = new Indexer({
      registry: createTestRegistry(),
      embeddings,
      store,
      manifest: new IndexManifestStore(path.join(dir, 'index_state.json')),
      chunking: { chunkSize: 50, overlap: 0 },
    });

    const outcomes = await Promise.all([
      restarted.indexDocumentDetailed(docPath, 'codigo_transito'),
      restarted.indexDocumentDetailed(docPath, 'codigo_transito'),
    ]);

    expect(outcomes.map(o => o.status)).toEqual(['skipped', 'skipped']);
    expect(embeddings.calls).toHaveLength(callsAfterFirst);
    expect(await store.count()).toBe(3);
  });

  it('replaces the chunks of a changed document', async () => {
    await indexer.indexDocument(docPath, 'codigo_transito');
    await fs.writeFile(docPath, AMENDED_LAW_TEXT, 'utf-8');

    const count = await indexer.indexDocument(docPath, 'codigo_transito');

    expect(count).toBe(2);
    expect(await store.count({ source: 'codigo_transito' })).toBe(2);
    const texts = (await store.get({ source: 'codigo_transito' })).map(r => r.text);
    expect(texts).not.toContain('Segundo parrafo sin marcador.');
  });

  it('reindexes unchanged content when forced', async () => {
    await indexer.indexDocument(docPath, 'codigo_transito');

    const outcome = await indexer.indexDocumentDetailed(docPath, 'codigo_transito', {
      forceReindex: true,
    });

    expect(outcome.status).toBe('indexed');
    expect(await store.count()).toBe(3);
  });

  it('records the document in the manifest file', async () => {
    await indexer.indexDocument(docPath, 'codigo_transito');

    const saved = JSON.parse(await fs.readFile(path.join(dir, 'index_state.json'), 'utf-8'));
    expect(saved.indexed_files[docPath]).toMatchObject({
      source_id: 'codigo_transito',
      chunk_count: 3,
    });
  });

  it('reports a missing file without touching the index', async () => {
    const missing = path.join(dir, 'no-existe.txt');

    const outcome = await indexer.indexDocumentDetailed(missing, 'codigo_transito');

    expect(outcome).toEqual({
      status: 'not_found',
      filePath: missing,
      sourceId: 'codigo_transito',
      chunkCount: 0,
    });
    expect(await indexer.indexDocument(missing, 'codigo_transito')).toBe(0);
    expect(await store.count()).toBe(0);
    expect((await manifest.snapshot()).indexed_files).toEqual({});
  });

  it('indexes an empty document as empty', async () => {
    const emptyPath = path.join(dir, 'vacio.txt');
    await fs.writeFile(emptyPath, '   \n', 'utf-8');

    const outcome = await indexer.indexDocumentDetailed(emptyPath, 'codigo_transito');

    expect(outcome.status).toBe('empty');
    expect(outcome.chunkCount).toBe(0);
  });

  it('stores repeated text of one document once', async () => {
    const repeatedPath = path.join(dir, 'repetido.txt');
    await fs.writeFile(repeatedPath, 'Parrafo repetido uno.\n\nParrafo repetido uno.', 'utf-8');
    const smallChunks = new Indexer({
      registry: createTestRegistry(),
      embeddings,
      store,
      manifest,
      chunking: { chunkSize: 25, overlap: 0 },
    });

    const count = await smallChunks.indexDocument(repeatedPath, 'guia_conductor');

    expect(count).toBe(1);
    expect(await store.count({ source: 'guia_conductor' })).toBe(1);
  });

  it('writes chunks in batches', async () => {
    const batched = new Indexer({
      registry: createTestRegistry(),
      embeddings,
      store,
      manifest,
      chunking: { chunkSize: 50, overlap: 0 },
      batchSize: 2,
    });

    await batched.indexDocument(docPath, 'codigo_transito');

    expect(embeddings.calls.map(batch => batch.length)).toEqual([2, 1]);
  });

  it('keeps committed batches but not the manifest when embedding fails', async () => {
    embeddings.failure = { error: new EmbeddingServiceError('servicio caído'), fromCall: 2 };
    const batched = new Indexer({
      registry: createTestRegistry(),
      embeddings,
      store,
      manifest,
      chunking: { chunkSize: 50, overlap: 0 },
      batchSize: 2,
    });

    await expect(batched.indexDocument(docPath, 'codigo_transito')).rejects.toThrow('servicio caído');

    expect(await store.count()).toBe(2);
    expect(await manifest.get(docPath)).toBeUndefined();
  });

  it('indexes a list of documents in order', async () => {
    const otherPath = path.join(dir, 'guia.txt');
    await fs.writeFile(otherPath, 'Use siempre el casco.', 'utf-8');

    const outcomes = await indexer.indexAllDocuments([
      { path: docPath, source_id: 'codigo_transito' },
      { path: otherPath, source_id: 'guia_conductor' },
    ]);

    expect(outcomes.map(o => [o.sourceId, o.status, o.chunkCount])).toEqual([
      ['codigo_transito', 'indexed', 3],
      ['guia_conductor', 'indexed', 1],
    ]);
    expect(outcomes.reduce((sum, o) => sum + o.chunkCount, 0)).toBe(4);
    expect(await store.count()).toBe(4);
  });
});

describe('loadDocumentsConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'documents-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('resolves paths against the config file and skips missing documents', async () => {
    await fs.mkdir(path.join(dir, 'documents'));
    await fs.writeFile(path.join(dir, 'documents', 'codigo.txt'), LAW_TEXT, 'utf-8');
    const configFile = path.join(dir, 'documents.json');
    await fs.writeFile(
      configFile,
      JSON.stringify([
        { path: 'documents/codigo.txt', source_id: 'codigo_transito' },
        { path: 'documents/falta.txt', source_id: 'decreto_2106' },
      ]),
      'utf-8'
    );

    const documents = await loadDocumentsConfig(configFile);

    expect(documents).toEqual([
      { path: path.join(dir, 'documents', 'codigo.txt'), source_id: 'codigo_transito' },
    ]);
  });

  it('rejects entries without a source id', async () => {
    const configFile = path.join(dir, 'documents.json');
    await fs.writeFile(configFile, JSON.stringify([{ path: 'documents/codigo.txt' }]), 'utf-8');

    await expect(loadDocumentsConfig(configFile)).rejects.toThrow();
  });
});
