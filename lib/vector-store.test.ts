import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StoreError } from './errors';
import { chunkMetadata } from './test-utils';
import { JsonVectorStore, matchesFilter } from './vector-store';

describe('matchesFilter', () => {
  const metadata = chunkMetadata('codigo_transito', { article: 'Artículo 131' });

  it('matches every record without a filter', () => {
    expect(matchesFilter(metadata)).toBe(true);
  });

  it('compares fields exactly', () => {
    expect(matchesFilter(metadata, { source: 'codigo_transito' })).toBe(true);
    expect(matchesFilter(metadata, { source: 'decreto_2106' })).toBe(false);
    expect(matchesFilter(metadata, { article: 'Artículo 13' })).toBe(false);
  });

  it('accepts any value from a list', () => {
    expect(matchesFilter(metadata, { source: ['decreto_2106', 'codigo_transito'] })).toBe(true);
    expect(matchesFilter(metadata, { source: [] })).toBe(false);
  });
});

describe('JsonVectorStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vector-store-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function seed(store: JsonVectorStore) {
    await store.upsert(
      ['a', 'b', 'c'],
      [[1, 0], [0, 1], [1, 1]],
      ['texto a', 'texto b', 'texto c'],
      [chunkMetadata('ley'), chunkMetadata('guia'), chunkMetadata('ley')]
    );
  }

  it('returns the nearest records by cosine distance', async () => {
    const store = new JsonVectorStore();
    await seed(store);

    const result = await store.query([1, 0], 2);

    expect(result.ids).toEqual(['a', 'c']);
    expect(result.documents).toEqual(['texto a', 'texto c']);
    expect(result.distances[0]).toBeCloseTo(0);
    expect(result.distances[1]).toBeCloseTo(1 - Math.SQRT1_2);
  });

  it('restricts the query with a metadata filter', async () => {
    const store = new JsonVectorStore();
    await seed(store);

    const result = await store.query([1, 0], 5, { source: 'guia' });

    expect(result.ids).toEqual(['b']);
    expect(result.metadatas[0].source).toBe('guia');
  });

  it('keeps insertion order for equal distances', async () => {
    const store = new JsonVectorStore();
    await store.upsert(
      ['x', 'y', 'z'],
      [[1, 0], [1, 0], [1, 0]],
      ['x', 'y', 'z'],
      [chunkMetadata('ley'), chunkMetadata('ley'), chunkMetadata('ley')]
    );

    const result = await store.query([1, 0], 3);

    expect(result.ids).toEqual(['x', 'y', 'z']);
  });

  it('replaces a record on upsert with the same id', async () => {
    const store = new JsonVectorStore();
    await seed(store);

    await store.upsert(['a'], [[0, 1]], ['texto nuevo'], [chunkMetadata('ley')]);

    expect(await store.count()).toBe(3);
    const [record] = await store.get({ source: 'ley' });
    expect(record).toEqual({ id: 'a', text: 'texto nuevo', metadata: chunkMetadata('ley') });
  });

  it('deletes by filter and reports the number of removed records', async () => {
    const store = new JsonVectorStore();
    await seed(store);

    expect(await store.delete({ source: 'ley' })).toBe(2);
    expect(await store.delete({ source: 'ley' })).toBe(0);
    expect(await store.count()).toBe(1);
    expect(await store.count({ source: 'guia' })).toBe(1);
  });

  it('persists records to the JSON file', async () => {
    const file = path.join(dir, 'store.json');
    const store = new JsonVectorStore(file, 'prueba');
    await seed(store);
    await store.delete({ source: 'guia' });

    const reopened = new JsonVectorStore(file, 'prueba');
    expect(await reopened.count()).toBe(2);
    expect((await reopened.query([1, 0], 1)).ids).toEqual(['a']);

    const saved = JSON.parse(await fs.readFile(file, 'utf-8'));
    expect(saved.collection).toBe('prueba');
    expect(saved.records).toHaveLength(2);
  });

  it('starts empty when the file does not exist', async () => {
    const store = new JsonVectorStore(path.join(dir, 'missing.json'));

    expect(await store.count()).toBe(0);
  });

  it('rejects a corrupted store file', async () => {
    const file = path.join(dir, 'store.json');
    await fs.writeFile(file, '{"records": "nope"}', 'utf-8');

    await expect(new JsonVectorStore(file).count()).rejects.toBeInstanceOf(StoreError);
  });

  it('rejects upserts with mismatched lengths', async () => {
    const store = new JsonVectorStore();

    await expect(
      store.upsert(['a', 'b'], [[1, 0]], ['a', 'b'], [chunkMetadata('ley'), chunkMetadata('ley')])
    ).rejects.toThrow('Длины ids, embeddings, documents и metadatas должны совпадать');
  });

  it('reports a dimension mismatch as a store error', async () => {
    const store = new JsonVectorStore();
    await seed(store);

    await expect(store.query([1, 0, 0], 1)).rejects.toBeInstanceOf(StoreError);
  });
});
