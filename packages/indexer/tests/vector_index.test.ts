import { describe, it, expect, beforeEach } from 'vitest';
import type { EmbeddingRecord, EntityType } from '@code-recall/shared';
import { StoreOperationError } from '../src/errors';
import { MemoryStoreClient } from '../src/store_client';
import { VectorIndex, cosineSimilarity } from '../src/vector_index';

function record(prefix: string, name: string, vector: number[], entityType: EntityType = 'function', file = 'a.py'): EmbeddingRecord {
  return {
    key: `${prefix}:${entityType}:${file}:${name}`,
    vector,
    provider_id: 'hash',
    model_id: 'hash-3',
    metadata: { entity_type: entityType, file_path: file, name, line_start: 1, line_end: 2 },
  };
}

describe('cosineSimilarity', () => {
  it('scores identical directions 1 and orthogonal ones 0', () => {
    expect(cosineSimilarity([1, 0], [2, 0])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('clamps opposite directions to 0', () => {
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(0);
  });

  it('scores mismatched dimensions and zero vectors 0', () => {
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });
});

describe('VectorIndex', () => {
  let store: MemoryStoreClient;
  let index: VectorIndex;

  beforeEach(async () => {
    store = new MemoryStoreClient();
    index = new VectorIndex(store, 'code:p');
    await index.upsert(record('code:p', 'east', [1, 0, 0]));
    await index.upsert(record('code:p', 'northeast', [1, 1, 0]));
    await index.upsert(record('code:p', 'north', [0, 1, 0], 'class', 'b.py'));
  });

  it('orders hits by descending similarity', async () => {
    const hits = await index.search([1, 0, 0], 3);
    expect(hits.map(hit => hit.key)).toEqual(['code:p:function:a.py:east', 'code:p:function:a.py:northeast', 'code:p:class:b.py:north']);
    expect(hits[0].score).toBeCloseTo(1);
    expect(hits[1].score).toBeCloseTo(Math.SQRT1_2);
    expect(hits[2].score).toBe(0);
  });

  it('clamps topK to the number of records and returns nothing for topK <= 0', async () => {
    expect(await index.search([1, 0, 0], 10)).toHaveLength(3);
    expect(await index.search([1, 0, 0], 0)).toEqual([]);
    expect(await index.search([1, 0, 0], -1)).toEqual([]);
  });

  it('breaks ties by key', async () => {
    await index.upsert(record('code:p', 'also_east', [2, 0, 0]));
    const hits = await index.search([1, 0, 0], 2);
    expect(hits.map(hit => hit.key)).toEqual(['code:p:function:a.py:also_east', 'code:p:function:a.py:east']);
  });

  it('upserts by key', async () => {
    await index.upsert(record('code:p', 'east', [0, 0, 1]));
    expect(await index.count()).toBe(3);
    expect((await index.get('code:p:function:a.py:east'))?.vector).toEqual([0, 0, 1]);
  });

  it('filters by entity type, file and minimum score', async () => {
    expect((await index.search([1, 0, 0], 5, { entityTypes: ['class'] })).map(hit => hit.metadata.name)).toEqual(['north']);
    expect((await index.search([1, 0, 0], 5, { filePath: 'a.py' })).map(hit => hit.metadata.name)).toEqual(['east', 'northeast']);
    expect((await index.search([1, 0, 0], 5, { minScore: 0.9 })).map(hit => hit.metadata.name)).toEqual(['east']);
  });

  it('scores vectors of another dimension 0', async () => {
    const hits = await index.search([1, 0], 3);
    expect(hits.every(hit => hit.score === 0)).toBe(true);
  });

  it('rejects keys outside its prefix', async () => {
    await expect(index.upsert(record('code:other', 'x', [1, 0, 0]))).rejects.toBeInstanceOf(StoreOperationError);
  });

  it('never returns another prefix', async () => {
    const other = new VectorIndex(store, 'code:q');
    await other.upsert(record('code:q', 'east', [1, 0, 0]));
    const hits = await index.search([1, 0, 0], 10);
    expect(hits.every(hit => hit.key.startsWith('code:p:'))).toBe(true);
    expect(await other.count()).toBe(1);
  });

  it('removes embeddings', async () => {
    expect(await index.remove('code:p:function:a.py:east')).toBe(1);
    expect(await index.count()).toBe(2);
    expect(await index.get('code:p:function:a.py:east')).toBeUndefined();
  });
});
