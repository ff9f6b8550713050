import { EmbeddingRecord, EntityType, SearchHit } from '@code-recall/shared';
import { StoreOperationError } from './errors';
import { belongsTo, embeddingIndexKey, embeddingKey } from './keys';
import { createLogger } from './log';
import { parseEmbeddingRecord } from './records';
import { StoreClient } from './store_client';

const log = createLogger('vector-index');

export interface SearchOptions {
  /** Hits scoring below this are dropped. */
  minScore?: number;
  entityTypes?: EntityType[];
  filePath?: string;
}

/** Cosine similarity clamped to [0, 1]; vectors of different length score 0. */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  const score = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  return Math.min(1, Math.max(0, score));
}

/**
 * Embeddings live beside the entity they describe (`{entityKey}#embedding`),
 * with the set of embedded entity keys kept under the project prefix. Search
 * is an exact scan over that set.
 */
export class VectorIndex {
  constructor(private store: StoreClient, readonly prefix: string) {}

  async upsert(record: EmbeddingRecord): Promise<void> {
    if (!belongsTo(this.prefix, record.key)) {
      throw new StoreOperationError(record.key, `key is outside ${this.prefix}`);
    }
    await this.store.set(embeddingKey(record.key), JSON.stringify(record));
    await this.store.setAdd(embeddingIndexKey(this.prefix), record.key);
  }

  async remove(...keys: string[]): Promise<number> {
    if (!keys.length) return 0;
    await this.store.setRemove(embeddingIndexKey(this.prefix), ...keys);
    return this.store.delete(...keys.map(embeddingKey));
  }

  async count(): Promise<number> {
    return (await this.store.members(embeddingIndexKey(this.prefix))).length;
  }

  async get(key: string): Promise<EmbeddingRecord | undefined> {
    return parseEmbeddingRecord(await this.store.get(embeddingKey(key)));
  }

  async search(query: number[], topK: number, options: SearchOptions = {}): Promise<SearchHit[]> {
    if (topK <= 0) return [];
    const keys = await this.store.members(embeddingIndexKey(this.prefix));
    const hits: SearchHit[] = [];
    let mismatched = 0;
    for (const key of keys) {
      const record = await this.get(key);
      if (!record) {
        log.warn(`embedding for ${key} missing or unreadable`);
        continue;
      }
      const { metadata } = record;
      if (options.entityTypes?.length && !options.entityTypes.includes(metadata.entity_type)) continue;
      if (options.filePath !== undefined && metadata.file_path !== options.filePath) continue;
      if (record.vector.length !== query.length) mismatched += 1;
      const score = cosineSimilarity(query, record.vector);
      if (options.minScore !== undefined && score < options.minScore) continue;
      hits.push({ key, score, metadata });
    }
    if (mismatched) {
      log.warn(`${mismatched} embeddings have a different dimension than the query; re-run vectorize after changing models`);
    }
    hits.sort((a, b) => b.score - a.score || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
    return hits.slice(0, Math.min(topK, hits.length));
  }
}
