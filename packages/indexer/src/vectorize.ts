import { EntityRecord, VectorizeSummary } from '@code-recall/shared';
import { Embedder } from './embedder';
import { InvalidInputError, ProviderUnavailableError, RateLimitedError, StoreOperationError } from './errors';
import { createLogger } from './log';
import { embeddingMetadataOf } from './records';
import { VectorIndex } from './vector_index';

const log = createLogger('vectorize');

export interface VectorizeItem {
  key: string;
  entity: EntityRecord;
}

export interface PipelineOptions {
  batchSize: number;
  maxAttempts: number;
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

interface BatchOutcome {
  embedded: Array<{ item: VectorizeItem; vector: number[] }>;
  rejected: number;
  /** Items lost because the provider gave up on the batch. */
  lost: number;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/** The text an entity is embedded as. */
export function entityText(entity: EntityRecord): string {
  const lines: string[] = [];
  switch (entity.entity_type) {
    case 'class':
      lines.push(entity.bases?.length ? `class ${entity.name}(${entity.bases.join(', ')})` : `class ${entity.name}`);
      break;
    case 'variable':
      lines.push(entity.value_repr !== undefined ? `${entity.name} = ${entity.value_repr}` : entity.name);
      break;
    default:
      lines.push(entity.signature ?? entity.name);
  }
  if (entity.parent_class) lines.push(`in class ${entity.parent_class}`);
  if (entity.docstring) lines.push(entity.docstring);
  lines.push(entity.file_path);
  return lines.join('\n');
}

/**
 * Embeds entities in fixed-size batches and stores the vectors. A batch the
 * provider cannot serve is counted and skipped; later batches still run.
 */
export class VectorizationPipeline {
  private sleep: (ms: number) => Promise<void>;

  constructor(private embedder: Embedder, private index: VectorIndex, private options: PipelineOptions) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async run(items: VectorizeItem[], signal?: AbortSignal): Promise<VectorizeSummary> {
    const summary: VectorizeSummary = { indexed: 0, failed: 0, batches: 0, failedBatches: 0 };
    const size = Math.max(1, this.options.batchSize);
    for (let start = 0; start < items.length; start += size) {
      if (signal?.aborted) {
        log.warn(`vectorize cancelled after ${summary.batches} batches`);
        break;
      }
      const batch = items.slice(start, start + size);
      summary.batches += 1;
      const outcome = await this.embedBatch(batch);
      if (outcome.lost) {
        summary.failedBatches += 1;
        log.warn(`batch ${summary.batches} failed, ${outcome.lost} entities not embedded`);
      }
      summary.failed += outcome.rejected + outcome.lost;
      for (const { item, vector } of outcome.embedded) {
        try {
          await this.index.upsert({
            key: item.key,
            vector,
            provider_id: this.embedder.providerId,
            model_id: this.embedder.modelId,
            metadata: embeddingMetadataOf(item.entity),
          });
          summary.indexed += 1;
        } catch (err) {
          if (!(err instanceof StoreOperationError)) throw err;
          log.warn(`could not store embedding for ${item.key}`, err);
          summary.failed += 1;
        }
      }
    }
    return summary;
  }

  private async embedBatch(batch: VectorizeItem[]): Promise<BatchOutcome> {
    let pending = batch;
    let rejected = 0;
    let attempt = 0;
    while (pending.length) {
      try {
        const vectors = await this.embedder.embed(pending.map(item => entityText(item.entity)));
        return { embedded: pending.map((item, i) => ({ item, vector: vectors[i] })), rejected, lost: 0 };
      } catch (err) {
        if (err instanceof RateLimitedError) {
          attempt += 1;
          if (attempt >= this.options.maxAttempts) {
            log.warn(`${err.providerId} still rate limited after ${attempt} attempts`);
            return { embedded: [], rejected, lost: pending.length };
          }
          const delay = err.retryAfterMs ?? this.options.baseDelayMs * 2 ** (attempt - 1);
          log.debug(`rate limited, retrying in ${delay}ms`);
          await this.sleep(delay);
          continue;
        }
        if (err instanceof InvalidInputError) {
          const index = err.itemIndex;
          if (index !== undefined && index >= 0 && index < pending.length) {
            log.warn(`dropping ${pending[index].key}: ${err.message}`);
            pending = pending.filter((_, i) => i !== index);
            rejected += 1;
            continue;
          }
          if (pending.length === 1) {
            log.warn(`dropping ${pending[0].key}: ${err.message}`);
            return { embedded: [], rejected: rejected + 1, lost: 0 };
          }
          const singles = await this.embedOneByOne(pending);
          return { ...singles, rejected: rejected + singles.rejected };
        }
        if (err instanceof ProviderUnavailableError) {
          log.warn(err.message);
          return { embedded: [], rejected, lost: pending.length };
        }
        throw err;
      }
    }
    return { embedded: [], rejected, lost: 0 };
  }

  /** Isolates the rejected items when the provider does not say which one it was. */
  private async embedOneByOne(items: VectorizeItem[]): Promise<BatchOutcome> {
    const outcome: BatchOutcome = { embedded: [], rejected: 0, lost: 0 };
    for (const [position, item] of items.entries()) {
      const single = await this.embedBatch([item]);
      outcome.embedded.push(...single.embedded);
      outcome.rejected += single.rejected;
      if (single.lost) {
        outcome.lost += items.length - position;
        break;
      }
    }
    return outcome;
  }
}
