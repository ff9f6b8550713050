import fs from 'fs';
import path from 'path';
import { ENTITY_TYPES, EntityRecord, EntityType, ProjectStatus, RecallHit, VectorizeSummary, WriteSummary } from '@code-recall/shared';
import { AppConfig } from './config';
import { Embedder } from './embedder';
import { ConfigurationError, ParseFailure, errorMessage } from './errors';
import { ExtractionResult, extractWithDiagnostics } from './extractor';
import { relativeToRoot, scanFiles } from './file_scanner';
import { FileWriteResult, IndexWriter, addFileResult, emptyWriteSummary } from './index_writer';
import { entityKey, projectPrefix } from './keys';
import { createLogger } from './log';
import { mapWithConcurrency, yieldToEventLoop } from './pool';
import { StoreClient } from './store_client';
import { startTimer } from './telemetry';
import { SearchOptions, VectorIndex } from './vector_index';
import { VectorizationPipeline } from './vectorize';

const log = createLogger('orchestrator');

export type OrchestratorSettings = Pick<AppConfig, 'extensions' | 'ignore' | 'concurrency' | 'batchSize' | 'topK' | 'retry'>;

export interface OrchestratorOptions {
  projectName: string;
  root: string;
  store: StoreClient;
  settings: OrchestratorSettings;
  /** Required only by vectorize and vectorRecall. */
  embedder?: Embedder;
  /** Backoff sleep for the vectorization pipeline. */
  sleep?: (ms: number) => Promise<void>;
}

export interface RememberSummary extends WriteSummary {
  parseFailures: number;
  skippedNodes: number;
  /** files no longer on disk whose entities were cleared */
  pruned: number;
  cancelled: boolean;
}

export interface VectorizeRunSummary {
  remember: RememberSummary;
  vectors: VectorizeSummary;
}

type FileOutcome =
  | { kind: 'written'; result: FileWriteResult; skipped: number }
  | { kind: 'deleted'; removed: number }
  | { kind: 'parse_failure'; error: ParseFailure }
  | { kind: 'cancelled' };

export function isClean(summary: RememberSummary): boolean {
  return summary.failedFiles === 0 && summary.failedEntities === 0 && summary.parseFailures === 0 && !summary.cancelled;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * Downstream operations of one project session. The store and embedder
 * are chosen by the caller; everything here goes through them.
 */
export class Orchestrator {
  readonly prefix: string;
  readonly writer: IndexWriter;
  readonly vectors: VectorIndex;
  private root: string;

  constructor(private options: OrchestratorOptions) {
    this.prefix = projectPrefix(options.projectName);
    this.root = path.resolve(options.root);
    this.writer = new IndexWriter(options.store, this.prefix);
    this.vectors = new VectorIndex(options.store, this.prefix);
  }

  get projectName() {
    return this.options.projectName;
  }

  /**
   * Indexes the given files, or every source file under the root. A full
   * run also clears processed files that no longer exist.
   */
  async remember(files?: string[], signal?: AbortSignal): Promise<RememberSummary> {
    const stop = startTimer('remember', { project: this.projectName });
    const full = files === undefined;
    const resolved = full ? { files: this.scan(), outside: [] } : relativeToRoot(this.root, files);
    const targets = resolved.files;
    const summary = await this.processFiles(targets, signal);
    this.rejectOutside(summary, resolved.outside);
    if (full && !summary.cancelled) {
      const present = new Set(targets);
      const gone = (await this.writer.processedFiles()).filter(file => !present.has(file));
      if (gone.length) {
        summary.removed += await this.writer.clearFiles(gone);
        summary.pruned = gone.length;
        log.info(`pruned ${gone.length} files that no longer exist`);
      }
    }
    await this.finish(summary, targets);
    stop({ outcome: isClean(summary) ? 'ok' : 'partial', files: summary.files, entities: summary.entities });
    return summary;
  }

  /** Re-indexes only the changed files; deleted ones are cleared. */
  async refresh(changedFiles: string[], signal?: AbortSignal): Promise<RememberSummary> {
    const stop = startTimer('refresh', { project: this.projectName });
    const extensions = new Set(this.options.settings.extensions);
    const resolved = relativeToRoot(this.root, changedFiles);
    const targets = resolved.files.filter(file => extensions.has(path.extname(file)));
    const summary = await this.processFiles(targets, signal);
    this.rejectOutside(summary, resolved.outside);
    await this.finish(summary, targets);
    stop({ outcome: isClean(summary) ? 'ok' : 'partial', files: summary.files, entities: summary.entities });
    return summary;
  }

  forget() {
    return this.writer.forget();
  }

  status(): Promise<ProjectStatus> {
    return this.writer.status(this.projectName);
  }

  recall(entityType: EntityType, name?: string): Promise<EntityRecord[]> {
    return this.writer.recall(entityType, name);
  }

  /**
   * Indexes the project, then embeds every entity of it. Entities are
   * persisted first so every embedding key resolves to an entity.
   */
  async vectorize(batchSize?: number, signal?: AbortSignal): Promise<VectorizeRunSummary> {
    const embedder = this.requireEmbedder();
    const remember = await this.remember(undefined, signal);
    const stop = startTimer('vectorize', { project: this.projectName, provider: embedder.providerId });
    const entities: EntityRecord[] = [];
    for (const type of ENTITY_TYPES) entities.push(...(await this.writer.recall(type)));
    const items = entities.map(entity => ({ key: entityKey(this.prefix, entity), entity }));
    const pipeline = new VectorizationPipeline(embedder, this.vectors, {
      batchSize: batchSize ?? this.options.settings.batchSize,
      maxAttempts: this.options.settings.retry.maxAttempts,
      baseDelayMs: this.options.settings.retry.baseDelayMs,
      sleep: this.options.sleep,
    });
    const vectors = await pipeline.run(items, signal);
    log.info(`embedded ${vectors.indexed} of ${items.length} entities in ${vectors.batches} batches`);
    stop({ outcome: vectors.failed ? 'partial' : 'ok', indexed: vectors.indexed, failed: vectors.failed });
    return { remember, vectors };
  }

  async vectorRecall(query: string, topK?: number, options?: SearchOptions): Promise<RecallHit[]> {
    const embedder = this.requireEmbedder();
    const stop = startTimer('search', { project: this.projectName });
    const [vector] = await embedder.embed([query]);
    const hits = await this.vectors.search(vector, topK ?? this.options.settings.topK, options);
    const joined = await Promise.all(
      hits.map(async (hit): Promise<RecallHit> => {
        const entity = await this.writer.getEntity(hit.key);
        return entity ? { ...hit, entity } : hit;
      }),
    );
    stop({ outcome: 'ok', hits: joined.length });
    return joined;
  }

  private requireEmbedder(): Embedder {
    if (!this.options.embedder) throw new ConfigurationError('no embedding provider configured for this session');
    return this.options.embedder;
  }

  private scan(): string[] {
    if (!fs.existsSync(this.root)) throw new ConfigurationError(`project root ${this.root} does not exist`);
    return scanFiles(this.root, { extensions: this.options.settings.extensions, ignore: this.options.settings.ignore });
  }

  private async processFiles(files: string[], signal?: AbortSignal): Promise<RememberSummary> {
    const summary: RememberSummary = { ...emptyWriteSummary(), parseFailures: 0, skippedNodes: 0, pruned: 0, cancelled: false };
    const outcomes = await mapWithConcurrency(files, this.options.settings.concurrency, file => this.processFile(file, signal));
    for (const outcome of outcomes) {
      switch (outcome.kind) {
        case 'written':
          addFileResult(summary, outcome.result);
          summary.skippedNodes += outcome.skipped;
          break;
        case 'deleted':
          summary.removed += outcome.removed;
          summary.pruned += 1;
          break;
        case 'parse_failure':
          summary.parseFailures += 1;
          summary.errors.push({ file: outcome.error.filePath, message: outcome.error.message });
          break;
        case 'cancelled':
          summary.cancelled = true;
          break;
      }
    }
    return summary;
  }

  private async processFile(file: string, signal?: AbortSignal): Promise<FileOutcome> {
    if (signal?.aborted) return { kind: 'cancelled' };
    let content: string;
    try {
      content = await fs.promises.readFile(path.join(this.root, file), 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return { kind: 'deleted', removed: await this.writer.clearFiles([file]) };
      return { kind: 'parse_failure', error: new ParseFailure(file, `cannot read: ${errorMessage(err)}`) };
    }
    // Extraction is synchronous; let queued I/O run first.
    await yieldToEventLoop();
    let extraction: ExtractionResult;
    try {
      extraction = extractWithDiagnostics(content, file);
    } catch (err) {
      if (!(err instanceof ParseFailure)) throw err;
      log.warn(err.message);
      return { kind: 'parse_failure', error: err };
    }
    const result = await this.writer.writeFile(file, extraction.entities);
    log.debug(`${file}: ${result.written} entities written, ${result.removed} removed`);
    return { kind: 'written', result, skipped: extraction.skipped.length };
  }

  private rejectOutside(summary: RememberSummary, outside: string[]) {
    for (const file of outside) {
      summary.failedFiles += 1;
      summary.errors.push({ file, message: `${file} is outside the project root ${this.root}` });
    }
  }

  private async finish(summary: RememberSummary, targets: string[]) {
    if (summary.cancelled) log.warn('run cancelled; summary covers the files processed before cancellation');
    if (!targets.length) return;
    await this.writer.updateMetadata({ name: this.projectName, root: this.root, updatedFiles: targets });
  }
}
