import { ENTITY_TYPES, EntityRecord, EntityType, ProjectStatus, WriteSummary } from '@code-recall/shared';
import { StoreOperationError, errorMessage } from './errors';
import {
  embeddingIndexKey,
  embeddingKey,
  entityKey,
  fileEntitiesKey,
  fileSetKey,
  isMetadataKey,
  KEY_NAMESPACE,
  metadataKey,
  nameIndexKey,
  typeIndexKey,
} from './keys';
import { createLogger } from './log';
import { isObject, parseEntityRecord } from './records';
import { StoreClient } from './store_client';

const log = createLogger('index-writer');

const RECENT_FILES = 20;

export interface FileWriteResult {
  file: string;
  ok: boolean;
  written: number;
  failed: number;
  removed: number;
  errors: WriteSummary['errors'];
}

export interface ProjectMetadata {
  name: string;
  root?: string;
  last_indexed_at: string;
  total_files: number;
  total_entities: number;
  updated_files: string[];
}

function isProjectMetadata(value: unknown): value is ProjectMetadata {
  return (
    isObject(value) &&
    typeof value.name === 'string' &&
    typeof value.last_indexed_at === 'string' &&
    typeof value.total_files === 'number' &&
    typeof value.total_entities === 'number' &&
    Array.isArray(value.updated_files) &&
    value.updated_files.every(file => typeof file === 'string')
  );
}

export interface IndexedProject {
  prefix: string;
  metadata: ProjectMetadata;
}

/** Every project with metadata in the store, most recently indexed first. */
export async function listProjects(store: StoreClient): Promise<IndexedProject[]> {
  const keys = (await store.scanPrefix(`${KEY_NAMESPACE}:`)).filter(isMetadataKey);
  const projects: IndexedProject[] = [];
  for (const key of keys) {
    const prefix = key.slice(0, key.lastIndexOf(':'));
    const metadata = await new IndexWriter(store, prefix).readMetadata();
    if (metadata) projects.push({ prefix, metadata });
  }
  return projects.sort(
    (a, b) => b.metadata.last_indexed_at.localeCompare(a.metadata.last_indexed_at) || a.prefix.localeCompare(b.prefix),
  );
}

export function emptyWriteSummary(): WriteSummary {
  return { files: 0, failedFiles: 0, entities: 0, failedEntities: 0, removed: 0, errors: [] };
}

export function addFileResult(summary: WriteSummary, result: FileWriteResult): WriteSummary {
  summary.files += 1;
  if (!result.ok) summary.failedFiles += 1;
  summary.entities += result.written;
  summary.failedEntities += result.failed;
  summary.removed += result.removed;
  summary.errors.push(...result.errors);
  return summary;
}

/**
 * Persists entities under the key scheme and keeps the auxiliary sets in
 * step with them. Entities are independent key operations; a file joins the
 * processed-file set only once all of its entities are written.
 */
export class IndexWriter {
  constructor(private store: StoreClient, readonly prefix: string) {}

  /**
   * Upserts every entity, grouped by file. `files` names processed files
   * that may have produced no entities, so they are recorded (and their
   * stale entities removed) as well.
   */
  async write(entities: EntityRecord[], files: string[] = []): Promise<WriteSummary> {
    const byFile = new Map<string, EntityRecord[]>();
    for (const file of files) byFile.set(file, []);
    for (const entity of entities) {
      const list = byFile.get(entity.file_path) ?? [];
      list.push(entity);
      byFile.set(entity.file_path, list);
    }
    const summary = emptyWriteSummary();
    for (const [file, fileEntities] of byFile) {
      addFileResult(summary, await this.writeFile(file, fileEntities));
    }
    return summary;
  }

  async writeFile(file: string, entities: EntityRecord[]): Promise<FileWriteResult> {
    const result: FileWriteResult = { file, ok: true, written: 0, failed: 0, removed: 0, errors: [] };
    const previous = new Set(await this.store.members(fileEntitiesKey(this.prefix, file)));
    const current = new Set<string>();

    for (const entity of entities) {
      const key = entityKey(this.prefix, entity);
      current.add(key);
      try {
        await this.upsertEntity(key, entity);
        result.written += 1;
      } catch (err) {
        if (!(err instanceof StoreOperationError)) throw err;
        log.warn(`failed to write ${key}`, err);
        result.failed += 1;
        result.errors.push({ file, key, message: err.message });
      }
    }

    const stale = [...previous].filter(key => !current.has(key));
    if (stale.length) {
      try {
        result.removed = await this.removeEntities(file, stale);
      } catch (err) {
        if (!(err instanceof StoreOperationError)) throw err;
        result.failed += 1;
        result.errors.push({ file, key: err.key, message: err.message });
      }
    }

    result.ok = result.failed === 0;
    // Entities first, then the file set: a listed file always has its entities.
    if (result.ok) await this.store.setAdd(fileSetKey(this.prefix), file);
    else await this.store.setRemove(fileSetKey(this.prefix), file);
    return result;
  }

  private async upsertEntity(key: string, entity: EntityRecord) {
    await this.store.set(key, JSON.stringify(entity));
    await Promise.all([
      this.store.setAdd(typeIndexKey(this.prefix, entity.entity_type), key),
      this.store.setAdd(nameIndexKey(this.prefix, entity.entity_type, entity.name), key),
      this.store.setAdd(fileEntitiesKey(this.prefix, entity.file_path), key),
    ]);
  }

  /** Removes entities (and their embeddings) along with every index entry naming them. */
  private async removeEntities(file: string, keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      const entity = parseEntityRecord(await this.store.get(key));
      if (entity) {
        await Promise.all([
          this.store.setRemove(typeIndexKey(this.prefix, entity.entity_type), key),
          this.store.setRemove(nameIndexKey(this.prefix, entity.entity_type, entity.name), key),
        ]);
      } else {
        log.warn(`entity ${key} missing or unreadable, dropping its index entries only`);
        await Promise.all(ENTITY_TYPES.map(type => this.store.setRemove(typeIndexKey(this.prefix, type), key)));
      }
      await this.store.setRemove(embeddingIndexKey(this.prefix), key);
      removed += (await this.store.delete(key, embeddingKey(key))) > 0 ? 1 : 0;
      await this.store.setRemove(fileEntitiesKey(this.prefix, file), key);
    }
    return removed;
  }

  /** Drops every entity, embedding and processed-file entry of the given files. */
  async clearFiles(files: string[]): Promise<number> {
    let removed = 0;
    for (const file of files) {
      const keys = await this.store.members(fileEntitiesKey(this.prefix, file));
      removed += await this.removeEntities(file, keys);
      await this.store.delete(fileEntitiesKey(this.prefix, file));
      await this.store.setRemove(fileSetKey(this.prefix), file);
    }
    return removed;
  }

  /** Deletes every key under the prefix. Other prefixes are never scanned. */
  async forget(): Promise<{ deleted: number }> {
    const keys = await this.store.scanPrefix(`${this.prefix}:`);
    const deleted = keys.length ? await this.store.delete(...keys) : 0;
    log.info(`forgot ${deleted} keys under ${this.prefix}`);
    return { deleted };
  }

  async processedFiles(): Promise<string[]> {
    const key = fileSetKey(this.prefix);
    const type = await this.store.typeOf(key);
    if (type !== 'set' && type !== 'none') {
      throw new StoreOperationError(key, `processed-file index holds a ${type}, expected a set`);
    }
    return (await this.store.members(key)).sort();
  }

  async status(projectName: string): Promise<ProjectStatus> {
    const files = await this.processedFiles();
    const counts: Record<EntityType, number> = { function: 0, class: 0, method: 0, variable: 0 };
    for (const type of ENTITY_TYPES) {
      counts[type] = (await this.store.members(typeIndexKey(this.prefix, type))).length;
    }
    const embeddings = await this.store.members(embeddingIndexKey(this.prefix));
    const metadata = await this.readMetadata();
    const status: ProjectStatus = {
      project: projectName,
      prefix: this.prefix,
      file_count: files.length,
      entity_count: ENTITY_TYPES.reduce((sum, type) => sum + counts[type], 0),
      counts,
      embedding_count: embeddings.length,
    };
    if (metadata) status.last_indexed_at = metadata.last_indexed_at;
    return status;
  }

  async recall(entityType: EntityType, name?: string): Promise<EntityRecord[]> {
    const indexKey = name === undefined ? typeIndexKey(this.prefix, entityType) : nameIndexKey(this.prefix, entityType, name);
    const keys = await this.store.members(indexKey);
    const entities = await Promise.all(keys.map(async key => parseEntityRecord(await this.store.get(key))));
    return entities
      .filter((entity): entity is EntityRecord => entity !== undefined)
      .sort((a, b) => a.file_path.localeCompare(b.file_path) || a.line_start - b.line_start || a.name.localeCompare(b.name));
  }

  async getEntity(key: string): Promise<EntityRecord | undefined> {
    return parseEntityRecord(await this.store.get(key));
  }

  async readMetadata(): Promise<ProjectMetadata | undefined> {
    const raw = await this.store.get(metadataKey(this.prefix));
    if (!raw) return undefined;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      log.warn(`ignoring unreadable project metadata: ${errorMessage(err)}`);
      return undefined;
    }
    return isProjectMetadata(parsed) ? parsed : undefined;
  }

  async updateMetadata(update: { name: string; root?: string; updatedFiles: string[] }): Promise<ProjectMetadata> {
    const existing = await this.readMetadata();
    const status = await this.status(update.name);
    const recent = [...update.updatedFiles, ...(existing?.updated_files ?? [])];
    const metadata: ProjectMetadata = {
      name: update.name,
      root: update.root ?? existing?.root,
      last_indexed_at: new Date().toISOString(),
      total_files: status.file_count,
      total_entities: status.entity_count,
      updated_files: Array.from(new Set(recent)).slice(0, RECENT_FILES),
    };
    await this.store.set(metadataKey(this.prefix), JSON.stringify(metadata));
    return metadata;
  }
}
