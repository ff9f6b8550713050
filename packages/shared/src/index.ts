/**
 * Shared type definitions for the code-recall packages.
 */

export const ENTITY_TYPES = ['function', 'class', 'method', 'variable'] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPES.some(type => type === value);
}

/**
 * One structural fact extracted from a source file. Field names are the ones
 * stored in the key-value store, so they stay snake_case. Only the fields
 * that apply to an entity's type are present; nothing is stored as an empty
 * placeholder.
 */
export interface EntityRecord {
  entity_type: EntityType;
  /** Relative to the project root, always forward slashes. */
  file_path: string;
  name: string;
  /** function and method only */
  signature?: string;
  docstring?: string;
  /** 1-indexed, inclusive */
  line_start: number;
  line_end: number;
  /** methods and class-level variables */
  parent_class?: string;
  /** class only */
  bases?: string[];
  /** variable only */
  value_repr?: string;
}

export type EmbeddingMetadata = Pick<EntityRecord, 'entity_type' | 'file_path' | 'name' | 'line_start' | 'line_end'> &
  Partial<Pick<EntityRecord, 'parent_class' | 'signature'>>;

/**
 * Vector stored for an entity. `key` is the entity's own key, never a key
 * from another namespace.
 */
export interface EmbeddingRecord {
  key: string;
  vector: number[];
  provider_id: string;
  model_id: string;
  metadata: EmbeddingMetadata;
}

export interface SearchHit {
  key: string;
  score: number;
  metadata: EmbeddingMetadata;
}

/** A search hit joined with its entity; `entity` is absent when the entity was removed after embedding. */
export interface RecallHit extends SearchHit {
  entity?: EntityRecord;
}

export interface WriteFailure {
  file: string;
  key?: string;
  message: string;
}

export interface WriteSummary {
  files: number;
  failedFiles: number;
  entities: number;
  failedEntities: number;
  /** stale entities removed from re-written files */
  removed: number;
  errors: WriteFailure[];
}

export interface VectorizeSummary {
  indexed: number;
  failed: number;
  batches: number;
  failedBatches: number;
}

export interface ProjectStatus {
  project: string;
  prefix: string;
  file_count: number;
  entity_count: number;
  counts: Record<EntityType, number>;
  embedding_count: number;
  last_indexed_at?: string;
}
