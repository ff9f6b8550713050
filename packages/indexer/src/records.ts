import { EmbeddingMetadata, EmbeddingRecord, EntityRecord, isEntityType } from '@code-recall/shared';

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

function isEmbeddingMetadata(value: unknown): value is EmbeddingMetadata {
  return (
    isObject(value) &&
    typeof value.entity_type === 'string' &&
    isEntityType(value.entity_type) &&
    typeof value.file_path === 'string' &&
    typeof value.name === 'string' &&
    typeof value.line_start === 'number' &&
    typeof value.line_end === 'number' &&
    optionalString(value.parent_class) &&
    optionalString(value.signature)
  );
}

export function isEntityRecord(value: unknown): value is EntityRecord {
  if (!isObject(value)) return false;
  const { docstring, value_repr: valueRepr, bases } = value;
  return (
    optionalString(docstring) &&
    optionalString(valueRepr) &&
    (bases === undefined || (Array.isArray(bases) && bases.every((base: unknown) => typeof base === 'string'))) &&
    isEmbeddingMetadata(value)
  );
}

export function isEmbeddingRecord(value: unknown): value is EmbeddingRecord {
  return (
    isObject(value) &&
    typeof value.key === 'string' &&
    Array.isArray(value.vector) &&
    value.vector.every((component: unknown) => typeof component === 'number') &&
    typeof value.provider_id === 'string' &&
    typeof value.model_id === 'string' &&
    isEmbeddingMetadata(value.metadata)
  );
}

function parseJson(json: string | null): unknown {
  if (json === null) return undefined;
  try {
    return JSON.parse(json);
  } catch {
    return undefined;
  }
}

export function parseEntityRecord(json: string | null): EntityRecord | undefined {
  const value = parseJson(json);
  return isEntityRecord(value) ? value : undefined;
}

export function parseEmbeddingRecord(json: string | null): EmbeddingRecord | undefined {
  const value = parseJson(json);
  return isEmbeddingRecord(value) ? value : undefined;
}

export function embeddingMetadataOf(entity: EntityRecord): EmbeddingMetadata {
  const metadata: EmbeddingMetadata = {
    entity_type: entity.entity_type,
    file_path: entity.file_path,
    name: entity.name,
    line_start: entity.line_start,
    line_end: entity.line_end,
  };
  if (entity.parent_class !== undefined) metadata.parent_class = entity.parent_class;
  if (entity.signature !== undefined) metadata.signature = entity.signature;
  return metadata;
}
