import { EntityRecord, EntityType } from '@code-recall/shared';
import { ConfigurationError } from './errors';

/**
 * Key layout. Every key of a project lives under its prefix:
 *
 *   {prefix}:{type}:{file}:{name}            entity JSON
 *   {prefix}:method:{file}:{Class}.{name}    method entity JSON
 *   {prefix}:{type}:{file}:{name}#embedding  embedding record JSON
 *   {prefix}:file_index                      processed-file set
 *   {prefix}:index:{type}                    entity keys per type
 *   {prefix}:names:{type}:{name}             entity keys per type and name
 *   {prefix}:file_entities:{file}            entity keys per file
 *   {prefix}:embedding_index                 entity keys with an embedding
 *   {prefix}:metadata                        project metadata JSON
 */

export const KEY_NAMESPACE = 'code';
const EMBEDDING_SUFFIX = '#embedding';
const METADATA_SUFFIX = 'metadata';

/**
 * Characters percent-encoded in a project name: the key separator,
 * whitespace, glob syntax, and `%` itself so distinct names never share a
 * prefix.
 */
const RESERVED_NAME_CHARS = /[%:\s*?[\]\\{}]/g;

function percentEncode(char: string): string {
  return Array.from(Buffer.from(char, 'utf8'), byte => `%${byte.toString(16).toUpperCase().padStart(2, '0')}`).join('');
}

export function projectPrefix(projectName: string): string {
  if (!projectName) throw new ConfigurationError('project name must not be empty');
  return `${KEY_NAMESPACE}:${projectName.replace(RESERVED_NAME_CHARS, percentEncode)}`;
}

/** Key relative to the project prefix. */
export function entitySlot(entity: Pick<EntityRecord, 'entity_type' | 'file_path' | 'name' | 'parent_class'>): string {
  if (entity.entity_type === 'method') {
    return `method:${entity.file_path}:${entity.parent_class ?? ''}.${entity.name}`;
  }
  return `${entity.entity_type}:${entity.file_path}:${entity.name}`;
}

export function entityKey(prefix: string, entity: Pick<EntityRecord, 'entity_type' | 'file_path' | 'name' | 'parent_class'>): string {
  return `${prefix}:${entitySlot(entity)}`;
}

export function embeddingKey(key: string): string {
  return `${key}${EMBEDDING_SUFFIX}`;
}

export function fileSetKey(prefix: string): string {
  return `${prefix}:file_index`;
}

export function typeIndexKey(prefix: string, type: EntityType): string {
  return `${prefix}:index:${type}`;
}

export function nameIndexKey(prefix: string, type: EntityType, name: string): string {
  return `${prefix}:names:${type}:${name}`;
}

export function fileEntitiesKey(prefix: string, filePath: string): string {
  return `${prefix}:file_entities:${filePath}`;
}

export function embeddingIndexKey(prefix: string): string {
  return `${prefix}:embedding_index`;
}

export function metadataKey(prefix: string): string {
  return `${prefix}:${METADATA_SUFFIX}`;
}

export function belongsTo(prefix: string, key: string): boolean {
  return key.startsWith(`${prefix}:`);
}

/** True for `code:{project}:metadata`; project segments never contain `:`. */
export function isMetadataKey(key: string): boolean {
  const parts = key.split(':');
  return parts.length === 3 && parts[0] === KEY_NAMESPACE && parts[2] === METADATA_SUFFIX;
}
