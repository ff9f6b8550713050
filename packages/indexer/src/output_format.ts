import { ENTITY_TYPES, EntityRecord, ProjectStatus, RecallHit, SearchHit } from '@code-recall/shared';
import { IndexedProject } from './index_writer';
import { RememberSummary, VectorizeRunSummary } from './orchestrator';

const DOCSTRING_PREVIEW = 200;

export function formatEntity(entity: EntityRecord): string {
  const lines = [`${entity.entity_type.toUpperCase()}: ${entity.name}`];
  lines.push(`  file: ${entity.file_path} (lines ${entity.line_start}-${entity.line_end})`);
  if (entity.signature) lines.push(`  signature: ${entity.signature}`);
  if (entity.parent_class) lines.push(`  class: ${entity.parent_class}`);
  if (entity.bases?.length) lines.push(`  bases: ${entity.bases.join(', ')}`);
  if (entity.value_repr !== undefined) lines.push(`  value: ${entity.value_repr}`);
  if (entity.docstring) {
    const doc = entity.docstring.length > DOCSTRING_PREVIEW ? `${entity.docstring.slice(0, DOCSTRING_PREVIEW)}...` : entity.docstring;
    lines.push(`  docstring: ${doc.replace(/\n/g, '\n    ')}`);
  }
  return lines.join('\n');
}

export function formatEntities(entities: EntityRecord[]): string {
  return entities.map(formatEntity).join('\n\n');
}

/** One `key: score` line per hit. */
export function formatHits(hits: SearchHit[]): string {
  return hits.map(hit => `${hit.key}: ${hit.score.toFixed(4)}`).join('\n');
}

/** `[[key, score], ...]`, scores unrounded. */
export function formatHitsJson(hits: SearchHit[]): string {
  return JSON.stringify(hits.map(hit => [hit.key, hit.score]));
}

export function formatRecallHits(hits: RecallHit[]): string {
  return hits
    .map(hit => {
      const head = `${hit.key}: ${hit.score.toFixed(4)}`;
      if (!hit.entity) return `${head}\n  (entity no longer indexed: ${hit.metadata.file_path}:${hit.metadata.line_start})`;
      return `${head}\n${formatEntity(hit.entity).replace(/^/gm, '  ')}`;
    })
    .join('\n\n');
}

export function formatStatus(status: ProjectStatus): string {
  const lines = [
    `project: ${status.project} (${status.prefix})`,
    `last indexed: ${status.last_indexed_at ?? 'never'}`,
    `files: ${status.file_count}`,
    ...ENTITY_TYPES.map(type => `${type === 'class' ? 'classes' : `${type}s`}: ${status.counts[type]}`),
    `entities: ${status.entity_count}`,
    `embeddings: ${status.embedding_count}`,
  ];
  return lines.join('\n');
}

export function formatProjectList(projects: IndexedProject[]): string {
  if (!projects.length) return 'no indexed projects';
  return projects
    .map(({ prefix, metadata }) => {
      const counts = `${metadata.total_files} files, ${metadata.total_entities} entities`;
      return `${metadata.name} (${prefix}): ${counts}, last indexed ${metadata.last_indexed_at}`;
    })
    .join('\n');
}

export function formatRememberSummary(summary: RememberSummary): string {
  const parts = [
    `${summary.files} files`,
    `${summary.entities} entities written`,
    `${summary.removed} removed`,
  ];
  if (summary.pruned) parts.push(`${summary.pruned} files pruned`);
  if (summary.failedFiles) parts.push(`${summary.failedFiles} files failed`);
  if (summary.failedEntities) parts.push(`${summary.failedEntities} entities failed`);
  if (summary.parseFailures) parts.push(`${summary.parseFailures} parse failures`);
  if (summary.skippedNodes) parts.push(`${summary.skippedNodes} nodes skipped`);
  if (summary.cancelled) parts.push('cancelled');
  const errors = summary.errors.map(e => `  ${e.file}${e.key ? ` [${e.key}]` : ''}: ${e.message}`);
  return [parts.join(', '), ...errors].join('\n');
}

export function formatVectorizeSummary(summary: VectorizeRunSummary): string {
  const { vectors } = summary;
  return [
    formatRememberSummary(summary.remember),
    `${vectors.indexed} embeddings stored, ${vectors.failed} failed, ${vectors.batches} batches (${vectors.failedBatches} failed)`,
  ].join('\n');
}
