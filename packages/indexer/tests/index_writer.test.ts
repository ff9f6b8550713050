import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { EntityRecord } from '@code-recall/shared';
import { StoreOperationError } from '../src/errors';
import { IndexWriter, listProjects } from '../src/index_writer';
import { projectPrefix } from '../src/keys';
import { MemoryStoreClient } from '../src/store_client';

function fn(file: string, name: string, line = 1): EntityRecord {
  return { entity_type: 'function', file_path: file, name, signature: `def ${name}()`, line_start: line, line_end: line + 1 };
}

/** Fails writes of one key the way a WRONGTYPE reply would. */
class FlakyStore extends MemoryStoreClient {
  constructor(private failingKey: string) {
    super();
  }

  async set(key: string, value: string) {
    if (key === this.failingKey) throw new StoreOperationError(key, 'WRONGTYPE');
    return super.set(key, value);
  }
}

describe('IndexWriter', () => {
  let store: MemoryStoreClient;
  let writer: IndexWriter;

  beforeEach(() => {
    store = new MemoryStoreClient();
    writer = new IndexWriter(store, projectPrefix('alpha'));
  });

  it('writes entities with their index sets', async () => {
    const summary = await writer.write([fn('a.py', 'one'), fn('a.py', 'two', 5)]);
    expect(summary).toEqual({ files: 1, failedFiles: 0, entities: 2, failedEntities: 0, removed: 0, errors: [] });
    expect(store.keys()).toEqual([
      'code:alpha:file_entities:a.py',
      'code:alpha:file_index',
      'code:alpha:function:a.py:one',
      'code:alpha:function:a.py:two',
      'code:alpha:index:function',
      'code:alpha:names:function:one',
      'code:alpha:names:function:two',
    ]);
    expect(await writer.processedFiles()).toEqual(['a.py']);
  });

  it('is idempotent', async () => {
    await writer.write([fn('a.py', 'one')]);
    const before = store.keys();
    const again = await writer.write([fn('a.py', 'one')]);
    expect(store.keys()).toEqual(before);
    expect(again.removed).toBe(0);
    expect(await writer.recall('function')).toEqual([fn('a.py', 'one')]);
  });

  it('removes entities a file no longer defines', async () => {
    await writer.write([fn('a.py', 'one'), fn('a.py', 'two')]);
    const summary = await writer.write([fn('a.py', 'two')]);
    expect(summary.removed).toBe(1);
    expect(await store.get('code:alpha:function:a.py:one')).toBeNull();
    expect(await writer.recall('function', 'one')).toEqual([]);
    expect(await writer.recall('function')).toHaveLength(1);
  });

  it('records a file that produced no entities', async () => {
    await writer.write([], ['empty.py']);
    expect(await writer.processedFiles()).toEqual(['empty.py']);
  });

  it('keeps a file out of the processed set when an entity fails', async () => {
    const flaky = new FlakyStore('code:alpha:function:a.py:bad');
    const flakyWriter = new IndexWriter(flaky, 'code:alpha');
    const summary = await flakyWriter.write([fn('a.py', 'good'), fn('a.py', 'bad'), fn('b.py', 'fine')]);
    expect(summary.failedFiles).toBe(1);
    expect(summary.failedEntities).toBe(1);
    expect(summary.entities).toBe(2);
    expect(summary.errors).toEqual([
      { file: 'a.py', key: 'code:alpha:function:a.py:bad', message: 'WRONGTYPE (key code:alpha:function:a.py:bad)' },
    ]);
    expect(await flakyWriter.processedFiles()).toEqual(['b.py']);
    expect(await flaky.get('code:alpha:function:a.py:good')).not.toBeNull();
  });

  it('recalls by type and name, sorted by file then line', async () => {
    await writer.write([fn('b.py', 'run', 3), fn('a.py', 'run', 9), fn('a.py', 'stop', 1)]);
    const runs = await writer.recall('function', 'run');
    expect(runs.map(entity => entity.file_path)).toEqual(['a.py', 'b.py']);
    const all = await writer.recall('function');
    expect(all.map(entity => `${entity.file_path}:${entity.name}`)).toEqual(['a.py:stop', 'a.py:run', 'b.py:run']);
  });

  it('forgets only its own prefix', async () => {
    const other = new IndexWriter(store, projectPrefix('beta'));
    await writer.write([fn('a.py', 'one')]);
    await other.write([fn('a.py', 'one')]);
    const result = await writer.forget();
    expect(result.deleted).toBe(5);
    expect(store.keys().every(key => key.startsWith('code:beta:'))).toBe(true);
    expect(await other.recall('function')).toHaveLength(1);
  });

  it('does not let a prefix that is a string prefix of another match it', async () => {
    const ab = new IndexWriter(store, projectPrefix('ab'));
    await writer.write([fn('x.py', 'f')]);
    await ab.write([fn('x.py', 'f')]);
    await new IndexWriter(store, projectPrefix('a')).forget();
    expect(await writer.recall('function')).toHaveLength(1);
    expect(await ab.recall('function')).toHaveLength(1);
  });

  it('keeps projects whose names differ only in reserved characters apart', async () => {
    const underscore = new IndexWriter(store, projectPrefix('my_app'));
    await underscore.write([fn('a.py', 'one')]);
    await new IndexWriter(store, projectPrefix('my app')).forget();
    await new IndexWriter(store, projectPrefix('my:app')).forget();
    expect(await underscore.recall('function')).toHaveLength(1);
  });

  it('clears files with their entities', async () => {
    await writer.write([fn('a.py', 'one'), fn('b.py', 'two')]);
    const removed = await writer.clearFiles(['a.py']);
    expect(removed).toBe(1);
    expect(await writer.processedFiles()).toEqual(['b.py']);
    expect(store.keys().some(key => key.includes('a.py'))).toBe(false);
  });

  it('reports status counts and metadata', async () => {
    await writer.write([fn('a.py', 'one'), { ...fn('a.py', 'Box'), entity_type: 'class', signature: undefined, bases: [] }]);
    await writer.updateMetadata({ name: 'alpha', updatedFiles: ['a.py'] });
    const status = await writer.status('alpha');
    expect(status).toMatchObject({
      project: 'alpha',
      prefix: 'code:alpha',
      file_count: 1,
      entity_count: 2,
      counts: { function: 1, class: 1, method: 0, variable: 0 },
      embedding_count: 0,
    });
    expect(typeof status.last_indexed_at).toBe('string');
    expect((await writer.readMetadata())?.updated_files).toEqual(['a.py']);
  });

  it('rejects a processed-file index that is not a set', async () => {
    await store.set('code:alpha:file_index', 'oops');
    await expect(writer.processedFiles()).rejects.toBeInstanceOf(StoreOperationError);
  });
});

describe('listProjects', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('lists projects with metadata, most recently indexed first', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    const store = new MemoryStoreClient();
    const older = new IndexWriter(store, projectPrefix('my app'));
    await older.write([fn('a.py', 'one')]);
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    await older.updateMetadata({ name: 'my app', updatedFiles: ['a.py'] });

    const newer = new IndexWriter(store, projectPrefix('shop'));
    await newer.write([fn('b.py', 'two'), fn('b.py', 'three')]);
    vi.setSystemTime(new Date('2024-02-01T00:00:00Z'));
    await newer.updateMetadata({ name: 'shop', updatedFiles: ['b.py'] });

    // indexed but never stamped with metadata
    await new IndexWriter(store, projectPrefix('bare')).write([fn('c.py', 'four')]);

    const projects = await listProjects(store);
    expect(projects.map(project => [project.metadata.name, project.prefix])).toEqual([
      ['shop', 'code:shop'],
      ['my app', 'code:my%20app'],
    ]);
    expect(projects[0].metadata).toMatchObject({ total_files: 1, total_entities: 2, last_indexed_at: '2024-02-01T00:00:00.000Z' });
  });

  it('returns nothing for an empty store', async () => {
    expect(await listProjects(new MemoryStoreClient())).toEqual([]);
  });
});
