import { describe, it, expect } from 'vitest';
import type { EntityRecord, ProjectStatus } from '@code-recall/shared';
import {
  formatEntity,
  formatHits,
  formatHitsJson,
  formatProjectList,
  formatRecallHits,
  formatRememberSummary,
  formatStatus,
} from '../src/output_format';

const METHOD: EntityRecord = {
  entity_type: 'method',
  file_path: 'app/cart.py',
  name: 'add',
  signature: 'def add(self, item)',
  docstring: 'Add an item.\nReturns nothing.',
  line_start: 10,
  line_end: 12,
  parent_class: 'Cart',
};

const META = { entity_type: 'method' as const, file_path: 'app/cart.py', name: 'add', line_start: 10, line_end: 12 };

describe('output formatting', () => {
  it('renders entity details', () => {
    expect(formatEntity(METHOD)).toBe(
      [
        'METHOD: add',
        '  file: app/cart.py (lines 10-12)',
        '  signature: def add(self, item)',
        '  class: Cart',
        '  docstring: Add an item.',
        '    Returns nothing.',
      ].join('\n'),
    );
  });

  it('truncates long docstrings', () => {
    const text = formatEntity({ ...METHOD, docstring: 'x'.repeat(250) });
    expect(text.split('\n').pop()).toBe(`  docstring: ${'x'.repeat(200)}...`);
  });

  it('renders variables and classes', () => {
    expect(formatEntity({ entity_type: 'variable', file_path: 'a.py', name: 'N', line_start: 1, line_end: 1, value_repr: '3' })).toBe(
      'VARIABLE: N\n  file: a.py (lines 1-1)\n  value: 3',
    );
    expect(formatEntity({ entity_type: 'class', file_path: 'a.py', name: 'C', line_start: 2, line_end: 5, bases: ['A', 'B'] })).toBe(
      'CLASS: C\n  file: a.py (lines 2-5)\n  bases: A, B',
    );
  });

  it('renders search hits as key: score lines and JSON pairs', () => {
    const hits = [
      { key: 'code:p:method:app/cart.py:Cart.add', score: 0.91234, metadata: META },
      { key: 'code:p:function:a.py:f', score: 0.5, metadata: { ...META, entity_type: 'function' as const, name: 'f' } },
    ];
    expect(formatHits(hits)).toBe('code:p:method:app/cart.py:Cart.add: 0.9123\ncode:p:function:a.py:f: 0.5000');
    expect(formatHitsJson(hits)).toBe('[["code:p:method:app/cart.py:Cart.add",0.91234],["code:p:function:a.py:f",0.5]]');
  });

  it('renders recall hits with their entity or a placeholder', () => {
    const key = 'code:p:method:app/cart.py:Cart.add';
    expect(formatRecallHits([{ key, score: 1, metadata: META }])).toBe(`${key}: 1.0000\n  (entity no longer indexed: app/cart.py:10)`);
    const joined = formatRecallHits([{ key, score: 1, metadata: META, entity: { ...METHOD, docstring: undefined } }]);
    expect(joined.split('\n')).toEqual([
      `${key}: 1.0000`,
      '  METHOD: add',
      '    file: app/cart.py (lines 10-12)',
      '    signature: def add(self, item)',
      '    class: Cart',
    ]);
  });

  it('renders project status', () => {
    const status: ProjectStatus = {
      project: 'shop',
      prefix: 'code:shop',
      file_count: 3,
      entity_count: 7,
      counts: { function: 2, class: 1, method: 3, variable: 1 },
      embedding_count: 0,
    };
    expect(formatStatus(status)).toBe(
      [
        'project: shop (code:shop)',
        'last indexed: never',
        'files: 3',
        'functions: 2',
        'classes: 1',
        'methods: 3',
        'variables: 1',
        'entities: 7',
        'embeddings: 0',
      ].join('\n'),
    );
  });

  it('lists indexed projects one per line', () => {
    const metadata = { name: 'my app', last_indexed_at: '2024-02-01T00:00:00.000Z', total_files: 2, total_entities: 9, updated_files: [] };
    expect(formatProjectList([{ prefix: 'code:my%20app', metadata }])).toBe(
      'my app (code:my%20app): 2 files, 9 entities, last indexed 2024-02-01T00:00:00.000Z',
    );
    expect(formatProjectList([])).toBe('no indexed projects');
  });

  it('summarises a run with its failures', () => {
    const text = formatRememberSummary({
      files: 2,
      failedFiles: 1,
      entities: 4,
      failedEntities: 1,
      removed: 0,
      errors: [{ file: 'a.py', key: 'code:p:function:a.py:f', message: 'WRONGTYPE' }],
      parseFailures: 0,
      skippedNodes: 0,
      pruned: 0,
      cancelled: false,
    });
    expect(text).toBe('2 files, 4 entities written, 0 removed, 1 files failed, 1 entities failed\n  a.py [code:p:function:a.py:f]: WRONGTYPE');
  });
});
