import fs from 'fs';
import os from 'os';
import path from 'path';
import { Writable } from 'stream';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { defaultConfig } from '../src/config';
import { DescriptiveStoreClient, Mutation } from '../src/descriptive_store';
import type { Embedder } from '../src/embedder';
import { ConfigurationError } from '../src/errors';
import { Orchestrator, isClean } from '../src/orchestrator';
import { MemoryStoreClient } from '../src/store_client';

const APP_PY = [
  'class Greeter:',
  '    def __init__(self, name):',
  '        self.name = name',
  '',
  '    def greet(self):',
  "        return 'hi'",
  '',
].join('\n');

const UTIL_PY = ['RATE = 0.5', '', 'def total(items):', '    return sum(items)', ''].join('\n');

const GREET_KEY = 'code:demo:method:pkg/app.py:Greeter.greet';

/** Two keyword dimensions plus a constant one, so no vector is zero. */
class KeywordEmbedder implements Embedder {
  readonly providerId = 'keyword';
  readonly modelId = 'keyword-3';

  async embed(texts: string[]) {
    return texts.map(text => [text.includes('greet') ? 1 : 0, text.includes('total') ? 1 : 0, 0.1]);
  }
}

let root: string;
let store: MemoryStoreClient;

function orchestrator(options: { embedder?: Embedder; store?: MemoryStoreClient | DescriptiveStoreClient } = {}) {
  return new Orchestrator({
    projectName: 'demo',
    root,
    store: options.store ?? store,
    embedder: options.embedder,
    settings: { ...defaultConfig, concurrency: 2, batchSize: 2 },
  });
}

function write(rel: string, content: string) {
  const file = path.join(root, rel);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content, 'utf8');
}

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'code-recall-project-'));
  store = new MemoryStoreClient();
  write('pkg/app.py', APP_PY);
  write('util.py', UTIL_PY);
  write('.venv/lib/site.py', 'def hidden():\n    pass\n');
  write('notes.txt', 'def not_python(): pass\n');
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe('Orchestrator.remember', () => {
  it('indexes every source file under the root', async () => {
    const run = orchestrator();
    const summary = await run.remember();
    expect(isClean(summary)).toBe(true);
    expect(summary.files).toBe(2);
    expect(summary.entities).toBe(5);
    const status = await run.status();
    expect(status.file_count).toBe(2);
    expect(status.counts).toEqual({ function: 1, class: 1, method: 2, variable: 1 });
    expect(typeof status.last_indexed_at).toBe('string');
    expect((await run.recall('method', 'greet'))[0]).toMatchObject({ parent_class: 'Greeter', signature: 'def greet(self)' });
  });

  it('leaves the store unchanged when run twice', async () => {
    const run = orchestrator();
    await run.remember();
    const keys = store.keys();
    const greet = await store.get(GREET_KEY);
    await run.remember();
    expect(store.keys()).toEqual(keys);
    expect(await store.get(GREET_KEY)).toBe(greet);
  });

  it('prunes files that were deleted since the last run', async () => {
    const run = orchestrator();
    await run.remember();
    fs.rmSync(path.join(root, 'util.py'));
    const summary = await run.remember();
    expect(summary.pruned).toBe(1);
    expect(await run.writer.processedFiles()).toEqual(['pkg/app.py']);
    expect(await run.recall('function')).toEqual([]);
  });

  it('counts a file that cannot be parsed and indexes the rest', async () => {
    write('bad.py', 'x = 1\u0000');
    const summary = await orchestrator().remember();
    expect(summary.parseFailures).toBe(1);
    expect(summary.errors).toEqual([{ file: 'bad.py', message: 'Failed to parse bad.py: content contains NUL bytes' }]);
    expect(summary.files).toBe(2);
    expect(isClean(summary)).toBe(false);
  });

  it('stops before the first file once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const summary = await orchestrator().remember(undefined, controller.signal);
    expect(summary.cancelled).toBe(true);
    expect(summary.files).toBe(0);
  });

  it('rejects a root that does not exist', async () => {
    const run = new Orchestrator({ projectName: 'demo', root: path.join(root, 'missing'), store, settings: defaultConfig });
    await expect(run.remember()).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('Orchestrator.refresh', () => {
  it('re-indexes the changed file and leaves the others alone', async () => {
    const run = orchestrator();
    await run.remember();
    const appKeys = store.keys().filter(key => key.includes('pkg/app.py'));
    const greet = await store.get(GREET_KEY);

    write('util.py', `${UTIL_PY}\ndef average(items):\n    return total(items) / len(items)\n`);
    const summary = await run.refresh([path.join(root, 'util.py')]);

    expect(summary.files).toBe(1);
    expect((await run.recall('function')).map(entity => entity.name)).toEqual(['total', 'average']);
    expect(store.keys().filter(key => key.includes('pkg/app.py'))).toEqual(appKeys);
    expect(await store.get(GREET_KEY)).toBe(greet);
  });

  it('clears a file that was deleted', async () => {
    const run = orchestrator();
    await run.remember();
    fs.rmSync(path.join(root, 'util.py'));
    const summary = await run.refresh([path.join(root, 'util.py')]);
    expect(summary.pruned).toBe(1);
    expect(summary.removed).toBe(2);
    expect(await run.writer.processedFiles()).toEqual(['pkg/app.py']);
  });

  it('skips other extensions and reports files outside the root', async () => {
    const elsewhere = path.join(os.tmpdir(), 'elsewhere.py');
    const summary = await orchestrator().refresh([path.join(root, 'notes.txt'), elsewhere]);
    expect(summary.files).toBe(0);
    expect(summary.failedFiles).toBe(1);
    expect(summary.errors).toEqual([{ file: elsewhere, message: `${elsewhere} is outside the project root ${root}` }]);
    expect(isClean(summary)).toBe(false);
    expect(store.keys()).toEqual([]);
  });

  it('takes relative paths relative to the project root', async () => {
    const run = orchestrator();
    await run.remember();
    write('util.py', 'def average(items):\n    return 0\n');
    expect(process.cwd()).not.toBe(root);
    const summary = await run.refresh(['util.py']);
    expect(summary.files).toBe(1);
    expect(isClean(summary)).toBe(true);
    expect((await run.recall('function')).map(entity => entity.name)).toEqual(['average']);
  });
});

describe('Orchestrator.forget', () => {
  it('removes the project and nothing else', async () => {
    const other = new Orchestrator({ projectName: 'other', root, store, settings: defaultConfig });
    await orchestrator().remember();
    await other.remember();
    await orchestrator().forget();
    expect(store.keys().every(key => key.startsWith('code:other:'))).toBe(true);
    expect((await other.status()).entity_count).toBe(5);
  });
});

describe('Orchestrator vectors', () => {
  it('embeds every entity and finds the closest one', async () => {
    const run = orchestrator({ embedder: new KeywordEmbedder() });
    const { remember, vectors } = await run.vectorize();
    expect(remember.entities).toBe(5);
    expect(vectors).toEqual({ indexed: 5, failed: 0, batches: 3, failedBatches: 0 });
    expect((await run.status()).embedding_count).toBe(5);

    const hits = await run.vectorRecall('greet', 2);
    expect(hits.map(hit => hit.key)).toEqual([GREET_KEY, 'code:demo:class:pkg/app.py:Greeter']);
    expect(hits[0].score).toBeCloseTo(1);
    expect(hits[0].entity?.name).toBe('greet');
  });

  it('returns the stored metadata when the entity is gone', async () => {
    const run = orchestrator({ embedder: new KeywordEmbedder() });
    await run.vectorize();
    await store.delete(GREET_KEY);
    const [hit] = await run.vectorRecall('greet', 1);
    expect(hit.entity).toBeUndefined();
    expect(hit.metadata).toMatchObject({ name: 'greet', parent_class: 'Greeter', file_path: 'pkg/app.py' });
  });

  it('drops embeddings together with their entities', async () => {
    const run = orchestrator({ embedder: new KeywordEmbedder() });
    await run.vectorize();
    fs.rmSync(path.join(root, 'util.py'));
    await run.refresh([path.join(root, 'util.py')]);
    expect(await run.vectors.count()).toBe(3);
    expect(store.keys().some(key => key.includes('util.py'))).toBe(false);
  });

  it('needs an embedder for semantic recall', async () => {
    await expect(orchestrator().vectorRecall('greet')).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('descriptive output mode', () => {
  it('describes mutations instead of applying them', async () => {
    const lines: string[] = [];
    const sink = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        lines.push(chunk.toString('utf8'));
        callback();
      },
    });
    const describing = new DescriptiveStoreClient(sink, store);
    await orchestrator({ store: describing }).remember();

    expect(store.keys()).toEqual([]);
    const mutations = lines.map((line): Mutation => JSON.parse(line));
    expect(mutations).toEqual(describing.emitted);
    const set = describing.emitted.find(m => m.op === 'SET' && m.key === 'code:demo:function:util.py:total');
    expect(set).toBeDefined();
    expect(describing.emitted).toContainEqual({ op: 'SADD', key: 'code:demo:file_index', members: ['util.py'] });
  });
});
