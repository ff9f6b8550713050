import path from 'path';
import { Writable } from 'stream';
import { AppConfig } from './config';
import { Env } from './credentials';
import { DescriptiveStoreClient } from './descriptive_store';
import { Embedder, createEmbedder } from './embedder';
import { Orchestrator } from './orchestrator';
import { RedisStoreClient } from './redis_store';
import { MemoryStoreClient, StoreClient } from './store_client';
import { configureTelemetry } from './telemetry';
import { setLogLevel } from './log';

export interface SessionOptions {
  config: AppConfig;
  root: string;
  /** Overrides config.project and the root's directory name. */
  project?: string;
  /** Descriptive output mode: mutations are written to `sink` instead of applied. */
  describe?: boolean;
  sink?: Writable;
  /** Build the embedder; commands that never embed leave it off so no key is needed. */
  withEmbedder?: boolean;
  env?: Env;
}

export interface Session {
  orchestrator: Orchestrator;
  store: StoreClient;
  embedder?: Embedder;
  /** Same store, embedder and settings, under another project's prefix. */
  orchestratorFor(projectName: string): Orchestrator;
  close(): Promise<void>;
}

export function createStore(config: AppConfig): StoreClient {
  switch (config.vectorStore.backend) {
    case 'redis':
      return new RedisStoreClient(config.redisUrl);
    case 'memory':
      return new MemoryStoreClient();
  }
}

export function projectNameFor(root: string, configured?: string): string {
  return configured ?? path.basename(path.resolve(root));
}

/** Selects store backend, output mode and embedder once, for one command. */
export function openSession(options: SessionOptions): Session {
  const { config } = options;
  setLogLevel(config.logLevel);
  configureTelemetry(config.telemetry);
  const embedder = options.withEmbedder ? createEmbedder(config.embedding, options.env) : undefined;
  const backing = createStore(config);
  const store = options.describe ? new DescriptiveStoreClient(options.sink ?? process.stdout, backing) : backing;
  const orchestratorFor = (projectName: string) =>
    new Orchestrator({ projectName, root: options.root, store, embedder, settings: config });
  return {
    orchestrator: orchestratorFor(options.project ?? projectNameFor(options.root, config.project)),
    store,
    embedder,
    orchestratorFor,
    close: () => store.close(),
  };
}
