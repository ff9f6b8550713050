import fs from 'fs';
import os from 'os';
import path from 'path';
import { Env } from './credentials';
import { DEFAULT_MODELS, EMBEDDING_PROVIDERS, EmbeddingProviderId, EmbeddingSettings } from './embedder';
import { ConfigurationError, errorMessage } from './errors';
import { LogLevel, isLogLevel } from './log';
import { isObject } from './records';

export type VectorStoreBackend = 'redis' | 'memory';

export interface TelemetryConfig {
  /** JSON-lines metric log; metrics stay in memory when unset. */
  logFile?: string;
  promFile?: string;
}

export interface QueueConfig {
  enabled: boolean;
  name: string;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
}

export interface AppConfig {
  redisUrl: string;
  logLevel: LogLevel;
  /** Project name; defaults to the indexed directory's base name. */
  project?: string;
  embedding: EmbeddingSettings;
  vectorStore: { backend: VectorStoreBackend };
  batchSize: number;
  topK: number;
  concurrency: number;
  extensions: string[];
  ignore: string[];
  telemetry: TelemetryConfig;
  queue: QueueConfig;
  retry: RetryConfig;
}

export const defaultConfig: AppConfig = {
  redisUrl: 'redis://localhost:6379',
  logLevel: 'info',
  embedding: { provider: 'hash', model: DEFAULT_MODELS.hash },
  vectorStore: { backend: 'redis' },
  batchSize: 32,
  topK: 10,
  concurrency: 4,
  extensions: ['.py'],
  ignore: [],
  telemetry: {},
  queue: { enabled: false, name: 'code-recall' },
  retry: { maxAttempts: 5, baseDelayMs: 500 },
};

const CONFIG_FILE = 'code-recall.json';

export function resolveConfigPath(custom?: string, env: Env = process.env): string | undefined {
  if (custom) {
    if (!fs.existsSync(custom)) throw new ConfigurationError(`config file not found: ${custom}`);
    return custom;
  }
  const envPath = env.CODE_RECALL_CONFIG;
  if (envPath && fs.existsSync(envPath)) return envPath;
  const cwdPath = path.join(process.cwd(), 'config', CONFIG_FILE);
  if (fs.existsSync(cwdPath)) return cwdPath;
  const homePath = path.join(os.homedir(), '.code-recall', 'config.json');
  if (fs.existsSync(homePath)) return homePath;
  return undefined;
}

function positiveInt(value: unknown, field: string, fallback: number): number {
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${field} must be a positive integer`);
  }
  return value;
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || !value.trim()) throw new ConfigurationError(`${field} must be a non-empty string`);
  return value;
}

function stringList(value: unknown, field: string, fallback: string[]): string[] {
  if (value === undefined) return [...fallback];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigurationError(`${field} must be a list of strings`);
  }
  return value;
}

function parseBoolean(value: unknown, field: string, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') throw new ConfigurationError(`${field} must be a boolean`);
  return value;
}

function section(value: unknown, field: string): Record<string, unknown> {
  if (value === undefined) return {};
  if (!isObject(value)) throw new ConfigurationError(`${field} must be an object`);
  return value;
}

function isProvider(value: string): value is EmbeddingProviderId {
  return EMBEDDING_PROVIDERS.some(provider => provider === value);
}

function parseProvider(value: unknown): EmbeddingProviderId | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || !isProvider(value)) {
    throw new ConfigurationError(`embedding.provider must be one of ${EMBEDDING_PROVIDERS.join(', ')}`);
  }
  return value;
}

function parseLogLevel(value: unknown, fallback: LogLevel): LogLevel {
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || !isLogLevel(value)) throw new ConfigurationError(`invalid logLevel: ${String(value)}`);
  return value;
}

function parseBackend(value: unknown): VectorStoreBackend {
  if (value === undefined) return defaultConfig.vectorStore.backend;
  if (value !== 'redis' && value !== 'memory') throw new ConfigurationError('vectorStore.backend must be redis or memory');
  return value;
}

/** Validates a parsed config object, filling gaps from the defaults. */
export function parseConfig(raw: unknown, env: Env = {}): AppConfig {
  const parsed = section(raw, 'config');
  const embedding = section(parsed.embedding, 'embedding');
  const telemetry = section(parsed.telemetry, 'telemetry');
  const queue = section(parsed.queue, 'queue');
  const retry = section(parsed.retry, 'retry');

  const provider = parseProvider(env.CODE_RECALL_PROVIDER || embedding.provider) ?? defaultConfig.embedding.provider;
  const model = optionalString(env.CODE_RECALL_MODEL || embedding.model, 'embedding.model') ?? DEFAULT_MODELS[provider];
  const settings: EmbeddingSettings = { provider, model };
  const baseUrl = optionalString(embedding.baseUrl, 'embedding.baseUrl');
  if (baseUrl) settings.baseUrl = baseUrl;
  if (embedding.dimensions !== undefined) settings.dimensions = positiveInt(embedding.dimensions, 'embedding.dimensions', 96);

  const config: AppConfig = {
    redisUrl: optionalString(env.REDIS_URL || parsed.redisUrl, 'redisUrl') ?? defaultConfig.redisUrl,
    logLevel: parseLogLevel(env.CODE_RECALL_LOG_LEVEL || parsed.logLevel, defaultConfig.logLevel),
    embedding: settings,
    vectorStore: { backend: parseBackend(section(parsed.vectorStore, 'vectorStore').backend) },
    batchSize: positiveInt(parsed.batchSize, 'batchSize', defaultConfig.batchSize),
    topK: positiveInt(parsed.topK, 'topK', defaultConfig.topK),
    concurrency: positiveInt(parsed.concurrency, 'concurrency', defaultConfig.concurrency),
    extensions: stringList(parsed.extensions, 'extensions', defaultConfig.extensions),
    ignore: stringList(parsed.ignore, 'ignore', defaultConfig.ignore),
    telemetry: {
      logFile: optionalString(telemetry.logFile, 'telemetry.logFile'),
      promFile: optionalString(telemetry.promFile, 'telemetry.promFile'),
    },
    queue: {
      enabled: parseBoolean(queue.enabled, 'queue.enabled', defaultConfig.queue.enabled),
      name: optionalString(queue.name, 'queue.name') ?? defaultConfig.queue.name,
    },
    retry: {
      maxAttempts: positiveInt(retry.maxAttempts, 'retry.maxAttempts', defaultConfig.retry.maxAttempts),
      baseDelayMs: positiveInt(retry.baseDelayMs, 'retry.baseDelayMs', defaultConfig.retry.baseDelayMs),
    },
  };
  const project = optionalString(parsed.project, 'project');
  if (project) config.project = project;
  return config;
}

export function loadConfig(customPath?: string, env: Env = process.env): AppConfig {
  const cfgPath = resolveConfigPath(customPath, env);
  if (!cfgPath) return parseConfig({}, env);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(cfgPath, 'utf8'));
  } catch (err) {
    throw new ConfigurationError(`cannot read ${cfgPath}: ${errorMessage(err)}`, { cause: err });
  }
  return parseConfig(raw, env);
}
