import { Env, PROVIDER_KEY_VARS, requireCredential } from './credentials';
import { InvalidInputError, ProviderUnavailableError, RateLimitedError, errorMessage } from './errors';
import { createLogger } from './log';

const log = createLogger('embedder');

/** One vector per input text, in input order. */
export interface Embedder {
  readonly providerId: string;
  readonly modelId: string;
  embed(texts: string[]): Promise<number[][]>;
}

export type EmbeddingProviderId = 'openai' | 'huggingface' | 'hash';

export const EMBEDDING_PROVIDERS: readonly EmbeddingProviderId[] = ['openai', 'huggingface', 'hash'];

export interface EmbeddingSettings {
  provider: EmbeddingProviderId;
  model: string;
  baseUrl?: string;
  dimensions?: number;
}

export const DEFAULT_MODELS: Record<EmbeddingProviderId, string> = {
  openai: 'text-embedding-3-small',
  huggingface: 'sentence-transformers/all-MiniLM-L6-v2',
  hash: 'hash-96',
};

/**
 * Hashed bag-of-words embedding: deterministic, offline and free. Good
 * enough to match identifiers and docstring words; it knows nothing about
 * meaning.
 */
export function buildTextEmbedding(text: string, dim = 96): number[] {
  const tokens = text
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean);
  const vector = new Array<number>(dim).fill(0);
  for (const token of tokens) {
    let hash = 0;
    for (let i = 0; i < token.length; i += 1) {
      hash = (hash * 31 + token.charCodeAt(i)) >>> 0;
    }
    vector[hash % dim] += 1;
  }
  const norm = Math.sqrt(vector.reduce((acc, v) => acc + v * v, 0)) || 1;
  return vector.map(v => Number((v / norm).toFixed(6)));
}

export class HashEmbedder implements Embedder {
  readonly providerId = 'hash';
  readonly modelId: string;

  constructor(private dimensions = 96) {
    this.modelId = `hash-${dimensions}`;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(text => buildTextEmbedding(text, this.dimensions));
  }
}

function retryAfterMs(response: Response): number | undefined {
  const header = response.headers.get('retry-after');
  if (!header) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) ? seconds * 1000 : undefined;
}

async function failureFor(providerId: string, response: Response): Promise<Error> {
  const body = await response.text().catch(() => '');
  const detail = `${response.status} ${response.statusText}${body ? ` - ${body.slice(0, 300)}` : ''}`;
  if (response.status === 429) return new RateLimitedError(providerId, retryAfterMs(response));
  if (response.status === 400 || response.status === 413 || response.status === 422) {
    return new InvalidInputError(providerId, detail);
  }
  return new ProviderUnavailableError(providerId, detail);
}

async function post(providerId: string, url: string, apiKey: string, body: unknown): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'content-type': 'application/json', authorization: `Bearer ${apiKey}` },
      body: JSON.stringify(body),
    });
  } catch (err) {
    throw new ProviderUnavailableError(providerId, errorMessage(err), { cause: err });
  }
  if (!response.ok) throw await failureFor(providerId, response);
  try {
    return await response.json();
  } catch (err) {
    throw new ProviderUnavailableError(providerId, `unreadable response: ${errorMessage(err)}`, { cause: err });
  }
}

function isVector(value: unknown): value is number[] {
  return Array.isArray(value) && value.length > 0 && value.every(v => typeof v === 'number');
}

function checkCount(providerId: string, vectors: number[][], texts: string[]): number[][] {
  if (vectors.length !== texts.length) {
    throw new ProviderUnavailableError(providerId, `returned ${vectors.length} vectors for ${texts.length} inputs`);
  }
  return vectors;
}

export class OpenAIEmbedder implements Embedder {
  readonly providerId = 'openai';

  constructor(private apiKey: string, readonly modelId: string = DEFAULT_MODELS.openai, private baseUrl = 'https://api.openai.com') {}

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const url = `${this.baseUrl.replace(/\/+$/, '')}/v1/embeddings`;
    const parsed = await post(this.providerId, url, this.apiKey, { model: this.modelId, input: texts });
    const data = typeof parsed === 'object' && parsed !== null && 'data' in parsed ? parsed.data : undefined;
    if (!Array.isArray(data)) throw new ProviderUnavailableError(this.providerId, 'response missing data');
    const items: Array<{ index: number; embedding: number[] }> = [];
    for (const [position, item] of data.entries()) {
      const embedding = typeof item === 'object' && item !== null && 'embedding' in item ? item.embedding : undefined;
      const index = typeof item === 'object' && item !== null && 'index' in item && typeof item.index === 'number' ? item.index : position;
      if (!isVector(embedding)) throw new ProviderUnavailableError(this.providerId, `item ${position} has no embedding`);
      items.push({ index, embedding });
    }
    items.sort((a, b) => a.index - b.index);
    return checkCount(this.providerId, items.map(item => item.embedding), texts);
  }
}

/** Mean of token vectors, for models that answer with one vector per token. */
export function meanPool(tokens: number[][]): number[] {
  const dim = tokens[0]?.length ?? 0;
  const sum = new Array<number>(dim).fill(0);
  for (const token of tokens) token.forEach((v, i) => (sum[i] += v));
  return sum.map(v => v / Math.max(tokens.length, 1));
}

export class HuggingFaceEmbedder implements Embedder {
  readonly providerId = 'huggingface';

  constructor(
    private apiKey: string,
    readonly modelId: string = DEFAULT_MODELS.huggingface,
    private baseUrl = 'https://api-inference.huggingface.co',
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const url = `${this.baseUrl.replace(/\/+$/, '')}/pipeline/feature-extraction/${this.modelId}`;
    const parsed = await post(this.providerId, url, this.apiKey, { inputs: texts, options: { wait_for_model: true } });
    if (!Array.isArray(parsed)) throw new ProviderUnavailableError(this.providerId, 'response is not a list');
    const vectors = parsed.map((item: unknown, position) => {
      if (isVector(item)) return item;
      if (Array.isArray(item) && item.every(isVector)) return meanPool(item);
      throw new ProviderUnavailableError(this.providerId, `item ${position} is not a vector`);
    });
    return checkCount(this.providerId, vectors, texts);
  }
}

/** Picks the provider once, from configuration; keys come from the environment. */
export function createEmbedder(settings: EmbeddingSettings, env: Env = process.env): Embedder {
  switch (settings.provider) {
    case 'openai':
      return new OpenAIEmbedder(requireCredential(PROVIDER_KEY_VARS.openai, env), settings.model, settings.baseUrl);
    case 'huggingface':
      return new HuggingFaceEmbedder(requireCredential(PROVIDER_KEY_VARS.huggingface, env), settings.model, settings.baseUrl);
    case 'hash': {
      const embedder = new HashEmbedder(settings.dimensions);
      log.debug(`using offline ${embedder.modelId} embeddings`);
      return embedder;
    }
  }
}
