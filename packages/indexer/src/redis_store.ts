import Redis from 'ioredis';
import { StoreConnectionError, StoreOperationError, errorMessage } from './errors';
import { createLogger } from './log';
import { StoreClient, StoreValueType } from './store_client';

const log = createLogger('redis');

const DELETE_CHUNK = 500;

export interface RedisStoreOptions {
  connectTimeoutMs?: number;
}

export function escapeGlob(text: string): string {
  return text.replace(/[*?[\]\\]/g, '\\$&');
}

/** Redis answered, but refused this command (WRONGTYPE and friends). */
export function isReplyError(err: unknown): boolean {
  return err instanceof Error && err.name === 'ReplyError';
}

export class RedisStoreClient implements StoreClient {
  private redis: Redis;
  private ready?: Promise<void>;

  constructor(private url: string, options: RedisStoreOptions = {}) {
    this.redis = new Redis(url, {
      lazyConnect: true,
      connectTimeout: options.connectTimeoutMs ?? 5000,
      maxRetriesPerRequest: 1,
      retryStrategy: times => (times > 3 ? null : Math.min(times * 200, 1000)),
    });
    this.redis.on('error', err => log.debug(`connection event: ${errorMessage(err)}`));
  }

  private connect(): Promise<void> {
    if (!this.ready) {
      this.ready = this.redis.connect().catch(err => {
        this.ready = undefined;
        throw new StoreConnectionError(`cannot connect to ${redactUrl(this.url)}: ${errorMessage(err)}`, { cause: err });
      });
    }
    return this.ready;
  }

  private async run<T>(key: string, op: (redis: Redis) => Promise<T>): Promise<T> {
    await this.connect();
    try {
      return await op(this.redis);
    } catch (err) {
      if (isReplyError(err)) throw new StoreOperationError(key, errorMessage(err), { cause: err });
      throw new StoreConnectionError(`redis command failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  get(key: string) {
    return this.run(key, redis => redis.get(key));
  }

  async set(key: string, value: string) {
    await this.run(key, redis => redis.set(key, value));
  }

  setAdd(key: string, ...members: string[]) {
    if (members.length === 0) return Promise.resolve(0);
    return this.run(key, redis => redis.sadd(key, ...members));
  }

  setRemove(key: string, ...members: string[]) {
    if (members.length === 0) return Promise.resolve(0);
    return this.run(key, redis => redis.srem(key, ...members));
  }

  members(key: string) {
    return this.run(key, redis => redis.smembers(key));
  }

  async typeOf(key: string): Promise<StoreValueType> {
    const type = await this.run(key, redis => redis.type(key));
    return type === 'string' || type === 'set' || type === 'none' ? type : 'other';
  }

  async delete(...keys: string[]) {
    let removed = 0;
    for (let i = 0; i < keys.length; i += DELETE_CHUNK) {
      const chunk = keys.slice(i, i + DELETE_CHUNK);
      removed += await this.run(chunk[0], redis => redis.del(...chunk));
    }
    return removed;
  }

  scanPrefix(prefix: string) {
    return this.run(prefix, async redis => {
      const keys = new Set<string>();
      const stream = redis.scanStream({ match: `${escapeGlob(prefix)}*`, count: 500 });
      for await (const batch of stream) {
        if (!Array.isArray(batch)) continue;
        for (const key of batch) if (typeof key === 'string') keys.add(key);
      }
      return Array.from(keys);
    });
  }

  async close() {
    if (this.redis.status === 'wait' || this.redis.status === 'end') {
      this.redis.disconnect();
      return;
    }
    await this.redis.quit();
  }
}

export function redactUrl(url: string): string {
  return url.replace(/\/\/([^@/]*)@/, '//***@');
}
