import { Writable } from 'stream';
import { StoreClient, StoreValueType } from './store_client';

export type Mutation =
  | { op: 'SET'; key: string; value: string }
  | { op: 'SADD'; key: string; members: string[] }
  | { op: 'SREM'; key: string; members: string[] }
  | { op: 'DEL'; keys: string[] };

/**
 * Describes mutations instead of performing them: each one is written to the
 * sink as a JSON line for an external orchestrator to apply. Reads go to the
 * optional backing store, so planning can still see what is indexed.
 */
export class DescriptiveStoreClient implements StoreClient {
  readonly emitted: Mutation[] = [];

  constructor(private sink: Writable, private reader?: StoreClient) {}

  private emit(mutation: Mutation) {
    this.emitted.push(mutation);
    this.sink.write(`${JSON.stringify(mutation)}\n`);
  }

  async get(key: string) {
    return this.reader ? this.reader.get(key) : null;
  }

  async set(key: string, value: string) {
    this.emit({ op: 'SET', key, value });
  }

  async setAdd(key: string, ...members: string[]) {
    if (members.length) this.emit({ op: 'SADD', key, members });
    return members.length;
  }

  async setRemove(key: string, ...members: string[]) {
    if (members.length) this.emit({ op: 'SREM', key, members });
    return members.length;
  }

  async members(key: string) {
    return this.reader ? this.reader.members(key) : [];
  }

  async typeOf(key: string): Promise<StoreValueType> {
    return this.reader ? this.reader.typeOf(key) : 'none';
  }

  async delete(...keys: string[]) {
    if (keys.length) this.emit({ op: 'DEL', keys });
    return keys.length;
  }

  async scanPrefix(prefix: string) {
    return this.reader ? this.reader.scanPrefix(prefix) : [];
  }

  async close() {
    if (this.reader) await this.reader.close();
  }
}
