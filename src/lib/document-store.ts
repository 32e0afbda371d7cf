/**
 * JSON document store backing the voter repository.
 * Values are plain JSON-serializable objects; the KV client handles (de)serialization.
 */

import { createClient } from '@vercel/kv';

export type KvClient = ReturnType<typeof createClient>;

/** The KV commands the document store issues. */
export type KvCommands = Pick<KvClient, 'get' | 'mget' | 'set' | 'del' | 'keys' | 'ping'>;

export interface DocumentStore {
  /** Parsed document at key, or null when the key is absent. */
  read(key: string): Promise<unknown>;
  /** One entry per key, null for keys that are absent. */
  readMany(keys: string[]): Promise<unknown[]>;
  /** Write only if the key does not exist yet. Returns false when it already did. */
  writeIfAbsent(key: string, value: unknown): Promise<boolean>;
  /** Write only if the key already exists. Returns false when it did not. */
  writeIfPresent(key: string, value: unknown): Promise<boolean>;
  /** Number of keys actually removed. */
  remove(keys: string[]): Promise<number>;
  keysWithPrefix(prefix: string): Promise<string[]>;
  /** Rejects when the store cannot be reached. */
  ping(): Promise<void>;
}

export function createKvDocumentStore(client: KvCommands): DocumentStore {
  return {
    async read(key) {
      return client.get<unknown>(key);
    },

    async readMany(keys) {
      if (keys.length === 0) return [];
      return client.mget<unknown[]>(keys);
    },

    async writeIfAbsent(key, value) {
      const result = await client.set(key, value, { nx: true });
      return result !== null && result !== undefined;
    },

    async writeIfPresent(key, value) {
      const result = await client.set(key, value, { xx: true });
      return result !== null && result !== undefined;
    },

    async remove(keys) {
      if (keys.length === 0) return 0;
      return client.del(...keys);
    },

    async keysWithPrefix(prefix) {
      return client.keys(`${prefix}*`);
    },

    async ping() {
      await client.ping();
    },
  };
}

/** KV client for the configured REST endpoint. */
export function connectKvDocumentStore(url: string, token: string): DocumentStore {
  return createKvDocumentStore(createClient({ url, token }));
}
