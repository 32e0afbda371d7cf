import type { DocumentStore } from '@/lib/document-store';

/**
 * In-process fallback for when no KV endpoint is wanted (local dev, tests).
 * Documents are held serialized so callers never share references with the store.
 */
export class MemoryDocumentStore implements DocumentStore {
  private readonly documents = new Map<string, string>();

  async read(key: string): Promise<unknown> {
    const raw = this.documents.get(key);
    return raw === undefined ? null : JSON.parse(raw);
  }

  async readMany(keys: string[]): Promise<unknown[]> {
    return Promise.all(keys.map((key) => this.read(key)));
  }

  async writeIfAbsent(key: string, value: unknown): Promise<boolean> {
    if (this.documents.has(key)) return false;
    this.documents.set(key, JSON.stringify(value));
    return true;
  }

  async writeIfPresent(key: string, value: unknown): Promise<boolean> {
    if (!this.documents.has(key)) return false;
    this.documents.set(key, JSON.stringify(value));
    return true;
  }

  async remove(keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of new Set(keys)) {
      if (this.documents.delete(key)) removed++;
    }
    return removed;
  }

  async keysWithPrefix(prefix: string): Promise<string[]> {
    return [...this.documents.keys()].filter((key) => key.startsWith(prefix));
  }

  async ping(): Promise<void> {}

  /** Raw write with no existence check; seeds fixtures and corrupt documents. */
  async put(key: string, value: unknown): Promise<void> {
    this.documents.set(key, JSON.stringify(value));
  }

  get size(): number {
    return this.documents.size;
  }
}
