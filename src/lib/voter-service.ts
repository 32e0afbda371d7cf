/**
 * Process-wide voter API, built on first use from the store configuration.
 */

import { connectKvDocumentStore } from '@/lib/document-store';
import type { DocumentStore } from '@/lib/document-store';
import { loadStoreConfig } from '@/lib/env-validator';
import type { StoreConfig } from '@/lib/env-validator';
import { StoreLogger } from '@/lib/logger';
import { MemoryDocumentStore } from '@/lib/memory-document-store';
import { createVoterApi } from '@/lib/voter-api';
import type { VoterApi } from '@/lib/voter-api';
import { VoterRepository } from '@/lib/voter-store';

let _store: DocumentStore | null = null;
let _voterApi: VoterApi | null = null;

export function createDocumentStore(config: StoreConfig): DocumentStore {
  if (config.driver === 'memory') {
    StoreLogger.warn('Using in-memory voter store');
    return new MemoryDocumentStore();
  }
  StoreLogger.debug(`Using KV store at ${config.url}`);
  return connectKvDocumentStore(config.url, config.token);
}

function getDocumentStore(): DocumentStore {
  if (!_store) {
    _store = createDocumentStore(loadStoreConfig());
  }
  return _store;
}

export function getVoterApi(): VoterApi {
  if (!_voterApi) {
    _voterApi = createVoterApi(new VoterRepository(getDocumentStore()));
  }
  return _voterApi;
}

/** Pings the configured store; logs and resolves false when it cannot be reached. */
export async function checkStoreConnection(): Promise<boolean> {
  try {
    await getDocumentStore().ping();
    StoreLogger.info('Store connection OK');
    return true;
  } catch (error) {
    StoreLogger.error('Error connecting to store', error);
    return false;
  }
}

/** Drops the cached store and API so the next call re-reads configuration. */
export function resetVoterApi(): void {
  _store = null;
  _voterApi = null;
}
