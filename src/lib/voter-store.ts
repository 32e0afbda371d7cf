/**
 * Voter data access on top of a JSON document store.
 * One document per voter under `voters:<id>`; poll history lives inside that document
 * and is changed by rewriting the whole document (no version token, last writer wins).
 */

import type { DocumentStore } from '@/lib/document-store';
import { StoreLogger } from '@/lib/logger';
import { VoterStoreError } from '@/lib/voter-errors';
import { validateVoterPayload } from '@/lib/voter-payload-validator';
import { VOTER_KEY_PREFIX, voterKey } from '@/types/voter';
import type { VoterHistory, VoterItem } from '@/types/voter';

export class VoterRepository {
  constructor(private readonly store: DocumentStore) {}

  async addVoter(voter: VoterItem): Promise<VoterItem> {
    const key = voterKey(voter.id);
    const written = await this.call(`add ${key}`, () => this.store.writeIfAbsent(key, voter));
    if (!written) {
      throw VoterStoreError.alreadyExists(`voter ${voter.id} already exists`);
    }
    return voter;
  }

  /** Full overwrite; no field merge. */
  async replaceVoter(voter: VoterItem): Promise<VoterItem> {
    const key = voterKey(voter.id);
    const written = await this.call(`replace ${key}`, () => this.store.writeIfPresent(key, voter));
    if (!written) {
      throw VoterStoreError.notFound(`voter ${voter.id} does not exist`);
    }
    return voter;
  }

  async getVoter(id: number): Promise<VoterItem> {
    const key = voterKey(id);
    const raw = await this.call(`get ${key}`, () => this.store.read(key));
    if (raw === null || raw === undefined) {
      throw VoterStoreError.notFound(`voter ${id} not found`);
    }
    return this.decode(key, raw);
  }

  async deleteVoter(id: number): Promise<void> {
    const key = voterKey(id);
    const removed = await this.call(`delete ${key}`, () => this.store.remove([key]));
    if (removed === 0) {
      throw VoterStoreError.notFound(`attempted to delete non-existent voter ${id}`);
    }
  }

  /** Removes every key under the voter prefix; resolves to the number removed. */
  async deleteAllVoters(): Promise<number> {
    const keys = await this.call('list keys', () => this.store.keysWithPrefix(VOTER_KEY_PREFIX));
    if (keys.length === 0) return 0;
    const removed = await this.call('delete all', () => this.store.remove(keys));
    if (removed !== keys.length) {
      throw new VoterStoreError('store_failure', `deleted ${removed} of ${keys.length} voters`);
    }
    return removed;
  }

  /** All voters ordered by id; empty when none are stored. */
  async listVoters(): Promise<VoterItem[]> {
    const keys = await this.call('list keys', () => this.store.keysWithPrefix(VOTER_KEY_PREFIX));
    const documents = await this.call('read all', () => this.store.readMany(keys));
    const voters: VoterItem[] = [];
    documents.forEach((raw, index) => {
      // Deleted between the key listing and the read
      if (raw === null || raw === undefined) return;
      voters.push(this.decode(keys[index], raw));
    });
    return voters.sort((a, b) => a.id - b.id);
  }

  // === 📜 POLL HISTORY ===

  async getVoterPolls(id: number): Promise<VoterHistory[]> {
    const voter = await this.getVoter(id);
    return voter.voteHistory;
  }

  async getVoterPoll(id: number, pollId: number): Promise<VoterHistory> {
    const voter = await this.getVoter(id);
    const entry = voter.voteHistory.find((h) => h.pollId === pollId);
    if (!entry) {
      throw VoterStoreError.notFound(`voter ${id} has no history for poll ${pollId}`);
    }
    return entry;
  }

  async addVoterPoll(id: number, entry: VoterHistory): Promise<VoterHistory> {
    const voter = await this.getVoter(id);
    if (voter.voteHistory.some((h) => h.pollId === entry.pollId)) {
      throw VoterStoreError.alreadyExists(`voter ${id} already has history for poll ${entry.pollId}`);
    }
    voter.voteHistory.push(entry);
    await this.writeBack(voter);
    return entry;
  }

  async replaceVoterPoll(id: number, pollId: number, entry: VoterHistory): Promise<VoterHistory> {
    const voter = await this.getVoter(id);
    const index = voter.voteHistory.findIndex((h) => h.pollId === pollId);
    if (index === -1) {
      throw VoterStoreError.notFound(`voter ${id} has no history for poll ${pollId}`);
    }
    voter.voteHistory[index] = entry;
    await this.writeBack(voter);
    return entry;
  }

  async deleteVoterPoll(id: number, pollId: number): Promise<void> {
    const voter = await this.getVoter(id);
    const remaining = voter.voteHistory.filter((h) => h.pollId !== pollId);
    if (remaining.length === voter.voteHistory.length) {
      throw VoterStoreError.notFound(`voter ${id} has no history for poll ${pollId}`);
    }
    await this.writeBack({ ...voter, voteHistory: remaining });
  }

  // A voter removed since it was read is reported missing, not recreated
  private async writeBack(voter: VoterItem): Promise<void> {
    await this.replaceVoter(voter);
  }

  private decode(key: string, raw: unknown): VoterItem {
    const voter = validateVoterPayload(raw);
    if (!voter) {
      StoreLogger.error(`Stored document at ${key} is not a valid voter`, raw);
      throw new VoterStoreError('invalid_document', `stored document at ${key} is not a valid voter`);
    }
    return voter;
  }

  private async call<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      StoreLogger.error(`Store ${operation} failed`, error);
      throw new VoterStoreError('store_failure', `store ${operation} failed`, { cause: error });
    }
  }
}
