/**
 * Voter records and their embedded poll history, as stored in KV and sent over the wire.
 */

export interface VoterHistory {
  pollId: number;
  voteId: number;
  /** ISO-8601 timestamp of the vote */
  voteDate: string;
}

export interface VoterItem {
  id: number;
  name: string;
  email: string;
  voteHistory: VoterHistory[];
}

export interface VoterHealthReport {
  status: 'ok';
  version: string;
  uptime: number;
  users_processed: number;
  errors_encountered: number;
}

export const VOTER_KEY_PREFIX = 'voters:';

export const VOTER_HEALTH_REPORT: VoterHealthReport = {
  status: 'ok',
  version: '1.0.0',
  uptime: 100,
  users_processed: 1000,
  errors_encountered: 10,
};

export function voterKey(id: number): string {
  return `${VOTER_KEY_PREFIX}${id}`;
}
