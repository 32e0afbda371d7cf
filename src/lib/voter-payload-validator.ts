// Validation for voter and poll-history payloads (request bodies and stored documents)

import type { VoterHistory, VoterItem } from '@/types/voter';

const ID_PATTERN = /^-?\d+$/;
// Calendar date, optionally with time and offset: 2024-05-01, 2024-05-01T10:00:00Z, 2024-05-01T10:00:00.000+02:00
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isValidString(s: unknown): s is string {
  return typeof s === 'string';
}

function isValidId(n: unknown): n is number {
  return typeof n === 'number' && Number.isSafeInteger(n);
}

function normalizeDate(value: unknown): string | null {
  if (typeof value !== 'string' || !ISO_DATE_PATTERN.test(value)) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

/**
 * Parses a path segment as an integer id. Returns null if malformed.
 */
export function parseId(raw: string | undefined): number | null {
  if (raw === undefined || !ID_PATTERN.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : null;
}

function sanitizeHistory(obj: unknown, now: () => Date): VoterHistory | null {
  if (!isRecord(obj)) return null;
  if (!isValidId(obj.pollId) || !isValidId(obj.voteId)) return null;
  const voteDate = obj.voteDate === undefined ? now().toISOString() : normalizeDate(obj.voteDate);
  if (voteDate === null) return null;
  return { pollId: obj.pollId, voteId: obj.voteId, voteDate };
}

function sanitizeHistoryList(value: unknown, now: () => Date): VoterHistory[] | null {
  // Absent or null history is an empty one
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) return null;
  const history: VoterHistory[] = [];
  for (const entry of value) {
    const sanitized = sanitizeHistory(entry, now);
    if (!sanitized) return null;
    history.push(sanitized);
  }
  return history;
}

/**
 * Validates and sanitizes a voter body or stored voter document. Returns null if invalid.
 * Unknown properties are dropped.
 */
export function validateVoterPayload(body: unknown, now: () => Date = () => new Date()): VoterItem | null {
  if (!isRecord(body)) return null;
  if (!isValidId(body.id) || !isValidString(body.name) || !isValidString(body.email)) return null;
  const voteHistory = sanitizeHistoryList(body.voteHistory, now);
  if (!voteHistory) return null;
  return { id: body.id, name: body.name, email: body.email, voteHistory };
}

/**
 * Validates a poll-history body addressed to `pollId`. The path id wins: a body pollId
 * must match it, and is filled in from it when missing. Returns null if invalid.
 */
export function validateHistoryPayload(
  body: unknown,
  pollId: number,
  now: () => Date = () => new Date()
): VoterHistory | null {
  if (!isRecord(body)) return null;
  if (body.pollId !== undefined && body.pollId !== pollId) return null;
  return sanitizeHistory({ ...body, pollId }, now);
}
