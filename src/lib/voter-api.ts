// === 🗳️ VOTER REST HANDLERS ===

import { NextResponse } from 'next/server';
import { HistoryLogger, Logger, VoterLogger } from '@/lib/logger';
import { statusForError } from '@/lib/voter-errors';
import { parseId, validateHistoryPayload, validateVoterPayload } from '@/lib/voter-payload-validator';
import type { VoterRepository } from '@/lib/voter-store';
import { VOTER_HEALTH_REPORT } from '@/types/voter';

const NO_CACHE_HEADERS = {
  'cache-control': 'no-cache, no-store, must-revalidate',
};

const STATUS_TEXT: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  409: 'Conflict',
  500: 'Internal Server Error',
};

type JsonBody = { ok: true; value: unknown } | { ok: false };

function txtResponse(body: string, status = 200) {
  return new NextResponse(body, {
    status,
    headers: {
      'content-type': 'text/plain; charset=utf-8',
      ...NO_CACHE_HEADERS,
    },
  });
}

function jsonResponse(obj: unknown, status = 200) {
  return NextResponse.json(obj, { status, headers: NO_CACHE_HEADERS });
}

/** Errors carry only the status and its reason phrase. */
function errorResponse(status: number) {
  return txtResponse(STATUS_TEXT[status] ?? 'Error', status);
}

async function readJson(request: Request): Promise<JsonBody> {
  try {
    return { ok: true, value: await request.json() };
  } catch {
    return { ok: false };
  }
}

function fail(logger: Logger, message: string, error: unknown) {
  const status = statusForError(error);
  logger.error(`${message} (${status})`, error);
  return errorResponse(status);
}

export interface VoterApi {
  listVoters(): Promise<NextResponse>;
  getVoter(id: string): Promise<NextResponse>;
  createVoter(request: Request): Promise<NextResponse>;
  replaceVoter(request: Request): Promise<NextResponse>;
  deleteVoter(id: string): Promise<NextResponse>;
  deleteAllVoters(): Promise<NextResponse>;
  listVoterPolls(id: string): Promise<NextResponse>;
  getVoterPoll(id: string, pollId: string): Promise<NextResponse>;
  addVoterPoll(request: Request, id: string, pollId: string): Promise<NextResponse>;
  replaceVoterPoll(request: Request, id: string, pollId: string): Promise<NextResponse>;
  deleteVoterPoll(id: string, pollId: string): Promise<NextResponse>;
}

/** Static health report; never touches the store. */
export function healthResponse() {
  return jsonResponse(VOTER_HEALTH_REPORT);
}

export function createVoterApi(repository: VoterRepository, now: () => Date = () => new Date()): VoterApi {
  /** Parsed and validated voter body, or null when it is malformed. */
  async function readVoter(request: Request) {
    const body = await readJson(request);
    if (!body.ok) {
      VoterLogger.warn('Malformed JSON body');
      return null;
    }
    const voter = validateVoterPayload(body.value, now);
    if (!voter) VoterLogger.warn('Invalid voter body', body.value);
    return voter;
  }

  async function readHistory(request: Request, pollId: number) {
    const body = await readJson(request);
    if (!body.ok) {
      HistoryLogger.warn('Malformed JSON body');
      return null;
    }
    const entry = validateHistoryPayload(body.value, pollId, now);
    if (!entry) HistoryLogger.warn(`Invalid history body for poll ${pollId}`, body.value);
    return entry;
  }

  function parsePair(id: string, pollId: string) {
    const voterId = parseId(id);
    const poll = parseId(pollId);
    return voterId === null || poll === null ? null : { voterId, pollId: poll };
  }

  return {
    async listVoters() {
      try {
        return jsonResponse(await repository.listVoters());
      } catch (error) {
        return fail(VoterLogger, 'Error getting all voters', error);
      }
    },

    async getVoter(rawId) {
      const id = parseId(rawId);
      if (id === null) return errorResponse(400);
      try {
        return jsonResponse(await repository.getVoter(id));
      } catch (error) {
        return fail(VoterLogger, `Error getting voter ${id}`, error);
      }
    },

    async createVoter(request) {
      const voter = await readVoter(request);
      if (!voter) return errorResponse(400);
      try {
        const added = await repository.addVoter(voter);
        VoterLogger.info(`Added voter ${added.id}`);
        return jsonResponse(added);
      } catch (error) {
        return fail(VoterLogger, `Error adding voter ${voter.id}`, error);
      }
    },

    async replaceVoter(request) {
      const voter = await readVoter(request);
      if (!voter) return errorResponse(400);
      try {
        return jsonResponse(await repository.replaceVoter(voter));
      } catch (error) {
        return fail(VoterLogger, `Error updating voter ${voter.id}`, error);
      }
    },

    async deleteVoter(rawId) {
      const id = parseId(rawId);
      if (id === null) return errorResponse(400);
      try {
        await repository.deleteVoter(id);
        return txtResponse('Delete OK');
      } catch (error) {
        return fail(VoterLogger, `Error deleting voter ${id}`, error);
      }
    },

    async deleteAllVoters() {
      try {
        const removed = await repository.deleteAllVoters();
        VoterLogger.info(`Deleted ${removed} voters`);
        return txtResponse(`Delete All OK: ${removed} voters removed`);
      } catch (error) {
        return fail(VoterLogger, 'Error deleting all voters', error);
      }
    },

    async listVoterPolls(rawId) {
      const id = parseId(rawId);
      if (id === null) return errorResponse(400);
      try {
        return jsonResponse(await repository.getVoterPolls(id));
      } catch (error) {
        return fail(HistoryLogger, `Error getting polls for voter ${id}`, error);
      }
    },

    async getVoterPoll(rawId, rawPollId) {
      const ids = parsePair(rawId, rawPollId);
      if (!ids) return errorResponse(400);
      try {
        return jsonResponse(await repository.getVoterPoll(ids.voterId, ids.pollId));
      } catch (error) {
        return fail(HistoryLogger, `Error getting poll ${ids.pollId} for voter ${ids.voterId}`, error);
      }
    },

    async addVoterPoll(request, rawId, rawPollId) {
      const ids = parsePair(rawId, rawPollId);
      if (!ids) return errorResponse(400);
      const entry = await readHistory(request, ids.pollId);
      if (!entry) return errorResponse(400);
      try {
        return jsonResponse(await repository.addVoterPoll(ids.voterId, entry));
      } catch (error) {
        return fail(HistoryLogger, `Error adding poll ${ids.pollId} for voter ${ids.voterId}`, error);
      }
    },

    async replaceVoterPoll(request, rawId, rawPollId) {
      const ids = parsePair(rawId, rawPollId);
      if (!ids) return errorResponse(400);
      const entry = await readHistory(request, ids.pollId);
      if (!entry) return errorResponse(400);
      try {
        return jsonResponse(await repository.replaceVoterPoll(ids.voterId, ids.pollId, entry));
      } catch (error) {
        return fail(HistoryLogger, `Error updating poll ${ids.pollId} for voter ${ids.voterId}`, error);
      }
    },

    async deleteVoterPoll(rawId, rawPollId) {
      const ids = parsePair(rawId, rawPollId);
      if (!ids) return errorResponse(400);
      try {
        await repository.deleteVoterPoll(ids.voterId, ids.pollId);
        return txtResponse('Voter history deleted successfully');
      } catch (error) {
        return fail(HistoryLogger, `Error deleting poll ${ids.pollId} for voter ${ids.voterId}`, error);
      }
    },
  };
}
