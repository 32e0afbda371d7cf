import { beforeEach, describe, expect, it } from 'vitest';
import { MemoryDocumentStore } from '@/lib/memory-document-store';
import { createVoterApi, healthResponse } from '@/lib/voter-api';
import type { VoterApi } from '@/lib/voter-api';
import { VoterRepository } from '@/lib/voter-store';

const NOW = '2024-01-01T00:00:00.000Z';
const jane = { id: 1, name: 'Jane Smith', email: 'jane@example.com' };

function jsonRequest(method: string, path: string, body: unknown): Request {
  return new Request(`http://localhost${path}`, {
    method,
    headers: { 'content-type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

class BrokenStore extends MemoryDocumentStore {
  async keysWithPrefix(): Promise<string[]> {
    throw new Error('store unavailable');
  }
}

describe('voter API', () => {
  let api: VoterApi;

  beforeEach(() => {
    api = createVoterApi(new VoterRepository(new MemoryDocumentStore()), () => new Date(NOW));
  });

  it('returns an empty array when there are no voters', async () => {
    const res = await api.listVoters();
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual([]);
  });

  it('creates a voter and returns it', async () => {
    const res = await api.createVoter(jsonRequest('POST', '/voters', jane));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ...jane, voteHistory: [] });
    expect(res.headers.get('cache-control')).toBe('no-cache, no-store, must-revalidate');
  });

  it('answers a duplicate insert with 409', async () => {
    await api.createVoter(jsonRequest('POST', '/voters', jane));
    const res = await api.createVoter(jsonRequest('POST', '/voters', jane));
    expect(res.status).toBe(409);
    expect(await res.text()).toBe('Conflict');
  });

  it('rejects malformed and mistyped bodies with 400', async () => {
    const malformed = await api.createVoter(jsonRequest('POST', '/voters', '{not json'));
    expect(malformed.status).toBe(400);
    expect(await malformed.text()).toBe('Bad Request');

    const mistyped = await api.createVoter(jsonRequest('POST', '/voters', { ...jane, id: 'one' }));
    expect(mistyped.status).toBe(400);
  });

  it('rejects a malformed path id with 400', async () => {
    expect((await api.getVoter('abc')).status).toBe(400);
    expect((await api.deleteVoter('1x')).status).toBe(400);
    expect((await api.listVoterPolls('')).status).toBe(400);
    expect((await api.getVoterPoll('1', 'x')).status).toBe(400);
  });

  it('answers a missing voter with 404', async () => {
    const res = await api.getVoter('9');
    expect(res.status).toBe(404);
    expect(await res.text()).toBe('Not Found');
  });

  it('replaces an existing voter and 404s on a missing one', async () => {
    const missing = await api.replaceVoter(jsonRequest('PUT', '/voters', jane));
    expect(missing.status).toBe(404);

    await api.createVoter(jsonRequest('POST', '/voters', jane));
    const replaced = await api.replaceVoter(jsonRequest('PUT', '/voters', { ...jane, email: 'smith@example.com' }));
    expect(replaced.status).toBe(200);
    expect(await (await api.getVoter('1')).json()).toEqual({ ...jane, email: 'smith@example.com', voteHistory: [] });
  });

  it('deletes a voter with a plain confirmation', async () => {
    await api.createVoter(jsonRequest('POST', '/voters', jane));
    const res = await api.deleteVoter('1');
    expect(res.status).toBe(200);
    expect(await res.text()).toBe('Delete OK');
    expect((await api.deleteVoter('1')).status).toBe(404);
  });

  it('deletes all voters and reports the count', async () => {
    await api.createVoter(jsonRequest('POST', '/voters', jane));
    await api.createVoter(jsonRequest('POST', '/voters', { ...jane, id: 2 }));
    const res = await api.deleteAllVoters();
    expect(res.status).toBe(200);
    expect(await res.text()).toBe('Delete All OK: 2 voters removed');
    expect(await (await api.listVoters()).json()).toEqual([]);
  });

  it('maps store failures to 500', async () => {
    const broken = createVoterApi(new VoterRepository(new BrokenStore()));
    const res = await broken.listVoters();
    expect(res.status).toBe(500);
    expect(await res.text()).toBe('Internal Server Error');
  });

  describe('poll history', () => {
    beforeEach(async () => {
      await api.createVoter(jsonRequest('POST', '/voters', jane));
    });

    it('records a vote and reads it back', async () => {
      const added = await api.addVoterPoll(jsonRequest('POST', '/voters/1/polls/1', { pollId: 1, voteId: 1 }), '1', '1');
      expect(added.status).toBe(200);
      expect(await added.json()).toEqual({ pollId: 1, voteId: 1, voteDate: NOW });

      const single = await api.getVoterPoll('1', '1');
      expect(single.status).toBe(200);
      const entry = await single.json();
      expect(entry.pollId).toBe(1);
      expect(entry.voteId).toBe(1);

      const voters = await (await api.listVoters()).json();
      expect(voters).toHaveLength(1);
    });

    it('lists history as an empty array for a voter with no votes', async () => {
      const res = await api.listVoterPolls('1');
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual([]);
    });

    it('answers a duplicate poll with 409', async () => {
      await api.addVoterPoll(jsonRequest('POST', '/voters/1/polls/1', { voteId: 1 }), '1', '1');
      const res = await api.addVoterPoll(jsonRequest('POST', '/voters/1/polls/1', { voteId: 2 }), '1', '1');
      expect(res.status).toBe(409);
    });

    it('rejects a body poll id that disagrees with the path', async () => {
      const res = await api.addVoterPoll(jsonRequest('POST', '/voters/1/polls/1', { pollId: 2, voteId: 1 }), '1', '1');
      expect(res.status).toBe(400);
    });

    it('rejects a vote date that is not ISO-8601 with 400', async () => {
      const res = await api.addVoterPoll(jsonRequest('POST', '/voters/1/polls/1', { voteId: 1, voteDate: '1' }), '1', '1');
      expect(res.status).toBe(400);
      expect(await (await api.listVoterPolls('1')).json()).toEqual([]);
    });

    it('404s when adding history to a missing voter', async () => {
      const res = await api.addVoterPoll(jsonRequest('POST', '/voters/9/polls/1', { voteId: 1 }), '9', '1');
      expect(res.status).toBe(404);
    });

    it('replaces one entry and leaves the others alone', async () => {
      await api.addVoterPoll(jsonRequest('POST', '/voters/1/polls/1', { voteId: 1 }), '1', '1');
      await api.addVoterPoll(jsonRequest('POST', '/voters/1/polls/2', { voteId: 2 }), '1', '2');

      const missing = await api.replaceVoterPoll(jsonRequest('PUT', '/voters/1/polls/3', { voteId: 3 }), '1', '3');
      expect(missing.status).toBe(404);

      const res = await api.replaceVoterPoll(
        jsonRequest('PUT', '/voters/1/polls/2', { voteId: 7, voteDate: '2024-06-01T08:30:00.000Z' }),
        '1',
        '2'
      );
      expect(res.status).toBe(200);
      expect(await (await api.listVoterPolls('1')).json()).toEqual([
        { pollId: 1, voteId: 1, voteDate: NOW },
        { pollId: 2, voteId: 7, voteDate: '2024-06-01T08:30:00.000Z' },
      ]);
    });

    it('deletes one entry with a plain confirmation', async () => {
      await api.addVoterPoll(jsonRequest('POST', '/voters/1/polls/1', { voteId: 1 }), '1', '1');
      await api.addVoterPoll(jsonRequest('POST', '/voters/1/polls/2', { voteId: 2 }), '1', '2');

      const res = await api.deleteVoterPoll('1', '1');
      expect(res.status).toBe(200);
      expect(await res.text()).toBe('Voter history deleted successfully');
      expect(await (await api.listVoterPolls('1')).json()).toEqual([{ pollId: 2, voteId: 2, voteDate: NOW }]);
      expect((await api.deleteVoterPoll('1', '1')).status).toBe(404);
    });
  });
});

describe('healthResponse', () => {
  it('returns the static report', async () => {
    const res = healthResponse();
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 'ok',
      version: '1.0.0',
      uptime: 100,
      users_processed: 1000,
      errors_encountered: 10,
    });
  });
});
