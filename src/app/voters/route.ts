import { NextRequest } from 'next/server';
import { getVoterApi } from '@/lib/voter-service';

export const dynamic = 'force-dynamic';

/** GET /voters: every stored voter, [] when none. */
export async function GET() {
  return getVoterApi().listVoters();
}

/** POST /voters: insert a new voter; 409 if the id is taken. */
export async function POST(request: NextRequest) {
  return getVoterApi().createVoter(request);
}

/** PUT /voters: overwrite an existing voter. */
export async function PUT(request: NextRequest) {
  return getVoterApi().replaceVoter(request);
}

/** DELETE /voters: remove all voters. */
export async function DELETE() {
  return getVoterApi().deleteAllVoters();
}
