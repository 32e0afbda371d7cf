import { healthResponse } from '@/lib/voter-api';

export const dynamic = 'force-dynamic';

export async function GET() {
  return healthResponse();
}
