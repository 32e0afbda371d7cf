import { performStartupValidation } from '@/lib/startup';

export async function register(): Promise<void> {
  if (process.env.NEXT_RUNTIME === 'nodejs') {
    await performStartupValidation();
  }
}
