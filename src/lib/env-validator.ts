// === 🔍 ENVIRONMENT VARIABLE VALIDATION ===

import { ConfigLogger } from '@/lib/logger';

export type StoreDriver = 'kv' | 'memory';

export interface StoreConfig {
  driver: StoreDriver;
  url: string;
  token: string;
}

interface EnvValidationResult {
  isValid: boolean;
  warnings: string[];
  errors: string[];
}

type Env = Record<string, string | undefined>;

export const DEFAULT_KV_REST_API_URL = 'http://localhost:8079';
// Token the local serverless-redis-http proxy accepts out of the box
export const DEFAULT_KV_REST_API_TOKEN = 'example_token';

const STORE_DRIVERS: readonly StoreDriver[] = ['kv', 'memory'];

function isStoreDriver(value: string): value is StoreDriver {
  return STORE_DRIVERS.some((driver) => driver === value);
}

/**
 * Resolves the store address and driver, falling back to the local KV proxy.
 * Throws on an unknown driver name.
 */
export function loadStoreConfig(env: Env = process.env): StoreConfig {
  const driver = (env.VOTER_STORE_DRIVER || 'kv').trim().toLowerCase();
  if (!isStoreDriver(driver)) {
    throw new Error(`Unknown VOTER_STORE_DRIVER "${driver}" (expected ${STORE_DRIVERS.join(' or ')})`);
  }
  return {
    driver,
    url: env.KV_REST_API_URL || DEFAULT_KV_REST_API_URL,
    token: env.KV_REST_API_TOKEN || DEFAULT_KV_REST_API_TOKEN,
  };
}

/**
 * Validates store-related environment variables
 */
export function validateEnvironment(env: Env = process.env): EnvValidationResult {
  const warnings: string[] = [];
  const errors: string[] = [];

  let config: StoreConfig;
  try {
    config = loadStoreConfig(env);
  } catch (error) {
    errors.push(error instanceof Error ? error.message : String(error));
    return { isValid: false, warnings, errors };
  }

  if (config.driver === 'memory') {
    warnings.push('VOTER_STORE_DRIVER=memory: voters are kept in process memory and lost on restart');
    return { isValid: true, warnings, errors };
  }

  if (!env.KV_REST_API_URL) {
    warnings.push(`KV_REST_API_URL not set, using ${DEFAULT_KV_REST_API_URL}`);
  } else if (!/^https?:\/\//.test(env.KV_REST_API_URL)) {
    warnings.push('KV_REST_API_URL should be an HTTP(S) URL');
  }

  if (!env.KV_REST_API_TOKEN) {
    warnings.push('KV_REST_API_TOKEN not set, using the local proxy token');
  }

  return {
    isValid: errors.length === 0,
    warnings,
    errors,
  };
}

/**
 * Logs environment validation results
 */
export function logEnvironmentValidation(env: Env = process.env): void {
  const result = validateEnvironment(env);

  if (!result.isValid) {
    ConfigLogger.error('Environment validation failed', result.errors);
  }

  if (result.warnings.length > 0) {
    ConfigLogger.warn('Environment warnings', result.warnings);
  }

  if (result.isValid && result.warnings.length === 0) {
    ConfigLogger.info('✅ Environment validation passed');
  }
}
