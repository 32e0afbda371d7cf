// === 🚀 STARTUP UTILITIES ===

import { logEnvironmentValidation, loadStoreConfig } from './env-validator';
import { ConfigLogger } from './logger';
import { checkStoreConnection } from './voter-service';

/**
 * Performs startup validation and logging
 */
export async function performStartupValidation(): Promise<void> {
  ConfigLogger.info('🚀 Starting voter API...');

  logEnvironmentValidation();

  ConfigLogger.info(`📊 Node.js version: ${process.version}`);
  ConfigLogger.info(`🌍 Environment: ${process.env.NODE_ENV || 'development'}`);

  try {
    const config = loadStoreConfig();
    ConfigLogger.info(`🗄️ Store driver: ${config.driver}`, config.driver === 'kv' ? config.url : undefined);
  } catch (error) {
    ConfigLogger.error('Store configuration invalid', error);
    return;
  }

  await checkStoreConnection();
}
