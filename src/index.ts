/**
 * Stock Ledger Service Entry Point
 *
 * - Opens the SQLite ledger and applies migrations
 * - Runs a conservation check over every balance at startup
 * - Starts the Telegram command bot when enabled
 */

import { config, getMissingTelegramConfig, isTelegramEnabled } from './config.js';
import { closeDatabase, initDatabase } from './db/connection.js';
import { getInventoryServices, resetInventoryServices } from './services/inventory.js';
import { startTelegramBot, stopTelegramBot } from './telegram/bot.js';
import { logger } from './utils/logger.js';

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutting down Stock Ledger Service');
  await stopTelegramBot();
  resetInventoryServices();
  closeDatabase();
  process.exit(0);
}

async function main() {
  logger.info({ databasePath: config.database.path }, 'Starting Stock Ledger Service');

  initDatabase();

  const report = await getInventoryServices().auditor.check();
  if (!report.passed) {
    logger.error(
      { divergences: report.divergences.length },
      'Startup conservation check found divergences - review before trusting balances'
    );
  }

  if (isTelegramEnabled()) {
    try {
      await startTelegramBot();
      logger.info('Telegram bot started successfully');
    } catch (error) {
      logger.error({ error }, 'Failed to start Telegram bot - service will continue without Telegram');
    }
  } else {
    const missing = getMissingTelegramConfig();
    if (missing.length > 0) {
      logger.warn({ missing }, 'Telegram bot not configured - skipping initialization');
    } else {
      logger.info('Telegram bot disabled in configuration');
    }
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.fatal({ error }, 'Error during shutdown');
        process.exit(1);
      });
    });
  }

  logger.info('Stock Ledger Service started successfully');
}

main().catch((error) => {
  logger.fatal({ error }, 'Failed to start Stock Ledger Service');
  process.exit(1);
});
