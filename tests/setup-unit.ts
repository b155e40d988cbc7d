/**
 * Vitest Setup File
 *
 * Runs BEFORE every test file, so config.ts parses these values at
 * module load.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error'; // Suppress log noise in tests
process.env.DATABASE_PATH = ':memory:';
process.env.FEATURE_TELEGRAM_ENABLED = 'false';
process.env.TELEGRAM_BOT_TOKEN = 'test-bot-token';
process.env.ADMIN_USERNAMES = '@Boss, auditor';
process.env.LOCK_TIMEOUT_MS = '2000';
process.env.LOCK_POLL_INTERVAL_MS = '5';
