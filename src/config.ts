import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { logger } from './utils/logger.js';

// Load environment variables from .env.local for development
dotenvConfig({ path: '.env.local' });
dotenvConfig(); // Fallback to .env

/**
 * "true"/"false" flag. z.coerce.boolean() would turn "false" into true.
 */
const flagSchema = z
  .string()
  .transform((val) => val.trim().toLowerCase())
  .pipe(z.enum(['true', 'false', '1', '0', '']))
  .transform((val) => val === 'true' || val === '1');

/**
 * Comma-separated Telegram usernames, stored without "@" and lower-cased
 */
const usernameListSchema = z
  .string()
  .transform((val) =>
    val
      .split(',')
      .map((name) => name.trim().replace(/^@/, '').toLowerCase())
      .filter(Boolean)
  );

/**
 * Regex source that must compile
 */
const patternSchema = z.string().refine(
  (source) => {
    try {
      new RegExp(source);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Invalid regular expression' }
);

/**
 * Configuration schema with Zod validation
 */
const configSchema = z.object({
  database: z.object({
    path: z.string().min(1).default('./data/inventory.db'),
  }),

  // Per-(employee, date) reconciliation lock
  lock: z.object({
    timeoutMs: z.coerce.number().int().min(0).default(15000),
    ttlMs: z.coerce.number().int().min(1000).default(60000),
    pollIntervalMs: z.coerce.number().int().min(1).max(5000).default(50),
  }),

  sales: z.object({
    // SIM/SWAP identifiers matching this take part in duplicate detection
    unitIdentifierPattern: patternSchema.default('^\\d{9}$'),
  }),

  features: z.object({
    telegramEnabled: flagSchema.default('false'),
  }),

  telegram: z.object({
    botToken: z.string().optional(),
    adminUsernames: usernameListSchema.default(''),
  }),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Parse and validate configuration
 */
function parseConfig(): Config {
  const rawConfig = {
    database: {
      path: process.env.DATABASE_PATH || undefined,
    },
    lock: {
      timeoutMs: process.env.LOCK_TIMEOUT_MS ?? '15000',
      ttlMs: process.env.LOCK_TTL_MS ?? '60000',
      pollIntervalMs: process.env.LOCK_POLL_INTERVAL_MS ?? '50',
    },
    sales: {
      unitIdentifierPattern: process.env.UNIT_IDENTIFIER_PATTERN || undefined,
    },
    features: {
      telegramEnabled: process.env.FEATURE_TELEGRAM_ENABLED ?? 'false',
    },
    telegram: {
      botToken: process.env.TELEGRAM_BOT_TOKEN || undefined,
      adminUsernames: process.env.ADMIN_USERNAMES ?? '',
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    logger.fatal({ errors: result.error.issues }, 'Configuration validation failed');
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}

/**
 * Validated and typed configuration, parsed at module load time
 */
export const config: Config = parseConfig();

/**
 * Check if Telegram bot is enabled and configured
 */
export function isTelegramEnabled(): boolean {
  return config.features.telegramEnabled && !!config.telegram.botToken;
}

/**
 * Returns list of missing Telegram configuration keys
 */
export function getMissingTelegramConfig(): string[] {
  const missing: string[] = [];

  if (!config.telegram.botToken) missing.push('TELEGRAM_BOT_TOKEN');
  if (config.telegram.adminUsernames.length === 0) missing.push('ADMIN_USERNAMES');

  return missing;
}

/**
 * Whether a Telegram username may run stock administration commands
 */
export function isAdminUsername(username: string | undefined): boolean {
  if (!username) return false;
  return config.telegram.adminUsernames.includes(username.replace(/^@/, '').toLowerCase());
}
