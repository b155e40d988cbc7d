/**
 * Telegram Bot Module
 *
 * Initializes and manages the grammy Telegram bot instance (polling mode).
 */

import { Bot, type Context, session, type SessionFlavor } from 'grammy';
import { config, isTelegramEnabled } from '../config.js';
import { logger } from '../utils/logger.js';
import { registerAllCommands } from './commands/index.js';

// =============================================================================
// Type Definitions
// =============================================================================

/**
 * Session data stored per user conversation
 */
export interface SessionData {
  /** Timestamp of last command */
  lastCommandAt: number;
}

/**
 * Extended context type with session data
 */
export type BotContext = Context & SessionFlavor<SessionData>;

// =============================================================================
// Bot Instance
// =============================================================================

let bot: Bot<BotContext> | null = null;
let isRunning = false;

/**
 * Create and configure the Telegram bot instance
 */
function createBot(): Bot<BotContext> {
  const token = config.telegram.botToken;
  if (!token) {
    throw new Error('TELEGRAM_BOT_TOKEN is required');
  }

  const newBot = new Bot<BotContext>(token);

  // Session middleware - stores per-user conversation state
  newBot.use(
    session({
      initial: (): SessionData => ({
        lastCommandAt: 0,
      }),
    })
  );

  newBot.catch((err) => {
    const ctx = err.ctx;

    logger.error(
      {
        error: err.error,
        updateId: ctx.update.update_id,
        chatId: ctx.chat?.id,
        userId: ctx.from?.id,
      },
      'Telegram bot error'
    );

    ctx.reply('Something went wrong. Please try again later.').catch((replyError: unknown) => {
      logger.warn({ error: replyError }, 'Failed to send error reply');
    });
  });

  registerAllCommands(newBot);
  logger.info('Telegram command handlers registered');

  return newBot;
}

/**
 * Get the bot instance, creating it if necessary
 */
export function getBot(): Bot<BotContext> {
  if (!bot) {
    bot = createBot();
  }
  return bot;
}

// =============================================================================
// Bot Lifecycle
// =============================================================================

/**
 * Start the Telegram bot in long-polling mode
 */
export async function startTelegramBot(): Promise<void> {
  if (!isTelegramEnabled()) {
    logger.info('Telegram bot is disabled, skipping initialization');
    return;
  }

  if (isRunning) {
    logger.warn('Telegram bot is already running');
    return;
  }

  const b = getBot();

  logger.info('Starting Telegram bot in polling mode');
  b.start({
    onStart: (botInfo) => {
      logger.info(
        { username: botInfo.username, id: botInfo.id },
        'Telegram bot started in polling mode'
      );
    },
  }).catch((error: unknown) => {
    isRunning = false;
    logger.error({ error }, 'Telegram polling stopped with an error');
  });

  isRunning = true;
}

/**
 * Stop the Telegram bot
 */
export async function stopTelegramBot(): Promise<void> {
  if (!isRunning || !bot) {
    return;
  }

  logger.info('Stopping Telegram bot...');

  try {
    await bot.stop();
    logger.info('Telegram bot stopped');
  } catch (error) {
    logger.error({ error }, 'Error stopping Telegram bot');
  }

  isRunning = false;
}
