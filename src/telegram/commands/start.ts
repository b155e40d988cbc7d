/**
 * /start Command Handler
 *
 * Provisions the caller's inventory account (idempotent) and shows the
 * current stock.
 */

import type { Bot } from 'grammy';
import type { BotContext } from '../bot.js';
import { getInventoryServices } from '../../services/inventory.js';
import { logger } from '../../utils/logger.js';
import { formatBalance } from '../format.js';
import { replyWithError, requireEmployeeId } from '../guards.js';

/**
 * Handle the /start command logic
 */
export async function handleStartCommand(ctx: BotContext): Promise<void> {
  const employeeId = await requireEmployeeId(ctx);
  if (!employeeId) return;

  logger.info({ userId: ctx.from?.id, employeeId, command: 'start' }, 'Telegram /start command received');
  ctx.session.lastCommandAt = Date.now();

  try {
    const { engine } = getInventoryServices();
    const displayName = [ctx.from?.first_name, ctx.from?.last_name].filter(Boolean).join(' ');
    await engine.ensureEmployee(employeeId, displayName || undefined);
    const balance = await engine.getBalance(employeeId);

    let message = `👋 *Welcome!*\n\nYour stock account is ready.`;
    if (balance) {
      message += `\n\n${formatBalance(balance)}`;
    }
    message += `\n\nUse /help to see what you can do.`;

    await ctx.reply(message, { parse_mode: 'Markdown' });
  } catch (error) {
    await replyWithError(ctx, error, 'start');
  }
}

/**
 * Register the /start command handler
 */
export function registerStartCommand(bot: Bot<BotContext>): void {
  bot.command('start', handleStartCommand);
}
