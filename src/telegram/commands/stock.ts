/**
 * /stock and /stock_of Command Handlers
 */

import type { Bot } from 'grammy';
import type { BotContext } from '../bot.js';
import { getInventoryServices } from '../../services/inventory.js';
import { logger } from '../../utils/logger.js';
import { escapeMarkdown, formatBalance, formatJournal } from '../format.js';
import {
  commandArgs,
  normalizeUsername,
  replyWithError,
  requireAdmin,
  requireEmployeeId,
} from '../guards.js';

const RECENT_MOVEMENTS = 5;

/**
 * /stock - the caller's balance
 */
export async function handleStockCommand(ctx: BotContext): Promise<void> {
  const employeeId = await requireEmployeeId(ctx);
  if (!employeeId) return;

  logger.info({ userId: ctx.from?.id, employeeId, command: 'stock' }, 'Telegram /stock command received');
  ctx.session.lastCommandAt = Date.now();

  try {
    const balance = await getInventoryServices().engine.getBalance(employeeId);
    if (!balance) {
      await ctx.reply('You have no stock account yet. Send /start first.');
      return;
    }
    await ctx.reply(formatBalance(balance), { parse_mode: 'Markdown' });
  } catch (error) {
    await replyWithError(ctx, error, 'stock');
  }
}

/**
 * /stock_of <user> - admin view of another employee with recent movements
 */
export async function handleStockOfCommand(ctx: BotContext): Promise<void> {
  if (!(await requireAdmin(ctx, 'stock_of'))) return;

  const [rawUser] = commandArgs(ctx);
  if (!rawUser) {
    await ctx.reply('Usage: /stock_of <user>');
    return;
  }
  const employeeId = normalizeUsername(rawUser);

  logger.info({ userId: ctx.from?.id, employeeId, command: 'stock_of' }, 'Telegram /stock_of command received');
  ctx.session.lastCommandAt = Date.now();

  try {
    const { engine } = getInventoryServices();
    const balance = await engine.getBalance(employeeId);
    if (!balance) {
      await ctx.reply(`No stock account for ${escapeMarkdown(employeeId)}.`, { parse_mode: 'Markdown' });
      return;
    }
    const movements = await engine.getJournal(employeeId, { limit: RECENT_MOVEMENTS });

    await ctx.reply(
      `${formatBalance(balance)}\n\n*Recent movements*\n${formatJournal(movements)}`,
      { parse_mode: 'Markdown' }
    );
  } catch (error) {
    await replyWithError(ctx, error, 'stock_of');
  }
}

export function registerStockCommands(bot: Bot<BotContext>): void {
  bot.command('stock', handleStockCommand);
  bot.command('stock_of', handleStockOfCommand);
}
