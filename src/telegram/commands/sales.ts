/**
 * /sales and /cancel_upload Command Handlers
 *
 * Both act on the caller's own (employee, date) key; the date defaults
 * to today (UTC).
 */

import type { Bot } from 'grammy';
import type { BotContext } from '../bot.js';
import { isReportDate, todayReportDate } from '../../packages/core/protocol/reconciliation-key.js';
import { getInventoryServices } from '../../services/inventory.js';
import { logger } from '../../utils/logger.js';
import { formatBatchResult, formatSales } from '../format.js';
import { commandArgs, replyWithError, requireEmployeeId } from '../guards.js';

/**
 * Date argument or today; replies and returns null when it is malformed
 */
async function reportDateArg(ctx: BotContext, usage: string): Promise<string | null> {
  const [raw] = commandArgs(ctx);
  if (!raw) return todayReportDate();
  if (isReportDate(raw)) return raw;

  await ctx.reply(`Dates are written YYYY-MM-DD.\nUsage: ${usage}`);
  return null;
}

export async function handleSalesCommand(ctx: BotContext): Promise<void> {
  const employeeId = await requireEmployeeId(ctx);
  if (!employeeId) return;
  const reportDate = await reportDateArg(ctx, '/sales [YYYY-MM-DD]');
  if (!reportDate) return;

  logger.info({ userId: ctx.from?.id, employeeId, reportDate, command: 'sales' }, 'Telegram /sales command received');
  ctx.session.lastCommandAt = Date.now();

  try {
    const sales = await getInventoryServices().engine.listSales(employeeId, reportDate);
    await ctx.reply(formatSales(employeeId, reportDate, sales), { parse_mode: 'Markdown' });
  } catch (error) {
    await replyWithError(ctx, error, 'sales');
  }
}

/**
 * An empty batch for the key reverts the day's upload
 */
export async function handleCancelUploadCommand(ctx: BotContext): Promise<void> {
  const employeeId = await requireEmployeeId(ctx);
  if (!employeeId) return;
  const reportDate = await reportDateArg(ctx, '/cancel_upload [YYYY-MM-DD]');
  if (!reportDate) return;

  logger.info(
    { userId: ctx.from?.id, employeeId, reportDate, command: 'cancel_upload' },
    'Telegram /cancel_upload command received'
  );
  ctx.session.lastCommandAt = Date.now();

  try {
    const result = await getInventoryServices().engine.applyBatch(employeeId, reportDate, []);
    if (result.reverted.saleIds.length === 0) {
      await ctx.reply(`Nothing to cancel for ${reportDate}.`);
      return;
    }
    await ctx.reply(formatBatchResult(reportDate, result), { parse_mode: 'Markdown' });
  } catch (error) {
    await replyWithError(ctx, error, 'cancel_upload');
  }
}

export function registerSalesCommands(bot: Bot<BotContext>): void {
  bot.command('sales', handleSalesCommand);
  bot.command('cancel_upload', handleCancelUploadCommand);
}
