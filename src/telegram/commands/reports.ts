/**
 * /all_sales Command Handler (admin)
 *
 * Every employee's sales for a date (default today, UTC), paged.
 */

import type { Bot } from 'grammy';
import type { BotContext } from '../bot.js';
import { isReportDate, todayReportDate } from '../../packages/core/protocol/reconciliation-key.js';
import { getInventoryServices } from '../../services/inventory.js';
import { formatAllSales } from '../format.js';
import { commandArgs, logCommand, replyWithError, requireAdmin } from '../guards.js';

export async function handleAllSalesCommand(ctx: BotContext): Promise<void> {
  if (!(await requireAdmin(ctx, 'all_sales'))) return;

  const [raw] = commandArgs(ctx);
  if (raw && !isReportDate(raw)) {
    await ctx.reply('Dates are written YYYY-MM-DD.\nUsage: /all_sales [YYYY-MM-DD]');
    return;
  }
  const reportDate = raw ?? todayReportDate();
  logCommand(ctx, 'all_sales', { reportDate });

  try {
    const sales = await getInventoryServices().engine.listSalesByDate(reportDate);
    for (const page of formatAllSales(reportDate, sales)) {
      await ctx.reply(page, { parse_mode: 'Markdown' });
    }
  } catch (error) {
    await replyWithError(ctx, error, 'all_sales');
  }
}

export function registerReportCommands(bot: Bot<BotContext>): void {
  bot.command('all_sales', handleAllSalesCommand);
}
