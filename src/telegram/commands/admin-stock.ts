/**
 * Admin stock commands
 *
 * /summary, /add_stock, /remove_stock, /transfer_stock, /delete_sales,
 * /delete_sale. Every handler is gated on ADMIN_USERNAMES.
 */

import type { Bot } from 'grammy';
import type { BotContext } from '../bot.js';
import { parseCounter, type Counter } from '../../packages/core/protocol/item-kinds.js';
import { isReportDate } from '../../packages/core/protocol/reconciliation-key.js';
import { getInventoryServices } from '../../services/inventory.js';
import { counterLabel, escapeMarkdown, formatBalance, formatTotals } from '../format.js';
import {
  actorOf,
  commandArgs,
  logCommand,
  normalizeUsername,
  parsePositiveInt,
  replyWithError,
  requireAdmin,
} from '../guards.js';

export async function handleSummaryCommand(ctx: BotContext): Promise<void> {
  if (!(await requireAdmin(ctx, 'summary'))) return;
  logCommand(ctx, 'summary');

  try {
    const summary = await getInventoryServices().engine.summarizeInventory();
    await ctx.reply(formatTotals(summary.totals), { parse_mode: 'Markdown' });
  } catch (error) {
    await replyWithError(ctx, error, 'summary');
  }
}

/**
 * Shared body of /add_stock and /remove_stock
 */
async function adjustStock(ctx: BotContext, command: 'add_stock' | 'remove_stock'): Promise<void> {
  if (!(await requireAdmin(ctx, command))) return;

  const [rawUser, rawItem, rawQty] = commandArgs(ctx);
  const counter: Counter | null = rawItem ? parseCounter(rawItem) : null;
  const quantity = parsePositiveInt(rawQty);
  if (!rawUser || !counter || !quantity) {
    await ctx.reply(`Usage: /${command} <user> <sim|swap|credit50|credit100> <qty>`);
    return;
  }

  const employeeId = normalizeUsername(rawUser);
  const delta = command === 'add_stock' ? quantity : -quantity;
  logCommand(ctx, command, { employeeId, counter, delta });

  try {
    const balance = await getInventoryServices().engine.adjustStock(
      employeeId,
      counter,
      delta,
      actorOf(ctx)
    );
    const verb = delta > 0 ? 'Added' : 'Removed';
    await ctx.reply(
      `${verb} ${quantity} ${counterLabel(counter)} for ${escapeMarkdown(employeeId)}.\n\n${formatBalance(balance)}`,
      { parse_mode: 'Markdown' }
    );
  } catch (error) {
    await replyWithError(ctx, error, command);
  }
}

export async function handleAddStockCommand(ctx: BotContext): Promise<void> {
  await adjustStock(ctx, 'add_stock');
}

export async function handleRemoveStockCommand(ctx: BotContext): Promise<void> {
  await adjustStock(ctx, 'remove_stock');
}

export async function handleTransferStockCommand(ctx: BotContext): Promise<void> {
  if (!(await requireAdmin(ctx, 'transfer_stock'))) return;

  const [rawFrom, rawTo, rawItem, rawQty] = commandArgs(ctx);
  const counter = rawItem ? parseCounter(rawItem) : null;
  const quantity = parsePositiveInt(rawQty);
  if (!rawFrom || !rawTo || !counter || !quantity) {
    await ctx.reply('Usage: /transfer_stock <from> <to> <sim|swap|credit50|credit100> <qty>');
    return;
  }

  const fromId = normalizeUsername(rawFrom);
  const toId = normalizeUsername(rawTo);
  logCommand(ctx, 'transfer_stock', { fromId, toId, counter, quantity });

  try {
    const result = await getInventoryServices().engine.transferStock(
      fromId,
      toId,
      counter,
      quantity,
      actorOf(ctx)
    );
    await ctx.reply(
      `Moved ${quantity} ${counterLabel(counter)} from ${escapeMarkdown(fromId)} to ${escapeMarkdown(toId)}.\n\n` +
      `${formatBalance(result.from)}\n\n${formatBalance(result.to)}`,
      { parse_mode: 'Markdown' }
    );
  } catch (error) {
    await replyWithError(ctx, error, 'transfer_stock');
  }
}

export async function handleDeleteSalesCommand(ctx: BotContext): Promise<void> {
  if (!(await requireAdmin(ctx, 'delete_sales'))) return;

  const [rawUser, reportDate] = commandArgs(ctx);
  if (!rawUser || !reportDate || !isReportDate(reportDate)) {
    await ctx.reply('Usage: /delete_sales <user> <YYYY-MM-DD>');
    return;
  }

  const employeeId = normalizeUsername(rawUser);
  logCommand(ctx, 'delete_sales', { employeeId, reportDate });

  try {
    const deleted = await getInventoryServices().engine.revert(employeeId, reportDate);
    await ctx.reply(
      deleted === 0
        ? `No sales to delete for ${escapeMarkdown(employeeId)} on ${reportDate}.`
        : `🗑 Deleted ${deleted} sale(s) of ${escapeMarkdown(employeeId)} on ${reportDate}; stock restored.`,
      { parse_mode: 'Markdown' }
    );
  } catch (error) {
    await replyWithError(ctx, error, 'delete_sales');
  }
}

export async function handleDeleteSaleCommand(ctx: BotContext): Promise<void> {
  if (!(await requireAdmin(ctx, 'delete_sale'))) return;

  const [rawId] = commandArgs(ctx);
  const saleId = parsePositiveInt(rawId);
  if (!saleId) {
    await ctx.reply('Usage: /delete_sale <sale id>');
    return;
  }

  logCommand(ctx, 'delete_sale', { saleId });

  try {
    const deleted = await getInventoryServices().engine.deleteSale(saleId);
    await ctx.reply(
      deleted ? `🗑 Sale #${saleId} deleted; stock restored.` : `Sale #${saleId} not found.`
    );
  } catch (error) {
    await replyWithError(ctx, error, 'delete_sale');
  }
}

export function registerAdminStockCommands(bot: Bot<BotContext>): void {
  bot.command('summary', handleSummaryCommand);
  bot.command('add_stock', handleAddStockCommand);
  bot.command('remove_stock', handleRemoveStockCommand);
  bot.command('transfer_stock', handleTransferStockCommand);
  bot.command('delete_sales', handleDeleteSalesCommand);
  bot.command('delete_sale', handleDeleteSaleCommand);
}
