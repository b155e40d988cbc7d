/**
 * Back-office pool commands (admin)
 *
 * /backoffice_add <item> <qty>, /backoffice_list,
 * /transfer_backoffice <user> <item> <qty>
 */

import type { Bot } from 'grammy';
import type { BotContext } from '../bot.js';
import { parseCounter } from '../../packages/core/protocol/item-kinds.js';
import { getInventoryServices } from '../../services/inventory.js';
import { counterLabel, escapeMarkdown, formatBackofficeStock, formatBalance } from '../format.js';
import {
  actorOf,
  commandArgs,
  logCommand,
  normalizeUsername,
  parsePositiveInt,
  replyWithError,
  requireAdmin,
} from '../guards.js';

export async function handleBackofficeAddCommand(ctx: BotContext): Promise<void> {
  if (!(await requireAdmin(ctx, 'backoffice_add'))) return;

  const [rawItem, rawQty] = commandArgs(ctx);
  const counter = rawItem ? parseCounter(rawItem) : null;
  const quantity = parsePositiveInt(rawQty);
  if (!counter || !quantity) {
    await ctx.reply('Usage: /backoffice_add <sim|swap|credit50|credit100> <qty>');
    return;
  }

  logCommand(ctx, 'backoffice_add', { counter, quantity });

  try {
    const levels = await getInventoryServices().engine.addBackofficeStock(counter, quantity, actorOf(ctx));
    await ctx.reply(
      `Added ${quantity} ${counterLabel(counter)} to back-office stock.\n\n${formatBackofficeStock(levels)}`,
      { parse_mode: 'Markdown' }
    );
  } catch (error) {
    await replyWithError(ctx, error, 'backoffice_add');
  }
}

export async function handleBackofficeListCommand(ctx: BotContext): Promise<void> {
  if (!(await requireAdmin(ctx, 'backoffice_list'))) return;
  logCommand(ctx, 'backoffice_list');

  try {
    const levels = await getInventoryServices().engine.listBackofficeStock();
    await ctx.reply(formatBackofficeStock(levels), { parse_mode: 'Markdown' });
  } catch (error) {
    await replyWithError(ctx, error, 'backoffice_list');
  }
}

export async function handleTransferBackofficeCommand(ctx: BotContext): Promise<void> {
  if (!(await requireAdmin(ctx, 'transfer_backoffice'))) return;

  const [rawUser, rawItem, rawQty] = commandArgs(ctx);
  const counter = rawItem ? parseCounter(rawItem) : null;
  const quantity = parsePositiveInt(rawQty);
  if (!rawUser || !counter || !quantity) {
    await ctx.reply('Usage: /transfer_backoffice <user> <sim|swap|credit50|credit100> <qty>');
    return;
  }

  const employeeId = normalizeUsername(rawUser);
  logCommand(ctx, 'transfer_backoffice', { employeeId, counter, quantity });

  try {
    const balance = await getInventoryServices().engine.transferFromBackoffice(
      employeeId,
      counter,
      quantity,
      actorOf(ctx)
    );
    await ctx.reply(
      `Moved ${quantity} ${counterLabel(counter)} from back office to ${escapeMarkdown(employeeId)}.\n\n` +
      formatBalance(balance),
      { parse_mode: 'Markdown' }
    );
  } catch (error) {
    await replyWithError(ctx, error, 'transfer_backoffice');
  }
}

export function registerBackofficeCommands(bot: Bot<BotContext>): void {
  bot.command('backoffice_add', handleBackofficeAddCommand);
  bot.command('backoffice_list', handleBackofficeListCommand);
  bot.command('transfer_backoffice', handleTransferBackofficeCommand);
}
