/**
 * /audit Command Handler (admin)
 *
 * Runs the conservation check; optional argument limits it to one employee.
 */

import type { Bot } from 'grammy';
import type { BotContext } from '../bot.js';
import { getInventoryServices } from '../../services/inventory.js';
import { logger } from '../../utils/logger.js';
import { formatConservationReport } from '../format.js';
import { commandArgs, normalizeUsername, replyWithError, requireAdmin } from '../guards.js';

export async function handleAuditCommand(ctx: BotContext): Promise<void> {
  if (!(await requireAdmin(ctx, 'audit'))) return;

  const [rawUser] = commandArgs(ctx);
  const employeeId = rawUser ? normalizeUsername(rawUser) : undefined;

  logger.info({ userId: ctx.from?.id, employeeId, command: 'audit' }, 'Telegram /audit command received');
  ctx.session.lastCommandAt = Date.now();

  try {
    const report = await getInventoryServices().auditor.check(employeeId);
    await ctx.reply(formatConservationReport(report), { parse_mode: 'Markdown' });
  } catch (error) {
    await replyWithError(ctx, error, 'audit');
  }
}

export function registerAuditCommand(bot: Bot<BotContext>): void {
  bot.command('audit', handleAuditCommand);
}
