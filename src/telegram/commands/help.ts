/**
 * /help Command Handler
 */

import type { Bot } from 'grammy';
import type { BotContext } from '../bot.js';
import { isAdminUsername } from '../../config.js';
import { logger } from '../../utils/logger.js';

const EMPLOYEE_HELP =
  `📖 *Commands*\n\n` +
  `/stock - your current stock\n` +
  `/sales [YYYY-MM-DD] - your sales for a day (default today)\n` +
  `/cancel\\_upload [YYYY-MM-DD] - cancel a day's upload and restore stock\n` +
  `/help - this message`;

const ADMIN_HELP =
  `\n\n🛠 *Admin*\n\n` +
  `/stock\\_of <user> - stock and recent movements of an employee\n` +
  `/summary - stock of every employee\n` +
  `/all\\_sales [YYYY-MM-DD] - every employee's sales for a day\n` +
  `/add\\_stock <user> <item> <qty>\n` +
  `/remove\\_stock <user> <item> <qty>\n` +
  `/transfer\\_stock <from> <to> <item> <qty>\n` +
  `/delete\\_sales <user> <YYYY-MM-DD>\n` +
  `/delete\\_sale <sale id>\n` +
  `/backoffice\\_add <item> <qty> - stock-in to the back office\n` +
  `/backoffice\\_list - back-office stock\n` +
  `/transfer\\_backoffice <user> <item> <qty>\n` +
  `/audit - check every balance against the journal\n\n` +
  `Items: sim, swap, credit50, credit100`;

export async function handleHelpCommand(ctx: BotContext): Promise<void> {
  logger.info({ userId: ctx.from?.id, command: 'help' }, 'Telegram /help command received');
  ctx.session.lastCommandAt = Date.now();

  const message = isAdminUsername(ctx.from?.username)
    ? EMPLOYEE_HELP + ADMIN_HELP
    : EMPLOYEE_HELP;
  await ctx.reply(message, { parse_mode: 'Markdown' });
}

export function registerHelpCommand(bot: Bot<BotContext>): void {
  bot.command('help', handleHelpCommand);
}
