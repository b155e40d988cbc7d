/**
 * Telegram Command Handlers Index
 *
 * Registers all command handlers on the bot instance.
 */

import type { Bot } from 'grammy';
import type { BotContext } from '../bot.js';
import { logger } from '../../utils/logger.js';
import { registerAdminStockCommands } from './admin-stock.js';
import { registerAuditCommand } from './audit.js';
import { registerBackofficeCommands } from './backoffice.js';
import { registerHelpCommand } from './help.js';
import { registerReportCommands } from './reports.js';
import { registerSalesCommands } from './sales.js';
import { registerStartCommand } from './start.js';
import { registerStockCommands } from './stock.js';

/**
 * Register all command handlers on the bot
 */
export function registerAllCommands(bot: Bot<BotContext>): void {
  // Employee commands
  registerStartCommand(bot);
  registerHelpCommand(bot);
  registerStockCommands(bot);
  registerSalesCommands(bot);

  // Admin commands
  registerAdminStockCommands(bot);
  registerBackofficeCommands(bot);
  registerReportCommands(bot);
  registerAuditCommand(bot);

  // Menu shows employee commands only
  bot.api.setMyCommands([
    { command: 'start', description: 'Create your stock account' },
    { command: 'stock', description: 'Show your current stock' },
    { command: 'sales', description: 'Show your sales for a day' },
    { command: 'cancel_upload', description: "Cancel a day's upload" },
    { command: 'help', description: 'Get help with commands' },
  ]).catch((error: unknown) => {
    // Non-fatal - bot works without command menu
    logger.warn({ error }, 'Failed to set bot commands');
  });
}
