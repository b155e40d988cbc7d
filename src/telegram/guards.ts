/**
 * Shared helpers for command handlers: caller identity, admin gate,
 * argument splitting and error replies.
 */

import type { BotContext } from './bot.js';
import { isAdminUsername } from '../config.js';
import { formatUserError, isRetryableError, logError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Employee id of the caller: the lower-cased Telegram username
 */
export function employeeIdOf(ctx: BotContext): string | null {
  const username = ctx.from?.username;
  return username ? username.toLowerCase() : null;
}

/**
 * Resolve the caller's employee id or tell them why there is none
 */
export async function requireEmployeeId(ctx: BotContext): Promise<string | null> {
  const employeeId = employeeIdOf(ctx);
  if (!employeeId) {
    await ctx.reply(
      'Your Telegram account has no username. Set one in Telegram settings and try again.'
    );
  }
  return employeeId;
}

/**
 * Admin gate; replies and returns false for everyone else
 */
export async function requireAdmin(ctx: BotContext, command: string): Promise<boolean> {
  if (isAdminUsername(ctx.from?.username)) {
    return true;
  }
  logger.warn(
    { userId: ctx.from?.id, username: ctx.from?.username, command },
    'Non-admin attempted admin command'
  );
  await ctx.reply('⛔ This command is for admins only.');
  return false;
}

/**
 * Whitespace-separated arguments after the command
 */
export function commandArgs(ctx: BotContext): string[] {
  return typeof ctx.match === 'string'
    ? ctx.match.trim().split(/\s+/).filter(Boolean)
    : [];
}

/** Positive whole number written in digits, or null */
export function parsePositiveInt(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const value = Number(raw);
  return Number.isSafeInteger(value) && value > 0 ? value : null;
}

/** Journal actor for admin commands */
export function actorOf(ctx: BotContext): string {
  return ctx.from?.username ?? String(ctx.from?.id ?? 'unknown');
}

export function logCommand(ctx: BotContext, command: string, details: Record<string, unknown> = {}): void {
  logger.info({ userId: ctx.from?.id, command, ...details }, `Telegram /${command} command received`);
  ctx.session.lastCommandAt = Date.now();
}

/** Accepts "user" and "@user" */
export function normalizeUsername(raw: string): string {
  return raw.replace(/^@/, '').toLowerCase();
}

/**
 * Log the error and tell the user what happened without internal detail
 */
export async function replyWithError(
  ctx: BotContext,
  error: unknown,
  command: string
): Promise<void> {
  logError(error, { command, userId: ctx.from?.id });

  const { error: message } = formatUserError(error);
  const hint = isRetryableError(error) ? '\nPlease try again in a moment.' : '';
  await ctx.reply(`❌ ${message}${hint}`);
}
