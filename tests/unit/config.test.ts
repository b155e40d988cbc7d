/**
 * Config tests
 *
 * Values come from tests/setup-unit.ts, parsed once at module load.
 */

import { describe, it, expect } from 'vitest';
import {
  config,
  getMissingTelegramConfig,
  isAdminUsername,
  isTelegramEnabled,
} from '../../src/config.js';
import { logger } from '../../src/utils/logger.js';

describe('config', () => {
  it('parses numeric settings from the environment', () => {
    expect(config.lock).toEqual({ timeoutMs: 2000, ttlMs: 60000, pollIntervalMs: 5 });
    expect(config.database.path).toBe(':memory:');
  });

  it('leaves the log level to the logger', () => {
    expect(config).not.toHaveProperty('logging');
    expect(logger.level).toBe('error');
  });

  it('falls back to the default identifier pattern', () => {
    expect(config.sales.unitIdentifierPattern).toBe('^\\d{9}$');
  });

  it('normalizes admin usernames', () => {
    expect(config.telegram.adminUsernames).toEqual(['boss', 'auditor']);
    expect(isAdminUsername('Boss')).toBe(true);
    expect(isAdminUsername('@auditor')).toBe(true);
    expect(isAdminUsername('alice')).toBe(false);
    expect(isAdminUsername(undefined)).toBe(false);
  });

  it('reads "false" as a disabled flag', () => {
    expect(config.features.telegramEnabled).toBe(false);
    expect(isTelegramEnabled()).toBe(false);
    expect(getMissingTelegramConfig()).toEqual([]);
  });
});
