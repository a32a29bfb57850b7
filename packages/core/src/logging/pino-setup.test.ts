/**
 * Tests for the pino root logger setup
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { pino } from 'pino';
import { createRootLogger, levelFromEnv, rootLogger } from './pino-setup.js';

describe('Pino Setup', () => {
  let logs: string[];
  let destination: pino.DestinationStream;

  beforeEach(() => {
    logs = [];
    destination = {
      write: (msg: string) => {
        logs.push(msg);
      },
    };
  });

  it('keeps the root logger silent unless a level is requested', () => {
    expect(levelFromEnv({})).toBe('silent');
    expect(rootLogger.level).toBe(levelFromEnv());
  });

  it('reads the level from ASSAY_LOG_LEVEL case-insensitively', () => {
    expect(levelFromEnv({ ASSAY_LOG_LEVEL: 'DEBUG' })).toBe('debug');
    expect(levelFromEnv({ ASSAY_LOG_LEVEL: 'verbose' })).toBe('silent');
  });

  it('writes structured lines at or above the configured level', () => {
    const logger = createRootLogger({ level: 'info', destination });

    logger.debug('hidden');
    logger.info({ assertion: 'equal' }, 'assertion failed');

    expect(logs).toHaveLength(1);
    const logged = JSON.parse(logs[0] ?? '{}');
    expect(logged.msg).toBe('assertion failed');
    expect(logged.assertion).toBe('equal');
    expect(logged.level).toBe(30);
  });

  it('serializes errors with the standard serializer', () => {
    const logger = createRootLogger({ level: 'error', destination });

    logger.error({ err: new TypeError('bad input') }, 'failed');

    const logged = JSON.parse(logs[0] ?? '{}');
    expect(logged.err.type).toBe('TypeError');
    expect(logged.err.message).toBe('bad input');
  });
});
