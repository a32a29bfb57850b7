import { describe, it, expect, beforeEach } from 'vitest';
import { NoOpLogger, PinoLogger, createScopedLogger } from '../logger.js';
import { createRootLogger } from '../logging/pino-setup.js';

describe('createScopedLogger', () => {
  let logs: string[];

  beforeEach(() => {
    logs = [];
  });

  const parent = () =>
    createRootLogger({
      level: 'debug',
      destination: {
        write: (msg: string) => {
          logs.push(msg);
        },
      },
    });

  it('should bind the scope to every line', () => {
    const logger = createScopedLogger('asserts', parent());

    logger.debug('assertion failed', { assertion: 'equal' });

    const logged = JSON.parse(logs[0] ?? '{}');
    expect(logged.scope).toBe('asserts');
    expect(logged.assertion).toBe('equal');
    expect(logged.msg).toBe('assertion failed');
    expect(logged.level).toBe(20);
  });

  it('should log errors under err', () => {
    const logger = new PinoLogger(parent());

    logger.error('capture failed', new Error('boom'), { attempt: 1 });
    logger.error('wrapped', 'plain reason');

    const first = JSON.parse(logs[0] ?? '{}');
    expect(first.err.message).toBe('boom');
    expect(first.attempt).toBe(1);
    expect(JSON.parse(logs[1] ?? '{}').err.message).toBe('plain reason');
  });

  it('should log warnings and info without context', () => {
    const logger = new PinoLogger(parent());

    logger.info('ready');
    logger.warn('slow');

    expect(logs.map((line) => JSON.parse(line).msg)).toEqual(['ready', 'slow']);
  });
});

describe('NoOpLogger', () => {
  it('should accept every call without output', () => {
    const logger = new NoOpLogger();

    expect(() => {
      logger.debug();
      logger.info();
      logger.warn();
      logger.error();
    }).not.toThrow();
  });
});
