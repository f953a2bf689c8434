import { describe, expect, it } from 'vitest';
import { createLogger, isLogLevel, type LogEntry } from './index.ts';

const FIXED_NOW = () => '2026-01-01T00:00:00.000Z';

describe('createLogger', () => {
  it('writes structured entry with level and merged context', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({
      baseContext: { module: 'bmi-evaluator' },
      now: FIXED_NOW,
      writer: (entry) => entries.push(entry),
    });

    logger.info('evaluation logged', { category: 'NORMAL' });

    expect(entries).toEqual([
      {
        timestamp: '2026-01-01T00:00:00.000Z',
        level: 'info',
        message: 'evaluation logged',
        context: {
          module: 'bmi-evaluator',
          category: 'NORMAL',
        },
      },
    ]);
  });

  it('supports withContext for child loggers', () => {
    const entries: LogEntry[] = [];
    const root = createLogger({
      baseContext: { app: 'self-test' },
      now: FIXED_NOW,
      writer: (entry) => entries.push(entry),
    });

    const child = root.withContext({ scenario: 2 });
    child.warning('slow sink', { attempt: 2 });

    expect(entries).toEqual([
      {
        timestamp: '2026-01-01T00:00:00.000Z',
        level: 'warning',
        message: 'slow sink',
        context: {
          app: 'self-test',
          scenario: 2,
          attempt: 2,
        },
      },
    ]);
  });

  it('exposes all level helpers', () => {
    const levels: string[] = [];
    const logger = createLogger({
      now: FIXED_NOW,
      writer: (entry) => levels.push(entry.level),
    });

    logger.debug('d');
    logger.info('i');
    logger.warning('w');
    logger.error('e');
    logger.fatal('f');

    expect(levels).toEqual(['debug', 'info', 'warning', 'error', 'fatal']);
  });

  it('drops entries below minLevel, also in child loggers', () => {
    const levels: string[] = [];
    const logger = createLogger({
      minLevel: 'warning',
      now: FIXED_NOW,
      writer: (entry) => levels.push(entry.level),
    });

    logger.debug('d');
    logger.info('i');
    logger.withContext({ child: true }).info('i2');
    logger.warning('w');
    logger.withContext({ child: true }).error('e');

    expect(levels).toEqual(['warning', 'error']);
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('warning')).toBe(true);
    expect(isLogLevel('warn')).toBe(false);
  });
});
