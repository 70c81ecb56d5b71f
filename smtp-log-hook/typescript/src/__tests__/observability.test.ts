/**
 * Tests for the logger and level hooks.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ConsoleLogger,
  Hook,
  LevelHooks,
  LogEntry,
  LogLevel,
  LoggerPanicError,
  NoopLogger,
  isLevelEnabled,
} from '../observability';

const fixedNow = (): Date => new Date('2024-01-01T00:00:00Z');

function recordingHook(levels: LogLevel[]): Hook & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    levels: () => levels,
    fire: (entry) => {
      entries.push(entry);
    },
  };
}

describe('isLevelEnabled', () => {
  it('should compare by severity', () => {
    expect(isLevelEnabled(LogLevel.Error, LogLevel.Info)).toBe(true);
    expect(isLevelEnabled(LogLevel.Debug, LogLevel.Info)).toBe(false);
    expect(isLevelEnabled(LogLevel.Panic, LogLevel.Panic)).toBe(true);
  });
});

describe('LevelHooks', () => {
  it('should index hooks under each of their levels', () => {
    const hooks = new LevelHooks();
    const hook = recordingHook([LogLevel.Panic, LogLevel.Error]);
    hooks.add(hook);

    expect(hooks.forLevel(LogLevel.Panic)).toEqual([hook]);
    expect(hooks.forLevel(LogLevel.Error)).toEqual([hook]);
    expect(hooks.forLevel(LogLevel.Warn)).toEqual([]);
  });
});

describe('ConsoleLogger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write formatted lines', () => {
    const logger = new ConsoleLogger(LogLevel.Info, { now: fixedNow });
    logger.info('started', { port: 25 });

    expect(console.info).toHaveBeenCalledWith('2024-01-01T00:00:00.000Z [INFO] started {"port":25}');
  });

  it('should fire hooks only for their levels', () => {
    const logger = new ConsoleLogger(LogLevel.Trace, { now: fixedNow });
    const hook = recordingHook([LogLevel.Error]);
    logger.addHook(hook);

    logger.info('ignored');
    logger.warn('ignored');
    logger.error('disk full', new Error('ENOSPC'), { volume: '/data' });

    expect(hook.entries).toEqual([
      {
        level: LogLevel.Error,
        message: 'disk full',
        timestamp: fixedNow(),
        fields: { volume: '/data', error: 'ENOSPC' },
      },
    ]);
  });

  it('should skip hooks for disabled levels', () => {
    const logger = new ConsoleLogger(LogLevel.Warn);
    const hook = recordingHook([LogLevel.Debug]);
    logger.addHook(hook);

    logger.debug('quiet');

    expect(hook.entries).toEqual([]);
  });

  it('should report a hook that throws', () => {
    const logger = new ConsoleLogger();
    logger.addHook({
      levels: () => [LogLevel.Error],
      fire: () => {
        throw new Error('boom');
      },
    });

    logger.error('failure');

    expect(console.error).toHaveBeenCalledWith('Failed to fire hook: boom');
  });

  it('should report a hook that rejects once flushed', async () => {
    const logger = new ConsoleLogger();
    logger.addHook({
      levels: () => [LogLevel.Error],
      fire: () => Promise.reject(new Error('late')),
    });

    logger.error('failure');
    await logger.flush();

    expect(console.error).toHaveBeenCalledWith('Failed to fire hook: late');
  });

  it('should share hooks and merge fields with withFields', () => {
    const logger = new ConsoleLogger(LogLevel.Info, { now: fixedNow, fields: { app: 'svc' } });
    const hook = recordingHook([LogLevel.Error]);
    logger.addHook(hook);

    logger.withFields({ request: 'r-1' }).error('failed');

    expect(hook.entries[0]?.fields).toEqual({ app: 'svc', request: 'r-1' });
  });

  it('should wait for hooks before exiting on fatal', async () => {
    const order: string[] = [];
    const exit = vi.fn((code: number) => {
      order.push(`exit ${code}`);
    });
    const logger = new ConsoleLogger(LogLevel.Info, { exit });
    logger.addHook({
      levels: () => [LogLevel.Fatal],
      fire: async () => {
        await new Promise((resolve) => setTimeout(resolve, 10));
        order.push('delivered');
      },
    });

    await logger.fatal('out of memory');

    expect(order).toEqual(['delivered', 'exit 1']);
  });

  it('should throw after logging a panic', () => {
    const logger = new ConsoleLogger();
    const hook = recordingHook([LogLevel.Panic]);
    logger.addHook(hook);

    expect(() => logger.panic('invariant broken')).toThrow(LoggerPanicError);
    expect(hook.entries).toHaveLength(1);
    expect(hook.entries[0]?.level).toBe(LogLevel.Panic);
  });
});

describe('NoopLogger', () => {
  it('should return itself from withFields', () => {
    const logger = new NoopLogger();
    expect(logger.withFields({ a: 1 })).toBe(logger);
  });
});
