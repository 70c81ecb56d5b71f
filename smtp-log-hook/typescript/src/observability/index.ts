/**
 * Logging for the SMTP log hook: levels, entries, hooks and loggers.
 *
 * A `ConsoleLogger` writes each entry to the console and fires every hook
 * registered for the entry's level. The mail hooks plug in here; the SMTP
 * client also uses the `Logger` interface for its own debug output.
 */

import { toError } from '../errors';

/**
 * Log levels, most severe first. The value is the level's display name.
 */
export enum LogLevel {
  Panic = 'panic',
  Fatal = 'fatal',
  Error = 'error',
  Warn = 'warning',
  Info = 'info',
  Debug = 'debug',
  Trace = 'trace',
}

const SEVERITY_ORDER: readonly LogLevel[] = [
  LogLevel.Panic,
  LogLevel.Fatal,
  LogLevel.Error,
  LogLevel.Warn,
  LogLevel.Info,
  LogLevel.Debug,
  LogLevel.Trace,
];

/**
 * Returns true if `level` is at least as severe as `threshold`.
 */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return SEVERITY_ORDER.indexOf(level) <= SEVERITY_ORDER.indexOf(threshold);
}

/**
 * Log entry structure.
 */
export interface LogEntry {
  /** Log level. */
  level: LogLevel;
  /** Log message. */
  message: string;
  /** Timestamp. */
  timestamp: Date;
  /** Structured fields. */
  fields: Record<string, unknown>;
}

/**
 * A listener fired for entries at the levels it reports.
 */
export interface Hook {
  levels(): readonly LogLevel[];
  fire(entry: LogEntry): void | Promise<void>;
}

/**
 * Hooks indexed by level.
 */
export class LevelHooks {
  private readonly hooks = new Map<LogLevel, Hook[]>();
  private readonly pending = new Set<Promise<void>>();

  /** Registers a hook under each of its levels. */
  add(hook: Hook): void {
    for (const level of hook.levels()) {
      const registered = this.hooks.get(level) ?? [];
      registered.push(hook);
      this.hooks.set(level, registered);
    }
  }

  /** Gets the hooks registered for a level. */
  forLevel(level: LogLevel): readonly Hook[] {
    return this.hooks.get(level) ?? [];
  }

  /**
   * Fires the hooks for the entry's level. Each hook is called synchronously;
   * a hook that throws or rejects is reported on stderr.
   */
  fire(entry: LogEntry): void {
    for (const hook of this.forLevel(entry.level)) {
      try {
        const result = hook.fire(entry);
        if (result instanceof Promise) {
          this.track(result);
        }
      } catch (err) {
        reportHookFailure(err);
      }
    }
  }

  /**
   * Waits for every pending asynchronous hook to settle.
   */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private track(delivery: Promise<void>): void {
    const settled = delivery.then(
      () => {
        this.pending.delete(settled);
      },
      (err: unknown) => {
        this.pending.delete(settled);
        reportHookFailure(err);
      }
    );
    this.pending.add(settled);
  }
}

function reportHookFailure(err: unknown): void {
  console.error(`Failed to fire hook: ${toError(err).message}`);
}

/**
 * Logger interface.
 */
export interface Logger {
  trace(message: string, fields?: Record<string, unknown>): void;
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, error?: Error, fields?: Record<string, unknown>): void;
  withFields(fields: Record<string, unknown>): Logger;
}

/**
 * Thrown by `ConsoleLogger.panic` once the entry has been logged.
 */
export class LoggerPanicError extends Error {
  readonly entry: LogEntry;

  constructor(entry: LogEntry) {
    super(entry.message);
    this.name = 'LoggerPanicError';
    this.entry = entry;
  }
}

/**
 * Console logger options.
 */
export interface ConsoleLoggerOptions {
  /** Hook registry. A fresh one is created when omitted. */
  hooks?: LevelHooks;
  /** Fields attached to every entry. */
  fields?: Record<string, unknown>;
  /** Clock used to stamp entries. */
  now?: () => Date;
  /** Called by `fatal` after hooks have settled. */
  exit?: (code: number) => void;
}

/**
 * Console logger with level hooks.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly fields: Record<string, unknown>;
  private readonly hooks: LevelHooks;
  private readonly now: () => Date;
  private readonly exit: (code: number) => void;

  constructor(minLevel: LogLevel = LogLevel.Info, options: ConsoleLoggerOptions = {}) {
    this.minLevel = minLevel;
    this.fields = options.fields ?? {};
    this.hooks = options.hooks ?? new LevelHooks();
    this.now = options.now ?? (() => new Date());
    this.exit = options.exit ?? ((code) => process.exit(code));
  }

  /** Registers a hook. */
  addHook(hook: Hook): void {
    this.hooks.add(hook);
  }

  trace(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Trace, message, fields);
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, fields);
  }

  error(message: string, error?: Error, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, error ? { ...fields, error: error.message } : fields);
  }

  /**
   * Logs at fatal level, waits for hook deliveries, then exits with code 1.
   */
  async fatal(message: string, fields?: Record<string, unknown>): Promise<void> {
    this.log(LogLevel.Fatal, message, fields);
    await this.flush();
    this.exit(1);
  }

  /**
   * Logs at panic level, then throws.
   */
  panic(message: string, fields?: Record<string, unknown>): never {
    const entry = this.log(LogLevel.Panic, message, fields);
    throw new LoggerPanicError(entry);
  }

  /**
   * Returns a logger that adds `fields` to every entry and shares this
   * logger's hooks.
   */
  withFields(fields: Record<string, unknown>): ConsoleLogger {
    return new ConsoleLogger(this.minLevel, {
      hooks: this.hooks,
      fields: { ...this.fields, ...fields },
      now: this.now,
      exit: this.exit,
    });
  }

  /**
   * Waits for every pending hook delivery to settle.
   */
  flush(): Promise<void> {
    return this.hooks.flush();
  }

  /**
   * Checks whether a level would be logged.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return isLevelEnabled(level, this.minLevel);
  }

  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): LogEntry {
    const entry: LogEntry = {
      level,
      message,
      timestamp: this.now(),
      fields: { ...this.fields, ...fields },
    };

    if (!this.isLevelEnabled(level)) {
      return entry;
    }

    const output = this.formatEntry(entry);

    switch (level) {
      case LogLevel.Trace:
      case LogLevel.Debug:
        console.debug(output);
        break;
      case LogLevel.Info:
        console.info(output);
        break;
      case LogLevel.Warn:
        console.warn(output);
        break;
      default:
        console.error(output);
    }

    this.hooks.fire(entry);

    return entry;
  }

  private formatEntry(entry: LogEntry): string {
    const parts: string[] = [
      entry.timestamp.toISOString(),
      `[${entry.level.toUpperCase()}]`,
      entry.message,
    ];

    if (Object.keys(entry.fields).length > 0) {
      parts.push(formatFields(entry.fields));
    }

    return parts.join(' ');
  }
}

function formatFields(fields: Record<string, unknown>): string {
  try {
    return JSON.stringify(fields);
  } catch (err) {
    return `[unserializable fields: ${toError(err).message}]`;
  }
}

/**
 * No-op logger that discards all logs.
 */
export class NoopLogger implements Logger {
  trace(): void {
    // No-op
  }
  debug(): void {
    // No-op
  }
  info(): void {
    // No-op
  }
  warn(): void {
    // No-op
  }
  error(): void {
    // No-op
  }
  withFields(_fields: Record<string, unknown>): Logger {
    return this;
  }
}

/**
 * Creates a console logger.
 */
export function createLogger(minLevel?: LogLevel, options?: ConsoleLoggerOptions): ConsoleLogger {
  return new ConsoleLogger(minLevel, options);
}

/**
 * Creates a no-op logger.
 */
export function createNoopLogger(): Logger {
  return new NoopLogger();
}
