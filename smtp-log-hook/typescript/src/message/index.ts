/**
 * Message builder: renders a log entry as a minimal email.
 *
 * The rendered text is a `From`/`To`/`Subject` header block, a blank line,
 * then a body holding the entry's timestamp and message, a trace of the call
 * stack at the point the message was built, and the entry's fields as JSON.
 * Every line ends in CRLF.
 *
 * @module message
 */

import { MAX_STACK_DEPTH } from '../config';
import { LogEntry } from '../observability';

/**
 * The parts of a V8 call site the builder reads.
 */
export interface CallSiteLike {
  getFileName(): string | null | undefined;
  getFunctionName(): string | null;
  getLineNumber(): number | null;
  getColumnNumber(): number | null;
}

/**
 * One resolved stack frame.
 */
export interface StackFrame {
  /** Source file path or URL, `native` for built-ins. */
  file: string;
  /** Function name, or `<anonymous>`. */
  functionName: string;
  /** 1-based line number, 0 when unknown. */
  line: number;
  /** 1-based column number, 0 when unknown. */
  column: number;
}

type AnyFunction = (...args: never[]) => unknown;

/**
 * Captures up to `maxDepth` call sites above `skip`, innermost first.
 */
export function captureCallSites(maxDepth: number, skip: AnyFunction): NodeJS.CallSite[] {
  const originalPrepare = Error.prepareStackTrace;
  const originalLimit = Error.stackTraceLimit;
  let sites: NodeJS.CallSite[] = [];

  Error.prepareStackTrace = (_err, callSites) => {
    sites = callSites;
    return '';
  };
  Error.stackTraceLimit = maxDepth;

  try {
    const holder: { stack?: string } = {};
    Error.captureStackTrace(holder, skip);
    // V8 formats lazily: reading `stack` runs prepareStackTrace.
    return holder.stack === undefined ? [] : sites;
  } finally {
    Error.prepareStackTrace = originalPrepare;
    Error.stackTraceLimit = originalLimit;
  }
}

/**
 * Resolves call sites into frames, stopping at the first one with neither a
 * file nor a function name. That site is not included. Built-ins such as
 * `Array.prototype.forEach` carry a name but no file and resolve to `native`.
 */
export function resolveFrames(sites: readonly CallSiteLike[], maxDepth = MAX_STACK_DEPTH): StackFrame[] {
  const frames: StackFrame[] = [];

  for (const site of sites.slice(0, maxDepth)) {
    const file = site.getFileName();
    const functionName = site.getFunctionName();
    if (!file && !functionName) {
      break;
    }
    frames.push({
      file: file || 'native',
      functionName: functionName || '<anonymous>',
      line: site.getLineNumber() ?? 0,
      column: site.getColumnNumber() ?? 0,
    });
  }

  return frames;
}

/**
 * Captures the frames above `skip`.
 */
export function captureStackFrames(maxDepth: number, skip: AnyFunction): StackFrame[] {
  return resolveFrames(captureCallSites(maxDepth, skip), maxDepth);
}

/**
 * Formats frames as the trace section of a message.
 */
export function formatTrace(frames: readonly StackFrame[]): string {
  return frames
    .map(
      (frame, i) =>
        `Frame ${String(i).padStart(2, '0')}:\r\n` +
        `\tFile: ${frame.file}\r\n` +
        `\tFunction: ${frame.functionName}\r\n` +
        `\tLine: ${frame.line}\r\n` +
        `\tColumn: ${frame.column}\r\n`
    )
    .join('');
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/**
 * Formats a timestamp as `YYYYMMDD HH:MM:SS` in UTC.
 */
export function formatTimestamp(date: Date): string {
  const day = `${pad(date.getUTCFullYear(), 4)}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  return `${day} ${time}`;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function sortKeys(value: unknown, ancestors: Set<unknown>): unknown {
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (ancestors.has(value)) {
    throw new TypeError('Converting circular structure to JSON');
  }

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => sortKeys(item, ancestors));
    }
    if (!isPlainObject(value)) {
      return value;
    }

    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key], ancestors);
    }
    return sorted;
  } finally {
    ancestors.delete(value);
  }
}

/**
 * Renders fields as tab-indented JSON with sorted keys. Returns an empty string
 * if the fields cannot be rendered.
 */
export function renderFields(fields: Record<string, unknown>): string {
  try {
    return JSON.stringify(sortKeys(fields, new Set()), null, '\t') ?? '';
  } catch {
    return '';
  }
}

/**
 * Builds the message for an entry. The trace starts at the caller of this
 * function. `from` and `to` headers are omitted when empty.
 */
export function buildMessage(entry: LogEntry, appName: string, from: string, to: string): Buffer {
  const trace = formatTrace(captureStackFrames(MAX_STACK_DEPTH, buildMessage));

  let headers = '';
  if (from !== '') {
    headers += `From: ${from}\r\n`;
  }
  if (to !== '') {
    headers += `To: ${to}\r\n`;
  }
  headers += `Subject: ${appName} - ${entry.level}\r\n`;

  let body = `${formatTimestamp(entry.timestamp)} - ${entry.message}\r\n\r\n`;
  body += `${trace}\r\n\r\nData:\r\n\r\n${renderFields(entry.fields)}`;

  return Buffer.from(`${headers}\r\n${body}\r\n\r\n`, 'utf-8');
}
