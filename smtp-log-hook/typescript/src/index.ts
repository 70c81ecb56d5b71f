/**
 * SMTP Log Hook
 *
 * Log hooks that email Panic, Fatal and Error entries: the entry's time,
 * message, a trace of the call stack and its fields rendered as JSON.
 *
 * @example
 * ```typescript
 * import { createLogger, createMailAuthHook, LogLevel } from 'smtp-log-hook';
 *
 * const logger = createLogger(LogLevel.Info);
 *
 * logger.addHook(
 *   await createMailAuthHook({
 *     appName: 'billing',
 *     host: 'smtp.example.com',
 *     port: 587,
 *     from: 'Alerts <alerts@example.com>',
 *     to: 'oncall@example.com',
 *     username: 'alerts',
 *     password: process.env.SMTP_PASSWORD ?? '',
 *   })
 * );
 *
 * logger.error('Invoice run failed', new Error('ledger locked'), { batch: 42 });
 * ```
 *
 * @packageDocumentation
 */

// Re-export errors
export { MailHookError, MailHookErrorKind, isMailHookError, toError } from './errors';

// Re-export config
export {
  DEFAULT_PROBE_TIMEOUT,
  MAX_STACK_DEPTH,
  DEFAULT_CLIENT_ID,
  HOOK_LEVELS,
  MailHookOptionsSchema,
  MailAuthHookOptionsSchema,
  validateMailHookOptions,
  validateMailAuthHookOptions,
  createConnectionConfig,
} from './config';
export type { MailHookConfigOptions, MailAuthHookConfigOptions, ConnectionConfig } from './config';

// Re-export types
export { parseAddress } from './types';
export type { Address } from './types';

// Re-export auth
export { SecretString, PlainAuth } from './auth';
export type { SmtpAuth, ServerInfo, AuthStart } from './auth';

// Re-export protocol
export {
  TransactionState,
  SmtpSession,
  ResponseReader,
  parseResponse,
  isSuccessResponse,
  parseCapabilities,
  canTransition,
} from './protocol';
export type { SmtpResponse, EsmtpCapabilities } from './protocol';

// Re-export mime
export { DotEncoder, prepareMessageData } from './mime';

// Re-export transport
export { TcpTransport, probe, tcpTransportFactory } from './transport';
export type { SmtpTransport, TransportFactory } from './transport';

// Re-export client
export { SmtpConnection, sendMail } from './client';
export type { DialOptions, DataWriter, SendMailOptions } from './client';

// Re-export message
export {
  buildMessage,
  captureCallSites,
  captureStackFrames,
  resolveFrames,
  formatTrace,
  formatTimestamp,
  renderFields,
} from './message';
export type { CallSiteLike, StackFrame } from './message';

// Re-export observability
export {
  LogLevel,
  LevelHooks,
  ConsoleLogger,
  NoopLogger,
  LoggerPanicError,
  isLevelEnabled,
  createLogger,
  createNoopLogger,
} from './observability';
export type { LogEntry, Hook, Logger, ConsoleLoggerOptions } from './observability';

// Re-export hooks
export {
  MailHook,
  MailAuthHook,
  createMailHook,
  createMailAuthHook,
  immediateExecutor,
} from './hooks';
export type { Executor, MailHookOptions, MailAuthHookOptions, MailAuthHookSettings } from './hooks';

// Re-export mocks
export {
  MockTransport,
  MockTransportFactory,
  createMockTransport,
  createMockTransportFactory,
} from './mocks';
export type {
  MockTransportConfig,
  MockTransportFactoryConfig,
  RecordedCommand,
  RecordedProbe,
} from './mocks';
