/**
 * Mail hooks: log listeners that email Panic, Fatal and Error entries.
 *
 * `MailHook` holds one SMTP session open for its whole lifetime, with sender
 * and recipient declared up front, and writes each entry onto it.
 * `MailAuthHook` keeps only settings and opens a fresh authenticated session
 * for every entry, off the caller's path.
 *
 * @module hooks
 */

import { toError } from '../errors';
import {
  ConnectionConfig,
  DEFAULT_PROBE_TIMEOUT,
  HOOK_LEVELS,
  MailAuthHookConfigOptions,
  MailHookConfigOptions,
  createConnectionConfig,
  validateMailAuthHookOptions,
  validateMailHookOptions,
} from '../config';
import { Address, parseAddress } from '../types';
import { PlainAuth, SecretString } from '../auth';
import { TransportFactory, tcpTransportFactory } from '../transport';
import { SmtpConnection, sendMail } from '../client';
import { Hook, LogEntry, LogLevel, Logger, createNoopLogger } from '../observability';
import { buildMessage } from '../message';

/**
 * Runs a detached task. The caller neither awaits nor observes it.
 */
export type Executor = (task: () => Promise<void>) => void;

/**
 * Runs tasks on the next turn of the event loop. A failed task is reported to
 * `logger` at debug level and goes no further.
 */
export function immediateExecutor(logger: Logger): Executor {
  return (task) => {
    setImmediate(() => {
      task().catch((err: unknown) => {
        logger.debug('Mail delivery failed', { error: toError(err).message });
      });
    });
  };
}

/**
 * Options for `createMailHook`.
 */
export interface MailHookOptions extends MailHookConfigOptions {
  /** Transport factory. Defaults to TCP. */
  transport?: TransportFactory;
  /** Diagnostic logger for the SMTP session. */
  logger?: Logger;
}

/**
 * Unauthenticated hook over one long-lived session.
 *
 * Not safe for concurrent use: callers must wait for one `fire` to settle
 * before starting the next.
 */
export class MailHook implements Hook {
  readonly appName: string;
  readonly from: Address;
  readonly to: Address;
  private readonly connection: SmtpConnection;

  constructor(appName: string, from: Address, to: Address, connection: SmtpConnection) {
    this.appName = appName;
    this.from = from;
    this.to = to;
    this.connection = connection;
  }

  levels(): readonly LogLevel[] {
    return HOOK_LEVELS;
  }

  /**
   * Writes one message onto the session.
   */
  async fire(entry: LogEntry): Promise<void> {
    const message = buildMessage(entry, this.appName, this.from.email, this.to.email);

    const writer = await this.connection.data();
    try {
      await writer.write(message);
    } catch (err) {
      await writer.abort();
      throw err;
    }
    await writer.close();
  }

  /**
   * Sends QUIT and releases the connection.
   */
  async close(): Promise<void> {
    await this.connection.quit();
  }
}

/**
 * Connects to the server, declares sender and recipient, and returns a hook
 * owning the session.
 */
export async function createMailHook(options: MailHookOptions): Promise<MailHook> {
  const validated = validateMailHookOptions(options);
  const config = createConnectionConfig(validated);

  const connection = await SmtpConnection.dial({
    ...config,
    transport: options.transport,
    logger: options.logger,
  });

  try {
    const from = parseAddress(validated.from);
    const to = parseAddress(validated.to);

    await connection.hello();
    await connection.mail(from.email);
    await connection.rcpt(to.email);

    return new MailHook(validated.appName, from, to, connection);
  } catch (err) {
    await connection.close();
    throw err;
  }
}

/**
 * Options for `createMailAuthHook`.
 */
export interface MailAuthHookOptions extends MailAuthHookConfigOptions {
  /** Transport factory. Defaults to TCP. */
  transport?: TransportFactory;
  /** Runs delivery tasks. Defaults to `setImmediate` dispatch. */
  executor?: Executor;
  /**
   * Receives delivery failures at debug level. This departs from a silent
   * discard: failures are logged here, though never returned or thrown to the
   * caller. When unset, failures are discarded without logging.
   */
  logger?: Logger;
}

/**
 * Settings held by an authenticated hook.
 */
export interface MailAuthHookSettings {
  readonly appName: string;
  readonly connection: ConnectionConfig;
  readonly from: Address;
  readonly to: Address;
  readonly username: string;
  readonly password: SecretString;
}

/**
 * Authenticated hook. Each `fire` delivers over a fresh session in the
 * background.
 */
export class MailAuthHook implements Hook {
  readonly appName: string;
  readonly connection: ConnectionConfig;
  readonly from: Address;
  readonly to: Address;
  readonly username: string;
  private readonly password: SecretString;
  private readonly transport: TransportFactory;
  private readonly executor: Executor;
  private readonly logger: Logger;

  constructor(
    settings: MailAuthHookSettings,
    transport: TransportFactory,
    executor: Executor,
    logger: Logger
  ) {
    this.appName = settings.appName;
    this.connection = settings.connection;
    this.from = settings.from;
    this.to = settings.to;
    this.username = settings.username;
    this.password = settings.password;
    this.transport = transport;
    this.executor = executor;
    this.logger = logger;
  }

  /** SMTP server host. */
  get host(): string {
    return this.connection.host;
  }

  /** SMTP server port. */
  get port(): number {
    return this.connection.port;
  }

  levels(): readonly LogLevel[] {
    return HOOK_LEVELS;
  }

  /**
   * Builds the message on the caller's stack, then hands delivery to the
   * executor. Never reports delivery failures.
   */
  fire(entry: LogEntry): void {
    const message = buildMessage(entry, this.appName, this.from.email, this.to.email);

    this.executor(() =>
      sendMail({
        ...this.connection,
        transport: this.transport,
        logger: this.logger,
        auth: new PlainAuth('', this.username, this.password, this.host),
        from: this.from.email,
        to: [this.to.email],
        message,
      })
    );
  }
}

/**
 * Checks the server is reachable, validates both addresses and returns a hook.
 * No session is kept open.
 */
export async function createMailAuthHook(options: MailAuthHookOptions): Promise<MailAuthHook> {
  const validated = validateMailAuthHookOptions(options);
  const transport = options.transport ?? tcpTransportFactory;
  const logger = options.logger ?? createNoopLogger();

  await transport.probe(
    validated.host,
    validated.port,
    validated.probeTimeout ?? DEFAULT_PROBE_TIMEOUT
  );

  const from = parseAddress(validated.from);
  const to = parseAddress(validated.to);

  return new MailAuthHook(
    {
      appName: validated.appName,
      connection: createConnectionConfig(validated),
      from,
      to,
      username: validated.username,
      password: new SecretString(validated.password),
    },
    transport,
    options.executor ?? immediateExecutor(logger),
    logger
  );
}
