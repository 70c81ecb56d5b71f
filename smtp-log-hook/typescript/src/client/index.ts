/**
 * SMTP client implementation.
 */

import { MailHookError, MailHookErrorKind, toError } from '../errors';
import { ConnectionConfig, DEFAULT_CLIENT_ID } from '../config';
import { AuthStart, SmtpAuth } from '../auth';
import {
  SmtpTransport,
  TransportFactory,
  tcpTransportFactory,
} from '../transport';
import {
  SmtpResponse,
  SmtpSession,
  TransactionState,
  describeResponse,
  isSuccessResponse,
  parseCapabilities,
} from '../protocol';
import { DotEncoder } from '../mime';
import { Logger, createNoopLogger } from '../observability';

/**
 * Options for dialing an SMTP server.
 */
export interface DialOptions {
  /** SMTP server host. */
  host: string;
  /** SMTP server port. */
  port: number;
  /** Name sent with EHLO/HELO. */
  clientId?: string;
  /** Connect timeout in milliseconds. */
  connectTimeout?: number;
  /** Reply timeout in milliseconds. */
  commandTimeout?: number;
  /** Transport factory. Defaults to TCP. */
  transport?: TransportFactory;
  /** Diagnostic logger. */
  logger?: Logger;
}

/**
 * Write side of an open DATA command.
 */
export interface DataWriter {
  /** Writes a chunk of message content. */
  write(chunk: string | Buffer): Promise<void>;
  /** Terminates the message and checks the server's verdict. */
  close(): Promise<void>;
  /** Terminates the message without reporting the outcome. */
  abort(): Promise<void>;
}

/**
 * A single SMTP session.
 *
 * Not safe for concurrent use: commands must be issued one at a time, and a
 * data channel must be closed before the next command.
 */
export class SmtpConnection {
  private readonly transport: SmtpTransport;
  private readonly host: string;
  private readonly clientId: string;
  private readonly logger: Logger;
  private didHello = false;
  private openWriter = false;

  private constructor(transport: SmtpTransport, host: string, clientId: string, logger: Logger) {
    this.transport = transport;
    this.host = host;
    this.clientId = clientId;
    this.logger = logger;
  }

  /**
   * Connects to the server and checks its greeting.
   */
  static async dial(options: DialOptions): Promise<SmtpConnection> {
    const config: ConnectionConfig = {
      host: options.host,
      port: options.port,
      clientId: options.clientId ?? DEFAULT_CLIENT_ID,
      connectTimeout: options.connectTimeout,
      commandTimeout: options.commandTimeout,
    };
    const logger = (options.logger ?? createNoopLogger()).withFields({
      host: config.host,
      port: config.port,
    });
    const transport = (options.transport ?? tcpTransportFactory).create(config);

    const greeting = await transport.connect();
    if (greeting.code !== 220) {
      await transport.close();
      throw MailHookError.fromSmtpResponse(greeting.code, describeResponse(greeting));
    }

    logger.debug('Connected', { greeting: describeResponse(greeting) });
    return new SmtpConnection(transport, config.host, config.clientId, logger);
  }

  /**
   * Sends EHLO, falling back to HELO. Runs at most once per session.
   */
  async hello(): Promise<void> {
    if (this.didHello) {
      return;
    }
    this.didHello = true;

    const session = this.session();
    try {
      const response = await this.transport.sendCommand(`EHLO ${this.clientId}`);
      if (isSuccessResponse(response)) {
        session.setCapabilities(parseCapabilities(response));
      } else {
        const heloResponse = await this.transport.sendCommand(`HELO ${this.clientId}`);
        this.expect(heloResponse, 250);
      }
    } catch (err) {
      session.fail();
      throw err;
    }

    session.transition(TransactionState.Ready);
  }

  /**
   * Checks whether the server advertised an extension.
   */
  async supportsExtension(name: string): Promise<boolean> {
    await this.hello();
    return this.session().getCapabilities()?.extensions.has(name.toUpperCase()) ?? false;
  }

  /**
   * Runs an authentication exchange.
   */
  async auth(mechanism: SmtpAuth): Promise<void> {
    await this.hello();
    const session = this.session();
    session.transition(TransactionState.Authenticating);

    const start = this.startAuth(mechanism);

    const initial = start.initialResponse ? ` ${start.initialResponse.toString('base64')}` : '';
    let response = await this.transport.sendCommand(`AUTH ${start.mechanism}${initial}`);

    for (;;) {
      const more = response.code === 334;
      if (!more && !isSuccessResponse(response)) {
        session.fail();
        throw MailHookError.authentication(
          `${response.code} ${describeResponse(response)}`.trim(),
          response.code
        );
      }

      const challenge = Buffer.from(response.message.join(''), more ? 'base64' : 'utf-8');
      let answer: Buffer | undefined;
      try {
        answer = mechanism.next(challenge, more);
      } catch (err) {
        if (more) {
          // Cancel the exchange
          await this.transport.sendCommand('*');
        }
        session.fail();
        throw err;
      }

      if (!more) {
        break;
      }
      response = await this.transport.sendCommand((answer ?? Buffer.alloc(0)).toString('base64'));
    }

    session.authenticate();
    this.logger.debug('Authenticated', { mechanism: start.mechanism });
  }

  private startAuth(mechanism: SmtpAuth): AuthStart {
    const session = this.session();
    try {
      return mechanism.start({
        name: this.host,
        auth: session.getCapabilities()?.authMethods ?? [],
      });
    } catch (err) {
      session.fail();
      throw err;
    }
  }

  /**
   * Declares the sender.
   */
  async mail(address: string): Promise<void> {
    await this.hello();
    const eightBit = this.session().getCapabilities()?.eightBitMime ? ' BODY=8BITMIME' : '';
    await this.command(`MAIL FROM:<${address}>${eightBit}`, 250, TransactionState.MailFrom);
  }

  /**
   * Declares a recipient.
   */
  async rcpt(address: string): Promise<void> {
    await this.command(`RCPT TO:<${address}>`, 25, TransactionState.RcptTo);
  }

  /**
   * Opens the data channel.
   */
  async data(): Promise<DataWriter> {
    if (this.openWriter) {
      throw MailHookError.protocol('A data channel is already open');
    }

    await this.command('DATA', 354, TransactionState.Data);
    this.openWriter = true;
    return this.createWriter();
  }

  /**
   * Sends QUIT and closes the connection.
   */
  async quit(): Promise<void> {
    try {
      await this.hello();
      const response = await this.transport.sendCommand('QUIT');
      this.expect(response, 221);
    } finally {
      await this.transport.close();
    }
  }

  /**
   * Closes the connection without QUIT.
   */
  async close(): Promise<void> {
    await this.transport.close();
  }

  /** Gets the session state. */
  getState(): TransactionState {
    return this.session().getState();
  }

  private session(): SmtpSession {
    return this.transport.getSession();
  }

  private createWriter(): DataWriter {
    const encoder = new DotEncoder();
    const session = this.session();
    let closed = false;

    const finish = async (): Promise<SmtpResponse> => {
      closed = true;
      this.openWriter = false;
      await this.transport.write(encoder.finish());
      return this.transport.readResponse();
    };

    return {
      write: async (chunk) => {
        if (closed) {
          throw MailHookError.protocol('Data channel is closed');
        }
        const text = typeof chunk === 'string' ? chunk : chunk.toString('utf-8');
        await this.transport.write(encoder.encode(text));
      },
      close: async () => {
        if (closed) {
          return;
        }
        let response: SmtpResponse;
        try {
          response = await finish();
        } catch (err) {
          session.fail();
          throw err;
        }
        if (!isSuccessResponse(response)) {
          session.fail();
          throw MailHookError.fromSmtpResponse(response.code, describeResponse(response));
        }
        session.transition(TransactionState.Completed);
      },
      abort: async () => {
        if (closed) {
          return;
        }
        session.fail();
        try {
          await finish();
        } catch (err) {
          this.logger.debug('Data channel abort failed', { error: toError(err).message });
        }
      },
    };
  }

  /**
   * Sends a command, expecting a reply code (or code prefix), and records the
   * new state on success.
   */
  private async command(line: string, expected: number, next: TransactionState): Promise<void> {
    const session = this.session();
    if (session.getState() === TransactionState.Failed) {
      throw MailHookError.protocol('Session is in a failed state');
    }

    try {
      const response = await this.transport.sendCommand(line);
      this.expect(response, expected);
      session.transition(next);
    } catch (err) {
      session.fail();
      throw err;
    }
  }

  private expect(response: SmtpResponse, expected: number): void {
    const matches =
      expected < 100
        ? Math.floor(response.code / 10) === expected
        : response.code === expected;

    if (!matches) {
      throw MailHookError.fromSmtpResponse(response.code, describeResponse(response));
    }
  }
}

/**
 * Options for a single-call send.
 */
export interface SendMailOptions extends DialOptions {
  /** Authentication mechanism. */
  auth?: SmtpAuth;
  /** Envelope sender. */
  from: string;
  /** Envelope recipients. */
  to: string[];
  /** Full message, headers included. */
  message: Buffer | string;
}

/**
 * Connects, authenticates, sends one message and quits.
 */
export async function sendMail(options: SendMailOptions): Promise<void> {
  const connection = await SmtpConnection.dial(options);

  try {
    await connection.hello();

    if (options.auth) {
      if (!(await connection.supportsExtension('AUTH'))) {
        throw new MailHookError(MailHookErrorKind.Authentication, "Server doesn't support AUTH");
      }
      await connection.auth(options.auth);
    }

    await connection.mail(options.from);
    for (const recipient of options.to) {
      await connection.rcpt(recipient);
    }

    const writer = await connection.data();
    try {
      await writer.write(options.message);
    } catch (err) {
      await writer.abort();
      throw err;
    }
    await writer.close();

    await connection.quit();
  } finally {
    await connection.close();
  }
}
