/**
 * Mock implementations for testing.
 */

import { MailHookError, MailHookErrorKind } from '../errors';
import { ConnectionConfig } from '../config';
import { SmtpTransport, TransportFactory } from '../transport';
import { SmtpResponse, SmtpSession, TransactionState } from '../protocol';

/**
 * Recorded SMTP command.
 */
export interface RecordedCommand {
  /** Command string. */
  command: string;
  /** Timestamp. */
  timestamp: Date;
  /** Response returned. */
  response?: SmtpResponse;
}

/**
 * Mock transport configuration.
 */
export interface MockTransportConfig {
  /** Greeting reply code. */
  greetingCode?: number;
  /** EHLO extension lines, after the server name. */
  capabilities?: string[];
  /** Answer EHLO with 502 so the client falls back to HELO. */
  ehloUnsupported?: boolean;
  /** Reject MAIL FROM. */
  rejectSender?: boolean;
  /** Recipients to reject. */
  rejectedRecipients?: string[];
  /** Whether authentication should succeed. */
  authSuccess?: boolean;
  /** Reply code for DATA. */
  dataCode?: number;
  /** Reply code once a message has been terminated. */
  messageCode?: number;
  /** Error to throw on connect. */
  connectError?: Error;
  /** Error to throw on write. */
  writeError?: Error;
}

const DEFAULT_CAPABILITIES = ['8BITMIME', 'AUTH PLAIN LOGIN'];

/**
 * Mock SMTP transport for testing.
 *
 * Answers commands from its configuration and collects DATA content. The
 * envelope is never reset, so DATA may be repeated after a message is accepted.
 */
export class MockTransport implements SmtpTransport {
  private readonly config: MockTransportConfig;
  private readonly session: SmtpSession;
  private readonly recordedCommands: RecordedCommand[] = [];
  private readonly messages: string[] = [];
  private readonly replies: SmtpResponse[] = [];
  private dataBuffer: string | null = null;
  private connected = false;

  constructor(config: MockTransportConfig = {}) {
    this.config = config;
    this.session = new SmtpSession();
  }

  async connect(): Promise<SmtpResponse> {
    if (this.config.connectError) {
      throw this.config.connectError;
    }

    this.connected = true;
    this.session.transition(TransactionState.Connected);

    const code = this.config.greetingCode ?? 220;
    if (code >= 200 && code < 400) {
      this.session.transition(TransactionState.Greeting);
    }
    return this.createResponse(code, ['mock.smtp.server ESMTP ready']);
  }

  async sendCommand(command: string): Promise<SmtpResponse> {
    this.requireConnected();

    const response = this.handleCommand(command.replace(/\r\n$/, ''));
    this.recordedCommands.push({
      command,
      timestamp: new Date(),
      response,
    });

    return response;
  }

  async write(data: string): Promise<void> {
    this.requireConnected();

    if (this.config.writeError) {
      throw this.config.writeError;
    }
    if (this.dataBuffer === null) {
      throw MailHookError.protocol('Write outside of DATA');
    }

    this.dataBuffer += data;
    if (this.dataBuffer === '.\r\n' || this.dataBuffer.endsWith('\r\n.\r\n')) {
      this.messages.push(unstuff(this.dataBuffer.slice(0, -3)));
      this.dataBuffer = null;
      const code = this.config.messageCode ?? 250;
      this.replies.push(
        this.createResponse(code, [code < 400 ? 'OK queued as MOCK123' : 'Message rejected'])
      );
    }
  }

  async readResponse(): Promise<SmtpResponse> {
    const reply = this.replies.shift();
    if (!reply) {
      throw MailHookError.protocol('No reply pending');
    }
    return reply;
  }

  async close(): Promise<void> {
    this.connected = false;
    this.session.disconnect();
  }

  isConnected(): boolean {
    return this.connected;
  }

  getSession(): SmtpSession {
    return this.session;
  }

  // Mock-specific methods

  /** Gets recorded commands. */
  getRecordedCommands(): RecordedCommand[] {
    return [...this.recordedCommands];
  }

  /** Gets the command lines, without their responses. */
  getCommandLines(): string[] {
    return this.recordedCommands.map((recorded) => recorded.command);
  }

  /** Gets every terminated message, with dot-stuffing undone. */
  getMessages(): string[] {
    return [...this.messages];
  }

  private requireConnected(): void {
    if (!this.connected) {
      throw new MailHookError(MailHookErrorKind.Connection, 'Not connected');
    }
  }

  private handleCommand(command: string): SmtpResponse {
    const upperCommand = command.toUpperCase();

    if (upperCommand.startsWith('EHLO')) {
      if (this.config.ehloUnsupported) {
        return this.createResponse(502, ['Command not implemented']);
      }
      return this.createResponse(250, [
        'mock.smtp.server',
        ...(this.config.capabilities ?? DEFAULT_CAPABILITIES),
      ]);
    }
    if (upperCommand.startsWith('HELO')) {
      return this.createResponse(250, ['mock.smtp.server Hello']);
    }
    if (upperCommand.startsWith('AUTH')) {
      return this.config.authSuccess === false
        ? this.createResponse(535, ['Authentication failed'])
        : this.createResponse(235, ['Authentication successful']);
    }
    if (upperCommand.startsWith('MAIL FROM')) {
      return this.config.rejectSender
        ? this.createResponse(550, ['Sender rejected'])
        : this.createResponse(250, ['OK']);
    }
    if (upperCommand.startsWith('RCPT TO')) {
      const email = command.match(/<([^>]*)>/)?.[1] ?? '';
      return this.config.rejectedRecipients?.includes(email)
        ? this.createResponse(550, ['Recipient rejected'])
        : this.createResponse(250, ['OK']);
    }
    if (upperCommand === 'DATA') {
      const code = this.config.dataCode ?? 354;
      if (code === 354) {
        this.dataBuffer = '';
        return this.createResponse(354, ['Start mail input; end with <CRLF>.<CRLF>']);
      }
      return this.createResponse(code, ['DATA refused']);
    }
    if (upperCommand === 'QUIT') {
      return this.createResponse(221, ['Bye']);
    }
    if (command === '*') {
      return this.createResponse(501, ['Authentication cancelled']);
    }

    return this.createResponse(500, ['Command not recognized']);
  }

  private createResponse(code: number, messages: string[]): SmtpResponse {
    return {
      code,
      message: messages,
      isMultiline: messages.length > 1,
    };
  }
}

function unstuff(data: string): string {
  return data
    .split('\r\n')
    .map((line) => (line.startsWith('..') ? line.slice(1) : line))
    .join('\r\n');
}

/**
 * Mock transport factory configuration.
 */
export interface MockTransportFactoryConfig extends MockTransportConfig {
  /** Error thrown by `probe`. */
  probeError?: Error;
}

/**
 * Recorded reachability probe.
 */
export interface RecordedProbe {
  host: string;
  port: number;
  timeoutMs: number;
}

/**
 * Hands out mock transports and records probes.
 */
export class MockTransportFactory implements TransportFactory {
  private readonly config: MockTransportFactoryConfig;
  private readonly transports: MockTransport[] = [];
  private readonly configs: ConnectionConfig[] = [];
  private readonly probes: RecordedProbe[] = [];

  constructor(config: MockTransportFactoryConfig = {}) {
    this.config = config;
  }

  create(config: ConnectionConfig): MockTransport {
    const transport = new MockTransport(this.config);
    this.transports.push(transport);
    this.configs.push(config);
    return transport;
  }

  async probe(host: string, port: number, timeoutMs: number): Promise<void> {
    this.probes.push({ host, port, timeoutMs });
    if (this.config.probeError) {
      throw this.config.probeError;
    }
  }

  // Mock-specific methods

  /** Gets every transport created so far. */
  getTransports(): MockTransport[] {
    return [...this.transports];
  }

  /** Gets the connection settings passed to `create`. */
  getConfigs(): ConnectionConfig[] {
    return [...this.configs];
  }

  /** Gets recorded probes. */
  getProbes(): RecordedProbe[] {
    return [...this.probes];
  }
}

/**
 * Creates a mock transport.
 */
export function createMockTransport(config?: MockTransportConfig): MockTransport {
  return new MockTransport(config);
}

/**
 * Creates a mock transport factory.
 */
export function createMockTransportFactory(config?: MockTransportFactoryConfig): MockTransportFactory {
  return new MockTransportFactory(config);
}
