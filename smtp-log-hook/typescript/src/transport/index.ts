/**
 * SMTP transport layer.
 */

import * as net from 'net';
import { MailHookError, MailHookErrorKind, toError } from '../errors';
import { ConnectionConfig } from '../config';
import {
  SmtpResponse,
  ResponseReader,
  SmtpSession,
  TransactionState,
} from '../protocol';

/**
 * SMTP transport interface.
 */
export interface SmtpTransport {
  /** Connects to the SMTP server and returns its greeting. */
  connect(): Promise<SmtpResponse>;
  /** Sends a command and receives a response. */
  sendCommand(command: string): Promise<SmtpResponse>;
  /** Writes raw data (DATA content) without waiting for a reply. */
  write(data: string): Promise<void>;
  /** Reads the next reply from the server. */
  readResponse(): Promise<SmtpResponse>;
  /** Closes the connection. */
  close(): Promise<void>;
  /** Checks if connected. */
  isConnected(): boolean;
  /** Gets the session. */
  getSession(): SmtpSession;
}

/**
 * Creates transports and probes endpoints. Hooks take one of these so tests can
 * substitute an in-process stand-in.
 */
export interface TransportFactory {
  /** Creates an unconnected transport. */
  create(config: ConnectionConfig): SmtpTransport;
  /** Opens and immediately closes a connection to host:port. */
  probe(host: string, port: number, timeoutMs: number): Promise<void>;
}

interface PendingRead {
  resolve: (response: SmtpResponse) => void;
  reject: (err: Error) => void;
  timeout?: NodeJS.Timeout;
}

/**
 * TCP transport implementation.
 */
export class TcpTransport implements SmtpTransport {
  private socket: net.Socket | null = null;
  private readonly host: string;
  private readonly port: number;
  private readonly connectTimeout?: number;
  private readonly commandTimeout?: number;
  private readonly session: SmtpSession;
  private readonly reader: ResponseReader;
  private readonly responses: SmtpResponse[] = [];
  private readonly waiters: PendingRead[] = [];
  private failure: Error | null = null;

  constructor(config: ConnectionConfig) {
    this.host = config.host;
    this.port = config.port;
    this.connectTimeout = config.connectTimeout;
    this.commandTimeout = config.commandTimeout;
    this.session = new SmtpSession();
    this.reader = new ResponseReader();
  }

  async connect(): Promise<SmtpResponse> {
    await new Promise<void>((resolve, reject) => {
      const socket = net.createConnection({ host: this.host, port: this.port });
      let timeout: NodeJS.Timeout | undefined;

      if (this.connectTimeout !== undefined) {
        const ms = this.connectTimeout;
        timeout = setTimeout(() => {
          socket.destroy();
          reject(MailHookError.timeout(`Connection to ${this.host}:${this.port} timed out after ${ms}ms`));
        }, ms);
      }

      const onError = (err: Error): void => {
        clearTimeout(timeout);
        reject(MailHookError.connection(`Cannot connect to ${this.host}:${this.port}: ${err.message}`, err));
      };

      socket.once('error', onError);
      socket.once('connect', () => {
        clearTimeout(timeout);
        socket.removeListener('error', onError);
        this.attach(socket);
        resolve();
      });
    });

    this.session.transition(TransactionState.Connected);
    const greeting = await this.readResponse();
    if (greeting.code >= 200 && greeting.code < 400) {
      this.session.transition(TransactionState.Greeting);
    }
    return greeting;
  }

  async sendCommand(command: string): Promise<SmtpResponse> {
    // Append CRLF if not present
    const commandLine = command.endsWith('\r\n') ? command : command + '\r\n';
    await this.write(commandLine);
    return this.readResponse();
  }

  async write(data: string): Promise<void> {
    const socket = this.requireSocket();

    return new Promise((resolve, reject) => {
      socket.write(data, 'utf-8', (err) => {
        if (err) {
          reject(MailHookError.connection(`Write failed: ${err.message}`, err));
        } else {
          resolve();
        }
      });
    });
  }

  readResponse(): Promise<SmtpResponse> {
    const queued = this.responses.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise((resolve, reject) => {
      const waiter: PendingRead = { resolve, reject };

      if (this.commandTimeout !== undefined) {
        const ms = this.commandTimeout;
        waiter.timeout = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          reject(MailHookError.timeout(`No reply from ${this.host}:${this.port} after ${ms}ms`));
        }, ms);
      }

      this.waiters.push(waiter);
    });
  }

  async close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    this.session.disconnect();

    if (!socket || socket.destroyed) {
      return;
    }

    await new Promise<void>((resolve) => {
      socket.end(() => {
        socket.destroy();
        resolve();
      });
    });
  }

  isConnected(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  getSession(): SmtpSession {
    return this.session;
  }

  private attach(socket: net.Socket): void {
    this.socket = socket;
    socket.setEncoding('utf-8');

    socket.on('data', (data: string) => {
      try {
        for (const response of this.reader.addData(data)) {
          this.deliver(response);
        }
      } catch (err) {
        this.abortReads(toError(err));
      }
    });

    socket.on('error', (err) => {
      this.abortReads(MailHookError.connection(`Connection error: ${err.message}`, err));
    });

    socket.on('close', () => {
      this.abortReads(MailHookError.connection('Connection closed by server'));
    });
  }

  private deliver(response: SmtpResponse): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timeout);
      waiter.resolve(response);
    } else {
      this.responses.push(response);
    }
  }

  private abortReads(err: Error): void {
    if (!this.failure) {
      this.failure = err;
    }
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timeout);
      waiter.reject(err);
    }
  }

  private requireSocket(): net.Socket {
    if (!this.socket || this.socket.destroyed) {
      throw new MailHookError(MailHookErrorKind.Connection, 'Not connected');
    }
    return this.socket;
  }
}

/**
 * Checks that something listens on host:port within a bounded time.
 */
export function probe(host: string, port: number, timeoutMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port });

    const timeout = setTimeout(() => {
      socket.destroy();
      reject(MailHookError.timeout(`Probe of ${host}:${port} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    socket.once('connect', () => {
      clearTimeout(timeout);
      socket.destroy();
      resolve();
    });

    socket.once('error', (err) => {
      clearTimeout(timeout);
      socket.destroy();
      reject(MailHookError.connection(`Cannot reach ${host}:${port}: ${err.message}`, err));
    });
  });
}

/**
 * Transport factory backed by real TCP connections.
 */
export const tcpTransportFactory: TransportFactory = {
  create: (config) => new TcpTransport(config),
  probe,
};
