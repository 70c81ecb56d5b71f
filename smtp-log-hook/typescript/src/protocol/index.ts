/**
 * SMTP protocol implementation.
 */

import { MailHookError } from '../errors';

/**
 * SMTP response from server.
 */
export interface SmtpResponse {
  /** Three-digit status code. */
  code: number;
  /** Response message(s). */
  message: string[];
  /** Whether this is a multiline response. */
  isMultiline: boolean;
}

/**
 * Parses an SMTP response from raw lines.
 */
export function parseResponse(lines: string[]): SmtpResponse {
  if (lines.length === 0) {
    throw MailHookError.protocol('Empty response');
  }

  const messages: string[] = [];
  let code = 0;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!line || line.length < 3) {
      throw MailHookError.protocol(`Invalid response line: ${line}`);
    }

    const lineCode = parseInt(line.substring(0, 3), 10);
    if (isNaN(lineCode)) {
      throw MailHookError.protocol(`Invalid status code in line: ${line}`);
    }

    if (i === 0) {
      code = lineCode;
    } else if (lineCode !== code) {
      throw MailHookError.protocol('Inconsistent status code in multiline response');
    }

    // Extract message (skip code and separator)
    messages.push(line.length > 4 ? line.substring(4) : '');
  }

  return {
    code,
    message: messages,
    isMultiline: lines.length > 1,
  };
}

/**
 * Checks if a response indicates success.
 */
export function isSuccessResponse(response: SmtpResponse): boolean {
  return response.code >= 200 && response.code < 300;
}

/**
 * Joins a response's message lines for error reporting.
 */
export function describeResponse(response: SmtpResponse): string {
  return response.message.join(' ');
}

/**
 * Accumulates socket data and yields complete SMTP replies.
 */
export class ResponseReader {
  private buffer = '';
  private lines: string[] = [];

  /**
   * Adds data and returns every reply completed by it.
   */
  addData(data: string): SmtpResponse[] {
    this.buffer += data;
    const completed: SmtpResponse[] = [];

    let lineEnd = this.buffer.indexOf('\r\n');
    while (lineEnd !== -1) {
      const line = this.buffer.substring(0, lineEnd);
      this.buffer = this.buffer.substring(lineEnd + 2);
      this.lines.push(line);

      // A reply ends on "XXX " or a bare "XXX"; "XXX-" continues it
      if (line.length === 3 || (line.length >= 4 && line[3] !== '-')) {
        completed.push(parseResponse(this.lines));
        this.lines = [];
      }

      lineEnd = this.buffer.indexOf('\r\n');
    }

    return completed;
  }
}

/**
 * ESMTP server capabilities.
 */
export interface EsmtpCapabilities {
  /** Supported authentication methods. */
  authMethods: string[];
  /** 8BITMIME extension is supported. */
  eightBitMime: boolean;
  /** Extension keywords mapped to their parameters. */
  extensions: Map<string, string>;
}

/**
 * Parses ESMTP capabilities from EHLO response.
 */
export function parseCapabilities(response: SmtpResponse): EsmtpCapabilities {
  const caps: EsmtpCapabilities = {
    authMethods: [],
    eightBitMime: false,
    extensions: new Map(),
  };

  // The first line is the server's greeting name
  for (const line of response.message.slice(1)) {
    const parts = line.trim().split(/\s+/);
    const keyword = parts[0]?.toUpperCase() ?? '';
    if (!keyword) {
      continue;
    }

    caps.extensions.set(keyword, parts.slice(1).join(' '));

    switch (keyword) {
      case 'AUTH':
        caps.authMethods = parts.slice(1).map((m) => m.toUpperCase());
        break;
      case '8BITMIME':
        caps.eightBitMime = true;
        break;
    }
  }

  return caps;
}

/**
 * SMTP transaction state machine.
 */
export enum TransactionState {
  /** Initial state, not connected. */
  Disconnected = 'disconnected',
  /** Connected, waiting for greeting. */
  Connected = 'connected',
  /** Received greeting, ready for EHLO/HELO. */
  Greeting = 'greeting',
  /** EHLO/HELO completed. */
  Ready = 'ready',
  /** Authentication in progress. */
  Authenticating = 'authenticating',
  /** Authenticated. */
  Authenticated = 'authenticated',
  /** MAIL FROM accepted. */
  MailFrom = 'mail_from',
  /** At least one RCPT TO accepted. */
  RcptTo = 'rcpt_to',
  /** DATA accepted, message content being written. */
  Data = 'data',
  /** Message accepted. The envelope stays pinned for further DATA. */
  Completed = 'completed',
  /** Transaction failed. */
  Failed = 'failed',
}

/**
 * Validates state transitions.
 */
export function canTransition(from: TransactionState, to: TransactionState): boolean {
  const validTransitions: Record<TransactionState, TransactionState[]> = {
    [TransactionState.Disconnected]: [TransactionState.Connected],
    [TransactionState.Connected]: [TransactionState.Greeting, TransactionState.Failed],
    [TransactionState.Greeting]: [TransactionState.Ready, TransactionState.Failed],
    [TransactionState.Ready]: [
      TransactionState.Authenticating,
      TransactionState.MailFrom,
      TransactionState.Failed,
    ],
    [TransactionState.Authenticating]: [TransactionState.Authenticated, TransactionState.Failed],
    [TransactionState.Authenticated]: [TransactionState.MailFrom, TransactionState.Failed],
    [TransactionState.MailFrom]: [TransactionState.RcptTo, TransactionState.Failed],
    [TransactionState.RcptTo]: [
      TransactionState.RcptTo, // Additional recipients
      TransactionState.Data,
      TransactionState.Failed,
    ],
    [TransactionState.Data]: [TransactionState.Completed, TransactionState.Failed],
    [TransactionState.Completed]: [
      TransactionState.Data,
      TransactionState.MailFrom,
      TransactionState.Failed,
    ],
    [TransactionState.Failed]: [],
  };

  return validTransitions[from].includes(to);
}

/**
 * SMTP session state manager.
 */
export class SmtpSession {
  private state: TransactionState = TransactionState.Disconnected;
  private capabilities?: EsmtpCapabilities;

  /** Gets the current state. */
  getState(): TransactionState {
    return this.state;
  }

  /** Gets server capabilities. */
  getCapabilities(): EsmtpCapabilities | undefined {
    return this.capabilities;
  }

  /**
   * Transitions to a new state.
   */
  transition(to: TransactionState): void {
    if (!canTransition(this.state, to)) {
      throw MailHookError.protocol(`Invalid state transition from ${this.state} to ${to}`);
    }
    this.state = to;
  }

  /**
   * Marks the transaction as failed. Only disconnecting leaves this state.
   */
  fail(): void {
    if (this.state !== TransactionState.Disconnected) {
      this.state = TransactionState.Failed;
    }
  }

  /**
   * Sets capabilities from EHLO response.
   */
  setCapabilities(caps: EsmtpCapabilities): void {
    this.capabilities = caps;
  }

  /**
   * Marks as authenticated.
   */
  authenticate(): void {
    this.state = TransactionState.Authenticated;
  }

  /**
   * Marks the session as disconnected.
   */
  disconnect(): void {
    this.state = TransactionState.Disconnected;
    this.capabilities = undefined;
  }
}
