/**
 * Authentication mechanisms for the SMTP client.
 */

import { MailHookError } from '../errors';

/**
 * Secure string wrapper for credentials.
 * Prevents accidental logging of sensitive values.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /** Gets the secret value. */
  expose(): string {
    return this.value;
  }

  /** Prevents accidental logging. */
  toString(): string {
    return '[REDACTED]';
  }

  /** Prevents accidental JSON serialization. */
  toJSON(): string {
    return '[REDACTED]';
  }
}

/**
 * What the client knows about the server when authentication starts.
 */
export interface ServerInfo {
  /** Host name the client dialed. */
  name: string;
  /** Mechanisms advertised in the EHLO reply. */
  auth: string[];
}

/**
 * First step of an authentication exchange.
 */
export interface AuthStart {
  /** Mechanism name sent with AUTH. */
  mechanism: string;
  /** Initial response, sent base64-encoded with the AUTH command. */
  initialResponse?: Buffer;
}

/**
 * An SMTP SASL mechanism.
 */
export interface SmtpAuth {
  /** Begins the exchange. */
  start(server: ServerInfo): AuthStart;
  /**
   * Answers a decoded server challenge. `more` is false once the server has
   * accepted; a returned Buffer is then ignored.
   */
  next(challenge: Buffer, more: boolean): Buffer | undefined;
}

/**
 * PLAIN authentication (RFC 4616).
 * Initial response: identity\0username\0password
 */
export class PlainAuth implements SmtpAuth {
  private readonly identity: string;
  private readonly username: string;
  private readonly password: SecretString;
  private readonly host: string;

  constructor(identity: string, username: string, password: string | SecretString, host: string) {
    this.identity = identity;
    this.username = username;
    this.password = typeof password === 'string' ? new SecretString(password) : password;
    this.host = host;
  }

  start(server: ServerInfo): AuthStart {
    if (server.name !== this.host) {
      throw MailHookError.authentication(`Wrong host name: expected ${this.host}, dialed ${server.name}`);
    }

    return {
      mechanism: 'PLAIN',
      initialResponse: Buffer.from(
        `${this.identity}\0${this.username}\0${this.password.expose()}`,
        'utf-8'
      ),
    };
  }

  next(_challenge: Buffer, more: boolean): Buffer | undefined {
    if (more) {
      throw MailHookError.authentication('Unexpected server challenge');
    }
    return undefined;
  }
}
