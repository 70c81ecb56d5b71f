/**
 * Error types for the SMTP log hook.
 */

/**
 * Error kinds categorizing the ways a hook can fail.
 */
export enum MailHookErrorKind {
  /** The target host:port could not be reached. */
  Connection = 'connection',
  /** A bounded wait (probe, connect, command) expired. */
  Timeout = 'timeout',
  /** A sender or recipient address is malformed. */
  AddressFormat = 'address_format',
  /** The server rejected a handshake step or data write. */
  Protocol = 'protocol',
  /** The server rejected the credentials or the mechanism failed. */
  Authentication = 'authentication',
  /** Hook options failed validation. */
  Configuration = 'configuration',
}

/**
 * Error raised by hook construction, the SMTP client and synchronous delivery.
 */
export class MailHookError extends Error {
  /** Error kind. */
  readonly kind: MailHookErrorKind;
  /** SMTP reply code if the error came from a server reply. */
  readonly smtpCode?: number;
  /** Underlying cause. */
  readonly cause?: Error;

  constructor(
    kind: MailHookErrorKind,
    message: string,
    options?: {
      smtpCode?: number;
      cause?: Error;
    }
  ) {
    super(message);
    this.name = 'MailHookError';
    this.kind = kind;
    this.smtpCode = options?.smtpCode;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MailHookError);
    }
  }

  static connection(message: string, cause?: Error): MailHookError {
    return new MailHookError(MailHookErrorKind.Connection, message, { cause });
  }

  static timeout(message: string): MailHookError {
    return new MailHookError(MailHookErrorKind.Timeout, message);
  }

  static addressFormat(message: string): MailHookError {
    return new MailHookError(MailHookErrorKind.AddressFormat, message);
  }

  static protocol(message: string): MailHookError {
    return new MailHookError(MailHookErrorKind.Protocol, message);
  }

  static authentication(message: string, smtpCode?: number): MailHookError {
    return new MailHookError(MailHookErrorKind.Authentication, message, { smtpCode });
  }

  static configuration(message: string): MailHookError {
    return new MailHookError(MailHookErrorKind.Configuration, message);
  }

  /**
   * Creates an error from a rejecting SMTP reply.
   */
  static fromSmtpResponse(code: number, message: string): MailHookError {
    const kind =
      code === 530 || code === 535 || code === 538
        ? MailHookErrorKind.Authentication
        : MailHookErrorKind.Protocol;

    return new MailHookError(kind, `${code} ${message}`.trim(), { smtpCode: code });
  }

  /**
   * Converts to JSON.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      smtpCode: this.smtpCode,
    };
  }
}

/**
 * Type guard for MailHookError.
 */
export function isMailHookError(error: unknown): error is MailHookError {
  return error instanceof MailHookError;
}

/**
 * Narrows an unknown thrown value to an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
