/**
 * Configuration for the SMTP log hooks.
 *
 * Hooks are configured entirely by the embedding application: there are no
 * environment variables or config files. Options are validated with zod before
 * any connection is attempted.
 *
 * @module config
 */

import { z } from 'zod';
import { MailHookError } from '../errors';
import { LogLevel } from '../observability';

/** Bound on the authenticated hook's reachability probe, in milliseconds. */
export const DEFAULT_PROBE_TIMEOUT = 3000;

/** Maximum number of stack frames recorded in a rendered message. */
export const MAX_STACK_DEPTH = 100;

/** Name sent with EHLO/HELO. */
export const DEFAULT_CLIENT_ID = 'localhost';

/** Levels both hooks report as applicable. */
export const HOOK_LEVELS: readonly LogLevel[] = [LogLevel.Panic, LogLevel.Fatal, LogLevel.Error];

/**
 * Options shared by both hooks.
 */
export interface MailHookConfigOptions {
  /** Application name, used in the Subject header. */
  appName: string;
  /** SMTP server host. */
  host: string;
  /** SMTP server port. */
  port: number;
  /** Sender address, e.g. `alerts@example.com` or `Alerts <alerts@example.com>`. */
  from: string;
  /** Recipient address. */
  to: string;
  /** Name sent with EHLO/HELO. */
  clientId?: string;
  /** Connect timeout in milliseconds. No timeout when unset. */
  connectTimeout?: number;
  /** Per-command reply timeout in milliseconds. No timeout when unset. */
  commandTimeout?: number;
}

/**
 * Options for the authenticated hook.
 */
export interface MailAuthHookConfigOptions extends MailHookConfigOptions {
  /** PLAIN username. */
  username: string;
  /** PLAIN password. */
  password: string;
  /** Reachability probe bound in milliseconds. */
  probeTimeout?: number;
}

/**
 * Validated connection settings.
 */
export interface ConnectionConfig {
  readonly host: string;
  readonly port: number;
  readonly clientId: string;
  readonly connectTimeout?: number;
  readonly commandTimeout?: number;
}

const timeoutSchema = z.number().int().positive().optional();

/**
 * Schema for the unauthenticated hook's options.
 */
export const MailHookOptionsSchema = z.object({
  appName: z.string(),
  host: z.string().min(1, 'Host is required'),
  port: z.number().int().min(1).max(65535),
  from: z.string(),
  to: z.string(),
  clientId: z.string().min(1).optional(),
  connectTimeout: timeoutSchema,
  commandTimeout: timeoutSchema,
});

/**
 * Schema for the authenticated hook's options.
 */
export const MailAuthHookOptionsSchema = MailHookOptionsSchema.extend({
  username: z.string(),
  password: z.string(),
  probeTimeout: timeoutSchema,
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validates unauthenticated hook options.
 */
export function validateMailHookOptions(
  options: MailHookConfigOptions
): z.infer<typeof MailHookOptionsSchema> {
  const result = MailHookOptionsSchema.safeParse(options);
  if (!result.success) {
    throw MailHookError.configuration(`Invalid mail hook options: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Validates authenticated hook options.
 */
export function validateMailAuthHookOptions(
  options: MailAuthHookConfigOptions
): z.infer<typeof MailAuthHookOptionsSchema> {
  const result = MailAuthHookOptionsSchema.safeParse(options);
  if (!result.success) {
    throw MailHookError.configuration(`Invalid mail auth hook options: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Extracts connection settings from validated options.
 */
export function createConnectionConfig(options: z.infer<typeof MailHookOptionsSchema>): ConnectionConfig {
  return {
    host: options.host,
    port: options.port,
    clientId: options.clientId ?? DEFAULT_CLIENT_ID,
    connectTimeout: options.connectTimeout,
    commandTimeout: options.commandTimeout,
  };
}
