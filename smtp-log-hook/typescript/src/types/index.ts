/**
 * Core types for the SMTP log hook.
 */

import { z } from 'zod';
import { MailHookError } from '../errors';

/**
 * Email address with optional display name.
 */
export interface Address {
  /** Display name (e.g., "Ops Team"). */
  readonly name?: string;
  /** Email address (e.g., "ops@example.com"). */
  readonly email: string;
}

// RFC 5322 addr-spec: dot-atom or quoted-string, then dot-atom or domain-literal.
const ATEXT = "[A-Za-z0-9!#$%&'*+/=?^_`{|}~-]+";
const DOT_ATOM = `${ATEXT}(?:\\.${ATEXT})*`;
const QUOTED_STRING = '"(?:[\\x20\\x21\\x23-\\x5B\\x5D-\\x7E]|\\\\[\\x20-\\x7E])*"';
const DOMAIN_LITERAL = '\\[[\\x21-\\x5A\\x5E-\\x7E]*\\]';
const ADDR_SPEC = new RegExp(`^(?:${DOT_ATOM}|${QUOTED_STRING})@(?:${DOT_ATOM}|${DOMAIN_LITERAL})$`);

const emailSchema = z.string().regex(ADDR_SPEC);

/**
 * Parses an address from a string (e.g., "Ops Team <ops@example.com>").
 */
export function parseAddress(s: string): Address {
  const trimmed = s.trim();

  // Check for "Name <email>" format
  const match = trimmed.match(/^(.*?)\s*<([^<>]*)>$/);
  if (match) {
    const name = (match[1] ?? '').trim().replace(/^"|"$/g, '');
    const email = validateEmail((match[2] ?? '').trim());
    return name ? { name, email } : { email };
  }

  return { email: validateEmail(trimmed) };
}

/**
 * Validates the local@domain part of an address.
 */
function validateEmail(email: string): string {
  if (!email) {
    throw MailHookError.addressFormat('Email address cannot be empty');
  }

  if (email.length > 254) {
    throw MailHookError.addressFormat('Email address too long (max 254 characters)');
  }

  const local = email.slice(0, email.lastIndexOf('@'));
  if (local.length > 64) {
    throw MailHookError.addressFormat('Local part must be 1-64 characters');
  }

  if (!emailSchema.safeParse(email).success) {
    throw MailHookError.addressFormat(`Invalid email address: ${email}`);
  }

  return email;
}
