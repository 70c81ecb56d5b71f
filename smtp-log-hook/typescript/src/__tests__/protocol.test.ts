/**
 * Tests for reply parsing, the session state machine and DATA encoding.
 */

import { describe, it, expect } from 'vitest';
import {
  ResponseReader,
  SmtpSession,
  TransactionState,
  canTransition,
  parseCapabilities,
  parseResponse,
} from '../protocol';
import { DotEncoder, prepareMessageData } from '../mime';
import { MailHookError } from '../errors';

describe('parseResponse', () => {
  it('should parse a single-line reply', () => {
    expect(parseResponse(['250 OK'])).toEqual({
      code: 250,
      message: ['OK'],
      isMultiline: false,
    });
  });

  it('should keep the reply text after the code', () => {
    const response = parseResponse(['550 5.1.1 User unknown']);

    expect(response.code).toBe(550);
    expect(response.message).toEqual(['5.1.1 User unknown']);
  });

  it('should reject inconsistent codes', () => {
    expect(() => parseResponse(['250-first', '251 second'])).toThrow(MailHookError);
  });
});

describe('ResponseReader', () => {
  it('should assemble replies split across chunks', () => {
    const reader = new ResponseReader();

    expect(reader.addData('250-mail.example.com\r\n250-8BIT')).toEqual([]);
    const replies = reader.addData('MIME\r\n250 AUTH PLAIN\r\n');

    expect(replies).toHaveLength(1);
    expect(replies[0]?.message).toEqual(['mail.example.com', '8BITMIME', 'AUTH PLAIN']);
    expect(replies[0]?.isMultiline).toBe(true);
  });

  it('should return several replies from one chunk', () => {
    const reader = new ResponseReader();
    const replies = reader.addData('250 OK\r\n354 Go ahead\r\n');

    expect(replies.map((reply) => reply.code)).toEqual([250, 354]);
  });
});

describe('parseCapabilities', () => {
  it('should read extensions after the server name', () => {
    const caps = parseCapabilities(
      parseResponse(['250-mail.example.com', '250-SIZE 1024', '250-8BITMIME', '250 AUTH plain LOGIN'])
    );

    expect(caps.eightBitMime).toBe(true);
    expect(caps.authMethods).toEqual(['PLAIN', 'LOGIN']);
    expect([...caps.extensions.keys()]).toEqual(['SIZE', '8BITMIME', 'AUTH']);
  });
});

describe('SmtpSession', () => {
  it('should follow a full transaction', () => {
    const session = new SmtpSession();
    for (const state of [
      TransactionState.Connected,
      TransactionState.Greeting,
      TransactionState.Ready,
      TransactionState.MailFrom,
      TransactionState.RcptTo,
      TransactionState.Data,
      TransactionState.Completed,
      TransactionState.Data,
    ]) {
      session.transition(state);
    }

    expect(session.getState()).toBe(TransactionState.Data);
  });

  it('should reject an invalid transition', () => {
    const session = new SmtpSession();
    expect(() => session.transition(TransactionState.Data)).toThrow(
      'Invalid state transition from disconnected to data'
    );
  });

  it('should stay failed until disconnected', () => {
    const session = new SmtpSession();
    session.transition(TransactionState.Connected);
    session.fail();

    expect(canTransition(TransactionState.Failed, TransactionState.Data)).toBe(false);
    expect(session.getState()).toBe(TransactionState.Failed);

    session.disconnect();
    expect(session.getState()).toBe(TransactionState.Disconnected);
  });

  it('should not fail a disconnected session', () => {
    const session = new SmtpSession();
    session.fail();
    expect(session.getState()).toBe(TransactionState.Disconnected);
  });
});

describe('DotEncoder', () => {
  it('should double leading dots', () => {
    expect(prepareMessageData('.hidden\r\nline\r\n')).toBe('..hidden\r\nline\r\n.\r\n');
  });

  it('should convert bare line feeds', () => {
    expect(prepareMessageData('a\nb')).toBe('a\r\nb\r\n.\r\n');
  });

  it('should keep line state across chunks', () => {
    const encoder = new DotEncoder();
    const out = encoder.encode('first\r') + encoder.encode('\n.second') + encoder.finish();

    expect(out).toBe('first\r\n..second\r\n.\r\n');
  });

  it('should terminate an empty message', () => {
    expect(prepareMessageData('')).toBe('.\r\n');
  });
});
