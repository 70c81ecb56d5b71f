/**
 * Tests for hook option validation.
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CLIENT_ID,
  HOOK_LEVELS,
  createConnectionConfig,
  validateMailAuthHookOptions,
  validateMailHookOptions,
} from '../config';
import { MailHookError, MailHookErrorKind } from '../errors';
import { LogLevel } from '../observability';

const baseOptions = {
  appName: 'svc',
  host: 'smtp.example.com',
  port: 25,
  from: 'alerts@example.com',
  to: 'oncall@example.com',
};

describe('validateMailHookOptions', () => {
  it('should accept valid options', () => {
    expect(validateMailHookOptions(baseOptions)).toEqual(baseOptions);
  });

  it('should reject an out-of-range port', () => {
    expect(() => validateMailHookOptions({ ...baseOptions, port: 70000 })).toThrow(MailHookError);
  });

  it('should name the failing field', () => {
    try {
      validateMailHookOptions({ ...baseOptions, host: '' });
      expect.fail('expected a configuration error');
    } catch (err) {
      expect(err).toBeInstanceOf(MailHookError);
      if (err instanceof MailHookError) {
        expect(err.kind).toBe(MailHookErrorKind.Configuration);
        expect(err.message).toBe('Invalid mail hook options: host: Host is required');
      }
    }
  });

  it('should leave empty addresses to address parsing', () => {
    expect(validateMailHookOptions({ ...baseOptions, from: '', to: '' })).toEqual({
      ...baseOptions,
      from: '',
      to: '',
    });
  });

  it('should reject a non-positive timeout', () => {
    expect(() => validateMailHookOptions({ ...baseOptions, commandTimeout: 0 })).toThrow(
      MailHookError
    );
  });
});

describe('validateMailAuthHookOptions', () => {
  it('should accept credentials and a probe timeout', () => {
    const validated = validateMailAuthHookOptions({
      ...baseOptions,
      username: 'alerts',
      password: 'test-secret',
      probeTimeout: 500,
    });

    expect(validated.username).toBe('alerts');
    expect(validated.probeTimeout).toBe(500);
  });
});

describe('createConnectionConfig', () => {
  it('should default the client id', () => {
    const config = createConnectionConfig(validateMailHookOptions(baseOptions));

    expect(config).toEqual({
      host: 'smtp.example.com',
      port: 25,
      clientId: DEFAULT_CLIENT_ID,
      connectTimeout: undefined,
      commandTimeout: undefined,
    });
  });
});

describe('HOOK_LEVELS', () => {
  it('should list exactly panic, fatal and error', () => {
    expect(HOOK_LEVELS).toEqual([LogLevel.Panic, LogLevel.Fatal, LogLevel.Error]);
  });
});
