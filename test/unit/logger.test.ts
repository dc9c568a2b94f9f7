import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import { StructuredLogger, maskToken } from '../../src/services/logger.service.js';

describe('maskToken', () => {
  it('should keep the first 6 and last 4 characters', () => {
    expect(maskToken('abcdefghijklmnop')).toBe('abcdef...mnop');
  });

  it('should fully mask short tokens', () => {
    expect(maskToken('access-1')).toBe('***');
    expect(maskToken('0123456789')).toBe('***');
  });
});

describe('StructuredLogger', () => {
  let lines: Record<string, unknown>[];
  let logger: StructuredLogger;

  beforeEach(() => {
    lines = [];
    const stream = {
      write(line: string) {
        const entry: unknown = JSON.parse(line);
        if (typeof entry === 'object' && entry !== null) {
          lines.push({ ...entry });
        }
      },
    };
    logger = new StructuredLogger(pino({ level: 'debug', base: null, timestamp: false }, stream));
  });

  it('should log a masked token on login', () => {
    logger.loginSucceeded({ username: 'test-user', accessToken: 'abcdefghijklmnop', duration: 12 });

    expect(lines).toEqual([
      {
        level: 30,
        event: 'session.login',
        username: 'test-user',
        status: 'AUTHENTICATED',
        token: 'abcdef...mnop',
        duration: 12,
        message: 'Logged in as test-user',
      },
    ]);
  });

  it('should log refresh failures as warnings', () => {
    logger.tokenRefreshed({ success: false, error: 'HTTP 401 from Authentication/v1/refresh' });

    expect(lines[0]).toMatchObject({
      level: 40,
      event: 'token.refresh_failed',
      message: 'Token refresh failed: HTTP 401 from Authentication/v1/refresh',
    });
  });

  it('should describe the default field set on quote requests', () => {
    logger.quoteRequested({ symbols: ['PETR4', 'VALE3'], fields: [], http_status: 200 });

    expect(lines[0]).toMatchObject({
      level: 20,
      event: 'quote.requested',
      message: 'Quote for PETR4,VALE3 (default fields)',
    });
  });

  it('should carry child bindings', () => {
    logger.child({ username: 'test-user' }).warn('slow response', { duration: 2500 });

    expect(lines[0]).toMatchObject({ level: 40, username: 'test-user', duration: 2500, message: 'slow response' });
  });
});
