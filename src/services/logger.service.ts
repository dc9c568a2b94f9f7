/**
 * Structured Logger Service
 *
 * Structured JSON logging for session events.
 *
 * Fields per event (when applicable):
 * - timestamp: ISO 8601 timestamp
 * - level: log level (info, warn, error, debug)
 * - event: event name (session.login, token.refreshed, ...)
 * - username: account the session belongs to
 * - endpoint: API path of the request
 * - http_status: HTTP status code
 * - error_code: transport error code (ECONNREFUSED, ETIMEDOUT, ...)
 * - message: human-readable message
 *
 * Tokens are never logged in full, only masked.
 */

import pino from 'pino';
import { config } from '../config/env.js';

/**
 * Log context for session events
 */
export interface SessionLogContext {
  username?: string;
  endpoint?: string;
  http_status?: number;
  error_code?: string;
  duration?: number;
  [key: string]: unknown;
}

/**
 * Masks a token for logging (shows first 6 and last 4 characters)
 */
export function maskToken(token: string): string {
  if (token.length <= 10) {
    return '***';
  }
  return `${token.substring(0, 6)}...${token.substring(token.length - 4)}`;
}

/**
 * Create base logger instance
 */
const baseLogger = pino({
  level: config.logLevel,

  formatters: {
    level: (label) => {
      return { level: label };
    },
  },

  base: {
    service: 'datafeed-session',
    environment: config.nodeEnv,
  },

  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

  // Pretty print in development
  transport: config.nodeEnv === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,
});

/**
 * Structured Logger
 */
export class StructuredLogger {
  private logger: pino.Logger;

  constructor(logger: pino.Logger = baseLogger) {
    this.logger = logger;
  }

  /**
   * Creates a child logger with additional context
   */
  child(bindings: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger(this.logger.child(bindings));
  }

  loginSucceeded(context: SessionLogContext & { accessToken: string }) {
    this.logger.info({
      event: 'session.login',
      username: context.username,
      status: 'AUTHENTICATED',
      token: maskToken(context.accessToken),
      duration: context.duration,
      message: `Logged in as ${context.username}`,
    });
  }

  loginFailed(context: SessionLogContext & { error: string }) {
    this.logger.error({
      event: 'session.login_failed',
      username: context.username,
      status: 'FAILED',
      http_status: context.http_status,
      error_code: context.error_code,
      error: context.error,
      message: `Login failed for ${context.username}: ${context.error}`,
    });
  }

  loggedOut(context: SessionLogContext) {
    this.logger.info({
      event: 'session.logout',
      username: context.username,
      http_status: context.http_status,
      message: `Logged out ${context.username}`,
    });
  }

  keepAliveSent(context: SessionLogContext) {
    this.logger.debug({
      event: 'session.keep_alive',
      username: context.username,
      http_status: context.http_status,
      message: 'Session keep-alive acknowledged',
    });
  }

  /**
   * Logs token refresh outcome
   */
  tokenRefreshed(context: { success: boolean; accessToken?: string; expiresAt?: string; error?: string }) {
    if (context.success) {
      this.logger.info({
        event: 'token.refreshed',
        status: 'SUCCESS',
        token: context.accessToken ? maskToken(context.accessToken) : undefined,
        expiresAt: context.expiresAt,
        message: `Access token refreshed${context.expiresAt ? ` (expires: ${context.expiresAt})` : ''}`,
      });
    } else {
      this.logger.warn({
        event: 'token.refresh_failed',
        status: 'FAILED',
        error: context.error,
        message: `Token refresh failed: ${context.error}`,
      });
    }
  }

  quoteRequested(context: SessionLogContext & { symbols: string[]; fields: string[] }) {
    this.logger.debug({
      event: 'quote.requested',
      symbols: context.symbols,
      fields: context.fields,
      http_status: context.http_status,
      duration: context.duration,
      message: `Quote for ${context.symbols.join(',')} (${context.fields.length || 'default'} fields)`,
    });
  }

  /**
   * Logs a failed API call (transport or HTTP status)
   */
  requestFailed(context: SessionLogContext & { error: string }) {
    this.logger.warn({
      event: 'request.failed',
      endpoint: context.endpoint,
      http_status: context.http_status,
      error_code: context.error_code,
      error: context.error,
      message: `${context.endpoint} failed: ${context.error}`,
    });
  }

  warn(message: string, context?: SessionLogContext) {
    this.logger.warn({ ...context, message });
  }
}

/**
 * Global logger instance
 */
export const logger = new StructuredLogger();
