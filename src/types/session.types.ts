/**
 * Session types
 */

import type { AxiosAdapter } from 'axios';
import type { QuoteApiError } from '../errors/quote-api.errors.js';
import type { StructuredLogger } from '../services/logger.service.js';

/**
 * Body returned by the login and refresh endpoints
 */
export interface AuthResponse {
  token: string;
  refreshToken: string;
}

/**
 * Token pair held by a session
 */
export interface TokenPair {
  accessToken: string;
  refreshToken: string;
}

/**
 * Decoded JSON body returned by the API. Shape is endpoint specific.
 */
export type ApiPayload = Record<string, unknown>;

/**
 * Quote payload, keyed by symbol then by field code (e.g. ULT, VAR).
 * May also carry a server-side error shape; callers inspect it.
 */
export type QuotePayload = Record<string, unknown>;

/**
 * Outcome of a token refresh. Never thrown, always returned.
 */
export type RefreshResult =
  | { success: true; status: number; tokens: TokenPair }
  | { success: false; error: QuoteApiError };

/**
 * HTTP transport options
 */
export interface TransportOptions {
  baseUrl: string;
  verifySsl: boolean;
  caBundlePath: string | null;
  timeoutMs: number;
}

/**
 * Options accepted by QuoteSession.connect()
 */
export interface SessionOptions extends Partial<TransportOptions> {
  username: string;
  password: string;
  keepAlive?: boolean;
  logger?: StructuredLogger;
  /** Custom axios adapter, e.g. an in-process stand-in for the API */
  adapter?: AxiosAdapter;
}

/**
 * Request and token metrics for a session
 */
export interface SessionMetrics {
  totalRequests: number;
  failedRequests: number;
  requestsByStatusCode: Record<number, number>;
  totalRefreshes: number;
  lastRefreshAt: number | null;
  lastError: string | null;
  currentTokenExpiresAt: number | null;
}
