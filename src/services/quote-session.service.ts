import { Mutex } from 'async-mutex';
import jwt from 'jsonwebtoken';
import { config, loadConfig } from '../config/env.js';
import {
  ConfigurationError,
  HttpStatusError,
  InvalidResponseError,
  QuoteApiError,
  ConnectionError,
} from '../errors/quote-api.errors.js';
import type {
  ApiPayload,
  QuotePayload,
  RefreshResult,
  SessionMetrics,
  SessionOptions,
  TokenPair,
} from '../types/session.types.js';
import {
  HttpTransport,
  toQuoteApiError,
  type HttpMethod,
  type TransportResponse,
} from './http-transport.service.js';
import { logger as defaultLogger, type StructuredLogger } from './logger.service.js';

export const ENDPOINTS = {
  login: 'Authentication/v1/login',
  logout: 'Authentication/v1/logout',
  keepAlive: 'Authentication/v1/keep',
  refresh: 'Authentication/v1/refresh',
  quote: 'stock/v1/quote/request',
} as const;

export const APPLICATION_ID = 'datafeed';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extracts the token pair from a login/refresh body
 */
function parseAuthResponse(data: unknown, endpoint: string): TokenPair {
  if (
    isRecord(data) &&
    typeof data.token === 'string' &&
    data.token.length > 0 &&
    typeof data.refreshToken === 'string' &&
    data.refreshToken.length > 0
  ) {
    return { accessToken: data.token, refreshToken: data.refreshToken };
  }
  throw new InvalidResponseError(`${endpoint} response is missing token or refreshToken`, data);
}

function toPayload(data: unknown, endpoint: string): ApiPayload {
  if (!isRecord(data)) {
    throw new InvalidResponseError(`${endpoint} did not return a JSON object`, data);
  }
  return data;
}

/**
 * Reads the `exp` claim of a JWT access token (ms since epoch).
 * Returns null for tokens that are not JWTs or carry no expiry.
 */
export function decodeTokenExpiry(token: string): number | null {
  const decoded = jwt.decode(token);
  if (decoded && typeof decoded === 'object' && typeof decoded.exp === 'number') {
    return decoded.exp * 1000;
  }
  return null;
}

/**
 * Quote Session
 *
 * Authenticated session against the quotes API.
 *
 * - Created through QuoteSession.connect(), which resolves only after login succeeds
 * - Bearer header built per request from the current access token
 * - Login and refresh serialized with a mutex; other calls wait for them to finish
 * - tokenRefresh() reports failure through its result and never throws
 * - No retries and no timers: keep-alive and refresh cadence belong to the caller
 *
 * logout() does not clear the tokens held locally.
 */
export class QuoteSession {
  private transport: HttpTransport;
  private logger: StructuredLogger;
  private mutex: Mutex;
  private credentials: Readonly<{ username: string; password: string }>;
  private tokenPair: TokenPair | null = null;
  private totalRefreshes = 0;
  private lastRefreshAt: number | null = null;
  private lastError: string | null = null;

  readonly keepAliveEnabled: boolean;

  private constructor(options: SessionOptions) {
    this.credentials = Object.freeze({
      username: options.username,
      password: options.password,
    });
    this.keepAliveEnabled = options.keepAlive ?? false;
    this.logger = (options.logger ?? defaultLogger).child({ username: options.username });
    this.mutex = new Mutex();

    const verifySsl = options.verifySsl ?? config.verifySsl;
    if (!verifySsl) {
      this.logger.warn('TLS certificate verification is disabled, use only in development');
    }

    this.transport = new HttpTransport(
      {
        baseUrl: options.baseUrl ?? config.apiUrl,
        verifySsl,
        caBundlePath: options.caBundlePath ?? config.caBundlePath,
        timeoutMs: options.timeoutMs ?? config.timeoutMs,
      },
      options.adapter,
    );
  }

  /**
   * Creates a session and logs in. With keepAlive, also sends one keep-alive.
   * Rejects with the error of the failing step; no instance is returned in that case.
   */
  static async connect(options: SessionOptions): Promise<QuoteSession> {
    const session = new QuoteSession(options);
    try {
      await session.login();
      if (session.keepAliveEnabled) {
        await session.keepAlive();
      }
    } catch (error) {
      session.close();
      throw error;
    }
    return session;
  }

  /**
   * connect() with settings read from the environment (DATAFEED_* variables).
   * Explicit overrides win over the environment.
   */
  static async fromEnv(overrides: Partial<SessionOptions> = {}): Promise<QuoteSession> {
    const env = loadConfig();
    const username = overrides.username ?? env.username;
    const password = overrides.password ?? env.password;

    if (!username || !password) {
      throw new ConfigurationError(
        'Missing credentials: set DATAFEED_USERNAME and DATAFEED_PASSWORD',
      );
    }

    return QuoteSession.connect({
      ...overrides,
      username,
      password,
      baseUrl: overrides.baseUrl ?? env.apiUrl,
      verifySsl: overrides.verifySsl ?? env.verifySsl,
      caBundlePath: overrides.caBundlePath ?? env.caBundlePath,
      timeoutMs: overrides.timeoutMs ?? env.timeoutMs,
    });
  }

  get username(): string {
    return this.credentials.username;
  }

  get accessToken(): string {
    return this.requireTokens().accessToken;
  }

  get refreshToken(): string {
    return this.requireTokens().refreshToken;
  }

  get tokens(): TokenPair {
    return { ...this.requireTokens() };
  }

  /**
   * Logs in and stores the returned token pair.
   * Defaults to the credentials the session was created with.
   */
  async login(
    username: string = this.credentials.username,
    password: string = this.credentials.password,
  ): Promise<TokenPair> {
    return this.mutex.runExclusive(async (): Promise<TokenPair> => {
      const startedAt = Date.now();
      try {
        const response = await this.transport.request<unknown>('POST', ENDPOINTS.login, {
          data: { applicationId: APPLICATION_ID, login: username, password },
        });
        const tokens = parseAuthResponse(response.data, ENDPOINTS.login);
        this.tokenPair = tokens;

        this.logger.loginSucceeded({
          username,
          accessToken: tokens.accessToken,
          duration: Date.now() - startedAt,
        });
        return { ...tokens };
      } catch (error) {
        const apiError = toQuoteApiError(error, ENDPOINTS.login);
        this.lastError = apiError.message;
        this.logger.loginFailed({
          username,
          ...this.describeError(apiError),
          error: apiError.message,
        });
        throw apiError;
      }
    });
  }

  /**
   * Invalidates the access token server-side and returns the API's answer.
   * The local token pair is kept.
   */
  async logout(): Promise<ApiPayload> {
    const response = await this.authenticatedRequest('GET', ENDPOINTS.logout);
    this.logger.loggedOut({ username: this.username, http_status: response.status });
    return response.data;
  }

  /**
   * Extends the server-side session lifetime
   */
  async keepAlive(): Promise<ApiPayload> {
    const response = await this.authenticatedRequest('GET', ENDPOINTS.keepAlive);
    this.logger.keepAliveSent({ username: this.username, http_status: response.status });
    return response.data;
  }

  /**
   * Exchanges the refresh token for a new pair.
   * Both tokens are replaced on success; on any failure they are left untouched.
   */
  async tokenRefresh(): Promise<RefreshResult> {
    return this.mutex.runExclusive(async (): Promise<RefreshResult> => {
      try {
        const current = this.requireTokens();
        const response = await this.transport.request<unknown>('POST', ENDPOINTS.refresh, {
          data: { refreshToken: current.refreshToken, token: current.accessToken },
          token: current.accessToken,
        });
        const tokens = parseAuthResponse(response.data, ENDPOINTS.refresh);
        this.tokenPair = tokens;

        this.totalRefreshes++;
        this.lastRefreshAt = Date.now();
        this.lastError = null;

        const expiresAt = decodeTokenExpiry(tokens.accessToken);
        this.logger.tokenRefreshed({
          success: true,
          accessToken: tokens.accessToken,
          expiresAt: expiresAt !== null ? new Date(expiresAt).toISOString() : undefined,
        });
        return { success: true, status: response.status, tokens: { ...tokens } };
      } catch (error) {
        const apiError = toQuoteApiError(error, ENDPOINTS.refresh);
        this.lastError = apiError.message;
        this.logger.tokenRefreshed({ success: false, error: apiError.message });
        return { success: false, error: apiError };
      }
    });
  }

  /**
   * Requests quotes for the given symbols.
   * Without fields the server returns its default field set.
   * The body is returned as decoded; an error encoded in a 2xx body is not detected here.
   */
  async getQuote(symbols: readonly string[], fields?: readonly string[]): Promise<QuotePayload> {
    if (symbols.length === 0) {
      throw new RangeError('getQuote requires at least one symbol');
    }

    const requestedFields = fields ? [...fields] : [];
    const startedAt = Date.now();
    const response = await this.authenticatedRequest('POST', ENDPOINTS.quote, {
      symbols: [...symbols],
      fields: requestedFields,
    });

    this.logger.quoteRequested({
      symbols: [...symbols],
      fields: requestedFields,
      http_status: response.status,
      duration: Date.now() - startedAt,
    });
    return response.data;
  }

  getMetrics(): SessionMetrics {
    const transportMetrics = this.transport.getMetrics();
    return {
      totalRequests: transportMetrics.totalRequests,
      failedRequests: transportMetrics.failedRequests,
      requestsByStatusCode: transportMetrics.requestsByStatusCode,
      totalRefreshes: this.totalRefreshes,
      lastRefreshAt: this.lastRefreshAt,
      lastError: this.lastError,
      currentTokenExpiresAt: this.tokenPair ? decodeTokenExpiry(this.tokenPair.accessToken) : null,
    };
  }

  /**
   * Releases pooled connections. The server-side session is not touched; call logout() for that.
   */
  close(): void {
    this.transport.close();
  }

  /**
   * Sends a request carrying the current access token.
   * Waits for an in-flight login/refresh so the token read is the latest one.
   */
  private async authenticatedRequest(
    method: HttpMethod,
    endpoint: string,
    data?: unknown,
  ): Promise<TransportResponse<ApiPayload>> {
    try {
      await this.mutex.waitForUnlock();
      const response = await this.transport.request<unknown>(method, endpoint, {
        data,
        token: this.accessToken,
      });
      return { status: response.status, data: toPayload(response.data, endpoint) };
    } catch (error) {
      const apiError = toQuoteApiError(error, endpoint);
      this.lastError = apiError.message;
      this.logger.requestFailed({
        endpoint,
        ...this.describeError(apiError),
        error: apiError.message,
      });
      throw apiError;
    }
  }

  private requireTokens(): TokenPair {
    if (!this.tokenPair) {
      throw new QuoteApiError('Session is not authenticated');
    }
    return this.tokenPair;
  }

  private describeError(error: QuoteApiError): { http_status?: number; error_code?: string } {
    if (error instanceof HttpStatusError) {
      return { http_status: error.status };
    }
    if (error instanceof ConnectionError) {
      return { error_code: error.code };
    }
    return {};
  }
}
