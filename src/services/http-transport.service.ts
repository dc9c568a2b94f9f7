import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import fs from 'fs';
import http from 'http';
import https from 'https';
import tls from 'tls';
import {
  ConnectionError,
  HttpStatusError,
  QuoteApiError,
} from '../errors/quote-api.errors.js';
import type { TransportOptions } from '../types/session.types.js';

/**
 * HTTP Transport
 *
 * One axios instance shared by every call of a session.
 *
 * - JSON accept/content-type defaults, set once at creation
 * - Authorization header built per request from the token passed in,
 *   the instance defaults are never mutated
 * - TLS verification toggle and extra CA bundle
 * - Keep-alive agents so consecutive calls reuse the connection
 * - axios failures mapped onto ConnectionError / HttpStatusError
 */

export type HttpMethod = 'GET' | 'POST';

export interface TransportRequest {
  data?: unknown;
  token?: string;
}

export interface TransportResponse<T> {
  status: number;
  data: T;
}

export interface TransportMetrics {
  totalRequests: number;
  failedRequests: number;
  requestsByStatusCode: Record<number, number>;
  lastRequestAt: number | null;
}

export const DEFAULT_HEADERS = {
  accept: 'application/json',
  'Content-Type': 'application/json',
} as const;

/**
 * Builds the CA list for the HTTPS agent.
 * A custom bundle is appended to Node's bundled root certificates rather than replacing them.
 */
export function buildCaList(caBundlePath: string | null): string[] | undefined {
  if (!caBundlePath) {
    return undefined;
  }
  return [...tls.rootCertificates, fs.readFileSync(caBundlePath, 'utf8')];
}

/**
 * Converts any error thrown by axios into the client's error taxonomy
 */
export function toQuoteApiError(error: unknown, endpoint: string): QuoteApiError {
  if (error instanceof QuoteApiError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    if (error.response) {
      const { status, data } = error.response;
      return new HttpStatusError(
        `HTTP ${status} from ${endpoint}`,
        status,
        data,
        { cause: error },
      );
    }
    return new ConnectionError(
      `Request to ${endpoint} failed: ${error.message}`,
      error.code,
      { cause: error },
    );
  }

  if (error instanceof Error) {
    return new QuoteApiError(error.message, { cause: error });
  }
  return new QuoteApiError(String(error));
}

export class HttpTransport {
  private client: AxiosInstance;
  private httpAgent: http.Agent;
  private httpsAgent: https.Agent;
  private metrics: TransportMetrics;

  constructor(options: TransportOptions, adapter?: AxiosAdapter) {
    this.httpAgent = new http.Agent({ keepAlive: true });
    this.httpsAgent = new https.Agent({
      keepAlive: true,
      rejectUnauthorized: options.verifySsl,
      ca: options.verifySsl ? buildCaList(options.caBundlePath) : undefined,
    });

    this.client = axios.create({
      baseURL: options.baseUrl,
      headers: { ...DEFAULT_HEADERS },
      timeout: options.timeoutMs, // 0 = no timeout
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      ...(adapter ? { adapter } : {}),
    });

    this.metrics = {
      totalRequests: 0,
      failedRequests: 0,
      requestsByStatusCode: {},
      lastRequestAt: null,
    };
  }

  /**
   * Sends one request. Resolves on 2xx, rejects with a QuoteApiError otherwise.
   */
  async request<T>(
    method: HttpMethod,
    endpoint: string,
    request: TransportRequest = {},
  ): Promise<TransportResponse<T>> {
    const headers: Record<string, string> = {};
    if (request.token) {
      headers['Authorization'] = `Bearer ${request.token}`;
    }

    this.metrics.totalRequests++;
    this.metrics.lastRequestAt = Date.now();

    try {
      const response = await this.client.request<T>({
        method,
        url: endpoint,
        data: request.data,
        headers,
      });
      this.recordStatus(response.status);
      return { status: response.status, data: response.data };
    } catch (error) {
      const apiError = toQuoteApiError(error, endpoint);
      this.metrics.failedRequests++;
      this.recordStatus(apiError instanceof HttpStatusError ? apiError.status : 0);
      throw apiError;
    }
  }

  private recordStatus(statusCode: number): void {
    this.metrics.requestsByStatusCode[statusCode] =
      (this.metrics.requestsByStatusCode[statusCode] ?? 0) + 1;
  }

  getMetrics(): TransportMetrics {
    return {
      ...this.metrics,
      requestsByStatusCode: { ...this.metrics.requestsByStatusCode },
    };
  }

  /**
   * TLS settings of the HTTPS agent
   */
  getTlsOptions(): Pick<https.AgentOptions, 'rejectUnauthorized' | 'ca'> {
    const { rejectUnauthorized, ca } = this.httpsAgent.options;
    return { rejectUnauthorized, ca };
  }

  /**
   * Closes pooled sockets
   */
  close(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}
