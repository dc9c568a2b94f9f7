export {
  QuoteSession,
  ENDPOINTS,
  APPLICATION_ID,
  decodeTokenExpiry,
} from './services/quote-session.service.js';
export {
  HttpTransport,
  toQuoteApiError,
  DEFAULT_HEADERS,
} from './services/http-transport.service.js';
export type {
  HttpMethod,
  TransportMetrics,
  TransportRequest,
  TransportResponse,
} from './services/http-transport.service.js';
export {
  StructuredLogger,
  logger,
  maskToken,
} from './services/logger.service.js';
export type { SessionLogContext } from './services/logger.service.js';
export {
  QuoteApiError,
  ConnectionError,
  HttpStatusError,
  InvalidResponseError,
  ConfigurationError,
} from './errors/quote-api.errors.js';
export { config, loadConfig, DEFAULT_API_URL } from './config/env.js';
export type { Config } from './config/env.js';
export type {
  ApiPayload,
  AuthResponse,
  QuotePayload,
  RefreshResult,
  SessionMetrics,
  SessionOptions,
  TokenPair,
  TransportOptions,
} from './types/session.types.js';
