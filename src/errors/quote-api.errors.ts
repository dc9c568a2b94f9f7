/**
 * Errors raised by the session client.
 *
 * ConnectionError   - no response (DNS, TLS, refused socket, timeout)
 * HttpStatusError   - the API answered with a non-2xx status
 * InvalidResponseError - 2xx body missing fields the client needs
 * ConfigurationError - the client cannot be built from the given settings
 */

export class QuoteApiError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'QuoteApiError';
  }
}

export class ConnectionError extends QuoteApiError {
  constructor(
    message: string,
    public code?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

export class HttpStatusError extends QuoteApiError {
  constructor(
    message: string,
    public status: number,
    public body: unknown,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'HttpStatusError';
  }
}

export class InvalidResponseError extends QuoteApiError {
  constructor(
    message: string,
    public body: unknown,
  ) {
    super(message);
    this.name = 'InvalidResponseError';
  }
}

export class ConfigurationError extends QuoteApiError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
