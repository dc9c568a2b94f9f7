import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import http from 'http';
import { QuoteSession } from '../../src/services/quote-session.service.js';
import { ConnectionError } from '../../src/errors/quote-api.errors.js';

/**
 * Integration Test - Session lifecycle over real HTTP
 *
 * A local node:http server plays the quotes API so the default axios
 * adapter, agents and error mapping are exercised end to end.
 */

interface SeenRequest {
  method: string;
  url: string;
  authorization: string | null;
}

function readBody(request: http.IncomingMessage): Promise<Record<string, unknown>> {
  return new Promise((resolve, reject) => {
    let raw = '';
    request.setEncoding('utf8');
    request.on('data', (chunk: string) => {
      raw += chunk;
    });
    request.on('end', () => {
      const parsed: unknown = raw ? JSON.parse(raw) : {};
      resolve(typeof parsed === 'object' && parsed !== null ? { ...parsed } : {});
    });
    request.on('error', reject);
  });
}

function portOf(server: http.Server): number {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return address.port;
}

function sendJson(response: http.ServerResponse, status: number, body: unknown): void {
  response.writeHead(status, { 'Content-Type': 'application/json' });
  response.end(JSON.stringify(body));
}

describe('Session lifecycle (local HTTP server)', () => {
  const seen: SeenRequest[] = [];
  let server: http.Server;
  let baseUrl: string;

  beforeAll(async () => {
    server = http.createServer((request, response) => {
      void (async () => {
        seen.push({
          method: request.method ?? '',
          url: request.url ?? '',
          authorization: request.headers.authorization ?? null,
        });
        const body = request.method === 'POST' ? await readBody(request) : {};

        switch (`${request.method} ${request.url}`) {
          case 'POST /Authentication/v1/login':
            if (body.login === 'test-user' && body.password === 'test-password') {
              return sendJson(response, 200, { token: 'access-1', refreshToken: 'refresh-1' });
            }
            return sendJson(response, 401, { message: 'Invalid credentials' });
          case 'GET /Authentication/v1/keep':
            return sendJson(response, 200, { status: 'session_extended' });
          case 'POST /Authentication/v1/refresh':
            return sendJson(response, 200, { token: 'access-2', refreshToken: 'refresh-2' });
          case 'POST /stock/v1/quote/request':
            return sendJson(response, 200, {
              PETR4: { ULT: '28.50', VAR: '1.25' },
              VALE3: { ULT: '61.20', VAR: '-0.40' },
            });
          case 'GET /Authentication/v1/logout':
            return sendJson(response, 200, { success: true, message: 'Session disconnected' });
          default:
            return sendJson(response, 404, { message: 'Not found' });
        }
      })().catch((error: unknown) => {
        sendJson(response, 500, { message: error instanceof Error ? error.message : String(error) });
      });
    });

    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    baseUrl = `http://127.0.0.1:${portOf(server)}/`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  it('should log in, refresh, quote and log out', async () => {
    const session = await QuoteSession.connect({
      username: 'test-user',
      password: 'test-password',
      baseUrl,
      keepAlive: true,
    });

    try {
      const refresh = await session.tokenRefresh();
      const quotes = await session.getQuote(['PETR4', 'VALE3'], ['ULT', 'VAR']);
      const logout = await session.logout();

      expect(refresh.success).toBe(true);
      expect(Object.keys(quotes)).toEqual(['PETR4', 'VALE3']);
      expect(logout).toEqual({ success: true, message: 'Session disconnected' });
      expect(seen.map((request) => `${request.method} ${request.url} ${request.authorization}`)).toEqual([
        'POST /Authentication/v1/login null',
        'GET /Authentication/v1/keep Bearer access-1',
        'POST /Authentication/v1/refresh Bearer access-1',
        'POST /stock/v1/quote/request Bearer access-2',
        'GET /Authentication/v1/logout Bearer access-2',
      ]);
    } finally {
      session.close();
    }
  });

  it('should reject wrong credentials with the status and body', async () => {
    await expect(
      QuoteSession.connect({ username: 'test-user', password: 'wrong-password', baseUrl }),
    ).rejects.toMatchObject({
      name: 'HttpStatusError',
      status: 401,
      body: { message: 'Invalid credentials' },
    });
  });

  it('should reject with ConnectionError when nothing listens on the port', async () => {
    const closed = http.createServer();
    await new Promise<void>((resolve) => closed.listen(0, '127.0.0.1', resolve));
    const port = portOf(closed);
    await new Promise<void>((resolve) => closed.close(() => resolve()));

    const attempt = QuoteSession.connect({
      username: 'test-user',
      password: 'test-password',
      baseUrl: `http://127.0.0.1:${port}/`,
    });

    await expect(attempt).rejects.toBeInstanceOf(ConnectionError);
    await expect(attempt).rejects.toMatchObject({ code: 'ECONNREFUSED' });
  });
});
