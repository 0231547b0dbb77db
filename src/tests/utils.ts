// ═══════════════════════════════════════════════════════════════════════════════
// API TEST UTILITIES — In-Process Server and HTTP Helpers
// ═══════════════════════════════════════════════════════════════════════════════

import type { Server } from 'node:http';
import type { Express } from 'express';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface RequestOptions {
  method?: 'GET' | 'POST';
  body?: unknown;
  /** Sent as-is instead of JSON-encoding `body` */
  rawBody?: string;
  headers?: Record<string, string>;
}

export interface RequestResponse {
  status: number;
  data: unknown;
  headers: Record<string, string>;
}

export interface TestServer {
  readonly baseUrl: string;
  close(): Promise<void>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SERVER
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Listen on an ephemeral loopback port.
 */
export function listenApp(app: Express): Promise<TestServer> {
  return new Promise((resolve, reject) => {
    const server: Server = app.listen(0, '127.0.0.1');
    server.once('error', reject);
    server.once('listening', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Expected a TCP address'));
        return;
      }
      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((error) => (error ? fail(error) : done()));
            server.closeIdleConnections();
          }),
      });
    });
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// HTTP REQUEST HELPER
// ─────────────────────────────────────────────────────────────────────────────────

export async function request(url: string, options: RequestOptions = {}): Promise<RequestResponse> {
  const { method = 'GET', body, rawBody, headers = {} } = options;

  const requestHeaders: Record<string, string> = { ...headers };
  let payload: string | undefined = rawBody;

  if (payload === undefined && body !== undefined) {
    payload = JSON.stringify(body);
  }
  if (payload !== undefined) {
    requestHeaders['Content-Type'] = 'application/json';
  }

  const response = await fetch(url, { method, headers: requestHeaders, body: payload });

  const contentType = response.headers.get('content-type') ?? '';
  const data: unknown = contentType.includes('application/json') ? await response.json() : await response.text();

  const responseHeaders: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    responseHeaders[key] = value;
  });

  return { status: response.status, data, headers: responseHeaders };
}
