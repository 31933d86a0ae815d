/**
 * Integration tests for end-to-end stripping against in-process HTTP servers
 */

import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { fileURLToPath } from 'node:url';
import { stripRequest } from '../src/minimizer.js';
import { createSocketTransport } from '../src/transport.js';
import { runStrip } from '../src/cli.js';
import type { ProbeTarget } from '../src/types/index.js';

const transport = createSocketTransport({ connectTimeoutMs: 2000, readTimeoutMs: 2000 });

function reply(res: ServerResponse, status: number, text: string): void {
  res.writeHead(status, {
    'Content-Type': 'text/plain',
    'Content-Length': String(Buffer.byteLength(text)),
  });
  res.end(text);
}

/**
 * Starts an HTTP server on an ephemeral port. The lenient parser accepts the
 * LF-only line endings the codec writes.
 */
async function startHttpServer(handler: (req: IncomingMessage, res: ServerResponse) => void): Promise<{ server: Server; port: number }> {
  const server = createServer({ insecureHTTPParser: true }, handler);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return { server, port: address.port };
}

async function stopHttpServer(server: Server): Promise<void> {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
}

describe('Integration Tests', () => {
  describe('header stripping', () => {
    let server: Server;
    let target: ProbeTarget;

    beforeAll(async () => {
      const started = await startHttpServer((req, res) => {
        if (req.headers.host === 'example.com' && req.headers['accept-encoding'] === 'gzip, deflate') {
          reply(res, 200, 'welcome');
        } else {
          reply(res, 400, 'missing');
        }
      });
      server = started.server;
      target = { host: '127.0.0.1', port: started.port, tls: false };
    });

    afterAll(async () => {
      await stopHttpServer(server);
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should keep Host and Accept-Encoding and drop User-Agent', async () => {
      const raw = 'GET / HTTP/1.1\nHost: example.com\nUser-Agent: X\nAccept-Encoding: gzip, deflate\n\n';

      const outcome = await stripRequest(raw, target, { transport });

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;
      expect(outcome.baseline.statusCode).toBe(200);
      expect(outcome.baseline.statusMessage).toBe('OK');
      expect(outcome.baseline.contentLength).toBe(7);
      expect(outcome.strippedText).toBe('GET / HTTP/1.1\nHost: example.com\nAccept-Encoding: gzip, deflate\n\n');
      expect(outcome.final.ok && outcome.final.fingerprint.statusCode).toBe(200);
    });

    it('should print the report from the CLI entry point', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      const code = await runStrip({
        req: fileURLToPath(new URL('./fixtures/example-request.txt', import.meta.url)),
        http: true,
        host: '127.0.0.1',
        port: target.port,
        verbose: 0,
        connectTimeout: 2000,
        readTimeout: 2000,
      });

      expect(code).toBe(0);
      expect(log).toHaveBeenCalledTimes(1);
      expect(log.mock.calls[0][0]).toContain(
        'Stripped request:\n-----------------\nGET / HTTP/1.1\nHost: example.com\nAccept-Encoding: gzip, deflate\n-----------------'
      );
    });
  });

  describe('query, cookie and form stripping', () => {
    let server: Server;
    let target: ProbeTarget;

    beforeAll(async () => {
      const started = await startHttpServer((req, res) => {
        let body = '';
        req.setEncoding('utf-8');
        req.on('data', (chunk: string) => {
          body += chunk;
        });
        req.on('end', () => {
          const url = new URL(req.url ?? '/', 'http://localhost');
          const form = new URLSearchParams(body);
          const allowed =
            req.headers.host === 'example.com' &&
            url.searchParams.get('id') === '7' &&
            (req.headers.cookie ?? '').includes('session=abc') &&
            form.get('user') === 'alice';
          if (allowed) {
            reply(res, 200, 'account');
          } else {
            reply(res, 403, 'denied');
          }
        });
      });
      server = started.server;
      target = { host: '127.0.0.1', port: started.port, tls: false };
    });

    afterAll(async () => {
      await stopHttpServer(server);
    });

    it('should strip every element the server ignores', async () => {
      const raw = [
        'POST /account?id=7&utm=mail HTTP/1.1',
        'Host: example.com',
        'User-Agent: X',
        'Content-Length: 21',
        'Cookie: session=abc; theme=dark',
        '',
        'user=alice&remember=1',
      ].join('\n');

      const outcome = await stripRequest(raw, target, { transport });

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;
      expect(outcome.results).toHaveLength(8);
      expect(outcome.strippedText).toBe(
        'POST /account?id=7 HTTP/1.1\nHost: example.com\nContent-Length: 10\nCookie: session=abc\n\nuser=alice\n\n'
      );
      expect(outcome.final.ok && outcome.final.fingerprint.statusCode).toBe(200);
    });
  });

  describe('unreachable target', () => {
    it('should fail without probing any variants', async () => {
      const { server, port } = await startHttpServer(() => undefined);
      await stopHttpServer(server);

      const outcome = await stripRequest('GET / HTTP/1.1\nHost: example.com\n\n', { host: '127.0.0.1', port, tls: false }, { transport });

      expect(outcome.ok).toBe(false);
      expect(!outcome.ok && outcome.error).toMatch(/^Connection error to 127\.0\.0\.1:/);
    });
  });
});
