/**
 * Transport Module
 * Sends raw request text over a fresh TCP or TLS connection and reads back
 * the response header block
 */

import { connect as connectTcp, isIP, type Socket } from 'node:net';
import { connect as connectTls, createSecureContext, type SecureContext } from 'node:tls';
import type { ProbeTarget, Transport, TransportOptions, TransportResult } from './types/index.js';

export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;
export const DEFAULT_READ_TIMEOUT_MS = 5000;
export const DEFAULT_MAX_HEADER_BYTES = 64 * 1024;

export const DEFAULT_TRANSPORT_OPTIONS: TransportOptions = {
  connectTimeoutMs: DEFAULT_CONNECT_TIMEOUT_MS,
  readTimeoutMs: DEFAULT_READ_TIMEOUT_MS,
  maxHeaderBytes: DEFAULT_MAX_HEADER_BYTES,
};

let trustAnyContext: SecureContext | null = null;

/**
 * Shared TLS context for probing. Connections made with it do not verify the
 * server certificate, so self-signed and mismatched endpoints can be probed.
 */
export function getTrustAnyContext(): SecureContext {
  if (trustAnyContext === null) {
    trustAnyContext = createSecureContext();
  }
  return trustAnyContext;
}

/**
 * Returns the header block (LF line endings, ending in a blank line) once the
 * received text contains a complete one, or null if more data is needed.
 * The search for the terminating blank line starts at `from`.
 */
export function extractHeaderBlock(received: string, from = 0): string | null {
  const terminator = /\n\r?\n/g;
  terminator.lastIndex = from;
  const match = terminator.exec(received);
  if (match === null) {
    return null;
  }
  const head = received.substring(0, match.index).replace(/\r$/, '').replace(/\r\n/g, '\n');
  return `${head}\n\n`;
}

/**
 * Sends one request over its own connection. Never rejects: every failure is
 * returned as `{ ok: false }`, and the socket is destroyed on every path.
 */
export function sendRaw(
  target: ProbeTarget,
  rawRequest: string,
  options: TransportOptions = DEFAULT_TRANSPORT_OPTIONS
): Promise<TransportResult> {
  return new Promise((resolve) => {
    const address = `${target.host}:${target.port}`;
    const tcp = connectTcp({ host: target.host, port: target.port });
    let stream: Socket = tcp;
    let connected = false;
    let settled = false;
    let received = '';
    let receivedBytes = 0;
    const maxHeaderBytes = options.maxHeaderBytes ?? DEFAULT_MAX_HEADER_BYTES;
    let connectTimer: NodeJS.Timeout | undefined;

    const finish = (result: TransportResult) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(connectTimer);
      stream.destroy();
      tcp.destroy();
      resolve(result);
    };

    const fail = (error: string) => finish({ ok: false, error });

    const onSocketError = (err: Error) => {
      if (connected) {
        fail(`Looks like you might have chosen the wrong protocol. Socket closed unexpectedly: ${err.message}`);
      } else {
        fail(`Connection error to ${address}: ${err.message}`);
      }
    };

    connectTimer = setTimeout(() => {
      fail(`Connection timeout connecting to ${address}`);
    }, options.connectTimeoutMs);

    tcp.on('error', onSocketError);

    tcp.once('connect', () => {
      connected = true;
      clearTimeout(connectTimer);

      if (target.tls) {
        stream = connectTls({
          socket: tcp,
          secureContext: getTrustAnyContext(),
          rejectUnauthorized: false,
          servername: isIP(target.host) === 0 ? target.host : undefined,
        });
        stream.on('error', onSocketError);
      }

      stream.setEncoding('utf-8');
      stream.setTimeout(options.readTimeoutMs, () => {
        fail(`Connection timeout reading from ${address}`);
      });

      stream.on('data', (chunk: string) => {
        // a terminator may straddle two chunks, so back up over its first two characters
        const from = Math.max(0, received.length - 2);
        received += chunk;
        receivedBytes += Buffer.byteLength(chunk, 'utf-8');
        const headerBlock = extractHeaderBlock(received, from);
        if (headerBlock !== null) {
          finish({ ok: true, headerBlock });
        } else if (receivedBytes > maxHeaderBytes) {
          fail(`Response headers from ${address} exceeded ${maxHeaderBytes} bytes`);
        }
      });

      // A peer that closes mid-headers still gets its partial block parsed
      stream.once('end', () => {
        if (received === '') {
          fail(`Connection closed by ${address} before response headers were received`);
        } else {
          finish({ ok: true, headerBlock: received.replace(/\r\n/g, '\n') });
        }
      });

      stream.once('close', () => {
        fail(`Connection closed by ${address} before response headers were received`);
      });

      stream.write(rawRequest);
    });
  });
}

/**
 * Creates a Transport backed by plain sockets, one connection per send
 */
export function createSocketTransport(options: Partial<TransportOptions> = {}): Transport {
  const resolved: TransportOptions = { ...DEFAULT_TRANSPORT_OPTIONS, ...options };
  return {
    send: (target: ProbeTarget, rawRequest: string) => sendRaw(target, rawRequest, resolved),
  };
}
