/**
 * Message Codec Module
 * Converts raw request text to and from the HttpRequest model, and parses
 * response header blocks into fingerprints
 */

import type {
  HttpRequest,
  JsonValue,
  RequestBody,
  ResponseFingerprint,
  ResponseParseResult,
} from './types/index.js';

export const COOKIE_HEADER = 'Cookie';
export const CONTENT_LENGTH_HEADER = 'Content-Length';

export const WRONG_PROTOCOL_ERROR =
  "Looks like you might have chosen the wrong protocol. Didn't receive a valid status code or message from the server";

/**
 * Splits text into lines on LF, trimming each line (drops any CR)
 */
export function splitLines(text: string): string[] {
  return text.split('\n').map((line) => line.trim());
}

/**
 * Splits a segment on the first delimiter into key and value.
 * Any later delimiters are dropped and the remaining parts joined as-is,
 * so `a=b=c` becomes `['a', 'bc']`.
 */
export function splitFolded(segment: string, delimiter: string): [string, string] {
  const [key, ...rest] = segment.split(delimiter);
  return [key, rest.join('')];
}

/**
 * Parses `k=v<sep>k=v` pairs into an ordered map. Later duplicates win.
 */
export function parsePairs(text: string, separator: string): Map<string, string> {
  const pairs = new Map<string, string>();
  for (const raw of text.split(separator)) {
    const segment = raw.trim();
    if (segment === '') {
      continue;
    }
    const [key, value] = splitFolded(segment, '=');
    pairs.set(key, value);
  }
  return pairs;
}

/**
 * Renders an ordered map as `k=v<sep>k=v`
 */
export function formatPairs(pairs: Map<string, string>, separator: string): string {
  return Array.from(pairs, ([key, value]) => `${key}=${value}`).join(separator);
}

/**
 * Parses header lines (everything after the start line up to the first blank
 * line) into an ordered map
 */
export function parseHeaderLines(lines: string[]): Map<string, string> {
  const headers = new Map<string, string>();
  for (const line of lines.slice(1)) {
    if (line === '') {
      break;
    }
    const [name, value] = splitFolded(line, ':');
    headers.set(name.trim(), value.trim());
  }
  return headers;
}

/**
 * Finds the body text of a raw request: the last non-empty segment after a
 * blank-line boundary, or null when there is none
 */
export function extractBodyText(rawText: string): string | null {
  const segments = rawText
    .split(/\r?\n\r?\n/)
    .map((segment) => segment.trim())
    .filter((segment) => segment !== '');
  if (segments.length <= 1) {
    return null;
  }
  return segments[segments.length - 1];
}

/**
 * Decodes body text as JSON, falling back to a urlencoded form. A form with
 * no fields (`&`, `&&`) is an empty body.
 */
export function decodeBody(bodyText: string | null): RequestBody {
  if (bodyText === null) {
    return { type: 'empty' };
  }
  try {
    const value: JsonValue = JSON.parse(bodyText);
    return { type: 'json', value, text: bodyText };
  } catch {
    const fields = parsePairs(bodyText, '&');
    return fields.size === 0 ? { type: 'empty' } : { type: 'form', fields };
  }
}

/**
 * Encodes a request body to its wire text
 */
export function encodeBody(body: RequestBody): string {
  switch (body.type) {
    case 'empty':
      return '';
    case 'json':
      return body.text;
    case 'form':
      return formatPairs(body.fields, '&');
  }
}

/**
 * Parses raw request text into the request model
 */
export function parse(rawText: string): HttpRequest {
  const lines = splitLines(rawText);
  const [method = '', target = '', version = ''] = lines[0].split(' ').map((token) => token.trim());

  const queryIndex = target.indexOf('?');
  const path = queryIndex === -1 ? target : target.substring(0, queryIndex);
  const queryParams =
    queryIndex === -1 ? new Map<string, string>() : parsePairs(target.substring(queryIndex + 1), '&');

  const headers = parseHeaderLines(lines);
  const cookieHeader = headers.get(COOKIE_HEADER);
  headers.delete(COOKIE_HEADER);
  headers.delete(CONTENT_LENGTH_HEADER);
  const cookies = cookieHeader === undefined ? new Map<string, string>() : parsePairs(cookieHeader, ';');

  return {
    method: method.toUpperCase(),
    path,
    queryParams,
    version,
    headers,
    cookies,
    body: decodeBody(extractBodyText(rawText)),
  };
}

/**
 * Renders the request line target: path plus any query string
 */
export function formatTarget(request: HttpRequest): string {
  if (request.queryParams.size === 0) {
    return request.path;
  }
  return `${request.path}?${formatPairs(request.queryParams, '&')}`;
}

/**
 * Serializes the request model to raw request text
 */
export function serialize(request: HttpRequest): string {
  const lines: string[] = [];

  lines.push(`${request.method.toUpperCase()} ${formatTarget(request)} ${request.version}`);

  for (const [name, value] of request.headers) {
    lines.push(`${name}: ${value}`);
  }

  const bodyText = encodeBody(request.body);
  if (request.body.type !== 'empty') {
    lines.push(`${CONTENT_LENGTH_HEADER}: ${Buffer.byteLength(bodyText, 'utf-8')}`);
  }

  if (request.cookies.size > 0) {
    lines.push(`${COOKIE_HEADER}: ${formatPairs(request.cookies, '; ')}`);
  }

  const head = lines.join('\n');
  if (request.body.type === 'empty') {
    return `${head}\n\n`;
  }
  return `${head}\n\n${bodyText}\n\n`;
}

/**
 * Parses a response header block into a fingerprint.
 * Fails when the status line has no integer status code, which usually means
 * the wrong protocol (TLS vs plaintext) was used.
 */
export function parseResponse(headerBlock: string): ResponseParseResult {
  const lines = splitLines(headerBlock);
  const tokens = lines[0].split(' ').map((token) => token.trim());
  const codeToken = tokens[1] ?? '';

  if (!/^\d+$/.test(codeToken)) {
    return { ok: false, error: WRONG_PROTOCOL_ERROR };
  }

  const headers = parseHeaderLines(lines);
  const lengthValue = headers.get(CONTENT_LENGTH_HEADER) ?? '';
  const contentLength = /^\d+$/.test(lengthValue) ? parseInt(lengthValue, 10) : 0;

  const fingerprint: ResponseFingerprint = {
    headers,
    contentLength,
    statusCode: parseInt(codeToken, 10),
    statusMessage: tokens.slice(2).join(' '),
  };

  return { ok: true, fingerprint };
}

/**
 * Copies a request body
 */
export function cloneBody(body: RequestBody): RequestBody {
  switch (body.type) {
    case 'empty':
      return { type: 'empty' };
    case 'json':
      return { type: 'json', value: structuredClone(body.value), text: body.text };
    case 'form':
      return { type: 'form', fields: new Map(body.fields) };
  }
}

/**
 * Deep-copies a request so each probe owns its own model
 */
export function cloneRequest(request: HttpRequest): HttpRequest {
  return {
    method: request.method,
    path: request.path,
    queryParams: new Map(request.queryParams),
    version: request.version,
    headers: new Map(request.headers),
    cookies: new Map(request.cookies),
    body: cloneBody(request.body),
  };
}
