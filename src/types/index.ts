/**
 * Type definitions for the request model, response fingerprints and probing
 */

// JSON values carried by a JSON request body
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// Request body, tagged by how it was decoded. JSON bodies keep their source
// text, which is what goes back on the wire.
export type RequestBody =
  | { type: 'empty' }
  | { type: 'json'; value: JsonValue; text: string }
  | { type: 'form'; fields: Map<string, string> };

export type BodyType = RequestBody['type'];

/**
 * Structured, mutable model of a captured HTTP request.
 * Maps keep insertion order so serialization is deterministic.
 */
export interface HttpRequest {
  method: string;
  path: string;
  queryParams: Map<string, string>;
  version: string;
  headers: Map<string, string>;
  cookies: Map<string, string>;
  body: RequestBody;
}

// The four places a removable element can live
export type ElementLocation = 'queryParams' | 'parsedBody' | 'headers' | 'cookies';

export interface RemovalDescriptor {
  key: string;
  location: ElementLocation;
}

export interface Variant {
  removal: RemovalDescriptor;
  request: HttpRequest;
}

// Response Fingerprint
export interface ResponseFingerprint {
  readonly headers: ReadonlyMap<string, string>; // reporting only
  readonly contentLength: number;
  readonly statusCode: number;
  readonly statusMessage: string;
}

export type ResponseParseResult =
  | { ok: true; fingerprint: ResponseFingerprint }
  | { ok: false; error: string };

export type ProbeOutcome = ResponseParseResult;

export type ProbeResult = ProbeOutcome & { removal: RemovalDescriptor };

// Transport contract
export interface ProbeTarget {
  host: string;
  port: number;
  tls: boolean;
}

export type TransportResult =
  | { ok: true; headerBlock: string }
  | { ok: false; error: string };

export interface Transport {
  send(target: ProbeTarget, rawRequest: string): Promise<TransportResult>;
}

export interface TransportOptions {
  connectTimeoutMs: number;
  readTimeoutMs: number;
  // Upper bound on response bytes read while looking for the end of the headers
  maxHeaderBytes?: number;
}

export type ProbeLogger = (result: ProbeResult, matched: boolean) => void;

export interface MinimizeOptions {
  transport?: Transport;
  onProbe?: ProbeLogger;
}

export type StripOutcome =
  | {
      ok: true;
      original: HttpRequest;
      baseline: ResponseFingerprint;
      results: ProbeResult[];
      stripped: HttpRequest;
      strippedText: string;
      final: ProbeOutcome;
    }
  | { ok: false; error: string };

export type StripSuccess = Extract<StripOutcome, { ok: true }>;

// CLI Options
export interface CLIOptions {
  http: boolean;
  host: string;
  port: number;
  req: string;
  verbose: number;
  connectTimeout: number;
  readTimeout: number;
}
