/**
 * Minimization Engine Module
 * Enumerates single-removal variants of a request, probes them concurrently
 * and folds the removals that kept the response unchanged
 */

import { cloneRequest, parse, parseResponse, serialize } from './codec.js';
import { matchesBaseline } from './matcher.js';
import { createSocketTransport } from './transport.js';
import type {
  ElementLocation,
  HttpRequest,
  MinimizeOptions,
  ProbeOutcome,
  ProbeResult,
  ProbeTarget,
  RemovalDescriptor,
  ResponseFingerprint,
  StripOutcome,
  Transport,
  Variant,
} from './types/index.js';

/**
 * Enumeration order of removable locations
 */
export const ELEMENT_LOCATIONS: readonly ElementLocation[] = ['queryParams', 'parsedBody', 'headers', 'cookies'];

/**
 * Returns the map backing a location, or null when the location holds no
 * removable elements (a JSON or empty body)
 */
export function getLocationMap(request: HttpRequest, location: ElementLocation): Map<string, string> | null {
  switch (location) {
    case 'queryParams':
      return request.queryParams;
    case 'headers':
      return request.headers;
    case 'cookies':
      return request.cookies;
    case 'parsedBody':
      return request.body.type === 'form' ? request.body.fields : null;
  }
}

/**
 * Returns a copy of the request without the described element
 */
export function removeElement(request: HttpRequest, removal: RemovalDescriptor): HttpRequest {
  const copy = cloneRequest(request);
  getLocationMap(copy, removal.location)?.delete(removal.key);
  return copy;
}

/**
 * Counts the elements that enumerateVariants would remove
 */
export function countRemovable(request: HttpRequest): number {
  return ELEMENT_LOCATIONS.reduce((total, location) => total + (getLocationMap(request, location)?.size ?? 0), 0);
}

/**
 * Produces one variant per removable element, each missing exactly that
 * element. Only one level deep: no variant removes two elements.
 */
export function enumerateVariants(base: HttpRequest): Variant[] {
  const variants: Variant[] = [];

  for (const location of ELEMENT_LOCATIONS) {
    const elements = getLocationMap(base, location);
    if (!elements) {
      continue;
    }
    for (const key of elements.keys()) {
      const removal: RemovalDescriptor = { key, location };
      variants.push({ removal, request: removeElement(base, removal) });
    }
  }

  return variants;
}

/**
 * Sends raw request text and parses the response header block
 */
export async function probe(transport: Transport, target: ProbeTarget, rawRequest: string): Promise<ProbeOutcome> {
  try {
    const sent = await transport.send(target, rawRequest);
    if (!sent.ok) {
      return { ok: false, error: sent.error };
    }
    return parseResponse(sent.headerBlock);
  } catch (e) {
    const error = e instanceof Error ? e.message : 'Unknown error';
    return { ok: false, error };
  }
}

/**
 * Probes the unmodified request. Failure here means there is nothing to
 * minimize against.
 */
export function probeBaseline(
  target: ProbeTarget,
  rawRequest: string,
  transport: Transport = createSocketTransport()
): Promise<ProbeOutcome> {
  return probe(transport, target, rawRequest);
}

/**
 * Probes every variant at once, each over its own connection, and waits for
 * all of them. Results come back in variant order.
 */
export async function probeAll(
  transport: Transport,
  target: ProbeTarget,
  variants: Variant[]
): Promise<ProbeResult[]> {
  return Promise.all(
    variants.map(async ({ removal, request }): Promise<ProbeResult> => {
      const outcome = await probe(transport, target, serialize(request));
      return { ...outcome, removal };
    })
  );
}

/**
 * Folds every removal whose probe matched the baseline into one request
 */
export function reduce(base: HttpRequest, baseline: ResponseFingerprint, results: ProbeResult[]): HttpRequest {
  return results
    .filter((result) => matchesBaseline(baseline, result))
    .map((result) => result.removal)
    .reduce((request, removal) => removeElement(request, removal), cloneRequest(base));
}

/**
 * Runs the whole probe batch for a request and returns the results alongside
 * the minimized request
 */
export async function minimizeWithResults(
  base: HttpRequest,
  baseline: ResponseFingerprint,
  target: ProbeTarget,
  options: MinimizeOptions = {}
): Promise<{ stripped: HttpRequest; results: ProbeResult[] }> {
  const transport = options.transport ?? createSocketTransport();
  const results = await probeAll(transport, target, enumerateVariants(base));

  if (options.onProbe) {
    for (const result of results) {
      options.onProbe(result, matchesBaseline(baseline, result));
    }
  }

  return { stripped: reduce(base, baseline, results), results };
}

/**
 * Returns the minimized request: the base request without every element whose
 * removal alone left the response fingerprint unchanged
 */
export async function minimize(
  base: HttpRequest,
  baseline: ResponseFingerprint,
  target: ProbeTarget,
  options: MinimizeOptions = {}
): Promise<HttpRequest> {
  const { stripped } = await minimizeWithResults(base, baseline, target, options);
  return stripped;
}

/**
 * Baseline probe, minimization and a final probe of the stripped request
 */
export async function stripRequest(
  rawRequest: string,
  target: ProbeTarget,
  options: MinimizeOptions = {}
): Promise<StripOutcome> {
  const transport = options.transport ?? createSocketTransport();

  const baselineOutcome = await probeBaseline(target, rawRequest, transport);
  if (!baselineOutcome.ok) {
    return { ok: false, error: baselineOutcome.error };
  }
  const baseline = baselineOutcome.fingerprint;

  const original = parse(rawRequest);
  const { stripped, results } = await minimizeWithResults(original, baseline, target, {
    ...options,
    transport,
  });

  const strippedText = serialize(stripped);
  const final = await probe(transport, target, strippedText);

  return { ok: true, original, baseline, results, stripped, strippedText, final };
}
