/**
 * Fingerprint Matcher Module
 * Decides whether two responses count as equivalent
 */

import type { ProbeOutcome, ResponseFingerprint } from './types/index.js';

/**
 * Two fingerprints match when content length, status code and status message
 * are all equal. Headers are ignored: dates, cache nodes and trace IDs change
 * on every response.
 */
export function fingerprintsMatch(a: ResponseFingerprint, b: ResponseFingerprint): boolean {
  return (
    a.contentLength === b.contentLength &&
    a.statusCode === b.statusCode &&
    a.statusMessage === b.statusMessage
  );
}

/**
 * Checks a probe outcome against the baseline. A failed probe never matches.
 */
export function matchesBaseline(baseline: ResponseFingerprint, outcome: ProbeOutcome): boolean {
  return outcome.ok && fingerprintsMatch(baseline, outcome.fingerprint);
}
