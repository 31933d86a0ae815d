/**
 * Report Module
 * Renders the original and stripped requests and their responses as text
 */

import { matchesBaseline } from './matcher.js';
import type { ProbeOutcome, ProbeResult, ResponseFingerprint, StripSuccess } from './types/index.js';

export const RULE = '-----------------';

/**
 * Drops trailing line breaks so raw messages sit flush against the rules
 */
function trimTrailingNewlines(text: string): string {
  return text.replace(/[\r\n]+$/, '');
}

/**
 * Formats a fingerprint as its status line followed by indented headers
 */
export function formatFingerprint(fingerprint: ResponseFingerprint): string {
  const lines: string[] = [];
  const status = `${fingerprint.statusCode} ${fingerprint.statusMessage}`.trim();

  lines.push(`${status} (Content-Length: ${fingerprint.contentLength})`);
  for (const [name, value] of fingerprint.headers) {
    lines.push(`  ${name}: ${value}`);
  }

  return lines.join('\n');
}

/**
 * Formats a probe outcome, successful or not
 */
export function formatOutcome(outcome: ProbeOutcome): string {
  return outcome.ok ? formatFingerprint(outcome.fingerprint) : `error: ${outcome.error}`;
}

/**
 * Gets the label for a probe result: removed, kept or error
 */
export function getRemovalLabel(result: ProbeResult, baseline: ResponseFingerprint): string {
  if (!result.ok) {
    return '[error]';
  }
  return matchesBaseline(baseline, result) ? '[removed]' : '[kept]';
}

/**
 * Formats one line per probe result
 */
export function formatRemovals(results: ProbeResult[], baseline: ResponseFingerprint): string {
  if (results.length === 0) {
    return '(nothing to remove)';
  }
  return results
    .map((result) => `${getRemovalLabel(result, baseline)} ${result.removal.location} ${result.removal.key}`)
    .join('\n');
}

function section(title: string, body: string): string[] {
  return [`${title}:`, RULE, body, RULE];
}

/**
 * Generates the full text report of a strip run
 */
export function formatReport(rawRequest: string, outcome: StripSuccess): string {
  return [
    ...section('Original request', trimTrailingNewlines(rawRequest)),
    ...section('Base response', formatFingerprint(outcome.baseline)),
    ...section('Removals', formatRemovals(outcome.results, outcome.baseline)),
    ...section('Stripped request', trimTrailingNewlines(outcome.strippedText)),
    ...section('Stripped response', formatOutcome(outcome.final)),
  ].join('\n');
}
