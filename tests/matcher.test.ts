/**
 * Property-based tests for the Fingerprint Matcher module
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { fingerprintsMatch, matchesBaseline } from '../src/matcher.js';
import type { ResponseFingerprint } from '../src/types/index.js';

const headersArb = fc
  .array(fc.tuple(fc.stringMatching(/^[A-Za-z-]{1,12}$/), fc.string({ maxLength: 20 })), { maxLength: 4 })
  .map((entries) => new Map(entries));

const fingerprintArb: fc.Arbitrary<ResponseFingerprint> = fc.record({
  headers: headersArb,
  contentLength: fc.nat({ max: 100000 }),
  statusCode: fc.integer({ min: 100, max: 599 }),
  statusMessage: fc.constantFrom('OK', 'Not Found', 'Bad Request', 'Moved Permanently', ''),
});

describe('Fingerprint Matcher', () => {
  /**
   * **Feature: req-strip, Property 2: Headers Do Not Affect Equivalence**
   * *For any* two fingerprints differing only in headers, the matcher SHALL
   * judge them equal.
   */
  describe('Property 2: Headers Do Not Affect Equivalence', () => {
    it('should match fingerprints that differ only in headers', () => {
      fc.assert(
        fc.property(fingerprintArb, headersArb, (fingerprint, otherHeaders) => {
          expect(fingerprintsMatch(fingerprint, { ...fingerprint, headers: otherHeaders })).toBe(true);
          return true;
        }),
        { numRuns: 100 }
      );
    });
  });

  /**
   * **Feature: req-strip, Property 3: Fingerprint Fields Decide Equivalence**
   * *For any* two fingerprints differing in content length, status code or
   * status message, the matcher SHALL judge them unequal.
   */
  describe('Property 3: Fingerprint Fields Decide Equivalence', () => {
    it('should not match when the content length differs', () => {
      fc.assert(
        fc.property(fingerprintArb, fc.integer({ min: 1, max: 1000 }), (fingerprint, delta) => {
          const other = { ...fingerprint, contentLength: fingerprint.contentLength + delta };
          expect(fingerprintsMatch(fingerprint, other)).toBe(false);
          return true;
        }),
        { numRuns: 100 }
      );
    });

    it('should not match when the status code differs', () => {
      fc.assert(
        fc.property(fingerprintArb, fc.integer({ min: 1, max: 50 }), (fingerprint, delta) => {
          const other = { ...fingerprint, statusCode: fingerprint.statusCode + delta };
          expect(fingerprintsMatch(fingerprint, other)).toBe(false);
          return true;
        }),
        { numRuns: 100 }
      );
    });

    it('should not match when the status message differs', () => {
      fc.assert(
        fc.property(fingerprintArb, (fingerprint) => {
          const other = { ...fingerprint, statusMessage: `${fingerprint.statusMessage}!` };
          expect(fingerprintsMatch(fingerprint, other)).toBe(false);
          return true;
        }),
        { numRuns: 100 }
      );
    });

    it('should be symmetric', () => {
      fc.assert(
        fc.property(fingerprintArb, fingerprintArb, (a, b) => {
          expect(fingerprintsMatch(a, b)).toBe(fingerprintsMatch(b, a));
          return true;
        }),
        { numRuns: 100 }
      );
    });
  });

  /**
   * **Feature: req-strip, Property 4: Failed Probes Never Match**
   * *For any* baseline and any failed probe, matchesBaseline SHALL be false.
   */
  describe('Property 4: Failed Probes Never Match', () => {
    it('should reject every failed outcome', () => {
      fc.assert(
        fc.property(fingerprintArb, fc.string(), (baseline, error) => {
          expect(matchesBaseline(baseline, { ok: false, error })).toBe(false);
          return true;
        }),
        { numRuns: 100 }
      );
    });

    it('should accept a successful outcome with an equal fingerprint', () => {
      const baseline: ResponseFingerprint = {
        headers: new Map([['Date', 'Mon']]),
        contentLength: 7,
        statusCode: 200,
        statusMessage: 'OK',
      };

      expect(
        matchesBaseline(baseline, {
          ok: true,
          fingerprint: { headers: new Map(), contentLength: 7, statusCode: 200, statusMessage: 'OK' },
        })
      ).toBe(true);
    });
  });
});
