/**
 * req-strip - Main entry point
 * Finds the headers, cookies, query parameters and form fields of a captured
 * request that a server actually needs
 */

// Export types
export * from './types/index.js';

// Export codec functions
export {
  parse,
  serialize,
  parseResponse,
  splitLines,
  splitFolded,
  parsePairs,
  formatPairs,
  parseHeaderLines,
  extractBodyText,
  decodeBody,
  encodeBody,
  formatTarget,
  cloneBody,
  cloneRequest,
  COOKIE_HEADER,
  CONTENT_LENGTH_HEADER,
  WRONG_PROTOCOL_ERROR,
} from './codec.js';

// Export matcher functions
export { fingerprintsMatch, matchesBaseline } from './matcher.js';

// Export minimization engine functions
export {
  ELEMENT_LOCATIONS,
  getLocationMap,
  removeElement,
  countRemovable,
  enumerateVariants,
  probe,
  probeBaseline,
  probeAll,
  reduce,
  minimize,
  minimizeWithResults,
  stripRequest,
} from './minimizer.js';

// Export transport functions
export {
  createSocketTransport,
  sendRaw,
  extractHeaderBlock,
  getTrustAnyContext,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_READ_TIMEOUT_MS,
  DEFAULT_TRANSPORT_OPTIONS,
  DEFAULT_MAX_HEADER_BYTES,
} from './transport.js';

// Export report functions
export { formatReport, formatFingerprint, formatOutcome, formatRemovals, getRemovalLabel, RULE } from './report.js';

// Export CLI functions
export {
  createProgram,
  runStrip,
  createLogger,
  parsePort,
  parseTimeout,
} from './cli.js';
