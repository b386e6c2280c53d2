/**
 * vidreport - video report intake
 *
 * Validate a reported video URL and reason, capture a screenshot of the page
 * as evidence, and keep an append-only log of every submission.
 */

// Error taxonomy
export * from './lib/errors/index.js';

// Submission validation
export * from './lib/validation/index.js';

// Screenshot capture
export * from './lib/screenshot/index.js';

// Report log
export * from './lib/store/index.js';

// Validate → capture → persist
export * from './lib/pipeline/index.js';

// Configuration
export * from './lib/config/index.js';

// Web layer
export * from './lib/server/index.js';

export { createReportApp, type ReportApp, type ReportAppOverrides } from './app.js';

// Version
export const VERSION = '0.1.0';
