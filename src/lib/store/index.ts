/**
 * Store Module
 *
 * Provides:
 * - Append-only JSON report log with atomic file replacement
 * - Serialized id assignment for concurrent submissions
 * - Ordered listing, recent reports and lookup by id
 */

export {
  ReportStore,
  createReportStore,
  ReportSchema,
  ReportLogSchema,
  LOG_FILENAME,
  type Report,
  type ReportLog,
  type NewReport,
  type ListOrder,
  type ReportStoreOptions,
} from './store.js';
