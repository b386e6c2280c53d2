/**
 * Server Module
 *
 * Provides:
 * - Submission form, recent reports and full history pages
 * - JSON API for listing, lookup and submission
 * - Screenshot serving
 * - Single-read flash notifications
 */

export {
  ReportServer,
  createReportServer,
  flashesFor,
  readCookie,
  MESSAGES,
  type ReportServerConfig,
  type SubmissionRunner,
  type ReportReader,
} from './server.js';
export { FlashQueue, type FlashMessage, type FlashCategory } from './flash.js';
export {
  renderIndexPage,
  renderHistoryPage,
  escapeHtml,
  formatTimestamp,
  categoryLabel,
} from './views.js';
