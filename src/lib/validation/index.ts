/**
 * Validation Module
 *
 * Provides:
 * - URL shape and category checks with per-field errors
 * - The fixed report category list and display labels
 * - Zod schema for whole submissions
 */

export {
  validate,
  parseSubmission,
  extractVideoId,
  isReportCategory,
  REPORT_CATEGORIES,
  CATEGORY_LABELS,
  SubmissionSchema,
  URL_ERROR,
  CATEGORY_ERROR,
  type ReportCategory,
  type Submission,
  type SubmissionInput,
  type ValidationResult,
  type ParsedSubmission,
} from './validator.js';
