/**
 * Errors Module
 *
 * Provides:
 * - ValidationError, CaptureError and StorageError
 * - A shared base class carrying a stable error code
 */

export {
  VidReportError,
  ValidationError,
  CaptureError,
  StorageError,
  describeError,
  type ErrorCode,
  type SubmissionField,
  type FieldErrors,
} from './errors.js';
