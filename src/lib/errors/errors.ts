/**
 * Error Taxonomy
 *
 * Every failure the intake pipeline can meet falls into one of three kinds.
 * Validation and capture failures are recovered inside the pipeline; storage
 * failures are surfaced to the caller as a failed submission.
 */

// ============================================================================
// Types
// ============================================================================

export type ErrorCode = 'VALIDATION_FAILED' | 'CAPTURE_FAILED' | 'STORAGE_FAILED';

export type SubmissionField = 'video_url' | 'report_category';

export type FieldErrors = Partial<Record<SubmissionField, string>>;

// ============================================================================
// Errors
// ============================================================================

export class VidReportError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends VidReportError {
  readonly fieldErrors: FieldErrors;

  constructor(fieldErrors: FieldErrors) {
    const fields = Object.keys(fieldErrors).join(', ');
    super('VALIDATION_FAILED', `Invalid submission: ${fields}`);
    this.fieldErrors = fieldErrors;
  }
}

export class CaptureError extends VidReportError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super('CAPTURE_FAILED', message, options);
    this.url = url;
  }
}

export class StorageError extends VidReportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE_FAILED', message, options);
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Human-readable message for anything thrown
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
