/**
 * Submission Validator
 *
 * Pure checks on the two required form fields: the video URL must have the
 * canonical watch-page or short-link shape, and the category must be one of
 * the fixed report reasons.
 */

import { z } from 'zod';
import type { FieldErrors, SubmissionField } from '../errors/index.js';

// ============================================================================
// Categories
// ============================================================================

export const REPORT_CATEGORIES = [
  'sexual',
  'violent',
  'hateful',
  'harassment',
  'harmful',
  'misinformation',
  'child',
  'terrorism',
  'spam',
] as const;

export type ReportCategory = (typeof REPORT_CATEGORIES)[number];

export const CATEGORY_LABELS: Record<ReportCategory, string> = {
  sexual: 'Sexual content',
  violent: 'Violent or repulsive content',
  hateful: 'Hateful or abusive content',
  harassment: 'Harassment or bullying',
  harmful: 'Harmful or dangerous acts',
  misinformation: 'Misinformation',
  child: 'Child abuse',
  terrorism: 'Promotes terrorism',
  spam: 'Spam or misleading',
};

export function isReportCategory(value: unknown): value is ReportCategory {
  return typeof value === 'string' && (REPORT_CATEGORIES as readonly string[]).includes(value);
}

// ============================================================================
// Schemas
// ============================================================================

// youtu.be/<id> or youtube.com/watch?v=<id>; anything after the id is tolerated
const VIDEO_URL_PATTERN =
  /^https?:\/\/(?:www\.)?(?:youtube\.com\/watch\?v=|youtu\.be\/)([A-Za-z0-9_-]{11})(?:\S+)?$/;

export const URL_ERROR = 'Enter a valid video URL (youtube.com/watch?v=… or youtu.be/…)';
export const CATEGORY_ERROR = 'Select a report reason';

const VideoUrlSchema = z
  .string({ required_error: URL_ERROR, invalid_type_error: URL_ERROR })
  .trim()
  .min(1, URL_ERROR)
  .regex(VIDEO_URL_PATTERN, URL_ERROR);

const CategorySchema = z.enum(REPORT_CATEGORIES, {
  errorMap: () => ({ message: CATEGORY_ERROR }),
});

const DetailsSchema = z
  .string()
  .optional()
  .catch(undefined)
  .transform((value) => value?.trim() || undefined);

export const SubmissionSchema = z.object({
  video_url: VideoUrlSchema,
  report_category: CategorySchema,
  report_details: DetailsSchema,
});

// ============================================================================
// Types
// ============================================================================

/** Raw form input as received from the caller */
export interface SubmissionInput {
  video_url?: unknown;
  report_category?: unknown;
  report_details?: unknown;
}

export type Submission = z.infer<typeof SubmissionSchema>;

export interface ValidationResult {
  ok: boolean;
  fieldErrors: FieldErrors;
}

export type ParsedSubmission =
  | { ok: true; submission: Submission }
  | { ok: false; fieldErrors: FieldErrors };

// ============================================================================
// Validation
// ============================================================================

function toFieldErrors(error: z.ZodError): FieldErrors {
  const fieldErrors: FieldErrors = {};

  for (const issue of error.issues) {
    const field = issue.path[0];
    if (field !== 'video_url' && field !== 'report_category') continue;

    const key: SubmissionField = field;
    fieldErrors[key] ??= issue.message;
  }

  return fieldErrors;
}

/**
 * Validate and normalize a whole submission. Never throws.
 */
export function parseSubmission(input: SubmissionInput): ParsedSubmission {
  const result = SubmissionSchema.safeParse({
    video_url: input.video_url,
    report_category: input.report_category,
    report_details: input.report_details,
  });

  if (result.success) {
    return { ok: true, submission: result.data };
  }

  return { ok: false, fieldErrors: toFieldErrors(result.error) };
}

/**
 * Check the two required fields, reporting each one that fails
 */
export function validate(videoUrl: unknown, category: unknown): ValidationResult {
  const parsed = parseSubmission({ video_url: videoUrl, report_category: category });
  return parsed.ok
    ? { ok: true, fieldErrors: {} }
    : { ok: false, fieldErrors: parsed.fieldErrors };
}

/**
 * Pull the 11-character video id out of a URL, or null if the shape is wrong
 */
export function extractVideoId(url: string): string | null {
  const match = VIDEO_URL_PATTERN.exec(url.trim());
  return match ? match[1] : null;
}
