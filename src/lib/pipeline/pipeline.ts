/**
 * Report Pipeline
 *
 * One run per submission: validate, capture evidence, persist. Every run
 * ends in exactly one of three states and never throws:
 *
 *   rejected  - a field failed validation; nothing captured or stored
 *   succeeded - the report was stored, with or without a screenshot
 *   failed    - the report could not be stored
 *
 * Evidence is best-effort. A failed or timed-out capture still stores the
 * report, without a screenshot.
 */

import {
  CaptureError,
  StorageError,
  describeError,
  type FieldErrors,
} from '../errors/index.js';
import { parseSubmission, type SubmissionInput } from '../validation/index.js';
import type { Capturer, CaptureResult } from '../screenshot/index.js';
import type { NewReport, Report } from '../store/index.js';
import { withDeadline } from '../utils/index.js';

// ============================================================================
// Types
// ============================================================================

export type PipelineStatus = 'rejected' | 'succeeded' | 'failed';

export interface RejectedResult {
  status: 'rejected';
  fieldErrors: FieldErrors;
}

export interface SucceededResult {
  status: 'succeeded';
  report: Report;
  /** Why no screenshot was attached, for logs and diagnostics */
  captureFailureReason?: string;
}

export interface FailedResult {
  status: 'failed';
  failureReason: string;
}

export type PipelineResult = RejectedResult | SucceededResult | FailedResult;

/** The part of the store the pipeline writes through */
export interface ReportWriter {
  create(input: NewReport): Promise<Report>;
}

export interface PipelineOptions {
  /** Bound the capturer is expected to honour */
  captureTimeoutMs?: number;
  /** Time the capturer may spend tearing down after that bound */
  closeTimeoutMs?: number;
  /** Extra time allowed past that bound before giving up on the capturer */
  graceMs?: number;
  /** Path prefix recorded in front of artifact file names */
  artifactPrefix?: string;
}

export const DEFAULT_PIPELINE_OPTIONS: Required<PipelineOptions> = {
  captureTimeoutMs: 15000,
  closeTimeoutMs: 5000,
  graceMs: 2000,
  artifactPrefix: 'screenshots',
};

// ============================================================================
// Report Pipeline
// ============================================================================

export class ReportPipeline {
  private capturer: Capturer;
  private store: ReportWriter;
  private options: Required<PipelineOptions>;

  constructor(capturer: Capturer, store: ReportWriter, options: PipelineOptions = {}) {
    this.capturer = capturer;
    this.store = store;
    this.options = {
      captureTimeoutMs: options.captureTimeoutMs ?? DEFAULT_PIPELINE_OPTIONS.captureTimeoutMs,
      closeTimeoutMs: options.closeTimeoutMs ?? DEFAULT_PIPELINE_OPTIONS.closeTimeoutMs,
      graceMs: options.graceMs ?? DEFAULT_PIPELINE_OPTIONS.graceMs,
      artifactPrefix: options.artifactPrefix ?? DEFAULT_PIPELINE_OPTIONS.artifactPrefix,
    };
  }

  /**
   * Run one submission through validation, capture and persistence
   */
  async run(input: SubmissionInput): Promise<PipelineResult> {
    const parsed = parseSubmission(input);
    if (!parsed.ok) {
      console.warn(`[Pipeline] Rejected submission (${Object.keys(parsed.fieldErrors).join(', ')})`);
      return { status: 'rejected', fieldErrors: parsed.fieldErrors };
    }

    const { submission } = parsed;
    const capture = await this.captureEvidence(submission.video_url);

    const newReport: NewReport = {
      video_url: submission.video_url,
      report_category: submission.report_category,
      report_details: submission.report_details,
    };
    if (capture.ok) {
      newReport.screenshot_path = `${this.options.artifactPrefix}/${capture.fileName}`;
    } else {
      console.warn(`[Pipeline] Saving report without screenshot: ${capture.reason}`);
    }

    let report: Report;
    try {
      report = await this.store.create(newReport);
    } catch (error) {
      const failure =
        error instanceof StorageError
          ? error
          : new StorageError(describeError(error), { cause: error });
      console.error(`[Pipeline] Could not store report for ${submission.video_url}: ${failure.message}`);
      return { status: 'failed', failureReason: failure.message };
    }

    console.log(`[Pipeline] Report #${report.id} stored`);

    return capture.ok
      ? { status: 'succeeded', report }
      : { status: 'succeeded', report, captureFailureReason: capture.reason };
  }

  /**
   * The capturer is trusted to bound itself, teardown included; this is the
   * backstop if it neither resolves nor rejects within that bound.
   */
  private async captureEvidence(url: string): Promise<CaptureResult> {
    const { captureTimeoutMs, closeTimeoutMs, graceMs } = this.options;
    const limit = captureTimeoutMs + closeTimeoutMs + graceMs;

    try {
      return await withDeadline(this.capturer.capture(url), limit, 'Screenshot capture');
    } catch (error) {
      const reason = describeError(error);
      return {
        ok: false,
        url,
        reason,
        error: new CaptureError(url, reason, { cause: error }),
      };
    }
  }

  getOptions(): Required<PipelineOptions> {
    return { ...this.options };
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createReportPipeline(
  capturer: Capturer,
  store: ReportWriter,
  options?: PipelineOptions
): ReportPipeline {
  return new ReportPipeline(capturer, store, options);
}
