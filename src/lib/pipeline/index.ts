/**
 * Pipeline Module
 *
 * Provides:
 * - Validate → capture → persist sequencing for one submission
 * - Rejected / succeeded / failed results for the web layer to render
 */

export {
  ReportPipeline,
  createReportPipeline,
  DEFAULT_PIPELINE_OPTIONS,
  type PipelineStatus,
  type PipelineResult,
  type RejectedResult,
  type SucceededResult,
  type FailedResult,
  type ReportWriter,
  type PipelineOptions,
} from './pipeline.js';
