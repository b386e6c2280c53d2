/**
 * Report Store
 *
 * Append-only log of submitted reports, kept as a single JSON document on
 * disk. Records are never updated or removed once written.
 *
 * All writes go through one queue: ids are assigned inside it, so concurrent
 * `create` calls always receive distinct, increasing ids.
 */

import { readFile, writeFile, mkdir, rename } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { StorageError, ValidationError, describeError } from '../errors/index.js';
import { REPORT_CATEGORIES, validate, type ReportCategory } from '../validation/index.js';

// ============================================================================
// Schemas
// ============================================================================

export const ReportSchema = z.object({
  id: z.number().int().positive(),
  video_url: z.string(),
  report_category: z.enum(REPORT_CATEGORIES),
  report_details: z.string().optional(),
  timestamp: z.string().datetime(),
  screenshot_path: z.string().optional(),
});

export const ReportLogSchema = z.object({
  version: z.literal('1.0'),
  nextId: z.number().int().positive(),
  createdAt: z.string(),
  updatedAt: z.string(),
  reports: z.array(ReportSchema),
});

// ============================================================================
// Types
// ============================================================================

export type Report = z.infer<typeof ReportSchema>;
export type ReportLog = z.infer<typeof ReportLogSchema>;

export interface NewReport {
  video_url: string;
  report_category: ReportCategory;
  report_details?: string;
  screenshot_path?: string;
}

/** 'desc' is newest first, 'asc' is submission order */
export type ListOrder = 'asc' | 'desc';

export interface ReportStoreOptions {
  /** Source of creation instants */
  clock?: () => Date;
}

export const LOG_FILENAME = 'reports.json';

// ============================================================================
// Report Store
// ============================================================================

export class ReportStore {
  private dataDir: string;
  private logPath: string;
  private clock: () => Date;
  private log: ReportLog | null = null;
  private loading: Promise<void> | null = null;
  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(dataDir: string = './.vidreport-data', options: ReportStoreOptions = {}) {
    this.dataDir = dataDir;
    this.logPath = join(dataDir, LOG_FILENAME);
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Create the data directory and load the log, or start an empty one
   */
  async init(): Promise<void> {
    if (this.log) return;
    this.loading ??= this.load().finally(() => {
      this.loading = null;
    });
    await this.loading;
  }

  private async load(): Promise<void> {
    try {
      await mkdir(this.dataDir, { recursive: true });
    } catch (error) {
      throw new StorageError(`Cannot create data directory ${this.dataDir}: ${describeError(error)}`, {
        cause: error,
      });
    }

    let content: string;
    try {
      content = await readFile(this.logPath, 'utf-8');
    } catch (error) {
      if (!isNotFound(error)) {
        throw new StorageError(`Cannot read report log ${this.logPath}: ${describeError(error)}`, {
          cause: error,
        });
      }

      const now = this.clock().toISOString();
      const fresh: ReportLog = {
        version: '1.0',
        nextId: 1,
        createdAt: now,
        updatedAt: now,
        reports: [],
      };
      await this.persist(fresh);
      this.log = fresh;
      console.log(`[Store] Created report log at ${this.logPath}`);
      return;
    }

    this.log = this.parseLog(content);
    console.log(`[Store] Loaded ${this.log.reports.length} reports from ${this.logPath}`);
  }

  private parseLog(content: string): ReportLog {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new StorageError(`Report log ${this.logPath} is not valid JSON`, { cause: error });
    }

    const result = ReportLogSchema.safeParse(parsed);
    if (!result.success) {
      throw new StorageError(`Report log ${this.logPath} is malformed: ${result.error.message}`, {
        cause: result.error,
      });
    }

    const log = result.data;
    const highestId = log.reports.reduce((max, report) => Math.max(max, report.id), 0);
    log.nextId = Math.max(log.nextId, highestId + 1);
    return log;
  }

  /**
   * Append a report. Assigns `id` and `timestamp`; the record is on disk
   * before this resolves. Throws StorageError when it could not be written,
   * in which case nothing was recorded.
   */
  async create(input: NewReport): Promise<Report> {
    const check = validate(input.video_url, input.report_category);
    if (!check.ok) {
      throw new ValidationError(check.fieldErrors);
    }

    await this.init();

    return this.enqueue(async () => {
      const log = this.requireLog();
      const previous = log.reports[log.reports.length - 1];

      const report: Report = {
        id: log.nextId,
        video_url: input.video_url.trim(),
        report_category: input.report_category,
        timestamp: this.nextTimestamp(previous),
      };
      const details = input.report_details?.trim();
      if (details) report.report_details = details;
      if (input.screenshot_path) report.screenshot_path = input.screenshot_path;

      const next: ReportLog = {
        ...log,
        nextId: log.nextId + 1,
        updatedAt: report.timestamp,
        reports: [...log.reports, report],
      };

      await this.persist(next);
      this.log = next;

      console.log(`[Store] Added report #${report.id} (${report.report_category})`);
      return { ...report };
    });
  }

  /**
   * All reports, newest first by default
   */
  list(order: ListOrder = 'desc'): Report[] {
    const reports = this.requireLog().reports.map((report) => ({ ...report }));
    return order === 'asc' ? reports : reports.reverse();
  }

  /**
   * The `limit` most recent reports
   */
  recent(limit: number = 5): Report[] {
    return this.list('desc').slice(0, Math.max(0, limit));
  }

  /**
   * Look up a report by id
   */
  get(id: number): Report | undefined {
    const report = this.requireLog().reports.find((r) => r.id === id);
    return report ? { ...report } : undefined;
  }

  count(): number {
    return this.requireLog().reports.length;
  }

  getLogPath(): string {
    return this.logPath;
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private requireLog(): ReportLog {
    if (!this.log) {
      throw new StorageError('Report store used before init()');
    }
    return this.log;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task);
    // A failed write is reported to its own caller; later writes still run
    this.writeQueue = run.catch(() => undefined);
    return run;
  }

  private nextTimestamp(previous: Report | undefined): string {
    const now = this.clock();
    if (previous && now.getTime() < Date.parse(previous.timestamp)) {
      return previous.timestamp;
    }
    return now.toISOString();
  }

  /**
   * Write the whole log to a temp file and rename it over the old one
   */
  private async persist(log: ReportLog): Promise<void> {
    const tempPath = `${this.logPath}.${process.pid}.tmp`;
    try {
      await writeFile(tempPath, JSON.stringify(log, null, 2));
      await rename(tempPath, this.logPath);
    } catch (error) {
      throw new StorageError(`Failed to write report log ${this.logPath}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ============================================================================
// Factory
// ============================================================================

export function createReportStore(dataDir?: string, options?: ReportStoreOptions): ReportStore {
  return new ReportStore(dataDir, options);
}
