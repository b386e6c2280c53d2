/**
 * Report Server
 *
 * HTTP front end for the intake pipeline: a submission form, the most recent
 * reports, the full history, a small JSON API and the captured screenshots.
 * It only renders what the pipeline and store return; all validation,
 * capture and persistence happen behind them.
 */

import { createServer, IncomingMessage, ServerResponse } from 'http';
import type { AddressInfo } from 'net';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { randomBytes } from 'crypto';
import type { PipelineResult } from '../pipeline/index.js';
import type { ListOrder, Report } from '../store/index.js';
import type { SubmissionInput } from '../validation/index.js';
import { FlashQueue, type FlashMessage } from './flash.js';
import { renderHistoryPage, renderIndexPage, renderNotFoundPage } from './views.js';

// ============================================================================
// Types
// ============================================================================

export interface ReportServerConfig {
  port?: number;
  host?: string;
  /** Directory screenshots are served from */
  screenshotsDir?: string;
  /** Reports listed on the submission page */
  recentLimit?: number;
  /** Largest accepted request body in bytes */
  maxBodyBytes?: number;
}

/** What the server needs from the pipeline */
export interface SubmissionRunner {
  run(input: SubmissionInput): Promise<PipelineResult>;
}

/** What the server needs from the store */
export interface ReportReader {
  init(): Promise<void>;
  list(order?: ListOrder): Report[];
  recent(limit?: number): Report[];
  get(id: number): Report | undefined;
}

class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.status = status;
  }
}

// ============================================================================
// Messages
// ============================================================================

export const MESSAGES = {
  submitted: 'Your report has been submitted successfully!',
  storageFailed: 'An error occurred while submitting your report. Please try again.',
  tooLarge: 'Your report is too large to submit. Please shorten the details.',
} as const;

const FLASH_COOKIE = 'flash';
const SCREENSHOT_NAME = /^[A-Za-z0-9_-]+\.png$/;

// ============================================================================
// Report Server
// ============================================================================

export class ReportServer {
  private port: number;
  private host: string;
  private screenshotsDir: string;
  private recentLimit: number;
  private maxBodyBytes: number;
  private pipeline: SubmissionRunner;
  private store: ReportReader;
  private flashes = new FlashQueue();
  private server: ReturnType<typeof createServer> | null = null;

  constructor(pipeline: SubmissionRunner, store: ReportReader, config: ReportServerConfig = {}) {
    this.pipeline = pipeline;
    this.store = store;
    this.port = config.port ?? 7860;
    this.host = config.host || 'localhost';
    this.screenshotsDir = config.screenshotsDir || './.vidreport-data/screenshots';
    this.recentLimit = config.recentLimit ?? 5;
    this.maxBodyBytes = config.maxBodyBytes ?? 64 * 1024;
  }

  /**
   * Load the store and start listening
   */
  async start(): Promise<void> {
    await this.store.init();

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => this.sendError(res, error));
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    console.log(`[Server] Listening at ${this.getUrl()}`);
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  /**
   * Base URL, with the bound port when configured with port 0
   */
  getUrl(): string {
    const address = this.server?.address();
    const port = isAddressInfo(address) ? address.port : this.port;
    return `http://${this.host}:${port}`;
  }

  // --------------------------------------------------------------------------
  // Request Handling
  // --------------------------------------------------------------------------

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = parseRequestUrl(req);
    if (!url) {
      this.send404(res);
      return;
    }

    const pathname = url.pathname;
    const method = req.method || 'GET';

    try {
      if (pathname === '/' && method === 'GET') {
        this.serveIndex(req, res);
        return;
      }

      if (pathname === '/submit_report' && method === 'POST') {
        await this.handleFormSubmission(req, res);
        return;
      }

      if (pathname === '/history' && method === 'GET') {
        this.sendHtml(res, 200, renderHistoryPage(this.store.list('asc')));
        return;
      }

      if (pathname === '/api/reports') {
        if (method === 'GET') {
          this.handleListReports(url, res);
          return;
        }
        if (method === 'POST') {
          await this.handleApiSubmission(req, res);
          return;
        }
      }

      if (pathname.startsWith('/api/reports/') && method === 'GET') {
        this.handleGetReport(pathname.slice('/api/reports/'.length), res);
        return;
      }

      if (pathname.startsWith('/screenshots/') && method === 'GET') {
        await this.serveScreenshot(pathname.slice('/screenshots/'.length), res);
        return;
      }

      this.send404(res);
    } catch (error) {
      if (error instanceof HttpError) {
        this.sendJson(res, error.status, { error: error.message });
        return;
      }
      this.sendError(res, error);
    }
  }

  private serveIndex(req: IncomingMessage, res: ServerResponse): void {
    const token = readCookie(req, FLASH_COOKIE);
    const flashes = token ? this.flashes.consume(token) : [];
    this.sendHtml(res, 200, renderIndexPage(this.store.recent(this.recentLimit), flashes));
  }

  private async handleFormSubmission(req: IncomingMessage, res: ServerResponse): Promise<void> {
    let body: string;
    try {
      body = await this.readBody(req);
    } catch (error) {
      if (!(error instanceof HttpError)) throw error;
      this.redirectWithFlashes(req, res, [{ category: 'danger', message: MESSAGES.tooLarge }]);
      return;
    }

    const form = new URLSearchParams(body);
    const result = await this.pipeline.run({
      video_url: form.get('video_url') ?? '',
      report_category: form.get('report_category') ?? '',
      report_details: form.get('report_details') ?? '',
    });

    this.redirectWithFlashes(req, res, flashesFor(result));
  }

  private redirectWithFlashes(req: IncomingMessage, res: ServerResponse, messages: FlashMessage[]): void {
    let token = readCookie(req, FLASH_COOKIE);
    if (!token) {
      token = randomBytes(16).toString('hex');
      res.setHeader('Set-Cookie', `${FLASH_COOKIE}=${token}; Path=/; HttpOnly; SameSite=Lax`);
    }

    for (const message of messages) {
      this.flashes.push(token, message);
    }

    res.writeHead(303, { Location: '/' });
    res.end();
  }

  private handleListReports(url: URL, res: ServerResponse): void {
    const order = url.searchParams.get('order') ?? 'desc';
    if (order !== 'asc' && order !== 'desc') {
      throw new HttpError(400, 'order must be "asc" or "desc"');
    }
    this.sendJson(res, 200, this.store.list(order));
  }

  private handleGetReport(rawId: string, res: ServerResponse): void {
    const id = /^\d+$/.test(rawId) ? Number(rawId) : NaN;
    const report = Number.isSafeInteger(id) ? this.store.get(id) : undefined;

    if (!report) {
      throw new HttpError(404, 'Report not found');
    }
    this.sendJson(res, 200, report);
  }

  private async handleApiSubmission(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = parseJsonObject(await this.readBody(req));
    const result = await this.pipeline.run({
      video_url: body.video_url,
      report_category: body.report_category,
      report_details: body.report_details,
    });

    switch (result.status) {
      case 'rejected':
        this.sendJson(res, 400, { status: result.status, fieldErrors: result.fieldErrors });
        return;
      case 'succeeded':
        this.sendJson(res, 201, { status: result.status, report: result.report });
        return;
      case 'failed':
        this.sendJson(res, 500, { status: result.status, error: MESSAGES.storageFailed });
        return;
    }
  }

  private async serveScreenshot(fileName: string, res: ServerResponse): Promise<void> {
    if (!SCREENSHOT_NAME.test(fileName)) {
      this.send404(res);
      return;
    }

    let content: Buffer;
    try {
      content = await readFile(join(this.screenshotsDir, fileName));
    } catch {
      this.send404(res);
      return;
    }

    res.writeHead(200, { 'Content-Type': 'image/png' });
    res.end(content);
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private async readBody(req: IncomingMessage): Promise<string> {
    const chunks: Buffer[] = [];
    let size = 0;

    // Read to the end even past the limit, so the response can still be delivered
    for await (const chunk of req) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      size += buffer.length;
      if (size <= this.maxBodyBytes) {
        chunks.push(buffer);
      }
    }

    if (size > this.maxBodyBytes) {
      throw new HttpError(413, 'Request body too large');
    }
    return Buffer.concat(chunks).toString('utf-8');
  }

  private sendHtml(res: ServerResponse, status: number, html: string): void {
    res.writeHead(status, { 'Content-Type': 'text/html; charset=utf-8' });
    res.end(html);
  }

  private sendJson(res: ServerResponse, status: number, data: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data, null, 2));
  }

  private send404(res: ServerResponse): void {
    this.sendHtml(res, 404, renderNotFoundPage());
  }

  private sendError(res: ServerResponse, error: unknown): void {
    console.error('[Server] Error:', error);
    if (res.headersSent) {
      res.end();
      return;
    }
    res.writeHead(500, { 'Content-Type': 'text/plain' });
    res.end('Internal Server Error');
  }
}

// ============================================================================
// Request Parsing
// ============================================================================

function isAddressInfo(address: string | AddressInfo | null | undefined): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}

/**
 * Request target as a URL, or null when it cannot be parsed (e.g. `//`)
 */
function parseRequestUrl(req: IncomingMessage): URL | null {
  try {
    return new URL(req.url || '/', 'http://localhost');
  } catch {
    return null;
  }
}

export function readCookie(req: IncomingMessage, name: string): string | undefined {
  const header = req.headers.cookie;
  if (!header) return undefined;

  for (const part of header.split(';')) {
    const [key, ...rest] = part.trim().split('=');
    if (key === name) {
      const value = rest.join('=');
      return /^[a-f0-9]{32}$/.test(value) ? value : undefined;
    }
  }
  return undefined;
}

function parseJsonObject(body: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new HttpError(400, 'Request body must be valid JSON');
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new HttpError(400, 'Request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Turn a pipeline result into the notifications shown on the next page view
 */
export function flashesFor(result: PipelineResult): FlashMessage[] {
  switch (result.status) {
    case 'rejected':
      return Object.values(result.fieldErrors)
        .filter((message): message is string => typeof message === 'string')
        .map((message): FlashMessage => ({ category: 'danger', message }));
    case 'succeeded':
      return [{ category: 'success', message: MESSAGES.submitted }];
    case 'failed':
      return [{ category: 'danger', message: MESSAGES.storageFailed }];
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createReportServer(
  pipeline: SubmissionRunner,
  store: ReportReader,
  config?: ReportServerConfig
): ReportServer {
  return new ReportServer(pipeline, store, config);
}
