/**
 * Screenshot Capture Module
 *
 * Uses Playwright to load a reported video page in a throwaway headless
 * Chromium and save a single PNG as evidence.
 *
 * Every call launches its own browser and closes it before returning,
 * whether the capture succeeded, failed or ran out of time.
 */

import { chromium } from 'playwright';
import type { BrowserContextOptions, LaunchOptions, PageScreenshotOptions } from 'playwright';
import { mkdir, access } from 'fs/promises';
import { join } from 'path';
import { createHash, randomBytes } from 'crypto';
import { CaptureError, describeError } from '../errors/index.js';
import { extractVideoId } from '../validation/index.js';
import { withDeadline } from '../utils/index.js';

// ============================================================================
// Types
// ============================================================================

export interface Viewport {
  width: number;
  height: number;
}

export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle';

export interface CaptureOptions {
  /** Browser viewport */
  viewport?: Viewport;
  /** Overall bound in ms for launch, navigation and screenshot */
  timeout?: number;
  /** Navigation event that counts as loaded */
  waitUntil?: WaitUntil;
  /** Settle time in ms after the page has loaded */
  waitAfterLoad?: number;
  /** Full page screenshot or viewport only */
  fullPage?: boolean;
  /** Custom user agent */
  userAgent?: string;
  /** Bound in ms on closing the browser, on top of `timeout` */
  closeTimeout?: number;
}

export interface CaptureSuccess {
  ok: true;
  url: string;
  /** Filesystem path of the written PNG */
  artifactPath: string;
  /** Bare file name inside the output directory */
  fileName: string;
  capturedAt: string;
  loadTime: number;
}

export interface CaptureFailure {
  ok: false;
  url: string;
  reason: string;
  error: CaptureError;
}

export type CaptureResult = CaptureSuccess | CaptureFailure;

/**
 * Anything that can turn a URL into an evidence image
 */
export interface Capturer {
  capture(videoUrl: string): Promise<CaptureResult>;
}

// The slice of Playwright the capturer drives; `chromium` satisfies it

export interface CapturePage {
  goto(url: string, options?: { timeout?: number; waitUntil?: WaitUntil }): Promise<unknown>;
  waitForTimeout(timeout: number): Promise<void>;
  screenshot(options?: PageScreenshotOptions): Promise<Buffer>;
}

export interface CaptureContext {
  newPage(): Promise<CapturePage>;
}

export interface CaptureBrowser {
  newContext(options?: BrowserContextOptions): Promise<CaptureContext>;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  launch(options?: LaunchOptions): Promise<CaptureBrowser>;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CAPTURE_OPTIONS: Required<CaptureOptions> = {
  viewport: { width: 1920, height: 1080 },
  timeout: 15000,
  waitUntil: 'load',
  waitAfterLoad: 1000,
  fullPage: false,
  userAgent: '',
  closeTimeout: 5000,
};

/** Flags for a headless browser in a container without a GPU or a large /dev/shm */
export const BROWSER_ARGS = ['--no-sandbox', '--disable-gpu', '--disable-dev-shm-usage'];

interface Session {
  browser: CaptureBrowser | null;
  released: boolean;
}

// ============================================================================
// Screenshot Capturer
// ============================================================================

export class ScreenshotCapturer implements Capturer {
  private outputDir: string;
  private options: Required<CaptureOptions>;
  private launcher: BrowserLauncher;

  constructor(
    outputDir: string = './.vidreport-data/screenshots',
    options: CaptureOptions = {},
    launcher: BrowserLauncher = chromium
  ) {
    this.outputDir = outputDir;
    this.launcher = launcher;
    this.options = {
      viewport: options.viewport || DEFAULT_CAPTURE_OPTIONS.viewport,
      timeout: options.timeout || DEFAULT_CAPTURE_OPTIONS.timeout,
      waitUntil: options.waitUntil || DEFAULT_CAPTURE_OPTIONS.waitUntil,
      waitAfterLoad: options.waitAfterLoad ?? DEFAULT_CAPTURE_OPTIONS.waitAfterLoad,
      fullPage: options.fullPage ?? DEFAULT_CAPTURE_OPTIONS.fullPage,
      userAgent: options.userAgent || DEFAULT_CAPTURE_OPTIONS.userAgent,
      closeTimeout: options.closeTimeout ?? DEFAULT_CAPTURE_OPTIONS.closeTimeout,
    };
  }

  /**
   * Capture a screenshot of a URL. Never throws; failures come back as
   * `{ ok: false, reason }`. Settles within `timeout + closeTimeout`.
   */
  async capture(videoUrl: string): Promise<CaptureResult> {
    const session: Session = { browser: null, released: false };
    const startTime = Date.now();

    try {
      const fileName = await withDeadline(
        this.captureInSession(videoUrl, session),
        this.options.timeout,
        'Screenshot capture'
      );
      const loadTime = Date.now() - startTime;

      console.log(`[Screenshot] ✓ ${videoUrl} captured in ${loadTime}ms`);

      return {
        ok: true,
        url: videoUrl,
        artifactPath: join(this.outputDir, fileName),
        fileName,
        capturedAt: new Date().toISOString(),
        loadTime,
      };
    } catch (error) {
      const reason = describeError(error);
      console.error(`[Screenshot] Capture failed for ${videoUrl}: ${reason}`);

      return {
        ok: false,
        url: videoUrl,
        reason,
        error: new CaptureError(videoUrl, reason, { cause: error }),
      };
    } finally {
      await this.release(session);
    }
  }

  private async captureInSession(url: string, session: Session): Promise<string> {
    await this.ensureOutputDir();

    console.log('[Screenshot] Launching browser...');
    const browser = await this.launcher.launch({ headless: true, args: BROWSER_ARGS });

    // The deadline may have passed while the browser was starting
    if (session.released) {
      await this.closeBrowser(browser);
      throw new CaptureError(url, 'Browser started after the capture was abandoned');
    }
    session.browser = browser;

    const context = await browser.newContext({
      viewport: this.options.viewport,
      userAgent: this.options.userAgent || undefined,
    });
    const page = await context.newPage();

    await page.goto(url, {
      timeout: this.options.timeout,
      waitUntil: this.options.waitUntil,
    });

    if (this.options.waitAfterLoad > 0) {
      await page.waitForTimeout(this.options.waitAfterLoad);
    }

    const fileName = this.generateFilename(url);
    await page.screenshot({
      path: join(this.outputDir, fileName),
      fullPage: this.options.fullPage,
      type: 'png',
    });

    return fileName;
  }

  private async release(session: Session): Promise<void> {
    session.released = true;
    const browser = session.browser;
    session.browser = null;

    if (browser) {
      await this.closeBrowser(browser);
    }
  }

  private async closeBrowser(browser: CaptureBrowser): Promise<void> {
    try {
      await withDeadline(browser.close(), this.options.closeTimeout, 'Browser close');
    } catch (error) {
      console.warn(`[Screenshot] Could not close browser: ${describeError(error)}`);
    }
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private async ensureOutputDir(): Promise<void> {
    try {
      await access(this.outputDir);
    } catch {
      await mkdir(this.outputDir, { recursive: true });
    }
  }

  private generateFilename(url: string): string {
    const stem = extractVideoId(url) ?? createHash('md5').update(url).digest('hex').slice(0, 8);
    const token = randomBytes(3).toString('hex');
    return `${stem}_${Date.now()}_${token}.png`;
  }

  /**
   * Get current options
   */
  getOptions(): Required<CaptureOptions> {
    return { ...this.options };
  }

  getOutputDir(): string {
    return this.outputDir;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createScreenshotCapturer(
  outputDir?: string,
  options?: CaptureOptions,
  launcher?: BrowserLauncher
): ScreenshotCapturer {
  return new ScreenshotCapturer(outputDir, options, launcher);
}
