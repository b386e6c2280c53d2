/**
 * In-process stand-ins for the browser and the capturer
 */

import { writeFile } from 'fs/promises';
import { join } from 'path';
import type {
  BrowserLauncher,
  CaptureBrowser,
  CaptureContext,
  CapturePage,
  CaptureResult,
  Capturer,
} from '../../src/lib/screenshot/index.js';
import { CaptureError } from '../../src/lib/errors/index.js';
import type { PageScreenshotOptions } from 'playwright';

// ============================================================================
// Capturers
// ============================================================================

/** Always succeeds with `<videoId-ish>_<n>.png`, writing nothing */
export class StaticCapturer implements Capturer {
  calls: string[] = [];

  constructor(private outputDir: string = './test-screenshots') {}

  async capture(videoUrl: string): Promise<CaptureResult> {
    this.calls.push(videoUrl);
    const fileName = `shot_${this.calls.length}.png`;
    return {
      ok: true,
      url: videoUrl,
      artifactPath: join(this.outputDir, fileName),
      fileName,
      capturedAt: new Date().toISOString(),
      loadTime: 1,
    };
  }
}

export class FailingCapturer implements Capturer {
  calls: string[] = [];

  constructor(private reason: string = 'net::ERR_NAME_NOT_RESOLVED') {}

  async capture(videoUrl: string): Promise<CaptureResult> {
    this.calls.push(videoUrl);
    return {
      ok: false,
      url: videoUrl,
      reason: this.reason,
      error: new CaptureError(videoUrl, this.reason),
    };
  }
}

export class ThrowingCapturer implements Capturer {
  async capture(): Promise<CaptureResult> {
    throw new Error('browser crashed');
  }
}

/** Never settles */
export class HangingCapturer implements Capturer {
  calls = 0;

  capture(): Promise<CaptureResult> {
    this.calls++;
    return new Promise<CaptureResult>(() => {});
  }
}

// ============================================================================
// Browser
// ============================================================================

export interface PageBehaviour {
  gotoError?: string;
  hangOnGoto?: boolean;
  launchDelayMs?: number;
  launchError?: string;
  closeDelayMs?: number;
}

export class FakePage implements CapturePage {
  visited: string[] = [];
  screenshots: PageScreenshotOptions[] = [];

  constructor(private behaviour: PageBehaviour) {}

  goto(url: string): Promise<unknown> {
    this.visited.push(url);
    if (this.behaviour.hangOnGoto) {
      return new Promise(() => {});
    }
    if (this.behaviour.gotoError) {
      return Promise.reject(new Error(this.behaviour.gotoError));
    }
    return Promise.resolve(null);
  }

  async waitForTimeout(): Promise<void> {}

  async screenshot(options: PageScreenshotOptions = {}): Promise<Buffer> {
    const image = Buffer.from('fake-png');
    this.screenshots.push(options);
    if (options.path) {
      await writeFile(options.path, image);
    }
    return image;
  }
}

export class FakeBrowser implements CaptureBrowser {
  closed = false;
  pages: FakePage[] = [];
  contextOptions: unknown[] = [];

  constructor(private behaviour: PageBehaviour) {}

  async newContext(options?: unknown): Promise<CaptureContext> {
    this.contextOptions.push(options);
    return {
      newPage: async () => {
        const page = new FakePage(this.behaviour);
        this.pages.push(page);
        return page;
      },
    };
  }

  async close(): Promise<void> {
    if (this.behaviour.closeDelayMs) {
      await sleep(this.behaviour.closeDelayMs);
    }
    this.closed = true;
  }
}

export class FakeLauncher implements BrowserLauncher {
  browsers: FakeBrowser[] = [];
  launchOptions: unknown[] = [];

  constructor(private behaviour: PageBehaviour = {}) {}

  async launch(options?: unknown): Promise<CaptureBrowser> {
    this.launchOptions.push(options);
    if (this.behaviour.launchError) {
      throw new Error(this.behaviour.launchError);
    }
    if (this.behaviour.launchDelayMs) {
      await sleep(this.behaviour.launchDelayMs);
    }
    const browser = new FakeBrowser(this.behaviour);
    this.browsers.push(browser);
    return browser;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
