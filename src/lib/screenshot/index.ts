/**
 * Screenshot Module
 *
 * Provides:
 * - The Capturer interface the pipeline depends on
 * - Playwright-based capture in a fresh headless browser per call
 * - Bounded capture time with guaranteed browser teardown
 */

export {
  ScreenshotCapturer,
  createScreenshotCapturer,
  DEFAULT_CAPTURE_OPTIONS,
  BROWSER_ARGS,
  type Capturer,
  type CaptureOptions,
  type CaptureResult,
  type CaptureSuccess,
  type CaptureFailure,
  type Viewport,
  type WaitUntil,
  type BrowserLauncher,
  type CaptureBrowser,
  type CaptureContext,
  type CapturePage,
} from './capture.js';
