/**
 * Wires config, store, capturer, pipeline and server into one application
 */

import { createConfigParser, type VidReportConfig } from './lib/config/index.js';
import { createReportStore, type ReportStore } from './lib/store/index.js';
import {
  createScreenshotCapturer,
  type BrowserLauncher,
  type Capturer,
} from './lib/screenshot/index.js';
import { createReportPipeline, type ReportPipeline } from './lib/pipeline/index.js';
import { createReportServer, type ReportServer } from './lib/server/index.js';

export interface ReportApp {
  config: VidReportConfig;
  store: ReportStore;
  capturer: Capturer;
  pipeline: ReportPipeline;
  server: ReportServer;
}

export interface ReportAppOverrides {
  /** Replaces the Playwright capturer entirely */
  capturer?: Capturer;
  /** Browser launcher for the default capturer */
  launcher?: BrowserLauncher;
}

export function createReportApp(
  config: VidReportConfig,
  overrides: ReportAppOverrides = {}
): ReportApp {
  const parser = createConfigParser();
  const screenshotsDir = parser.getScreenshotsDir(config);

  const store = createReportStore(config.data_dir);
  const capturer =
    overrides.capturer ??
    createScreenshotCapturer(screenshotsDir, parser.toCaptureOptions(config), overrides.launcher);
  const pipeline = createReportPipeline(capturer, store, parser.toPipelineOptions(config));
  const server = createReportServer(pipeline, store, {
    port: config.server.port,
    host: config.server.host,
    screenshotsDir,
    recentLimit: config.server.recent_limit,
  });

  return { config, store, capturer, pipeline, server };
}
