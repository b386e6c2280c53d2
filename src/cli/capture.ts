#!/usr/bin/env node
/**
 * CLI: Screenshot Capture
 *
 * Runs the same single capture the pipeline performs for a submission,
 * without storing a report. Useful for checking the browser works in a
 * given container.
 *
 * Usage:
 *   vidreport-capture <url> [options]
 */

import { createScreenshotCapturer } from '../lib/screenshot/index.js';
import { loadConfig, createConfigParser } from '../lib/config/index.js';
import { extractVideoId } from '../lib/validation/index.js';

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    console.log(`
vidreport - Screenshot Capture

Usage:
  vidreport-capture <url> [options]

Arguments:
  url         The video page to capture

Options:
  --output    Output directory (default: <data_dir>/screenshots)
  --timeout   Capture timeout in ms (default: 15000)
  --config    Config file (default: .vidreport.yml in the working directory)
  --json      Print the capture result as JSON

Example:
  vidreport-capture https://youtu.be/dQw4w9WgXcQ --timeout 20000
`);
    process.exit(0);
  }

  const url = args[0];
  if (!url.startsWith('http://') && !url.startsWith('https://')) {
    console.error('❌ URL must start with http:// or https://');
    process.exit(1);
  }
  if (!extractVideoId(url)) {
    console.warn('⚠️ Not a recognized video URL; capturing anyway');
  }

  const parser = createConfigParser();
  const config = await loadConfig(
    args.includes('--config') ? args[args.indexOf('--config') + 1] : undefined
  );

  const outputDir = args.includes('--output')
    ? args[args.indexOf('--output') + 1]
    : parser.getScreenshotsDir(config);

  const timeout = args.includes('--timeout')
    ? parseInt(args[args.indexOf('--timeout') + 1], 10)
    : config.capture.timeout_ms;

  const jsonOutput = args.includes('--json');

  console.log('📸 vidreport - Screenshot Capture\n');
  console.log(`URL: ${url}`);
  console.log(`Output: ${outputDir}`);
  console.log(`Timeout: ${timeout}ms\n`);

  const capturer = createScreenshotCapturer(outputDir, {
    ...parser.toCaptureOptions(config),
    timeout,
  });
  const result = await capturer.capture(url);

  if (jsonOutput) {
    const printable = result.ok ? result : { ok: false, url: result.url, reason: result.reason };
    console.log(JSON.stringify(printable, null, 2));
  }

  if (!result.ok) {
    console.error(`\n❌ Capture failed: ${result.reason}`);
    process.exit(1);
  }

  console.log(`\n✅ Saved ${result.artifactPath} in ${(result.loadTime / 1000).toFixed(1)}s`);
}

main().catch((error) => {
  console.error('❌ Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
