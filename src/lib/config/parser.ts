/**
 * Configuration Parser
 *
 * Parse .vidreport.yml (or .json) config files. Every setting has a default,
 * so an empty or missing file yields a complete configuration. A handful of
 * environment variables override the file for container deployments.
 */

import { readFile, access } from 'fs/promises';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { CaptureOptions } from '../screenshot/index.js';
import type { PipelineOptions } from '../pipeline/index.js';

// ============================================================================
// Schemas
// ============================================================================

const ViewportSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

const ServerSchema = z
  .object({
    host: z.string().min(1).default('localhost'),
    port: z.number().int().min(0).max(65535).default(7860),
    recent_limit: z.number().int().min(0).default(5),
  })
  .default({});

const CaptureSchema = z
  .object({
    timeout_ms: z.number().int().positive().default(15000),
    close_timeout_ms: z.number().int().min(0).default(5000),
    grace_ms: z.number().int().min(0).default(2000),
    wait_until: z.enum(['load', 'domcontentloaded', 'networkidle']).default('load'),
    wait_after_load_ms: z.number().int().min(0).default(1000),
    full_page: z.boolean().default(false),
    viewport: ViewportSchema.default({ width: 1920, height: 1080 }),
    user_agent: z.string().optional(),
  })
  .default({});

export const VidReportConfigSchema = z.object({
  data_dir: z.string().min(1).default('./.vidreport-data'),
  server: ServerSchema,
  capture: CaptureSchema,
});

// ============================================================================
// Types
// ============================================================================

export type VidReportConfig = z.infer<typeof VidReportConfigSchema>;
export type ServerConfig = VidReportConfig['server'];
export type CaptureConfig = VidReportConfig['capture'];

export const CONFIG_FILENAMES = ['.vidreport.yml', '.vidreport.yaml', '.vidreport.json'];

// ============================================================================
// Default Config
// ============================================================================

export const DEFAULT_CONFIG: VidReportConfig = VidReportConfigSchema.parse({});

// ============================================================================
// Config Parser
// ============================================================================

export class ConfigParser {
  /**
   * Load and parse config from file
   */
  async loadFile(path: string): Promise<VidReportConfig> {
    const content = await readFile(path, 'utf-8');
    return this.parse(content, path);
  }

  /**
   * Parse config from string content
   */
  parse(content: string, filename: string = 'config'): VidReportConfig {
    let parsed: unknown;

    if (filename.endsWith('.json')) {
      parsed = JSON.parse(content);
    } else {
      parsed = parseYaml(content);
    }

    // An empty YAML document parses to null
    return this.validate(parsed ?? {});
  }

  /**
   * Validate config object, filling in defaults
   */
  validate(config: unknown): VidReportConfig {
    return VidReportConfigSchema.parse(config);
  }

  /**
   * Apply PORT, HOST, VIDREPORT_DATA_DIR and VIDREPORT_CAPTURE_TIMEOUT_MS
   */
  applyEnv(config: VidReportConfig, env: NodeJS.ProcessEnv = process.env): VidReportConfig {
    return this.validate({
      ...config,
      data_dir: env.VIDREPORT_DATA_DIR || config.data_dir,
      server: {
        ...config.server,
        host: env.HOST || config.server.host,
        port: env.PORT ? Number(env.PORT) : config.server.port,
      },
      capture: {
        ...config.capture,
        timeout_ms: env.VIDREPORT_CAPTURE_TIMEOUT_MS
          ? Number(env.VIDREPORT_CAPTURE_TIMEOUT_MS)
          : config.capture.timeout_ms,
      },
    });
  }

  /**
   * Directory the capturer writes screenshots into
   */
  getScreenshotsDir(config: VidReportConfig): string {
    return join(config.data_dir, 'screenshots');
  }

  /**
   * Convert config capture settings to capturer options
   */
  toCaptureOptions(config: VidReportConfig): CaptureOptions {
    const c = config.capture;
    return {
      viewport: c.viewport,
      timeout: c.timeout_ms,
      waitUntil: c.wait_until,
      waitAfterLoad: c.wait_after_load_ms,
      fullPage: c.full_page,
      userAgent: c.user_agent,
      closeTimeout: c.close_timeout_ms,
    };
  }

  /**
   * Convert config capture settings to pipeline options
   */
  toPipelineOptions(config: VidReportConfig): PipelineOptions {
    return {
      captureTimeoutMs: config.capture.timeout_ms,
      closeTimeoutMs: config.capture.close_timeout_ms,
      graceMs: config.capture.grace_ms,
      artifactPrefix: 'screenshots',
    };
  }

  /**
   * Generate example config
   */
  static generateExample(): string {
    return `# vidreport configuration

data_dir: ./.vidreport-data   # reports.json and screenshots/ live here

server:
  host: localhost
  port: 7860
  recent_limit: 5             # reports shown on the submission page

capture:
  timeout_ms: 15000           # launch + navigation + screenshot
  close_timeout_ms: 5000      # browser teardown
  grace_ms: 2000
  wait_until: load            # load | domcontentloaded | networkidle
  wait_after_load_ms: 1000
  full_page: false
  viewport:
    width: 1920
    height: 1080
`;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createConfigParser(): ConfigParser {
  return new ConfigParser();
}

/**
 * Load config from `path`, or from the first config file found in `cwd`,
 * falling back to defaults. Environment overrides are applied last.
 */
export async function loadConfig(
  path?: string,
  options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<VidReportConfig> {
  const parser = new ConfigParser();
  const env = options.env ?? process.env;

  if (path) {
    return parser.applyEnv(await parser.loadFile(path), env);
  }

  const cwd = options.cwd ?? process.cwd();
  for (const filename of CONFIG_FILENAMES) {
    const candidate = join(cwd, filename);
    try {
      await access(candidate);
    } catch {
      continue;
    }
    return parser.applyEnv(await parser.loadFile(candidate), env);
  }

  return parser.applyEnv(DEFAULT_CONFIG, env);
}
