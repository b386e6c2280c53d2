/**
 * Config Module
 *
 * Provides:
 * - YAML and JSON config parsing
 * - Zod-validated schemas with defaults for every setting
 * - Environment variable overrides
 * - Conversion to capturer and pipeline options
 */

export {
  ConfigParser,
  createConfigParser,
  loadConfig,
  DEFAULT_CONFIG,
  CONFIG_FILENAMES,
  VidReportConfigSchema,
  type VidReportConfig,
  type ServerConfig,
  type CaptureConfig,
} from './parser.js';
