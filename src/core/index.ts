/**
 * Core scan engine
 *
 * This module contains:
 * - scanner/   - File walk, line matching and hit aggregation
 * - detection/ - Project language detection
 */

export const VERSION = "0.3.0";

// Detection module
export {
  detectProjectLanguage,
  getProjectLanguageLabel,
  type ProjectLanguage,
  type ProjectLanguageResult,
} from "./detection/index.js";

// Scanner module
export {
  Scanner,
  createScanner,
  walkFiles,
  HitTable,
  matchContent,
  DEFAULT_EXTENSIONS,
  DEFAULT_EXAMPLE_CAP,
  DEFAULT_SNIPPET_LENGTH,
  type ScannerOptions,
  type ScanReport,
  type Match,
  type Hit,
  type AntiPatternHit,
  type FileStats,
} from "./scanner/index.js";
