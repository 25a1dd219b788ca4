/**
 * Stylescan - repository style-pattern scanner
 *
 * @packageDocumentation
 */

// Catalog
export {
  DetectorDefinitionSchema,
  DetectorGroupSchema,
  AntiPatternDefinitionSchema,
  CatalogDefinitionSchema,
  ExtensionSchema,
  loadCatalog,
  compileCatalog,
  getBuiltinCatalogPath,
  deriveRecommendations,
  RECOMMENDATION_RULES,
} from "./catalog/index.js";
export type {
  CatalogDefinition,
  Catalog,
  Detector,
  AntiPatternRule,
  RecommendationRule,
} from "./catalog/index.js";

// Core scan engine
export {
  VERSION,
  Scanner,
  createScanner,
  walkFiles,
  detectProjectLanguage,
  getProjectLanguageLabel,
  DEFAULT_EXTENSIONS,
  DEFAULT_EXAMPLE_CAP,
  DEFAULT_SNIPPET_LENGTH,
} from "./core/index.js";
export type {
  ScannerOptions,
  ScanReport,
  Match,
  Hit,
  AntiPatternHit,
  FileStats,
  ProjectLanguage,
  ProjectLanguageResult,
} from "./core/index.js";

// Report
export { renderMarkdown, renderJson, renderReport, writeReport } from "./report/index.js";
export type { ReportFormat } from "./report/index.js";

// Utilities
export {
  StylescanError,
  ValidationError,
  ConfigError,
  FilesystemError,
  FileReadError,
  OutputWriteError,
  ok,
  err,
  unwrap,
  logger,
} from "./lib/index.js";
export type { Result, LogLevel } from "./lib/index.js";
