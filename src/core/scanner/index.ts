/**
 * Scanner module - Repository style scan
 *
 * This module provides:
 * - Scanner: walks a tree and aggregates detector hits
 * - walkFiles: sorted, symlink-safe file enumeration
 * - HitTable / matchContent: per-file matching and capped aggregation
 */

export { Scanner, createScanner } from "./scanner.js";

export { walkFiles, comparePaths, isEligible } from "./walker.js";
export type { WalkOptions, WalkedFile, WalkResult } from "./walker.js";

export { HitTable, matchContent, splitLines, toSnippet } from "./aggregate.js";
export type { FileMatches } from "./aggregate.js";

export type {
  ScannerOptions,
  ScanReport,
  Match,
  Hit,
  AntiPatternHit,
  FileStats,
} from "./types.js";

export {
  DEFAULT_EXTENSIONS,
  DEFAULT_EXAMPLE_CAP,
  DEFAULT_SNIPPET_LENGTH,
} from "./types.js";
