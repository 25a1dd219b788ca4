/**
 * Scanner types
 *
 * Defines the data structures produced by a scan: per-line matches,
 * per-detector hits and the complete scan report.
 */

import type { AntiPatternRule } from "../../catalog/schema.js";

/**
 * Options for scanning a directory
 */
export interface ScannerOptions {
  /** File extensions to include, with a leading dot */
  includeExtensions?: string[];
  /** Directory names to skip anywhere in the tree */
  excludeDirs?: string[];
  /** Maximum examples kept per detector and per anti-pattern rule */
  exampleCap?: number;
  /** Maximum snippet length in characters */
  snippetLength?: number;
  /** Maximum file size to scan in bytes */
  maxFileSize?: number;
  /** Follow symbolic links (each real directory is visited once) */
  followSymlinks?: boolean;
  /** Clock used for report timestamps */
  now?: () => Date;
}

/**
 * A single matching line
 */
export interface Match {
  /** Path relative to the scanned root, `/`-separated */
  filePath: string;
  /** 1-based line number */
  line: number;
  /** The matching line, tabs expanded and truncated */
  snippet: string;
}

/**
 * Aggregate result for one detector across the whole scan.
 * `count` is the true total; only `examples` is capped.
 */
export interface Hit {
  key: string;
  group: string;
  count: number;
  examples: Match[];
}

/**
 * Aggregate result for one anti-pattern rule
 */
export interface AntiPatternHit {
  rule: AntiPatternRule;
  count: number;
  matches: Match[];
}

/**
 * File statistics from the scan
 */
export interface FileStats {
  /** Eligible files that were read and matched */
  filesScanned: number;
  /** Eligible files that could not be read or were too large */
  filesSkipped: number;
  /** Lines examined across all scanned files */
  linesScanned: number;
}

/**
 * Complete scan report. Built once by the scanner, read-only afterwards.
 */
export interface ScanReport {
  /** Absolute path of the scanned root */
  root: string;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
  /** Every catalog detector, in catalog order, zero counts included */
  hits: Map<string, Hit>;
  /** Every anti-pattern rule, in catalog order */
  antiPatterns: Map<string, AntiPatternHit>;
  fileStats: FileStats;
  /** Recoverable problems encountered during the walk */
  warnings: string[];
}

/**
 * Default extensions for Java/Kotlin service repositories
 */
export const DEFAULT_EXTENSIONS: readonly string[] = [
  ".java",
  ".kt",
  ".xml",
  ".yml",
  ".yaml",
  ".properties",
  ".gradle",
  ".kts",
  ".toml",
];

/**
 * Default examples kept per detector / anti-pattern rule
 */
export const DEFAULT_EXAMPLE_CAP = 50;

/**
 * Default snippet length
 */
export const DEFAULT_SNIPPET_LENGTH = 240;
