/**
 * Scanner - Repository style scan orchestrator
 *
 * Walks the target directory, runs every detector and anti-pattern rule of
 * a catalog against each eligible file, and aggregates the matches into a
 * ScanReport.
 *
 * @example
 * ```typescript
 * const catalog = unwrap(await loadCatalog());
 * const scanner = new Scanner(catalog);
 *
 * const result = await scanner.scan('/path/to/service', { exampleCap: 20 });
 * if (result.success) {
 *   console.log(`di_field: ${result.data.hits.get('di_field')?.count}`);
 * }
 * ```
 */

import { readFile, stat } from "fs/promises";

import { FileReadError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import { ok, err, tryCatchAsync } from "../../lib/result.js";

import { HitTable, matchContent } from "./aggregate.js";
import {
  DEFAULT_EXAMPLE_CAP,
  DEFAULT_EXTENSIONS,
  DEFAULT_SNIPPET_LENGTH,
} from "./types.js";
import { walkFiles } from "./walker.js";

import type { Catalog } from "../../catalog/schema.js";
import type { FilesystemError } from "../../lib/errors.js";
import type { Result } from "../../lib/result.js";
import type { FileStats, ScannerOptions, ScanReport } from "./types.js";
import type { WalkedFile } from "./walker.js";

/**
 * Default scanner options. Extensions come from the catalog when it names any.
 */
const DEFAULT_OPTIONS: Required<Omit<ScannerOptions, "includeExtensions">> = {
  excludeDirs: [],
  exampleCap: DEFAULT_EXAMPLE_CAP,
  snippetLength: DEFAULT_SNIPPET_LENGTH,
  maxFileSize: 10 * 1024 * 1024, // 10MB
  followSymlinks: true,
  now: () => new Date(),
};

const log = logger.child("Scanner");

/**
 * Scanner class - orchestrates a single scan
 */
export class Scanner {
  private readonly catalog: Catalog;

  constructor(catalog: Catalog) {
    this.catalog = catalog;
  }

  /**
   * Scan a directory tree
   *
   * @param root Directory to scan
   * @param options Scan options
   * @returns Scan report, or a FilesystemError when the root is unusable
   */
  async scan(
    root: string,
    options: ScannerOptions = {}
  ): Promise<Result<ScanReport, FilesystemError>> {
    const opts = this.mergeOptions(options);
    const startedAt = opts.now();

    log.debug(`Starting scan of ${root}`);

    const walk = await walkFiles(root, {
      includeExtensions: opts.includeExtensions,
      excludeDirs: opts.excludeDirs,
      followSymlinks: opts.followSymlinks,
    });
    if (!walk.success) {
      return err(walk.error);
    }

    const { files, problems } = walk.data;
    log.debug(`Found ${files.length} eligible files`);

    const warnings: string[] = [];
    const fileStats: FileStats = { filesScanned: 0, filesSkipped: 0, linesScanned: 0 };
    const table = new HitTable(this.catalog, opts.exampleCap);

    for (const problem of problems) {
      this.warn(warnings, problem);
      fileStats.filesSkipped++;
    }

    for (const file of files) {
      const content = await this.readEligibleFile(file, opts.maxFileSize);
      if (!content.success) {
        this.warn(warnings, content.error);
        fileStats.filesSkipped++;
        continue;
      }

      const matches = matchContent(file.relativePath, content.data, this.catalog, opts.snippetLength);
      table.add(matches);
      fileStats.filesScanned++;
      fileStats.linesScanned += matches.lineCount;
    }

    const completedAt = opts.now();
    const durationMs = completedAt.getTime() - startedAt.getTime();

    log.debug(`Scan complete: ${fileStats.filesScanned} files in ${durationMs}ms`);

    return ok({
      root: walk.data.root,
      startedAt,
      completedAt,
      durationMs,
      hits: table.hits,
      antiPatterns: table.antiPatterns,
      fileStats,
      warnings,
    });
  }

  /**
   * Get the catalog this scanner runs
   */
  getCatalog(): Catalog {
    return this.catalog;
  }

  // ============================================================
  // Private methods
  // ============================================================

  /**
   * Merge user options with defaults
   */
  private mergeOptions(options: ScannerOptions): Required<ScannerOptions> {
    const extensions = options.includeExtensions ?? this.catalog.extensions ?? DEFAULT_EXTENSIONS;

    return {
      includeExtensions: extensions.map((ext) => ext.toLowerCase()),
      excludeDirs: options.excludeDirs ?? DEFAULT_OPTIONS.excludeDirs,
      exampleCap: options.exampleCap ?? DEFAULT_OPTIONS.exampleCap,
      snippetLength: options.snippetLength ?? DEFAULT_OPTIONS.snippetLength,
      maxFileSize: options.maxFileSize ?? DEFAULT_OPTIONS.maxFileSize,
      followSymlinks: options.followSymlinks ?? DEFAULT_OPTIONS.followSymlinks,
      now: options.now ?? DEFAULT_OPTIONS.now,
    };
  }

  /**
   * Read a file found by the walk. Any failure is recoverable.
   */
  private async readEligibleFile(
    file: WalkedFile,
    maxFileSize: number
  ): Promise<Result<string, FileReadError>> {
    const fileStat = await tryCatchAsync(() => stat(file.absolutePath));
    if (!fileStat.success) {
      return err(new FileReadError(`Cannot read ${file.relativePath}: ${fileStat.error.message}`, file.relativePath));
    }
    if (fileStat.data.size > maxFileSize) {
      return err(new FileReadError(
        `Skipping ${file.relativePath}: exceeds maximum size (${fileStat.data.size} > ${maxFileSize})`,
        file.relativePath,
        { size: fileStat.data.size, maxFileSize }
      ));
    }

    const content = await tryCatchAsync(() => readFile(file.absolutePath, "utf-8"));
    if (!content.success) {
      return err(new FileReadError(`Cannot read ${file.relativePath}: ${content.error.message}`, file.relativePath));
    }

    return ok(content.data);
  }

  private warn(warnings: string[], problem: FileReadError): void {
    warnings.push(problem.message);
    log.warn(problem.message);
  }
}

/**
 * Create a new Scanner instance
 */
export function createScanner(catalog: Catalog): Scanner {
  return new Scanner(catalog);
}
