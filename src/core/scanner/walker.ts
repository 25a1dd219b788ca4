/**
 * File walker
 *
 * Collects every eligible file under a root and returns them sorted by
 * relative path, so scan output does not depend on the order the
 * filesystem hands back directory entries.
 */

import { readdir, realpath, stat } from "fs/promises";
import type { Dirent } from "fs";
import { extname, join, resolve } from "path";

import { FileReadError, FilesystemError, errorMessage } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import { ok, err, tryCatchAsync } from "../../lib/result.js";

import type { Result } from "../../lib/result.js";

/**
 * Walk options
 */
export interface WalkOptions {
  /** Lower-case extensions with a leading dot */
  includeExtensions: readonly string[];
  /** Directory names to skip */
  excludeDirs: readonly string[];
  /** Follow symbolic links to files and directories */
  followSymlinks: boolean;
  /** Stop once this many files are collected */
  limit?: number;
}

/**
 * An eligible file found by the walk
 */
export interface WalkedFile {
  absolutePath: string;
  /** Relative to the root, `/`-separated */
  relativePath: string;
}

/**
 * Result of a walk
 */
export interface WalkResult {
  root: string;
  files: WalkedFile[];
  /** Entries that could not be inspected */
  problems: FileReadError[];
}

const log = logger.child("Walker");

/**
 * Compare two paths by UTF-16 code units, independent of locale
 */
export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Check a file name against the extension set
 */
export function isEligible(fileName: string, includeExtensions: readonly string[]): boolean {
  const ext = extname(fileName).toLowerCase();
  return ext.length > 0 && includeExtensions.includes(ext);
}

/**
 * Walk a directory tree and collect eligible files.
 * Fails only when the root itself is missing or unreadable.
 */
export async function walkFiles(
  root: string,
  options: WalkOptions
): Promise<Result<WalkResult, FilesystemError>> {
  const absoluteRoot = resolve(root);

  const rootStat = await tryCatchAsync(() => stat(absoluteRoot));
  if (!rootStat.success) {
    return err(new FilesystemError(`Directory not found: ${absoluteRoot}`, absoluteRoot, {
      cause: rootStat.error.message,
    }));
  }
  if (!rootStat.data.isDirectory()) {
    return err(new FilesystemError(`Not a directory: ${absoluteRoot}`, absoluteRoot));
  }

  const rootEntries = await tryCatchAsync(() => readEntries(absoluteRoot));
  if (!rootEntries.success) {
    return err(new FilesystemError(`Directory not readable: ${absoluteRoot}`, absoluteRoot, {
      cause: rootEntries.error.message,
    }));
  }

  const walker = new TreeWalker(options);
  await walker.markVisited(absoluteRoot);
  await walker.visitEntries(absoluteRoot, "", rootEntries.data);

  const files = walker.files.sort((a, b) => comparePaths(a.relativePath, b.relativePath));
  return ok({ root: absoluteRoot, files, problems: walker.problems });
}

function readEntries(dirPath: string): Promise<Dirent[]> {
  return readdir(dirPath, { withFileTypes: true });
}

/**
 * Recursive walk state
 */
class TreeWalker {
  readonly files: WalkedFile[] = [];
  readonly problems: FileReadError[] = [];
  private readonly visited = new Set<string>();

  constructor(private readonly options: WalkOptions) {}

  /**
   * Record a directory's real path. Returns false when it was already seen.
   */
  async markVisited(dirPath: string): Promise<boolean> {
    const real = await tryCatchAsync(() => realpath(dirPath));
    const key = real.success ? real.data : dirPath;
    if (this.visited.has(key)) {
      return false;
    }
    this.visited.add(key);
    return true;
  }

  async visitEntries(dirPath: string, relativeDir: string, entries: Dirent[]): Promise<void> {
    const ordered = [...entries].sort((a, b) => comparePaths(a.name, b.name));
    for (const entry of ordered) {
      if (this.isFull()) {
        return;
      }
      const name = entry.name;
      const fullPath = join(dirPath, name);
      const relativePath = relativeDir ? `${relativeDir}/${name}` : name;

      if (entry.isSymbolicLink()) {
        await this.visitSymlink(fullPath, relativePath, name);
      } else if (entry.isDirectory()) {
        await this.visitDirectory(fullPath, relativePath, name);
      } else if (entry.isFile() && isEligible(name, this.options.includeExtensions)) {
        this.files.push({ absolutePath: fullPath, relativePath });
      }
    }
  }

  private isFull(): boolean {
    return this.options.limit !== undefined && this.files.length >= this.options.limit;
  }

  private async visitDirectory(fullPath: string, relativePath: string, name: string): Promise<void> {
    if (this.options.excludeDirs.includes(name)) {
      log.debug(`Skipping excluded directory ${relativePath}`);
      return;
    }
    if (!(await this.markVisited(fullPath))) {
      log.debug(`Skipping already visited directory ${relativePath}`);
      return;
    }

    const entries = await tryCatchAsync(() => readEntries(fullPath));
    if (!entries.success) {
      this.problems.push(new FileReadError(
        `Cannot read directory ${relativePath}: ${entries.error.message}`,
        relativePath
      ));
      return;
    }

    await this.visitEntries(fullPath, relativePath, entries.data);
  }

  private async visitSymlink(fullPath: string, relativePath: string, name: string): Promise<void> {
    if (!this.options.followSymlinks) {
      return;
    }

    const target = await tryCatchAsync(() => stat(fullPath));
    if (!target.success) {
      // Broken links only matter when they look like something we would scan
      if (isEligible(name, this.options.includeExtensions)) {
        this.problems.push(new FileReadError(
          `Cannot read ${relativePath}: ${errorMessage(target.error)}`,
          relativePath
        ));
      }
      return;
    }

    if (target.data.isDirectory()) {
      await this.visitDirectory(fullPath, relativePath, name);
    } else if (target.data.isFile() && isEligible(name, this.options.includeExtensions)) {
      this.files.push({ absolutePath: fullPath, relativePath });
    }
  }
}
