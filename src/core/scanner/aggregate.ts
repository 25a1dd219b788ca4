/**
 * Line matching and hit aggregation
 *
 * `matchContent` turns one file into a per-file delta; `HitTable` folds
 * deltas into capped hits. Neither touches the filesystem, so a parallel
 * scan would only need to serialize calls to `HitTable.add`.
 */

import type { Catalog } from "../../catalog/schema.js";
import type { AntiPatternHit, Hit, Match } from "./types.js";

/**
 * Matches found in a single file
 */
export interface FileMatches {
  filePath: string;
  lineCount: number;
  /** Detector key -> matches in line order (detectors without matches are absent) */
  detectors: Map<string, Match[]>;
  /** Anti-pattern id -> matches in line order */
  antiPatterns: Map<string, Match[]>;
}

/**
 * Split file content into lines. A trailing `\r` is dropped, and a final
 * newline does not start another line.
 */
export function splitLines(content: string): string[] {
  if (content.length === 0) {
    return [];
  }
  const lines = content.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

/**
 * Build the snippet shown in the report for a matching line
 */
export function toSnippet(line: string, snippetLength: number): string {
  const snippet = line.replace(/\t/g, "  ").slice(0, snippetLength);
  // A cut inside a surrogate pair leaves a lone high surrogate
  const last = snippet.charCodeAt(snippet.length - 1);
  return last >= 0xd800 && last <= 0xdbff ? snippet.slice(0, -1) : snippet;
}

/**
 * Run every detector and anti-pattern rule against each line of a file
 */
export function matchContent(
  filePath: string,
  content: string,
  catalog: Catalog,
  snippetLength: number
): FileMatches {
  const lines = splitLines(content);
  const detectors = new Map<string, Match[]>();
  const antiPatterns = new Map<string, Match[]>();

  const record = (target: Map<string, Match[]>, id: string, match: Match): void => {
    const existing = target.get(id);
    if (existing) {
      existing.push(match);
    } else {
      target.set(id, [match]);
    }
  };

  lines.forEach((text, index) => {
    let match: Match | undefined;
    const matchAt = (): Match => {
      if (match === undefined) {
        match = { filePath, line: index + 1, snippet: toSnippet(text, snippetLength) };
      }
      return match;
    };

    for (const detector of catalog.detectors) {
      if (detector.pattern.test(text)) {
        record(detectors, detector.key, matchAt());
      }
    }
    for (const rule of catalog.antiPatterns) {
      if (rule.pattern.test(text)) {
        record(antiPatterns, rule.id, matchAt());
      }
    }
  });

  return { filePath, lineCount: lines.length, detectors, antiPatterns };
}

/**
 * Accumulates per-file matches into the `key -> Hit` table.
 * Counts are exact; example lists stop growing at `exampleCap`.
 */
export class HitTable {
  readonly hits = new Map<string, Hit>();
  readonly antiPatterns = new Map<string, AntiPatternHit>();

  constructor(
    catalog: Catalog,
    private readonly exampleCap: number
  ) {
    for (const detector of catalog.detectors) {
      this.hits.set(detector.key, { key: detector.key, group: detector.group, count: 0, examples: [] });
    }
    for (const rule of catalog.antiPatterns) {
      this.antiPatterns.set(rule.id, { rule, count: 0, matches: [] });
    }
  }

  /**
   * Merge one file's matches. Files must be added in traversal order.
   */
  add(file: FileMatches): void {
    for (const [key, matches] of file.detectors) {
      const hit = this.hits.get(key);
      if (hit) {
        hit.count += matches.length;
        this.fill(hit.examples, matches);
      }
    }
    for (const [id, matches] of file.antiPatterns) {
      const hit = this.antiPatterns.get(id);
      if (hit) {
        hit.count += matches.length;
        this.fill(hit.matches, matches);
      }
    }
  }

  private fill(target: Match[], matches: Match[]): void {
    const room = this.exampleCap - target.length;
    if (room > 0) {
      target.push(...matches.slice(0, room));
    }
  }
}
