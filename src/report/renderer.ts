/**
 * Report renderer
 *
 * Turns a ScanReport into the Markdown report (or a JSON equivalent).
 * The section headers are stable; other tools grep for them.
 */

import type { Catalog } from "../catalog/schema.js";
import type { Hit, Match, ScanReport } from "../core/scanner/types.js";

/**
 * Supported report formats
 */
export type ReportFormat = "markdown" | "json";

const REPORT_FORMATS: readonly ReportFormat[] = ["markdown", "json"];

/**
 * Groups with at least one hit, in catalog order
 */
export function detectedGroups(report: ScanReport, catalog: Catalog): string[] {
  return catalog.groups.filter((group) => hitsInGroup(report, group).some((hit) => hit.count > 0));
}

function hitsInGroup(report: ScanReport, group: string): Hit[] {
  return [...report.hits.values()].filter((hit) => hit.group === group);
}

function formatLocation(match: Match): string {
  return `\`${match.filePath}:${match.line}\``;
}

/**
 * Format a detector example line
 */
export function formatExample(match: Match): string {
  return `- ${formatLocation(match)} — ${match.snippet}`;
}

/**
 * Format an anti-pattern occurrence line
 */
export function formatAntiPatternMatch(match: Match, note: string): string {
  return `- ${formatLocation(match)} — ${match.snippet}  <-- ${note}`;
}

/**
 * Render the Markdown report
 */
export function renderMarkdown(
  report: ScanReport,
  catalog: Catalog,
  recommendations: readonly string[]
): string {
  const lines: string[] = [];

  // Header
  lines.push(`# ${catalog.title}`);
  lines.push(`_Root scanned: ${report.root}_`);
  lines.push(`_Generated: ${report.completedAt.toISOString()}_`);
  lines.push(`_Files scanned: ${report.fileStats.filesScanned}_`);
  lines.push("");

  // Summary
  const areas = detectedGroups(report, catalog);
  lines.push("## Summary");
  lines.push(`Detected areas: ${areas.length > 0 ? areas.join(", ") : "None"}`);
  lines.push("");

  lines.push("## Recommendations");
  if (recommendations.length > 0) {
    for (const recommendation of recommendations) {
      lines.push(`- ${recommendation}`);
    }
  } else {
    lines.push("_None._");
  }
  lines.push("");

  // Detailed findings, one subsection per group
  lines.push("## Detailed Findings");
  for (const group of catalog.groups) {
    lines.push(`### ${group}`);
    const present = hitsInGroup(report, group).filter((hit) => hit.count > 0);
    if (present.length === 0) {
      lines.push("_No matches._");
      lines.push("");
      continue;
    }
    for (const hit of present) {
      lines.push(`**${hit.key}** — ${hit.count} ${hit.count === 1 ? "hit" : "hits"}`);
      lines.push(...hit.examples.map(formatExample));
      lines.push("");
    }
  }

  lines.push("## Potential Anti-patterns");
  const antiPatterns = [...report.antiPatterns.values()].filter((hit) => hit.count > 0);
  if (antiPatterns.length > 0) {
    for (const hit of antiPatterns) {
      lines.push(...hit.matches.map((match) => formatAntiPatternMatch(match, hit.rule.note)));
    }
  } else {
    lines.push("_None detected._");
  }
  lines.push("");

  // Static appendix
  if (catalog.topics.length > 0) {
    lines.push("## Suggested Style Topics to Document");
    lines.push(...catalog.topics.map((topic) => `- ${topic}`));
    lines.push("");
  }

  return lines.join("\n");
}

/**
 * Render the report as JSON
 */
export function renderJson(
  report: ScanReport,
  catalog: Catalog,
  recommendations: readonly string[]
): string {
  const serializable = {
    catalog: catalog.name,
    root: report.root,
    startedAt: report.startedAt.toISOString(),
    completedAt: report.completedAt.toISOString(),
    durationMs: report.durationMs,
    fileStats: report.fileStats,
    detectedAreas: detectedGroups(report, catalog),
    recommendations,
    hits: [...report.hits.values()],
    antiPatterns: [...report.antiPatterns.values()].map((hit) => ({
      id: hit.rule.id,
      note: hit.rule.note,
      count: hit.count,
      matches: hit.matches,
    })),
    warnings: report.warnings,
  };

  return `${JSON.stringify(serializable, null, 2)}\n`;
}

/**
 * Render a report in the requested format
 */
export function renderReport(
  report: ScanReport,
  catalog: Catalog,
  recommendations: readonly string[],
  format: ReportFormat
): string {
  switch (format) {
    case "json":
      return renderJson(report, catalog, recommendations);
    case "markdown":
    default:
      return renderMarkdown(report, catalog, recommendations);
  }
}

/**
 * Validate report format string
 */
export function isValidReportFormat(format: string): format is ReportFormat {
  return REPORT_FORMATS.some((candidate) => candidate === format);
}
