import chalk from "chalk";

import type { Catalog, Detector } from "../catalog/schema.js";

/**
 * Output format types for the list command
 */
export type OutputFormat = "terminal" | "json" | "markdown";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["terminal", "json", "markdown"];

function detectorsInGroup(catalog: Catalog, group: string): Detector[] {
  return catalog.detectors.filter((detector) => detector.group === group);
}

/**
 * Format a catalog for terminal output with colors
 */
export function formatTerminal(catalog: Catalog): string {
  const lines: string[] = [];

  lines.push(chalk.bold.underline(`${catalog.title}`));
  lines.push(chalk.gray(`Catalog: ${catalog.name}`));
  if (catalog.extensions !== undefined) {
    lines.push(chalk.gray(`Extensions: ${catalog.extensions.join(", ")}`));
  }

  for (const group of catalog.groups) {
    const detectors = detectorsInGroup(catalog, group);
    lines.push(chalk.cyan.bold(`\n${group} (${detectors.length})`));
    lines.push(chalk.gray("─".repeat(40)));

    for (const detector of detectors) {
      lines.push(`  ${chalk.white.bold(detector.key)} ${chalk.gray(`/${detector.pattern.source}/`)}`);
      if (detector.description !== undefined) {
        lines.push(chalk.gray(`     ${detector.description}`));
      }
    }
  }

  if (catalog.antiPatterns.length > 0) {
    lines.push(chalk.yellow.bold(`\nAnti-patterns (${catalog.antiPatterns.length})`));
    lines.push(chalk.gray("─".repeat(40)));
    for (const rule of catalog.antiPatterns) {
      lines.push(`  ${chalk.white.bold(rule.id)} ${chalk.gray(`/${rule.pattern.source}/`)}`);
      lines.push(chalk.gray(`     ${rule.note}`));
    }
  }

  lines.push(chalk.gray("─".repeat(40)));
  lines.push(formatStats(catalog));

  return lines.join("\n");
}

/**
 * Format catalog totals
 */
function formatStats(catalog: Catalog): string {
  return [
    chalk.cyan(`${catalog.groups.length} groups`),
    chalk.white(`${catalog.detectors.length} detectors`),
    chalk.yellow(`${catalog.antiPatterns.length} anti-patterns`),
  ].join(chalk.gray(" | "));
}

/**
 * Format a catalog as JSON. Patterns are written as their source text.
 */
export function formatJson(catalog: Catalog): string {
  return JSON.stringify(
    {
      name: catalog.name,
      title: catalog.title,
      extensions: catalog.extensions ?? null,
      groups: catalog.groups.map((group) => ({
        name: group,
        detectors: detectorsInGroup(catalog, group).map((detector) => ({
          key: detector.key,
          pattern: detector.pattern.source,
        })),
      })),
      antiPatterns: catalog.antiPatterns.map((rule) => ({
        id: rule.id,
        pattern: rule.pattern.source,
        note: rule.note,
      })),
      topics: catalog.topics,
    },
    null,
    2
  );
}

/**
 * Format a catalog as Markdown
 */
export function formatMarkdown(catalog: Catalog): string {
  const lines: string[] = [];

  lines.push(`# ${catalog.title}\n`);

  for (const group of catalog.groups) {
    lines.push(`## ${group}\n`);
    for (const detector of detectorsInGroup(catalog, group)) {
      lines.push(`- **${detector.key}**: \`${detector.pattern.source}\``);
    }
    lines.push("");
  }

  if (catalog.antiPatterns.length > 0) {
    lines.push("## Anti-patterns\n");
    for (const rule of catalog.antiPatterns) {
      lines.push(`- **${rule.id}**: \`${rule.pattern.source}\` (${rule.note})`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

/**
 * Format a catalog in the specified output format
 */
export function formatCatalog(catalog: Catalog, format: OutputFormat): string {
  switch (format) {
    case "json":
      return formatJson(catalog);
    case "markdown":
      return formatMarkdown(catalog);
    case "terminal":
    default:
      return formatTerminal(catalog);
  }
}

/**
 * Validate output format string
 */
export function isValidOutputFormat(format: string): format is OutputFormat {
  return OUTPUT_FORMATS.some((candidate) => candidate === format);
}

/**
 * Format an error as a one-line diagnostic
 */
export function formatError(error: Error): string {
  return `Error: ${error.message}`;
}
