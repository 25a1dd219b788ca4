/**
 * Scan command - Write a style-pattern report for a repository
 */

import ora from "ora";

import { deriveRecommendations } from "../../catalog/recommendations.js";
import { loadCatalog } from "../../catalog/loader.js";
import { createScanner } from "../../core/index.js";
import { logger } from "../../lib/index.js";
import { renderReport } from "../../report/renderer.js";
import { writeReport } from "../../report/writer.js";
import { resolveScanConfig } from "../config.js";
import { formatError } from "../formatters.js";

import type { Command } from "commander";
import type { Ora } from "ora";
import type { ConfigContext } from "../config.js";

export interface RunScanContext extends Partial<ConfigContext> {
  /** Show a progress spinner on stderr */
  progress?: boolean;
}

/**
 * Run a scan from raw command options.
 *
 * @returns Process exit code: 0 when the report was written, 1 otherwise
 */
export async function runScan(options: unknown, context: RunScanContext = {}): Promise<number> {
  const configResult = resolveScanConfig(options, context);
  if (!configResult.success) {
    logger.error(formatError(configResult.error));
    return 1;
  }
  const config = configResult.data;

  const spinner: Ora | null = context.progress === true ? ora("Loading catalog...").start() : null;
  const fail = (error: Error, text: string): number => {
    spinner?.fail(text);
    logger.error(formatError(error));
    return 1;
  };

  logger.debug(`Loading catalog from: ${config.catalogPath ?? "built-in"}`);
  const catalog = await loadCatalog(config.catalogPath);
  if (!catalog.success) {
    return fail(catalog.error, "Failed to load catalog");
  }

  if (spinner) {
    spinner.text = `Scanning ${config.root}...`;
  }

  const scanner = createScanner(catalog.data);
  const scanResult = await scanner.scan(config.root, {
    ...(config.extensions !== undefined ? { includeExtensions: config.extensions } : {}),
    excludeDirs: config.excludeDirs,
    exampleCap: config.exampleCap,
    snippetLength: config.snippetLength,
    followSymlinks: config.followSymlinks,
  });
  if (!scanResult.success) {
    return fail(scanResult.error, "Scan failed");
  }

  const report = scanResult.data;
  const recommendations = deriveRecommendations(report.hits);
  const content = renderReport(report, catalog.data, recommendations, config.format);

  const written = await writeReport(config.out, content);
  if (!written.success) {
    return fail(written.error, "Failed to write report");
  }

  spinner?.stop();
  logger.info(`Wrote ${written.data}`);
  return 0;
}

export function registerScanCommand(program: Command): void {
  program
    .command("scan")
    .description("Scan a repository for style patterns and write a Markdown report")
    .option("--root <path>", "Directory to scan", ".")
    .option("--out <path>", "Report path (default: $OUT or ./tmp/scan-<timestamp>.md)")
    .option("-f, --format <format>", "Report format: markdown, json", "markdown")
    .option("--catalog <file>", "Pattern catalog file (default: built-in catalog)")
    .option("--example-cap <n>", "Maximum examples listed per detector or anti-pattern")
    .option("--snippet-length <n>", "Maximum snippet length in characters")
    .option("--extensions <list>", "File extensions to scan (comma-separated)")
    .option("--exclude <dirs>", "Directory names to skip (comma-separated)")
    .option("--no-follow-symlinks", "Do not follow symbolic links")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action(async (options: Record<string, unknown>) => {
      const isQuiet = Boolean(options["quiet"]);
      const isVerbose = Boolean(options["verbose"]);

      if (isQuiet) {
        logger.configure({ level: "error" });
      } else if (isVerbose) {
        logger.configure({ level: "debug" });
      }

      process.exitCode = await runScan(options, { progress: !isQuiet && process.stderr.isTTY });
    });
}
