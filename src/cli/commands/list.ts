/**
 * List command - Show the detectors and anti-patterns of a catalog
 */

import { resolve } from "path";

import { loadCatalog } from "../../catalog/loader.js";
import { logger } from "../../lib/index.js";
import { formatCatalog, formatError, isValidOutputFormat } from "../formatters.js";

import type { Command } from "commander";

export interface ListOptions {
  catalog?: string;
  output?: string;
}

/**
 * Print a catalog in the requested format
 *
 * @returns Process exit code
 */
export async function runList(options: ListOptions): Promise<number> {
  const outputFormat = options.output ?? "terminal";
  if (!isValidOutputFormat(outputFormat)) {
    logger.error(formatError(new Error(`Invalid output format: ${outputFormat}. Use: terminal, json, markdown`)));
    return 1;
  }

  const catalog = await loadCatalog(options.catalog !== undefined ? resolve(options.catalog) : undefined);
  if (!catalog.success) {
    logger.error(formatError(catalog.error));
    return 1;
  }

  logger.info(formatCatalog(catalog.data, outputFormat));
  return 0;
}

export function registerListCommand(program: Command): void {
  program
    .command("list")
    .description("List the detectors and anti-patterns of a catalog")
    .option("--catalog <file>", "Pattern catalog file (default: built-in catalog)")
    .option("-o, --output <format>", "Output format: terminal, json, markdown", "terminal")
    .action(async (options: Record<string, unknown>) => {
      const catalog = options["catalog"];
      const output = options["output"];
      process.exitCode = await runList({
        ...(typeof catalog === "string" ? { catalog } : {}),
        ...(typeof output === "string" ? { output } : {}),
      });
    });
}
