/**
 * Detect command - Report the primary language of a project
 */

import { resolve } from "path";

import chalk from "chalk";

import { detectProjectLanguage, getProjectLanguageLabel } from "../../core/index.js";
import { logger } from "../../lib/index.js";
import { formatError } from "../formatters.js";

import type { Command } from "commander";

/**
 * Detect and print a project's language
 *
 * @returns Process exit code; an undetected language is not an error
 */
export async function runDetect(targetPath: string | undefined): Promise<number> {
  const root = resolve(targetPath ?? process.cwd());

  const result = await detectProjectLanguage(root);
  if (!result.success) {
    logger.error(formatError(result.error));
    return 1;
  }

  const { language, evidence } = result.data;
  logger.info(getProjectLanguageLabel(language));
  for (const file of evidence) {
    logger.info(chalk.gray(`  ${file}`));
  }
  return 0;
}

export function registerDetectCommand(program: Command): void {
  program
    .command("detect [path]")
    .description("Detect whether a project is Java or JavaScript/TypeScript")
    .action(async (targetPath: string | undefined) => {
      process.exitCode = await runDetect(targetPath);
    });
}
