/**
 * Stylescan command-line program
 *
 * Commands:
 * - scan   - Scan a repository and write a style report
 * - list   - List the detectors and anti-patterns of a catalog
 * - detect - Detect a project's primary language
 */

import { Command } from "commander";

import { VERSION } from "../core/index.js";

import { registerDetectCommand } from "./commands/detect.js";
import { registerListCommand } from "./commands/list.js";
import { registerScanCommand } from "./commands/scan.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("stylescan")
    .description("Repository style-pattern scanner")
    .version(VERSION);

  registerScanCommand(program);
  registerListCommand(program);
  registerDetectCommand(program);

  return program;
}
