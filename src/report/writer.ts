/**
 * Report writer
 *
 * Writes the fully rendered report in one step. The content goes to a
 * sibling temp file first and is renamed into place, so a failed write
 * never leaves a partial report at the output path.
 */

import { mkdir, rename, rm, writeFile } from "fs/promises";
import { basename, dirname, join, resolve } from "path";

import { OutputWriteError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { ok, err, tryCatchAsync } from "../lib/result.js";

import type { Result } from "../lib/result.js";

const log = logger.child("Writer");

/**
 * Write a report, creating parent directories as needed.
 *
 * @returns The absolute path written
 */
export async function writeReport(
  outputPath: string,
  content: string
): Promise<Result<string, OutputWriteError>> {
  const target = resolve(outputPath);
  const directory = dirname(target);
  const tempPath = join(directory, `.${basename(target)}.${process.pid}.tmp`);

  const created = await tryCatchAsync(() => mkdir(directory, { recursive: true }));
  if (!created.success) {
    return err(new OutputWriteError(
      `Cannot create output directory ${directory}: ${created.error.message}`,
      target
    ));
  }

  const written = await tryCatchAsync(async () => {
    await writeFile(tempPath, content, "utf-8");
    await rename(tempPath, target);
  });

  if (!written.success) {
    const cleanup = await tryCatchAsync(() => rm(tempPath, { force: true }));
    if (!cleanup.success) {
      log.debug(`Could not remove ${tempPath}: ${cleanup.error.message}`);
    }
    return err(new OutputWriteError(
      `Cannot write report to ${target}: ${written.error.message}`,
      target
    ));
  }

  return ok(target);
}
