/**
 * Scan configuration
 *
 * Resolves command-line options, the environment and defaults into a
 * validated ScanConfig. Explicit options win over the environment.
 */

import { resolve } from "path";

import { z } from "zod";

import { ExtensionSchema } from "../catalog/schema.js";
import { DEFAULT_EXAMPLE_CAP, DEFAULT_SNIPPET_LENGTH } from "../core/scanner/types.js";
import { ValidationError } from "../lib/errors.js";
import { ok, err } from "../lib/result.js";

import type { ReportFormat } from "../report/renderer.js";
import type { Result } from "../lib/result.js";

/**
 * Environment variable that overrides the default output path
 */
export const OUTPUT_ENV_VAR = "OUT";

/**
 * Directory that receives timestamped reports by default
 */
export const DEFAULT_OUTPUT_DIR = "tmp";

/**
 * Comma-separated list option
 */
const CsvSchema = z
  .string()
  .transform((value) => value.split(",").map((item) => item.trim()).filter((item) => item.length > 0));

/**
 * Extensions may be given with or without the leading dot
 */
const ExtensionOptionSchema = z
  .string()
  .transform((ext) => (ext.startsWith(".") ? ext : `.${ext}`))
  .pipe(ExtensionSchema);

/**
 * Raw options as they arrive from the scan command
 */
export const ScanOptionsSchema = z.object({
  root: z.string().min(1).default("."),
  out: z.string().min(1).optional(),
  format: z.enum(["markdown", "json"]).default("markdown"),
  catalog: z.string().min(1).optional(),
  exampleCap: z.coerce.number().int().positive().default(DEFAULT_EXAMPLE_CAP),
  snippetLength: z.coerce.number().int().positive().default(DEFAULT_SNIPPET_LENGTH),
  extensions: CsvSchema.pipe(z.array(ExtensionOptionSchema).min(1)).optional(),
  exclude: CsvSchema.optional(),
  followSymlinks: z.boolean().default(true),
});

export type ScanOptionsInput = z.input<typeof ScanOptionsSchema>;

/**
 * Fully resolved scan configuration
 */
export interface ScanConfig {
  /** Absolute directory to scan */
  root: string;
  /** Absolute report path */
  out: string;
  format: ReportFormat;
  /** Catalog file; the built-in catalog when absent */
  catalogPath: string | undefined;
  exampleCap: number;
  snippetLength: number;
  /** Extension override; the catalog's list when absent */
  extensions: string[] | undefined;
  excludeDirs: string[];
  followSymlinks: boolean;
}

/**
 * Context used to resolve paths and defaults
 */
export interface ConfigContext {
  env: Record<string, string | undefined>;
  now: Date;
  cwd: string;
}

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

/**
 * Local timestamp in `YYYYMMDD_HHMMSS` form
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Default report path, relative to the working directory
 */
export function defaultOutputPath(now: Date, format: ReportFormat): string {
  const extension = format === "json" ? "json" : "md";
  return `${DEFAULT_OUTPUT_DIR}/scan-${formatTimestamp(now)}.${extension}`;
}

/**
 * `exampleCap` -> `--example-cap`
 */
function toFlag(key: string): string {
  return `--${key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}`;
}

/**
 * Validate raw options and resolve them into a ScanConfig
 */
export function resolveScanConfig(
  options: unknown,
  context: Partial<ConfigContext> = {}
): Result<ScanConfig, ValidationError> {
  const env = context.env ?? process.env;
  const now = context.now ?? new Date();
  const cwd = context.cwd ?? process.cwd();

  const parsed = ScanOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path[0];
    const message = issue
      ? `Invalid option ${typeof key === "string" ? toFlag(key) : "value"}: ${issue.message}`
      : "Invalid options";
    return err(new ValidationError(message, { issues: parsed.error.issues }));
  }

  const data = parsed.data;
  const envOut = env[OUTPUT_ENV_VAR];
  const out = data.out ?? (envOut !== undefined && envOut.length > 0 ? envOut : defaultOutputPath(now, data.format));

  return ok({
    root: resolve(cwd, data.root),
    out: resolve(cwd, out),
    format: data.format,
    catalogPath: data.catalog !== undefined ? resolve(cwd, data.catalog) : undefined,
    exampleCap: data.exampleCap,
    snippetLength: data.snippetLength,
    extensions: data.extensions,
    excludeDirs: data.exclude ?? [],
    followSymlinks: data.followSymlinks,
  });
}
