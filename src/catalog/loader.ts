/**
 * Catalog loader
 *
 * Reads a YAML catalog, validates it and compiles every pattern up front.
 * An invalid pattern is a programming error in the catalog, so loading
 * fails as a whole before any file is scanned.
 *
 * @example
 * ```typescript
 * const result = await loadCatalog();
 * if (!result.success) {
 *   console.error(result.error.message);
 *   process.exit(1);
 * }
 * console.log(`${result.data.detectors.length} detectors`);
 * ```
 */

import { readFile } from "fs/promises";
import { existsSync } from "fs";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";

import YAML from "yaml";

import { ConfigError, errorMessage } from "../lib/errors.js";
import { ok, err, tryCatch, tryCatchAsync } from "../lib/result.js";

import { CatalogDefinitionSchema } from "./schema.js";

import type { Result } from "../lib/result.js";
import type {
  AntiPatternRule,
  Catalog,
  Detector,
} from "./schema.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * File name of the built-in catalog
 */
export const BUILTIN_CATALOG_FILE = "java-services.yml";

/**
 * Locate the built-in catalog. Definitions are not copied by the compiler,
 * so a build under dist/ falls back to the sources.
 */
export function getBuiltinCatalogPath(): string {
  const candidates = [
    resolve(__dirname, "definitions", BUILTIN_CATALOG_FILE),
    resolve(__dirname, "../../src/catalog/definitions", BUILTIN_CATALOG_FILE),
  ];

  for (const candidate of candidates) {
    if (existsSync(candidate)) {
      return candidate;
    }
  }

  return candidates[0] ?? BUILTIN_CATALOG_FILE;
}

/**
 * Load and compile a catalog file (the built-in catalog when no path is given)
 */
export async function loadCatalog(filePath?: string): Promise<Result<Catalog, ConfigError>> {
  const catalogPath = filePath ?? getBuiltinCatalogPath();

  const parsed = await tryCatchAsync(async () => {
    const content = await readFile(catalogPath, "utf-8");
    const document: unknown = YAML.parse(content);
    return document;
  });

  if (!parsed.success) {
    return err(
      new ConfigError(`Failed to read catalog file: ${catalogPath} (${parsed.error.message})`, {
        filePath: catalogPath,
        cause: parsed.error.message,
      })
    );
  }

  return compileCatalog(parsed.data, catalogPath);
}

/**
 * Validate a parsed catalog definition and compile its patterns
 */
export function compileCatalog(
  definition: unknown,
  source = "<inline>"
): Result<Catalog, ConfigError> {
  const validation = CatalogDefinitionSchema.safeParse(definition);
  if (!validation.success) {
    const issue = validation.error.issues[0];
    const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown issue";
    return err(
      new ConfigError(`Invalid catalog in ${source} (${where})`, {
        filePath: source,
        issues: validation.error.issues,
      })
    );
  }

  const data = validation.data;
  const detectors: Detector[] = [];
  const seenKeys = new Set<string>();

  for (const group of data.groups) {
    for (const def of group.detectors) {
      if (seenKeys.has(def.key)) {
        return err(new ConfigError(`Duplicate detector key: ${def.key}`, { filePath: source, key: def.key }));
      }
      seenKeys.add(def.key);

      const compiled = compilePattern(def.pattern, def.key, source);
      if (!compiled.success) {
        return compiled;
      }

      detectors.push({
        group: group.name,
        key: def.key,
        pattern: compiled.data,
        ...(def.description !== undefined ? { description: def.description } : {}),
      });
    }
  }

  const antiPatterns: AntiPatternRule[] = [];
  const seenIds = new Set<string>();

  for (const def of data.antiPatterns) {
    if (seenIds.has(def.id)) {
      return err(new ConfigError(`Duplicate anti-pattern id: ${def.id}`, { filePath: source, id: def.id }));
    }
    seenIds.add(def.id);

    const compiled = compilePattern(def.pattern, def.id, source);
    if (!compiled.success) {
      return compiled;
    }

    antiPatterns.push({ id: def.id, pattern: compiled.data, note: def.note });
  }

  return ok({
    name: data.name,
    title: data.title,
    extensions: data.extensions,
    groups: [...new Set(data.groups.map((g) => g.name))],
    detectors,
    antiPatterns,
    topics: data.topics,
  });
}

/**
 * Compile a single pattern, naming it in the error
 */
function compilePattern(pattern: string, name: string, source: string): Result<RegExp, ConfigError> {
  const compiled = tryCatch(() => new RegExp(pattern));
  if (!compiled.success) {
    return err(
      new ConfigError(`Invalid pattern for ${name}: /${pattern}/ (${errorMessage(compiled.error)})`, {
        filePath: source,
        name,
        pattern,
      })
    );
  }
  return compiled;
}
