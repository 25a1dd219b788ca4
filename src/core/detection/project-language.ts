/**
 * Project Language Detection
 *
 * Decides whether a directory holds a Java or a JavaScript/TypeScript
 * project from build files and, failing that, from the sources present.
 * Java wins when both are found.
 */

import { existsSync } from "fs";
import { resolve } from "path";

import { ok, err } from "../../lib/result.js";
import { walkFiles } from "../scanner/walker.js";

import type { FilesystemError } from "../../lib/errors.js";
import type { Result } from "../../lib/result.js";

export type ProjectLanguage = "java" | "javascript" | "unknown";

export interface ProjectLanguageResult {
  language: ProjectLanguage;
  /** Files that led to the decision */
  evidence: string[];
}

interface LanguageSignature {
  language: Exclude<ProjectLanguage, "unknown">;
  /** Build files at the project root */
  markers: string[];
  /** Source extensions searched anywhere in the tree */
  extensions: string[];
}

const SIGNATURES: LanguageSignature[] = [
  {
    language: "java",
    markers: ["pom.xml", "build.gradle", "build.gradle.kts"],
    extensions: [".java"],
  },
  {
    language: "javascript",
    markers: ["package.json"],
    extensions: [".js", ".ts", ".jsx", ".tsx"],
  },
];

/**
 * Directories never searched for source files
 */
const IGNORED_DIRS = ["node_modules", ".git", "target", "build", "dist"];

const LABELS: Record<ProjectLanguage, string> = {
  java: "Java",
  javascript: "JavaScript/TypeScript",
  unknown: "Unknown",
};

/**
 * Detect the primary language of a project
 */
export async function detectProjectLanguage(
  root: string
): Promise<Result<ProjectLanguageResult, FilesystemError>> {
  const absoluteRoot = resolve(root);

  for (const signature of SIGNATURES) {
    const markers = signature.markers.filter((marker) => existsSync(resolve(absoluteRoot, marker)));
    if (markers.length > 0) {
      return ok({ language: signature.language, evidence: markers });
    }

    const walk = await walkFiles(absoluteRoot, {
      includeExtensions: signature.extensions,
      excludeDirs: IGNORED_DIRS,
      followSymlinks: false,
      limit: 1,
    });
    if (!walk.success) {
      return err(walk.error);
    }

    const first = walk.data.files[0];
    if (first !== undefined) {
      return ok({ language: signature.language, evidence: [first.relativePath] });
    }
  }

  return ok({ language: "unknown", evidence: [] });
}

/**
 * Human-readable label for a detected language
 */
export function getProjectLanguageLabel(language: ProjectLanguage): string {
  return LABELS[language];
}
