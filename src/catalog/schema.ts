import { z } from "zod";

/**
 * Detector keys are snake_case identifiers (e.g. `di_field`)
 */
const KEY_PATTERN = /^[a-z][a-z0-9_]*$/;

/**
 * Catalog and anti-pattern ids are lowercase with hyphens
 */
const ID_PATTERN = /^[a-z][a-z0-9-]*$/;

/**
 * A single detector as written in a catalog file
 */
export const DetectorDefinitionSchema = z.object({
  /** Unique key, used by recommendation rules and in the report */
  key: z
    .string()
    .regex(KEY_PATTERN, "Key must start with a lowercase letter and contain only lowercase letters, numbers, and underscores"),

  /** Regular expression source, matched against each line */
  pattern: z.string().min(1, "Pattern is required"),

  /** Optional human-readable description */
  description: z.string().optional(),
});

/**
 * A named group of detectors. Groups only affect presentation.
 */
export const DetectorGroupSchema = z.object({
  name: z.string().min(1, "Group name is required"),
  detectors: z.array(DetectorDefinitionSchema).min(1, "Group must contain at least one detector"),
});

/**
 * An anti-pattern rule with its remediation note
 */
export const AntiPatternDefinitionSchema = z.object({
  id: z
    .string()
    .regex(ID_PATTERN, "ID must start with lowercase letter and contain only lowercase letters, numbers, and hyphens"),
  pattern: z.string().min(1, "Pattern is required"),
  note: z.string().min(1, "Note is required"),
});

/**
 * Extensions are written with a leading dot (".java")
 */
export const ExtensionSchema = z
  .string()
  .regex(/^\.[A-Za-z0-9]+$/, "Extension must look like '.java'")
  .transform((ext) => ext.toLowerCase());

/**
 * Schema for a complete catalog file
 */
export const CatalogDefinitionSchema = z.object({
  name: z.string().regex(ID_PATTERN, "Catalog name must be lowercase with hyphens"),

  /** Report title */
  title: z.string().min(1, "Title is required"),

  /** File extensions scanned when the caller does not override them */
  extensions: z.array(ExtensionSchema).min(1).optional(),

  groups: z.array(DetectorGroupSchema).min(1, "Catalog must contain at least one group"),

  antiPatterns: z.array(AntiPatternDefinitionSchema).default([]),

  /** Static "Suggested Style Topics" appendix */
  topics: z.array(z.string().min(1)).default([]),
});

// Inferred types
export type DetectorDefinition = z.infer<typeof DetectorDefinitionSchema>;
export type DetectorGroup = z.infer<typeof DetectorGroupSchema>;
export type AntiPatternDefinition = z.infer<typeof AntiPatternDefinitionSchema>;
export type CatalogDefinition = z.input<typeof CatalogDefinitionSchema>;
export type ParsedCatalogDefinition = z.infer<typeof CatalogDefinitionSchema>;

/**
 * A compiled detector
 */
export interface Detector {
  readonly group: string;
  readonly key: string;
  readonly pattern: RegExp;
  readonly description?: string;
}

/**
 * A compiled anti-pattern rule
 */
export interface AntiPatternRule {
  readonly id: string;
  readonly pattern: RegExp;
  readonly note: string;
}

/**
 * A compiled, validated catalog. Immutable for the lifetime of a run.
 */
export interface Catalog {
  readonly name: string;
  readonly title: string;
  readonly extensions: readonly string[] | undefined;
  /** Group names in first-appearance order */
  readonly groups: readonly string[];
  /** Detectors in catalog order */
  readonly detectors: readonly Detector[];
  readonly antiPatterns: readonly AntiPatternRule[];
  readonly topics: readonly string[];
}
