/**
 * Catalog module - detector and anti-pattern tables
 */

export {
  DetectorDefinitionSchema,
  DetectorGroupSchema,
  AntiPatternDefinitionSchema,
  CatalogDefinitionSchema,
  ExtensionSchema,
} from "./schema.js";

export type {
  DetectorDefinition,
  DetectorGroup,
  AntiPatternDefinition,
  CatalogDefinition,
  ParsedCatalogDefinition,
  Detector,
  AntiPatternRule,
  Catalog,
} from "./schema.js";

export {
  loadCatalog,
  compileCatalog,
  getBuiltinCatalogPath,
  BUILTIN_CATALOG_FILE,
} from "./loader.js";

export {
  deriveRecommendations,
  RECOMMENDATION_RULES,
  type RecommendationRule,
  type CountOf,
  type Counted,
} from "./recommendations.js";
