/**
 * Detection module - project-level detection
 */

export {
  detectProjectLanguage,
  getProjectLanguageLabel,
  type ProjectLanguage,
  type ProjectLanguageResult,
} from "./project-language.js";
