/**
 * Report module - rendering and writing scan reports
 */

export {
  renderMarkdown,
  renderJson,
  renderReport,
  detectedGroups,
  formatExample,
  formatAntiPatternMatch,
  isValidReportFormat,
  type ReportFormat,
} from "./renderer.js";

export { writeReport } from "./writer.js";
