/**
 * Diagnostics shared by the validator and the planner, and the reporter
 * that orders and renders them.
 */

export type {
  Diagnostic,
  DiagnosticKind,
  DiagnosticSeverity,
  DiagnosticStage,
} from "./types.js";

export {
  createReport,
  compareDiagnostics,
  isClean,
  formatDiagnostic,
  formatReport,
  formatStudyPlan,
  type DiagnosticReport,
} from "./reporter.js";
