/**
 * Diagnostic definitions shared by the validator, the planner and the
 * reporter.
 *
 * - error: the graph is not clean; the planner will not run on it
 * - warning: worth reviewing, never blocks planning
 */

export type DiagnosticSeverity = "error" | "warning";

/**
 * Diagnostic kinds for programmatic handling.
 */
export type DiagnosticKind =
  | "DANGLING_REFERENCE"
  | "ORPHAN_NODE"
  | "PREREQUISITE_CYCLE"
  | "NUMBERING_GAP"
  | "PLAN_TRUNCATED"
  | "UNKNOWN_OVERRIDE";

export type DiagnosticStage = "validator" | "planner";

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly kind: DiagnosticKind;
  /** Offending nodes; for cycles, the cycle path (first id repeated at the end) */
  readonly nodeIds: readonly string[];
  /** Offending edges, if any */
  readonly edgeIds: readonly string[];
  readonly message: string;
  /** How to fix it */
  readonly suggestion?: string;
  readonly stage: DiagnosticStage;
}
