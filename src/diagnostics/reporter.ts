/**
 * Diagnostics Reporter
 *
 * Aggregates findings from the validator and the planner into one ordered
 * report. Ordering is total and stable:
 *
 *   1. errors before warnings
 *   2. then by first node id
 *   3. then by kind, then message
 *
 * A report is clean when it holds no errors; warnings never affect that.
 */

import type { Diagnostic } from "./types.js";
import type { StudyPlan } from "../planner/planner.js";

export interface DiagnosticReport {
  readonly diagnostics: readonly Diagnostic[];
  readonly errorCount: number;
  readonly warningCount: number;
  readonly isClean: boolean;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  if (a.severity !== b.severity) {
    return a.severity === "error" ? -1 : 1;
  }
  return (
    compareStrings(a.nodeIds[0] ?? "", b.nodeIds[0] ?? "") ||
    compareStrings(a.kind, b.kind) ||
    compareStrings(a.message, b.message)
  );
}

/**
 * Merge diagnostic lists into a sorted report.
 */
export function createReport(...lists: ReadonlyArray<readonly Diagnostic[]>): DiagnosticReport {
  const diagnostics = lists.flat().sort(compareDiagnostics);
  const errorCount = diagnostics.filter((d) => d.severity === "error").length;

  return {
    diagnostics,
    errorCount,
    warningCount: diagnostics.length - errorCount,
    isClean: errorCount === 0,
  };
}

export function isClean(report: DiagnosticReport): boolean {
  return report.isClean;
}

// ═══════════════════════════════════════════════════════════════════════════
// FORMATTING UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Format one diagnostic.
 *
 * @example Output:
 *   ERROR [PREREQUISITE_CYCLE]: Prerequisite cycle: a → b → a
 *     NODES: a, b, a
 *     SUGGESTION: Remove one prerequisite in the cycle so an order exists
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const lines: string[] = [
    `${diagnostic.severity.toUpperCase()} [${diagnostic.kind}]: ${diagnostic.message}`,
  ];

  if (diagnostic.nodeIds.length > 0) {
    lines.push(`  NODES: ${diagnostic.nodeIds.join(", ")}`);
  }
  if (diagnostic.edgeIds.length > 0) {
    lines.push(`  EDGES: ${diagnostic.edgeIds.join(", ")}`);
  }
  if (diagnostic.suggestion) {
    lines.push(`  SUGGESTION: ${diagnostic.suggestion}`);
  }

  return lines.join("\n");
}

export function formatReport(report: DiagnosticReport): string {
  const lines: string[] = [
    "═══════════════════════════════════════════════════════════════",
    " Handbook Diagnostics",
    "═══════════════════════════════════════════════════════════════",
    `Errors: ${report.errorCount} | Warnings: ${report.warningCount}`,
    `Clean: ${report.isClean ? "YES" : "NO (has errors)"}`,
  ];

  for (const diagnostic of report.diagnostics) {
    lines.push("");
    lines.push(formatDiagnostic(diagnostic));
  }

  return lines.join("\n");
}

/**
 * Format a study plan as a numbered list.
 *
 * @example Output:
 *   Study plan (budget 5, cost 3)
 *     1. 1-basics  "Basics"  effort 1  total 1
 */
export function formatStudyPlan(plan: StudyPlan): string {
  const lines: string[] = [`Study plan (budget ${plan.budget}, cost ${plan.totalCost})`];

  if (plan.steps.length === 0) {
    lines.push("  (nothing fits the budget)");
  }

  plan.steps.forEach((step, index) => {
    lines.push(
      `  ${index + 1}. ${step.nodeId}  "${step.title}"  effort ${step.effort}  total ${step.cumulativeCost}`
    );
  });

  if (plan.deferred.length > 0) {
    lines.push(`Deferred (${plan.deferred.length}): ${plan.deferred.join(", ")}`);
  }

  return lines.join("\n");
}
