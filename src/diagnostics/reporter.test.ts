/**
 * Diagnostics reporter tests.
 *
 * Run: node --import tsx src/diagnostics/reporter.test.ts
 */

import { strict as assert } from "node:assert";

import type { StudyPlan } from "../planner/index.js";
import {
  createReport,
  formatDiagnostic,
  formatReport,
  formatStudyPlan,
  isClean,
  type Diagnostic,
} from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function finding(
  severity: Diagnostic["severity"],
  kind: Diagnostic["kind"],
  nodeIds: string[],
  message: string = kind
): Diagnostic {
  return {
    severity,
    kind,
    nodeIds,
    edgeIds: [],
    message,
    stage: kind === "PLAN_TRUNCATED" || kind === "UNKNOWN_OVERRIDE" ? "planner" : "validator",
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// ORDERING
// ═══════════════════════════════════════════════════════════════════════════

section("Ordering");

test("errors come before warnings regardless of node id", () => {
  const report = createReport([
    finding("warning", "NUMBERING_GAP", ["a"]),
    finding("error", "ORPHAN_NODE", ["z"]),
    finding("error", "DANGLING_REFERENCE", ["b"]),
    finding("warning", "NUMBERING_GAP", ["(root)", "a"]),
  ]);
  assert.deepEqual(
    report.diagnostics.map((d) => [d.severity, d.nodeIds[0]]),
    [
      ["error", "b"],
      ["error", "z"],
      ["warning", "(root)"],
      ["warning", "a"],
    ]
  );
});

test("validator and planner lists are merged into one order", () => {
  const report = createReport(
    [finding("warning", "NUMBERING_GAP", ["m"])],
    [finding("warning", "PLAN_TRUNCATED", ["c"]), finding("warning", "UNKNOWN_OVERRIDE", ["x"])]
  );
  assert.deepEqual(
    report.diagnostics.map((d) => d.kind),
    ["PLAN_TRUNCATED", "NUMBERING_GAP", "UNKNOWN_OVERRIDE"]
  );
});

test("ties on node id fall back to kind, then message", () => {
  const report = createReport([
    finding("error", "ORPHAN_NODE", ["a"]),
    finding("error", "DANGLING_REFERENCE", ["a"], "second"),
    finding("error", "DANGLING_REFERENCE", ["a"], "first"),
  ]);
  assert.deepEqual(
    report.diagnostics.map((d) => [d.kind, d.message]),
    [
      ["DANGLING_REFERENCE", "first"],
      ["DANGLING_REFERENCE", "second"],
      ["ORPHAN_NODE", "ORPHAN_NODE"],
    ]
  );
});

test("input lists are not reordered in place", () => {
  const list = [finding("warning", "NUMBERING_GAP", ["b"]), finding("error", "ORPHAN_NODE", ["a"])];
  createReport(list);
  assert.equal(list[0]?.kind, "NUMBERING_GAP");
});

// ═══════════════════════════════════════════════════════════════════════════
// CLEANLINESS
// ═══════════════════════════════════════════════════════════════════════════

section("Cleanliness");

test("warnings only is clean", () => {
  const report = createReport([finding("warning", "NUMBERING_GAP", ["a"])]);
  assert.equal(isClean(report), true);
  assert.equal(report.errorCount, 0);
  assert.equal(report.warningCount, 1);
});

test("any error is not clean", () => {
  const report = createReport([], [finding("error", "PREREQUISITE_CYCLE", ["a", "a"])]);
  assert.equal(isClean(report), false);
  assert.equal(report.errorCount, 1);
});

test("an empty report is clean", () => {
  assert.equal(createReport().isClean, true);
});

// ═══════════════════════════════════════════════════════════════════════════
// FORMATTING
// ═══════════════════════════════════════════════════════════════════════════

section("Formatting");

test("formatDiagnostic lists nodes, edges and suggestion", () => {
  const text = formatDiagnostic({
    severity: "error",
    kind: "PREREQUISITE_CYCLE",
    nodeIds: ["a", "b", "a"],
    edgeIds: ["prerequisite:a->b", "prerequisite:b->a"],
    message: "Prerequisite cycle: a → b → a",
    suggestion: "Remove one prerequisite in the cycle so an order exists",
    stage: "validator",
  });
  assert.equal(
    text,
    [
      "ERROR [PREREQUISITE_CYCLE]: Prerequisite cycle: a → b → a",
      "  NODES: a, b, a",
      "  EDGES: prerequisite:a->b, prerequisite:b->a",
      "  SUGGESTION: Remove one prerequisite in the cycle so an order exists",
    ].join("\n")
  );
});

test("formatDiagnostic omits empty parts", () => {
  assert.equal(
    formatDiagnostic(finding("warning", "NUMBERING_GAP", [], "gap")),
    "WARNING [NUMBERING_GAP]: gap"
  );
});

test("formatReport prints counts then each diagnostic", () => {
  const report = createReport([finding("error", "ORPHAN_NODE", ["x"], "lost")]);
  assert.equal(
    formatReport(report),
    [
      "═══════════════════════════════════════════════════════════════",
      " Handbook Diagnostics",
      "═══════════════════════════════════════════════════════════════",
      "Errors: 1 | Warnings: 0",
      "Clean: NO (has errors)",
      "",
      "ERROR [ORPHAN_NODE]: lost",
      "  NODES: x",
    ].join("\n")
  );
});

test("formatStudyPlan numbers steps and lists deferred nodes", () => {
  const plan: StudyPlan = {
    steps: [
      { nodeId: "1-a", title: "A", effort: 1, cumulativeCost: 1 },
      { nodeId: "1-a.1-b", title: "B", effort: 0.5, cumulativeCost: 1.5 },
    ],
    budget: 2,
    totalCost: 1.5,
    deferred: ["2-c"],
    scope: "all",
  };
  assert.equal(
    formatStudyPlan(plan),
    [
      "Study plan (budget 2, cost 1.5)",
      '  1. 1-a  "A"  effort 1  total 1',
      '  2. 1-a.1-b  "B"  effort 0.5  total 1.5',
      "Deferred (1): 2-c",
    ].join("\n")
  );
});

test("formatStudyPlan marks an empty plan", () => {
  const plan: StudyPlan = { steps: [], budget: 1, totalCost: 0, deferred: [], scope: "targets" };
  assert.equal(formatStudyPlan(plan), "Study plan (budget 1, cost 0)\n  (nothing fits the budget)");
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
