/**
 * Graph Validator
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * STRUCTURAL CHECKS FOR A HANDBOOK GRAPH
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Four independent checks, all run on every call (no early exit), so one
 * pass reports every defect:
 *
 *   1. DANGLING_REFERENCE (error)  edge endpoint or listed child not in the graph
 *   2. ORPHAN_NODE        (error)  node not reachable from any chapter
 *   3. PREREQUISITE_CYCLE (error)  prerequisite edges loop back on themselves
 *   4. NUMBERING_GAP      (warning) sibling ordinals are not exactly 1..N
 *
 * VALIDATION DOES NOT THROW: findings are returned as diagnostics. A graph
 * with zero errors is "clean" and may be planned.
 */

import type { ContentGraph } from "../graph/graph.js";
import { makeEdgeId, type ContentNode } from "../graph/types.js";
import type { Diagnostic } from "../diagnostics/types.js";

/** Pseudo parent id used for the chapter level in numbering findings. */
export const ROOT_PARENT = "(root)";

// ═══════════════════════════════════════════════════════════════════════════
// INDIVIDUAL CHECKS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Edges whose source or target is missing, plus child ids a parent lists
 * that are not in the graph.
 */
export function checkDanglingReferences(graph: ContentGraph): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  for (const edge of graph.edges) {
    const missing = [edge.source, edge.target].filter((id) => !graph.has(id));
    if (missing.length === 0) continue;

    const origin = edge.declaredIn ?? edge.source;
    const message = edge.unresolved
      ? `Unresolved ${edge.unresolved.declaredKind === "prerequisite" ? "prerequisite" : "reference"} "${edge.unresolved.text}" in "${origin}"`
      : `Edge ${edge.id} points at missing node(s): ${missing.join(", ")}`;

    diagnostics.push({
      severity: "error",
      kind: "DANGLING_REFERENCE",
      nodeIds: graph.has(origin) ? [origin] : missing,
      edgeIds: [edge.id],
      message,
      suggestion: "Refer to an existing node by id or exact title, or remove the reference",
      stage: "validator",
    });
  }

  for (const node of graph.nodes) {
    for (const childId of node.children) {
      if (graph.has(childId)) continue;
      diagnostics.push({
        severity: "error",
        kind: "DANGLING_REFERENCE",
        nodeIds: [node.id],
        edgeIds: [],
        message: `"${node.id}" lists child "${childId}", which is not in the graph`,
        stage: "validator",
      });
    }
  }

  return diagnostics;
}

/**
 * Non-root nodes that cannot be reached from any chapter through children
 * lists. A correct builder never produces one.
 */
export function checkOrphanNodes(graph: ContentGraph): Diagnostic[] {
  const reached = new Set<string>();
  const queue: string[] = graph.roots.map((root) => root.id);

  for (let head = 0; head < queue.length; head++) {
    const id = queue[head];
    if (id === undefined || reached.has(id)) continue;
    reached.add(id);
    for (const child of graph.childrenOf(id)) {
      queue.push(child.id);
    }
  }

  const diagnostics: Diagnostic[] = [];
  for (const node of graph.nodes) {
    if (reached.has(node.id)) continue;
    const parentNote = node.parentId === undefined
      ? ""
      : graph.has(node.parentId)
        ? ` (parent "${node.parentId}" does not list it)`
        : ` (parent "${node.parentId}" is missing)`;
    diagnostics.push({
      severity: "error",
      kind: "ORPHAN_NODE",
      nodeIds: [node.id],
      edgeIds: [],
      message: `"${node.id}" is not reachable from any chapter${parentNote}`,
      stage: "validator",
    });
  }

  return diagnostics;
}

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;

/**
 * Find prerequisite cycles with an iterative three-colour depth-first
 * search, starting from nodes in document order. Each back edge reports the
 * cycle from the repeated node back to itself, e.g. [a, b, c, a]. Every node
 * and edge is visited at most once.
 */
export function checkPrerequisiteCycles(graph: ContentGraph): Diagnostic[] {
  const color = new Map<string, number>();
  const diagnostics: Diagnostic[] = [];

  for (const start of graph.nodes) {
    if ((color.get(start.id) ?? WHITE) !== WHITE) continue;

    const path: string[] = [start.id];
    const cursor: number[] = [0];
    color.set(start.id, GRAY);

    while (path.length > 0) {
      const depth = path.length - 1;
      const current = path[depth];
      const nextIndex = cursor[depth];
      if (current === undefined || nextIndex === undefined) break;

      const targets = graph.prerequisitesOf(current);
      if (nextIndex >= targets.length) {
        color.set(current, BLACK);
        path.pop();
        cursor.pop();
        continue;
      }

      cursor[depth] = nextIndex + 1;
      const target = targets[nextIndex];
      if (target === undefined || !graph.has(target)) continue;

      const state = color.get(target) ?? WHITE;
      if (state === WHITE) {
        color.set(target, GRAY);
        path.push(target);
        cursor.push(0);
      } else if (state === GRAY) {
        const cycle = [...path.slice(path.indexOf(target)), target];
        diagnostics.push({
          severity: "error",
          kind: "PREREQUISITE_CYCLE",
          nodeIds: cycle,
          edgeIds: cycle.slice(1).map((to, i) => makeEdgeId("prerequisite", cycle[i] ?? to, to)),
          message: `Prerequisite cycle: ${cycle.join(" → ")}`,
          suggestion: "Remove one prerequisite in the cycle so an order exists",
          stage: "validator",
        });
      }
    }
  }

  return diagnostics;
}

function numberingFinding(
  parentId: string,
  siblings: ReadonlyArray<Readonly<ContentNode>>
): Diagnostic | null {
  const ordinals = siblings.map((node) => node.ordinal);
  const sorted = [...ordinals].sort((a, b) => a - b);
  const contiguous = sorted.every((ordinal, index) => ordinal === index + 1);
  if (contiguous) return null;

  return {
    severity: "warning",
    kind: "NUMBERING_GAP",
    nodeIds: [parentId, ...siblings.map((node) => node.id)],
    edgeIds: [],
    message: `Children of "${parentId}" are numbered ${ordinals.join(", ")}; expected 1..${ordinals.length}`,
    suggestion: "Renumber the siblings consecutively from 1",
    stage: "validator",
  };
}

/**
 * Sibling ordinals, per parent and for the chapter level, must be 1..N.
 */
export function checkNumbering(graph: ContentGraph): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  const rootFinding = numberingFinding(ROOT_PARENT, graph.roots);
  if (rootFinding) diagnostics.push(rootFinding);

  for (const node of graph.nodes) {
    const children = graph.childrenOf(node.id);
    if (children.length === 0) continue;
    const finding = numberingFinding(node.id, children);
    if (finding) diagnostics.push(finding);
  }

  return diagnostics;
}

// ═══════════════════════════════════════════════════════════════════════════
// MAIN VALIDATION FUNCTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Run every structural check against a graph.
 *
 * @returns Diagnostics in check order (dangling, orphan, cycle, numbering)
 */
export function validateGraph(graph: ContentGraph): Diagnostic[] {
  return [
    ...checkDanglingReferences(graph),
    ...checkOrphanNodes(graph),
    ...checkPrerequisiteCycles(graph),
    ...checkNumbering(graph),
  ];
}

/**
 * Result of validating a graph, with counts.
 */
export interface GraphValidationResult {
  diagnostics: Diagnostic[];
  errorCount: number;
  warningCount: number;
  /** No errors (warnings allowed) */
  isClean: boolean;
}

export function validateGraphWithSummary(graph: ContentGraph): GraphValidationResult {
  const diagnostics = validateGraph(graph);
  const errorCount = diagnostics.filter((d) => d.severity === "error").length;
  return {
    diagnostics,
    errorCount,
    warningCount: diagnostics.length - errorCount,
    isClean: errorCount === 0,
  };
}
