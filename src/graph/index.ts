/**
 * Content graph module.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ARCHITECTURE OVERVIEW
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * 1. BUILD: buildGraph(events) places chapters, sections and topics in a
 *    tree and assigns stable ids. Fails with StructureError on a section or
 *    topic that precedes every chapter.
 *
 * 2. RESOLVE (references module): resolveReferences(graph) appends cross
 *    reference and prerequisite edges read from node text.
 *
 * 3. CONSUME: the validator and the planner read the graph through its
 *    indexes (getById, childrenOf, prerequisitesOf, dependentsOf, …).
 */

export { ContentGraph, normalizeTitle } from "./graph.js";
export {
  buildGraph,
  buildGraphWithSummary,
  slugify,
  type BuildOptions,
  type BuildSummary,
} from "./builder.js";
export { StructureError, type StructureErrorKind } from "./errors.js";
export {
  makeEdgeId,
  type ContentNode,
  type ContentEdge,
  type NodeKind,
  type EdgeKind,
  type DeclaredEdgeKind,
  type GraphStats,
} from "./types.js";
