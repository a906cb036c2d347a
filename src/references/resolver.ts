/**
 * Reference resolver.
 *
 * Reads the reference clauses in every node's text (see patterns.ts) and
 * turns them into declared edges on a new graph.
 *
 * RESOLUTION ORDER for a reference target:
 *   1. exact node id
 *   2. case-insensitive title match over the whole graph
 *
 * Several title matches are fatal (AmbiguousReferenceError lists all
 * candidates). No match is not fatal: the reference is kept as a
 * cross_reference edge marked `unresolved`, pointing at the raw text, so the
 * validator reports it as dangling instead of it silently disappearing.
 */

import type { ContentGraph } from "../graph/graph.js";
import {
  makeEdgeId,
  type ContentEdge,
  type ContentNode,
  type DeclaredEdgeKind,
} from "../graph/types.js";
import { extractReferences, type ExtractedReference } from "./patterns.js";

/**
 * A reference matched more than one node by title.
 */
export class AmbiguousReferenceError extends Error {
  public readonly kind = "AMBIGUOUS_REFERENCE" as const;
  public readonly reference: string;
  public readonly candidates: readonly string[];
  /** Node whose text holds the reference */
  public readonly nodeId: string;

  constructor(reference: string, candidates: readonly string[], nodeId: string) {
    super(
      `Reference "${reference}" in "${nodeId}" matches ${candidates.length} nodes: ${candidates.join(", ")}`
    );
    this.name = "AmbiguousReferenceError";
    this.reference = reference;
    this.candidates = candidates;
    this.nodeId = nodeId;
  }

  format(): string {
    return [
      `AMBIGUOUS REFERENCE in [${this.nodeId}]: "${this.reference}"`,
      ...this.candidates.map((id) => `  candidate: ${id}`),
      `  SUGGESTION: refer to one of the candidates by id, e.g. [[${this.candidates[0] ?? "node-id"}]]`,
    ].join("\n");
  }
}

export type ReferenceResolution =
  | { status: "resolved"; nodeId: string; via: "id" | "title" }
  | { status: "unresolved" }
  | { status: "ambiguous"; candidates: readonly string[] };

/**
 * Resolve one reference target against the graph.
 * Exact id wins over title; ids are never ambiguous.
 */
export function resolveReference(graph: ContentGraph, target: string): ReferenceResolution {
  const trimmed = target.trim();

  if (graph.has(trimmed)) {
    return { status: "resolved", nodeId: trimmed, via: "id" };
  }

  const candidates = graph.findByTitle(trimmed);
  if (candidates.length === 1 && candidates[0] !== undefined) {
    return { status: "resolved", nodeId: candidates[0], via: "title" };
  }
  if (candidates.length > 1) {
    return { status: "ambiguous", candidates };
  }

  return { status: "unresolved" };
}

/**
 * Counters describing one resolver pass.
 */
export interface ResolutionSummary {
  references: number;
  crossReferences: number;
  prerequisites: number;
  unresolved: number;
  duplicates: number;
}

function resolveOrThrow(graph: ContentGraph, target: string, nodeId: string): string | undefined {
  const resolution = resolveReference(graph, target);
  switch (resolution.status) {
    case "resolved":
      return resolution.nodeId;
    case "ambiguous":
      throw new AmbiguousReferenceError(target, resolution.candidates, nodeId);
    case "unresolved":
      return undefined;
  }
}

function toEdge(
  graph: ContentGraph,
  node: Readonly<ContentNode>,
  reference: ExtractedReference
): ContentEdge {
  const target = resolveOrThrow(graph, reference.target, node.id);
  const source =
    reference.source === undefined ? node.id : resolveOrThrow(graph, reference.source, node.id);

  if (source !== undefined && target !== undefined) {
    return {
      id: makeEdgeId(reference.kind, source, target),
      kind: reference.kind,
      source,
      target,
      declaredIn: node.id,
      text: reference.clause,
    };
  }

  const unresolvedText = target === undefined ? reference.target : reference.source ?? reference.target;
  const rawSource = source ?? reference.source ?? node.id;
  const rawTarget = target ?? reference.target;
  const declaredKind: DeclaredEdgeKind = reference.kind;

  return {
    id: makeEdgeId("cross_reference", rawSource, rawTarget),
    kind: "cross_reference",
    source: rawSource,
    target: rawTarget,
    declaredIn: node.id,
    text: reference.clause,
    unresolved: { declaredKind, text: unresolvedText },
  };
}

/**
 * Resolve every reference in the graph's node texts.
 *
 * @returns A new graph with the declared edges appended, and counters
 * @throws AmbiguousReferenceError on the first ambiguous title match
 */
export function resolveReferencesWithSummary(graph: ContentGraph): {
  graph: ContentGraph;
  summary: ResolutionSummary;
} {
  const edges: ContentEdge[] = [];
  const seen = new Set<string>(graph.edges.map((edge) => edge.id));
  const summary: ResolutionSummary = {
    references: 0,
    crossReferences: 0,
    prerequisites: 0,
    unresolved: 0,
    duplicates: 0,
  };

  for (const node of graph.nodes) {
    for (const reference of extractReferences(node.text)) {
      summary.references++;
      const edge = toEdge(graph, node, reference);

      if (seen.has(edge.id)) {
        summary.duplicates++;
        continue;
      }
      seen.add(edge.id);
      edges.push(edge);

      if (edge.unresolved) {
        summary.unresolved++;
      } else if (edge.kind === "prerequisite") {
        summary.prerequisites++;
      } else {
        summary.crossReferences++;
      }
    }
  }

  return { graph: graph.withEdges(edges), summary };
}

/**
 * Resolve every reference in the graph's node texts.
 *
 * @throws AmbiguousReferenceError on the first ambiguous title match
 */
export function resolveReferences(graph: ContentGraph): ContentGraph {
  return resolveReferencesWithSummary(graph).graph;
}
