/**
 * Immutable content graph with derived indexes.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ONE GRAPH PER INGESTION RUN
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * The graph is created by the builder (containment only), extended once by
 * the reference resolver (declared edges), then read by the validator and
 * the planner. Nothing mutates it: `withEdges()` returns a new instance and
 * every node, edge and index is frozen.
 *
 * INDEXES:
 *   - id → node (document order preserved by `nodes`)
 *   - normalized title → node ids (for reference resolution)
 *   - prerequisite forward (source → targets) and reverse (target → sources)
 *     adjacency, in edge declaration order
 */

import { StructureError } from "./errors.js";
import {
  makeEdgeId,
  type ContentEdge,
  type ContentNode,
  type EdgeKind,
  type GraphStats,
} from "./types.js";

/**
 * Normalize a title for case-insensitive lookup.
 */
export function normalizeTitle(title: string): string {
  return title.trim().replace(/\s+/g, " ").toLowerCase();
}

function freezeNode(node: ContentNode): Readonly<ContentNode> {
  return Object.freeze({ ...node, children: Object.freeze([...node.children]) });
}

function freezeEdge(edge: ContentEdge): Readonly<ContentEdge> {
  const unresolved = edge.unresolved ? Object.freeze({ ...edge.unresolved }) : undefined;
  return Object.freeze(unresolved ? { ...edge, unresolved } : { ...edge });
}

/**
 * Immutable handbook graph.
 *
 * @example
 *   const graph = buildGraph(events);          // containment only
 *   const linked = resolveReferences(graph);   // + declared edges
 *
 *   linked.getById("1-strings.2-string-pool");
 *   linked.prerequisitesOf("2-collections");   // ids it requires
 *   linked.findByTitle("string pool");         // case-insensitive
 */
export class ContentGraph {
  private readonly _nodes: ReadonlyArray<Readonly<ContentNode>>;
  private readonly _edges: ReadonlyArray<Readonly<ContentEdge>>;
  private readonly _byId: ReadonlyMap<string, Readonly<ContentNode>>;
  private readonly _byTitle: ReadonlyMap<string, ReadonlyArray<string>>;
  private readonly _prerequisitesOf: ReadonlyMap<string, ReadonlyArray<string>>;
  private readonly _dependentsOf: ReadonlyMap<string, ReadonlyArray<string>>;
  private readonly _documentIndex: ReadonlyMap<string, number>;

  private constructor(nodes: readonly ContentNode[], edges: readonly ContentEdge[]) {
    this._nodes = Object.freeze(nodes.map(freezeNode));
    this._edges = Object.freeze(edges.map(freezeEdge));

    this._byId = this.buildIdIndex(this._nodes);
    this._documentIndex = new Map(this._nodes.map((node, index) => [node.id, index]));
    this._byTitle = this.buildTitleIndex(this._nodes);
    this._prerequisitesOf = this.buildAdjacency(this._edges, "forward");
    this._dependentsOf = this.buildAdjacency(this._edges, "reverse");
  }

  /**
   * Create a graph from nodes (in document order) and declared edges.
   *
   * Endpoints are not checked here; a dangling edge is a validation finding,
   * not a construction failure.
   *
   * @throws StructureError on empty or duplicate node ids
   */
  static create(
    nodes: readonly ContentNode[],
    edges: readonly ContentEdge[] = []
  ): ContentGraph {
    return new ContentGraph(nodes, edges);
  }

  // ============================================================
  // Index Builders (private)
  // ============================================================

  private buildIdIndex(
    nodes: ReadonlyArray<Readonly<ContentNode>>
  ): ReadonlyMap<string, Readonly<ContentNode>> {
    const index = new Map<string, Readonly<ContentNode>>();
    for (const node of nodes) {
      if (node.id.trim() === "") {
        throw new StructureError("EMPTY_NODE_ID", `Node "${node.title}" has an empty id`, {
          eventIndex: node.sourceIndex,
        });
      }
      if (index.has(node.id)) {
        throw new StructureError("DUPLICATE_NODE_ID", `Duplicate node id "${node.id}"`, {
          nodeId: node.id,
          eventIndex: node.sourceIndex,
        });
      }
      index.set(node.id, node);
    }
    return index;
  }

  private buildTitleIndex(
    nodes: ReadonlyArray<Readonly<ContentNode>>
  ): ReadonlyMap<string, ReadonlyArray<string>> {
    const index = new Map<string, string[]>();
    for (const node of nodes) {
      const key = normalizeTitle(node.title);
      const ids = index.get(key) ?? [];
      ids.push(node.id);
      index.set(key, ids);
    }

    const frozenIndex = new Map<string, ReadonlyArray<string>>();
    for (const [key, value] of index) {
      frozenIndex.set(key, Object.freeze(value));
    }
    return frozenIndex;
  }

  private buildAdjacency(
    edges: ReadonlyArray<Readonly<ContentEdge>>,
    direction: "forward" | "reverse"
  ): ReadonlyMap<string, ReadonlyArray<string>> {
    const index = new Map<string, string[]>();
    for (const edge of edges) {
      if (edge.kind !== "prerequisite") continue;
      const from = direction === "forward" ? edge.source : edge.target;
      const to = direction === "forward" ? edge.target : edge.source;
      const list = index.get(from) ?? [];
      list.push(to);
      index.set(from, list);
    }

    const frozenIndex = new Map<string, ReadonlyArray<string>>();
    for (const [key, value] of index) {
      frozenIndex.set(key, Object.freeze(value));
    }
    return frozenIndex;
  }

  // ============================================================
  // Public Accessors
  // ============================================================

  /** All nodes in document order. */
  get nodes(): ReadonlyArray<Readonly<ContentNode>> {
    return this._nodes;
  }

  /** Declared edges (cross references and prerequisites), in declaration order. */
  get edges(): ReadonlyArray<Readonly<ContentEdge>> {
    return this._edges;
  }

  get size(): number {
    return this._nodes.length;
  }

  has(id: string): boolean {
    return this._byId.has(id);
  }

  getById(id: string): Readonly<ContentNode> | undefined {
    return this._byId.get(id);
  }

  /**
   * Position of a node in document order, or -1.
   */
  documentIndexOf(id: string): number {
    return this._documentIndex.get(id) ?? -1;
  }

  /** Chapters (nodes without a parent), in document order. */
  get roots(): ReadonlyArray<Readonly<ContentNode>> {
    return Object.freeze(this._nodes.filter((node) => node.parentId === undefined));
  }

  /**
   * Child nodes of a node, skipping ids missing from the graph.
   */
  childrenOf(id: string): ReadonlyArray<Readonly<ContentNode>> {
    const node = this._byId.get(id);
    if (!node) return [];
    const children: Readonly<ContentNode>[] = [];
    for (const childId of node.children) {
      const child = this._byId.get(childId);
      if (child) children.push(child);
    }
    return Object.freeze(children);
  }

  /**
   * All descendants of a node, depth-first in document order.
   */
  descendantsOf(id: string): ReadonlyArray<string> {
    const result: string[] = [];
    const seen = new Set<string>([id]);
    const stack = [...(this._byId.get(id)?.children ?? [])].reverse();

    while (stack.length > 0) {
      const next = stack.pop();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      result.push(next);
      const node = this._byId.get(next);
      if (node) {
        stack.push(...[...node.children].reverse());
      }
    }
    return Object.freeze(result);
  }

  /**
   * Node ids whose normalized title equals the given title.
   */
  findByTitle(title: string): ReadonlyArray<string> {
    return this._byTitle.get(normalizeTitle(title)) ?? [];
  }

  /** Ids a node requires (prerequisite edge targets). */
  prerequisitesOf(id: string): ReadonlyArray<string> {
    return this._prerequisitesOf.get(id) ?? [];
  }

  /** Ids that require a node (prerequisite edge sources). */
  dependentsOf(id: string): ReadonlyArray<string> {
    return this._dependentsOf.get(id) ?? [];
  }

  edgesOfKind(kind: EdgeKind): ReadonlyArray<Readonly<ContentEdge>> {
    if (kind === "containment") return this.containmentEdges();
    return Object.freeze(this._edges.filter((edge) => edge.kind === kind));
  }

  /**
   * Containment edges derived from the tree (parent → child).
   */
  containmentEdges(): ReadonlyArray<Readonly<ContentEdge>> {
    const edges: ContentEdge[] = [];
    for (const node of this._nodes) {
      for (const childId of node.children) {
        edges.push({
          id: makeEdgeId("containment", node.id, childId),
          kind: "containment",
          source: node.id,
          target: childId,
        });
      }
    }
    return Object.freeze(edges.map(freezeEdge));
  }

  /**
   * A new graph with the same nodes and these edges appended.
   * Edges whose id is already present are skipped.
   */
  withEdges(edges: readonly ContentEdge[]): ContentGraph {
    const seen = new Set(this._edges.map((edge) => edge.id));
    const merged: ContentEdge[] = [...this._edges];
    for (const edge of edges) {
      if (seen.has(edge.id)) continue;
      seen.add(edge.id);
      merged.push(edge);
    }
    return new ContentGraph(this._nodes, merged);
  }

  getStats(): GraphStats {
    const byKind = { chapter: 0, section: 0, topic: 0 };
    let maxDepth = 0;
    let levelSkips = 0;

    for (const node of this._nodes) {
      byKind[node.kind]++;
      maxDepth = Math.max(maxDepth, node.depth);
      if (node.levelSkipped) levelSkips++;
    }

    return {
      totalNodes: this._nodes.length,
      byKind,
      maxDepth,
      levelSkips,
      crossReferences: this._edges.filter((e) => e.kind === "cross_reference").length,
      prerequisites: this._edges.filter((e) => e.kind === "prerequisite").length,
      unresolvedReferences: this._edges.filter((e) => e.unresolved !== undefined).length,
    };
  }
}
