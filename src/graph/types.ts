/**
 * Content graph types.
 *
 * A handbook is a tree of chapters → sections → topics (containment) plus
 * declared edges between arbitrary nodes (cross references and
 * prerequisites). Containment is implied by `parentId`/`children` and is
 * never stored as an edge.
 */

export type NodeKind = "chapter" | "section" | "topic";

export interface ContentNode {
  /** Stable path-like key, e.g. "2-collections.1-list.3-arraylist-vs-linkedlist" */
  readonly id: string;
  readonly kind: NodeKind;
  readonly title: string;
  /** Source text references are read from (title or item text, plus paragraphs) */
  readonly text: string;
  /** 0 for chapters, parent depth + 1 otherwise */
  readonly depth: number;
  /** 1-based position among siblings */
  readonly ordinal: number;
  /** Absent for chapters */
  readonly parentId?: string;
  readonly children: readonly string[];
  /** The declared depth skipped a level (e.g. a topic directly under a chapter) */
  readonly levelSkipped: boolean;
  /** Index of the event that opened this node */
  readonly sourceIndex?: number;
}

export type EdgeKind = "containment" | "cross_reference" | "prerequisite";

/** Edge kinds that can be declared in source text. */
export type DeclaredEdgeKind = Exclude<EdgeKind, "containment">;

/**
 * A directed edge. For prerequisites, `source` requires `target`
 * (target is studied first).
 */
export interface ContentEdge {
  /** `<kind>:<source>-><target>` */
  readonly id: string;
  readonly kind: EdgeKind;
  readonly source: string;
  readonly target: string;
  /** Node whose text declared this edge */
  readonly declaredIn?: string;
  /** Reference text as written */
  readonly text?: string;
  /** Present when the reference could not be matched to a node */
  readonly unresolved?: {
    readonly declaredKind: DeclaredEdgeKind;
    readonly text: string;
  };
}

export function makeEdgeId(kind: EdgeKind, source: string, target: string): string {
  return `${kind}:${source}->${target}`;
}

/**
 * Statistics about the graph contents.
 */
export interface GraphStats {
  totalNodes: number;
  byKind: Record<NodeKind, number>;
  maxDepth: number;
  levelSkips: number;
  crossReferences: number;
  prerequisites: number;
  unresolvedReferences: number;
}
