/**
 * Structural errors raised while building a graph.
 * These are fatal: no graph is produced when one is thrown.
 */

export type StructureErrorKind = "ORPHAN_AT_ROOT" | "DUPLICATE_NODE_ID" | "EMPTY_NODE_ID";

export class StructureError extends Error {
  public readonly kind: StructureErrorKind;
  /** Index of the offending event, when raised by the builder */
  public readonly eventIndex?: number;
  public readonly nodeId?: string;

  constructor(
    kind: StructureErrorKind,
    message: string,
    details: { eventIndex?: number; nodeId?: string } = {}
  ) {
    super(message);
    this.name = "StructureError";
    this.kind = kind;
    this.eventIndex = details.eventIndex;
    this.nodeId = details.nodeId;
  }

  format(): string {
    const location =
      this.eventIndex !== undefined ? ` (event ${this.eventIndex})` : "";
    return `STRUCTURE ERROR [${this.kind}]${location}: ${this.message}`;
  }
}
