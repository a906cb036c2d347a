/**
 * Reference syntax.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * WHAT COUNTS AS A REFERENCE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   [[target]]                     cross reference to target
 *   see also: a, b                 cross references to a and b
 *   requires: a, b                 this node requires a and b
 *   prerequisite(s): a             this node requires a
 *   before X go through Y          X requires Y (comma after X optional)
 *
 * Targets are node ids or titles. Clauses run to the next ";", ")", line
 * break, or "." followed by whitespace (ids such as "1-a.2-b" keep their
 * dots); list items are separated by commas outside [[…]]. Anything else in the text
 * is prose and is ignored.
 */

import type { DeclaredEdgeKind } from "../graph/types.js";

/**
 * A reference found in a node's text, before resolution.
 */
export interface ExtractedReference {
  readonly kind: DeclaredEdgeKind;
  /** Target as written (link brackets removed) */
  readonly target: string;
  /**
   * Dependent as written, for "before X go through Y" clauses.
   * Undefined means the node that holds the text.
   */
  readonly source?: string;
  /** The clause the reference came from */
  readonly clause: string;
}

const LINK_PATTERN = /\[\[([^\]]+)\]\]/g;

const SEE_ALSO_PATTERN = /\bsee also\b\s*:?\s*((?:[^.;)\n]|\.(?=\S))+)/gi;

const REQUIRES_PATTERN = /\b(?:requires|prerequisites?)\s*:\s*((?:[^.;)\n]|\.(?=\S))+)/gi;

const BEFORE_PATTERN =
  /\bbefore\s+((?:[^,.;)\n]|\.(?=\S))+?)\s*,?\s+go\s+through\s+((?:[^.;)\n]|\.(?=\S))+)/gi;

/** Markers that start a reference clause; used to cut titles. */
const CLAUSE_START_PATTERN =
  /\bsee also\b|\b(?:requires|prerequisites?)\s*:|\bbefore\s+(?:[^,.;)\n]|\.(?=\S))+?\s*,?\s+go\s+through\b/i;

const PARENTHESIZED_CLAUSE_PATTERN =
  /\s*\([^()]*?(?:\bsee also\b|\b(?:requires|prerequisites?)\s*:|\bgo\s+through\b)[^()]*\)/gi;

function unbracket(value: string): string {
  return value.replace(LINK_PATTERN, (_match, inner: string) => inner).trim();
}

/** A list item: commas inside [[…]] belong to the link. */
const LIST_ITEM_PATTERN = /(?:\[\[[^\]]*\]\]|[^,])+/g;

function splitTargets(list: string): string[] {
  return (list.match(LIST_ITEM_PATTERN) ?? [])
    .map(unbracket)
    .filter((item) => item.length > 0);
}

/**
 * Extract every reference declared in a piece of text, in order of kind:
 * "before … go through" clauses, prerequisite lists, see-also lists, then
 * bare [[links]] outside those clauses.
 */
export function extractReferences(text: string): ExtractedReference[] {
  const references: ExtractedReference[] = [];
  let remaining = text;

  remaining = remaining.replace(BEFORE_PATTERN, (clause: string, dependent: string, list: string) => {
    const source = unbracket(dependent);
    for (const target of splitTargets(list)) {
      references.push({ kind: "prerequisite", target, source, clause: clause.trim() });
    }
    return " ";
  });

  remaining = remaining.replace(REQUIRES_PATTERN, (clause: string, list: string) => {
    for (const target of splitTargets(list)) {
      references.push({ kind: "prerequisite", target, clause: clause.trim() });
    }
    return " ";
  });

  remaining = remaining.replace(SEE_ALSO_PATTERN, (clause: string, list: string) => {
    for (const target of splitTargets(list)) {
      references.push({ kind: "cross_reference", target, clause: clause.trim() });
    }
    return " ";
  });

  for (const match of remaining.matchAll(LINK_PATTERN)) {
    const target = (match[1] ?? "").trim();
    if (target.length > 0) {
      references.push({ kind: "cross_reference", target, clause: match[0] });
    }
  }

  return references;
}

/**
 * Derive a display title from text that may carry reference markup.
 *
 * @example
 *   referenceFreeTitle("String pool (see also: [[Heap]])")  // "String pool"
 *   referenceFreeTitle("Use [[equals]] for content")        // "Use equals for content"
 */
export function referenceFreeTitle(text: string): string {
  let title = text.replace(PARENTHESIZED_CLAUSE_PATTERN, "");

  const clauseStart = title.search(CLAUSE_START_PATTERN);
  if (clauseStart >= 0) {
    title = title.slice(0, clauseStart);
  }

  title = unbracket(title).replace(/[\s,;:.\-–—]+$/, "").trim();

  return title.length > 0 ? title : unbracket(text).trim();
}
