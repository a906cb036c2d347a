/**
 * Document model builder.
 *
 * Turns a flat event sequence into a containment-only ContentGraph:
 *
 *   chapter_start "Strings"            → 1-strings
 *   section_start "String Pool"        → 1-strings.1-string-pool
 *   topic_item    "intern()"           → 1-strings.1-string-pool.1-intern
 *   topic_item    "Immutability" (d=3) → 1-strings.1-string-pool.1-intern.1-immutability
 *
 * PLACEMENT: a stack holds the open nodes with their declared depths. A new
 * section or topic pops every open node declared at the same depth or deeper;
 * whatever remains on top is its parent. A chapter closes everything.
 *
 * The build is all-or-nothing: a section or topic before the first chapter
 * throws StructureError(ORPHAN_AT_ROOT) and no graph is returned.
 */

import type { DocumentEvent } from "../events/schema.js";
import { referenceFreeTitle } from "../references/patterns.js";
import { StructureError } from "./errors.js";
import { ContentGraph } from "./graph.js";
import type { ContentNode, NodeKind } from "./types.js";

export interface BuildOptions {
  /**
   * Prefix each id segment with the sibling ordinal ("2-collections").
   * Default: true. Without it, repeated titles under one parent are
   * disambiguated with "-2", "-3", …
   */
  includeOrdinal?: boolean;
  /** Maximum length of the title part of an id segment. Default: 48 */
  maxSlugLength?: number;
}

/**
 * Result counters reported alongside the graph.
 */
export interface BuildSummary {
  events: number;
  nodes: number;
  /** Paragraphs seen before the first chapter (ignored) */
  preambleParagraphs: number;
}

interface DraftNode {
  id: string;
  kind: NodeKind;
  title: string;
  textParts: string[];
  depth: number;
  declaredDepth: number;
  ordinal: number;
  parentId?: string;
  children: string[];
  levelSkipped: boolean;
  sourceIndex: number;
}

/**
 * Turn a title into an id segment: lowercase, runs of anything other than
 * letters and digits collapsed to "-", trimmed to maxLength.
 */
export function slugify(title: string, maxLength = 48): string {
  const slug = title
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, maxLength)
    .replace(/-+$/g, "");

  return slug.length > 0 ? slug : "untitled";
}

/**
 * Build a containment graph from document events.
 *
 * @param events - Event sequence; iterated once
 * @param options - Id generation options
 * @throws StructureError if a section or topic precedes every chapter
 */
export function buildGraph(
  events: Iterable<DocumentEvent>,
  options: BuildOptions = {}
): ContentGraph {
  return buildGraphWithSummary(events, options).graph;
}

/**
 * Build a containment graph and report what was consumed.
 */
export function buildGraphWithSummary(
  events: Iterable<DocumentEvent>,
  options: BuildOptions = {}
): { graph: ContentGraph; summary: BuildSummary } {
  const { includeOrdinal = true, maxSlugLength = 48 } = options;

  const drafts: DraftNode[] = [];
  const usedIds = new Set<string>();
  const stack: DraftNode[] = [];
  let chapterCount = 0;
  let preambleParagraphs = 0;
  let eventCount = 0;

  function allocateId(parent: DraftNode | undefined, ordinal: number, title: string): string {
    const slug = slugify(title, maxSlugLength);
    const segment = includeOrdinal ? `${ordinal}-${slug}` : slug;
    const base = parent ? `${parent.id}.${segment}` : segment;

    let id = base;
    for (let n = 2; usedIds.has(id); n++) {
      id = `${base}-${n}`;
    }
    usedIds.add(id);
    return id;
  }

  function open(
    kind: NodeKind,
    sourceText: string,
    declaredDepth: number,
    parent: DraftNode | undefined,
    sourceIndex: number
  ): void {
    const ordinal = parent ? parent.children.length + 1 : chapterCount + 1;
    const title = referenceFreeTitle(sourceText);
    const node: DraftNode = {
      id: allocateId(parent, ordinal, title),
      kind,
      title,
      textParts: [sourceText],
      depth: parent ? parent.depth + 1 : 0,
      declaredDepth,
      ordinal,
      parentId: parent?.id,
      children: [],
      levelSkipped: parent ? declaredDepth - parent.declaredDepth > 1 : false,
      sourceIndex,
    };

    if (parent) {
      parent.children.push(node.id);
    } else {
      chapterCount++;
    }
    drafts.push(node);
    stack.push(node);
  }

  for (const event of events) {
    const index = eventCount++;

    switch (event.kind) {
      case "chapter_start": {
        stack.length = 0;
        open("chapter", event.title, event.depth, undefined, index);
        break;
      }
      case "section_start":
      case "topic_item": {
        const declaredDepth = event.depth;
        while (stack.length > 0 && (stack[stack.length - 1]?.declaredDepth ?? -1) >= declaredDepth) {
          stack.pop();
        }
        const parent = stack[stack.length - 1];
        const sourceText = event.kind === "section_start" ? event.title : event.text;
        if (!parent) {
          const what = event.kind === "section_start" ? "Section" : "Topic";
          throw new StructureError(
            "ORPHAN_AT_ROOT",
            `${what} "${sourceText}" appears before any chapter`,
            { eventIndex: index }
          );
        }
        open(event.kind === "section_start" ? "section" : "topic", sourceText, declaredDepth, parent, index);
        break;
      }
      case "paragraph": {
        const current = stack[stack.length - 1];
        const text = event.text.trim();
        if (!current) {
          preambleParagraphs++;
        } else if (text.length > 0) {
          current.textParts.push(text);
        }
        break;
      }
    }
  }

  const nodes: ContentNode[] = drafts.map((draft) => ({
    id: draft.id,
    kind: draft.kind,
    title: draft.title,
    text: draft.textParts.join("\n"),
    depth: draft.depth,
    ordinal: draft.ordinal,
    parentId: draft.parentId,
    children: draft.children,
    levelSkipped: draft.levelSkipped,
    sourceIndex: draft.sourceIndex,
  }));

  return {
    graph: ContentGraph.create(nodes),
    summary: { events: eventCount, nodes: nodes.length, preambleParagraphs },
  };
}
