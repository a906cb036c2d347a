/**
 * Document event schema.
 *
 * A handbook reaches the engine as a flat, ordered sequence of events
 * produced by some outline parser:
 *
 *   chapter_start  "Java Strings"             (depth 0)
 *   section_start  "String Pool"              (depth 1)
 *   topic_item     "intern() and [[equals]]"  (depth 2)
 *   paragraph      "See also: Collections."   (attached to the last node)
 *
 * Depths are the ones the parser declared (heading level, bullet indent).
 * The builder uses them to find each node's parent; a topic declared at
 * depth 2 directly under a chapter is legal and is recorded as a skipped
 * level rather than rejected.
 */

import { z } from "zod";

export const ChapterStartSchema = z
  .object({
    kind: z.literal("chapter_start"),
    title: z.string().trim().min(1, "Chapter title must not be empty"),
    depth: z.literal(0).default(0),
  })
  .strict();

export const SectionStartSchema = z
  .object({
    kind: z.literal("section_start"),
    title: z.string().trim().min(1, "Section title must not be empty"),
    depth: z.number().int().min(1, "Section depth must be at least 1").default(1),
  })
  .strict();

export const TopicItemSchema = z
  .object({
    kind: z.literal("topic_item"),
    text: z.string().trim().min(1, "Topic text must not be empty"),
    depth: z.number().int().min(1, "Topic depth must be at least 1").default(2),
  })
  .strict();

export const ParagraphSchema = z
  .object({
    kind: z.literal("paragraph"),
    text: z.string(),
  })
  .strict();

export const DocumentEventSchema = z.discriminatedUnion("kind", [
  ChapterStartSchema,
  SectionStartSchema,
  TopicItemSchema,
  ParagraphSchema,
]);

/** A validated event (depths defaulted). */
export type DocumentEvent = z.infer<typeof DocumentEventSchema>;

/** An event as a parser may emit it (depth optional). */
export type DocumentEventInput = z.input<typeof DocumentEventSchema>;

export type ChapterStart = z.infer<typeof ChapterStartSchema>;
export type SectionStart = z.infer<typeof SectionStartSchema>;
export type TopicItem = z.infer<typeof TopicItemSchema>;
export type Paragraph = z.infer<typeof ParagraphSchema>;

/**
 * Schema for an events document on disk.
 */
export const EventDocumentSchema = z.object({
  /** Format version; bump major on breaking event changes. */
  version: z.string().regex(/^\d+\.\d+\.\d+$/, "Version must be semver (x.y.z)"),

  /** Optional handbook name, used in reports only. */
  name: z.string().optional(),

  events: z.array(DocumentEventSchema),
});

export type EventDocument = z.infer<typeof EventDocumentSchema>;
