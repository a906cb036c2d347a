/**
 * Document event input.
 *
 * Events are the boundary between an outline parser and the engine. They
 * can be produced in code (any Iterable<DocumentEvent>) or loaded from a
 * JSON events document with loadEvents()/loadEventsOrThrow().
 */

export {
  DocumentEventSchema,
  EventDocumentSchema,
  ChapterStartSchema,
  SectionStartSchema,
  TopicItemSchema,
  ParagraphSchema,
  type DocumentEvent,
  type DocumentEventInput,
  type EventDocument,
  type ChapterStart,
  type SectionStart,
  type TopicItem,
  type Paragraph,
} from "./schema.js";

export {
  loadEvents,
  loadEventsOrThrow,
  loadEventsFile,
  parseEvents,
  formatEventIssues,
  EventValidationError,
  type EventIssue,
  type EventLoadResult,
} from "./loader.js";
