/**
 * Event document loader.
 *
 * Responsible for:
 * - Validating raw event documents (JSON) against the event schema
 * - Pointing every problem at the event index it came from
 * - Applying declared-depth defaults
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import {
  DocumentEventSchema,
  EventDocumentSchema,
  type DocumentEvent,
  type DocumentEventInput,
  type EventDocument,
} from "./schema.js";

/**
 * Individual event validation issue.
 */
export interface EventIssue {
  /** Index of the offending event, when the issue is inside `events` */
  eventIndex?: number;
  /** Dotted path inside the event (or document) */
  field: string;
  /** Human-readable error message */
  message: string;
}

/**
 * Validation error for event loading.
 */
export class EventValidationError extends Error {
  public readonly issues: EventIssue[];

  constructor(message: string, issues: EventIssue[]) {
    super(message);
    this.name = "EventValidationError";
    this.issues = issues;
  }

  format(): string {
    return ["Event validation failed:", formatEventIssues(this.issues)].join("\n");
  }
}

/**
 * Result of loading an events document.
 */
export interface EventLoadResult {
  success: boolean;
  document?: EventDocument;
  events?: DocumentEvent[];
  errors?: EventIssue[];
}

function toEventIssue(issue: ZodIssue, basePath: (string | number)[] = []): EventIssue {
  const path = [...basePath, ...issue.path];
  const eventIndex = path[1];

  if (path[0] === "events" && typeof eventIndex === "number") {
    const rest = path.slice(2).join(".");
    return { eventIndex, field: rest || "(event)", message: issue.message };
  }

  return { field: path.join(".") || "(root)", message: issue.message };
}

/**
 * Load and validate an events document.
 *
 * @param input - Raw `{ version, name?, events }` object
 * @returns Validated events or the list of issues
 */
export function loadEvents(input: unknown): EventLoadResult {
  const result = EventDocumentSchema.safeParse(input);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => toEventIssue(issue)),
    };
  }

  return { success: true, document: result.data, events: result.data.events };
}

/**
 * Load an events document, throwing on error.
 *
 * @throws EventValidationError if validation fails
 */
export function loadEventsOrThrow(input: unknown): DocumentEvent[] {
  const result = loadEvents(input);

  if (!result.success || !result.events) {
    const errors = result.errors ?? [];
    throw new EventValidationError(
      `Event validation failed: ${errors.length} error(s)`,
      errors
    );
  }

  return result.events;
}

/**
 * Read and validate an events document from a JSON file.
 *
 * @throws EventValidationError if the file is unreadable or invalid
 */
export function loadEventsFile(path: string): EventDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new EventValidationError(`Cannot read events from ${path}`, [
      { field: "(file)", message: reason },
    ]);
  }

  const result = loadEvents(raw);
  if (!result.success || !result.document) {
    const errors = result.errors ?? [];
    throw new EventValidationError(
      `Event validation failed for ${path}: ${errors.length} error(s)`,
      errors
    );
  }

  return result.document;
}

/**
 * Validate events built in code and apply depth defaults.
 *
 * @throws EventValidationError naming the first invalid events
 */
export function parseEvents(inputs: readonly DocumentEventInput[]): DocumentEvent[] {
  const events: DocumentEvent[] = [];
  const issues: EventIssue[] = [];

  inputs.forEach((input, index) => {
    const result = DocumentEventSchema.safeParse(input);
    if (result.success) {
      events.push(result.data);
    } else {
      issues.push(
        ...result.error.issues.map((issue) => toEventIssue(issue, ["events", index]))
      );
    }
  });

  if (issues.length > 0) {
    throw new EventValidationError(
      `Event validation failed: ${issues.length} error(s)`,
      issues
    );
  }

  return events;
}

/**
 * Format event issues, one per line.
 *
 * @example Output:
 *   - [event 3] title: Section title must not be empty
 *   - [document] version: Version must be semver (x.y.z)
 */
export function formatEventIssues(issues: readonly EventIssue[]): string {
  return issues
    .map((issue) => {
      const location =
        issue.eventIndex !== undefined ? `[event ${issue.eventIndex}]` : "[document]";
      return `  - ${location} ${issue.field}: ${issue.message}`;
    })
    .join("\n");
}
