/**
 * Event loading tests.
 *
 * Run: node --import tsx src/events/loader.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  EventValidationError,
  formatEventIssues,
  loadEvents,
  loadEventsFile,
  loadEventsOrThrow,
  parseEvents,
} from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function withTempDir(fn: (dir: string) => void): void {
  const dir = mkdtempSync(join(tmpdir(), "handbook-events-"));
  try {
    fn(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

const validDocument = {
  version: "1.0.0",
  name: "Demo handbook",
  events: [
    { kind: "chapter_start", title: "  Basics " },
    { kind: "section_start", title: "Intro" },
    { kind: "topic_item", text: "Hello world" },
    { kind: "paragraph", text: "Some prose." },
  ],
};

// ═══════════════════════════════════════════════════════════════════════════
// DOCUMENTS
// ═══════════════════════════════════════════════════════════════════════════

section("Event documents");

test("valid document loads with depth defaults", () => {
  const result = loadEvents(validDocument);
  assert.equal(result.success, true);
  assert.equal(result.document?.name, "Demo handbook");
  assert.deepEqual(result.events, [
    { kind: "chapter_start", title: "Basics", depth: 0 },
    { kind: "section_start", title: "Intro", depth: 1 },
    { kind: "topic_item", text: "Hello world", depth: 2 },
    { kind: "paragraph", text: "Some prose." },
  ]);
});

test("explicit depths are kept", () => {
  const result = loadEvents({
    version: "1.0.0",
    events: [
      { kind: "chapter_start", title: "A" },
      { kind: "topic_item", text: "Deep", depth: 4 },
    ],
  });
  assert.equal(result.success, true);
  assert.deepEqual(result.events?.[1], { kind: "topic_item", text: "Deep", depth: 4 });
});

test("bad version is a document-level issue", () => {
  const result = loadEvents({ ...validDocument, version: "1.0" });
  assert.equal(result.success, false);
  assert.deepEqual(result.errors, [
    { field: "version", message: "Version must be semver (x.y.z)" },
  ]);
});

test("non-object input is reported at the root", () => {
  const result = loadEvents("not a document");
  assert.equal(result.success, false);
  assert.equal(result.errors?.length, 1);
  assert.equal(result.errors?.[0]?.field, "(root)");
  assert.equal(result.errors?.[0]?.eventIndex, undefined);
});

// ═══════════════════════════════════════════════════════════════════════════
// EVENT ISSUES
// ═══════════════════════════════════════════════════════════════════════════

section("Event issues");

test("blank title points at the event index", () => {
  const result = loadEvents({
    version: "1.0.0",
    events: [
      { kind: "chapter_start", title: "A" },
      { kind: "section_start", title: "   " },
    ],
  });
  assert.equal(result.success, false);
  assert.deepEqual(result.errors, [
    { eventIndex: 1, field: "title", message: "Section title must not be empty" },
  ]);
});

test("unknown event kind is reported on the kind field", () => {
  const result = loadEvents({ version: "1.0.0", events: [{ kind: "heading", title: "A" }] });
  assert.equal(result.success, false);
  assert.equal(result.errors?.[0]?.eventIndex, 0);
  assert.equal(result.errors?.[0]?.field, "kind");
});

test("unexpected keys are reported against the whole event", () => {
  const result = loadEvents({
    version: "1.0.0",
    events: [{ kind: "paragraph", text: "x", style: "bold" }],
  });
  assert.equal(result.success, false);
  assert.equal(result.errors?.[0]?.eventIndex, 0);
  assert.equal(result.errors?.[0]?.field, "(event)");
});

test("section depth below 1 is rejected", () => {
  const result = loadEvents({
    version: "1.0.0",
    events: [
      { kind: "chapter_start", title: "A" },
      { kind: "section_start", title: "B", depth: 0 },
    ],
  });
  assert.deepEqual(result.errors, [
    { eventIndex: 1, field: "depth", message: "Section depth must be at least 1" },
  ]);
});

test("loadEventsOrThrow throws EventValidationError with issues", () => {
  assert.throws(
    () => loadEventsOrThrow({ ...validDocument, version: "one" }),
    (err: unknown) => {
      assert.ok(err instanceof EventValidationError);
      assert.equal(err.message, "Event validation failed: 1 error(s)");
      assert.equal(err.issues.length, 1);
      assert.equal(
        err.format(),
        "Event validation failed:\n  - [document] version: Version must be semver (x.y.z)"
      );
      return true;
    }
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// IN-CODE EVENTS
// ═══════════════════════════════════════════════════════════════════════════

section("parseEvents");

test("parseEvents applies defaults", () => {
  const events = parseEvents([
    { kind: "chapter_start", title: "A" },
    { kind: "topic_item", text: "t" },
  ]);
  assert.deepEqual(events, [
    { kind: "chapter_start", title: "A", depth: 0 },
    { kind: "topic_item", text: "t", depth: 2 },
  ]);
});

test("parseEvents reports every invalid event by index", () => {
  assert.throws(
    () =>
      parseEvents([
        { kind: "topic_item", text: "" },
        { kind: "chapter_start", title: "ok" },
        { kind: "section_start", title: "" },
      ]),
    (err: unknown) => {
      assert.ok(err instanceof EventValidationError);
      assert.deepEqual(err.issues, [
        { eventIndex: 0, field: "text", message: "Topic text must not be empty" },
        { eventIndex: 2, field: "title", message: "Section title must not be empty" },
      ]);
      return true;
    }
  );
});

test("formatEventIssues renders one line per issue", () => {
  const text = formatEventIssues([
    { eventIndex: 3, field: "title", message: "Section title must not be empty" },
    { field: "version", message: "Version must be semver (x.y.z)" },
  ]);
  assert.equal(
    text,
    "  - [event 3] title: Section title must not be empty\n" +
      "  - [document] version: Version must be semver (x.y.z)"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// FILES
// ═══════════════════════════════════════════════════════════════════════════

section("Event files");

test("loadEventsFile reads a JSON document", () => {
  withTempDir((dir) => {
    const path = join(dir, "handbook.json");
    writeFileSync(path, JSON.stringify(validDocument));
    const document = loadEventsFile(path);
    assert.equal(document.version, "1.0.0");
    assert.equal(document.events.length, 4);
  });
});

test("loadEventsFile reports an unreadable file", () => {
  withTempDir((dir) => {
    assert.throws(
      () => loadEventsFile(join(dir, "missing.json")),
      (err: unknown) => {
        assert.ok(err instanceof EventValidationError);
        assert.equal(err.issues[0]?.field, "(file)");
        return true;
      }
    );
  });
});

test("loadEventsFile reports malformed JSON", () => {
  withTempDir((dir) => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");
    assert.throws(
      () => loadEventsFile(path),
      (err: unknown) => err instanceof EventValidationError && err.issues[0]?.field === "(file)"
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
