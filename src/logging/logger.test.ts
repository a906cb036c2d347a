/**
 * Logger and run ID tests.
 *
 * Run: node --import tsx src/logging/logger.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  createLogger,
  formatLogEntry,
  generateRunId,
  getRunId,
  initRunId,
  isLogLevel,
  resetRunId,
  type LogEntry,
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

function capture(level: "debug" | "info" | "warn" | "error" = "debug") {
  const entries: LogEntry[] = [];
  const logger = createLogger({
    level,
    console: false,
    file: false,
    sink: (entry) => entries.push(entry),
  });
  return { logger, entries };
}

// ═══════════════════════════════════════════════════════════════════════════
// RUN IDS
// ═══════════════════════════════════════════════════════════════════════════

section("Run IDs");

test("generateRunId uses the date prefix", () => {
  const id = generateRunId(new Date("2024-03-09T12:00:00Z"));
  assert.match(id, /^20240309-[0-9a-f]{6}$/);
});

test("initRunId accepts an explicit id", () => {
  assert.equal(initRunId("nightly-42"), "nightly-42");
  assert.equal(getRunId(), "nightly-42");
});

test("initRunId rejects ids with spaces", () => {
  assert.throws(() => initRunId("bad id"), /Invalid run ID/);
});

test("resetRunId clears the current id", () => {
  initRunId("temp");
  resetRunId();
  assert.equal(getRunId(), null);
});

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER
// ═══════════════════════════════════════════════════════════════════════════

section("Logger");

test("entries below the level are dropped", () => {
  const { logger, entries } = capture("warn");
  logger.info("ignored");
  logger.warn("kept");
  assert.equal(entries.length, 1);
  assert.equal(entries[0]?.message, "kept");
});

test("entries carry the run id or a placeholder", () => {
  resetRunId();
  const { logger, entries } = capture();
  logger.info("before");
  initRunId("run-7");
  logger.info("after");
  assert.equal(entries[0]?.runId, "no-run-id");
  assert.equal(entries[1]?.runId, "run-7");
  resetRunId();
});

test("child loggers nest their scope", () => {
  const entries: LogEntry[] = [];
  const logger = createLogger({
    scope: "pipeline",
    console: false,
    sink: (entry) => entries.push(entry),
  });
  logger.child("planner").info("planned");
  assert.equal(entries[0]?.scope, "pipeline:planner");
});

test("formatLogEntry renders scope and context", () => {
  const line = formatLogEntry({
    timestamp: "2024-01-15T10:00:00.000Z",
    level: "info",
    runId: "20240115-a1b2c3",
    scope: "validator",
    message: "checks complete",
    context: { errors: 0 },
  });
  assert.equal(
    line,
    '[2024-01-15T10:00:00.000Z] [INFO ] [20240115-a1b2c3] [validator] checks complete {"errors":0}'
  );
});

test("formatLogEntry omits empty context", () => {
  const line = formatLogEntry({
    timestamp: "t",
    level: "error",
    runId: "r",
    message: "boom",
    context: {},
  });
  assert.equal(line, "[t] [ERROR] [r] boom");
});

test("file output appends formatted lines", () => {
  const dir = mkdtempSync(join(tmpdir(), "handbook-log-"));
  try {
    initRunId("file-run");
    const logger = createLogger({ console: false, file: true, logDir: dir, logFile: "t.log" });
    logger.info("one");
    logger.debug("skipped");
    logger.warn("two");
    const lines = readFileSync(join(dir, "t.log"), "utf-8").trim().split("\n");
    assert.equal(lines.length, 2);
    assert.ok(lines[0]?.endsWith("[file-run] one"));
    assert.ok(lines[1]?.endsWith("[file-run] two"));
  } finally {
    resetRunId();
    rmSync(dir, { recursive: true, force: true });
  }
});

test("isLogLevel narrows strings", () => {
  assert.equal(isLogLevel("warn"), true);
  assert.equal(isLogLevel("verbose"), false);
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
