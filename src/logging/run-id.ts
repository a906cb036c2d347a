/**
 * Run ID generation and management.
 * Each ingestion run gets a unique run ID so log lines and reports can be
 * traced back to it.
 */

import { randomBytes } from "node:crypto";

const RUN_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

/** Current run ID for this execution */
let currentRunId: string | null = null;

/**
 * Initialize the run ID for this execution.
 * Pass an explicit ID to correlate with an external job; otherwise one is
 * generated.
 */
export function initRunId(explicitId?: string): string {
  if (explicitId !== undefined && !RUN_ID_PATTERN.test(explicitId)) {
    throw new Error(`Invalid run ID "${explicitId}": use letters, digits, "-" or "_"`);
  }
  currentRunId = explicitId ?? generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID.
 * Returns null if not initialized.
 */
export function getRunId(): string | null {
  return currentRunId;
}

/**
 * Forget the current run ID.
 */
export function resetRunId(): void {
  currentRunId = null;
}
