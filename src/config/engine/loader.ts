/**
 * Engine configuration loader and validator.
 *
 * Responsible for:
 * - Loading configuration from plain objects or JSON files
 * - Validating against the schema with fail-fast behavior
 * - Producing structured error messages
 * - Freezing configuration so no stage can alter it mid-run
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import { EngineConfigSchema, type EngineConfig } from "./schema.js";

/**
 * Structured validation error for engine configuration.
 */
export class EngineConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "EngineConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Engine configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "file" for unreadable input */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return Object.freeze(obj);
}

/**
 * Validate and load engine configuration.
 *
 * @param input - Raw configuration object to validate
 * @returns Validated, defaulted and frozen EngineConfig
 * @throws EngineConfigError if validation fails
 */
export function loadEngineConfig(input: unknown): Readonly<EngineConfig> {
  const result = EngineConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new EngineConfigError(
      `Invalid engine configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Read a JSON config file and load it.
 *
 * @param path - Path to a JSON file holding an engine config object
 * @param overrides - Values that take precedence over the file (e.g. a CLI --budget)
 * @throws EngineConfigError if the file cannot be read, is not JSON, or fails validation
 */
export function loadEngineConfigFile(
  path: string,
  overrides: Record<string, unknown> = {}
): Readonly<EngineConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new EngineConfigError(`Cannot read engine configuration from ${path}`, [
      { path: [], message: reason, code: "file" },
    ]);
  }

  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    return loadEngineConfig(raw);
  }

  return loadEngineConfig({ ...raw, ...overrides });
}

/**
 * Validate engine configuration without loading.
 *
 * @param input - Raw configuration object to validate
 * @returns Validation result with success status and any errors
 */
export function validateEngineConfig(input: unknown): {
  success: boolean;
  config?: EngineConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = EngineConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}
