#!/usr/bin/env node
/**
 * CLI command to check a handbook and compute a study plan.
 *
 * Runs the full pipeline (build, resolve, validate, plan) over an events
 * document and prints the diagnostics report, followed by the plan when the
 * graph is clean.
 *
 * Usage:
 *   node --import tsx src/cli/check-handbook.ts --events <path> [options]
 *   npm run check-handbook -- --events handbooks/sample-handbook.json
 *
 * Options:
 *   --events <path>   Events document (JSON), required
 *   --config <path>   Engine config (JSON), e.g. config/study-paths/one-week.json
 *   --budget <n>      Budget override (takes precedence over --config)
 *   --json            Output the report and plan as JSON (for CI parsing)
 *   --verbose         Log every stage at debug level
 *   -h, --help        Show help
 *
 * Exit codes:
 *   0 - Graph is clean (warnings allowed)
 *   1 - Graph has errors, or a fatal error stopped the run
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  config,
  ConfigError,
  DEFAULT_ENGINE_CONFIG,
  EngineConfigError,
  loadEngineConfigFile,
  resolveLogLevel,
} from "../config/index.js";
import { EventValidationError, loadEventsFile } from "../events/index.js";
import { PipelineError, runPipeline } from "../pipeline/index.js";
import { formatReport, formatStudyPlan } from "../diagnostics/index.js";
import { createLogger, type Logger } from "../logging/index.js";

// ============================================================
// Types
// ============================================================

export interface CliOptions {
  events?: string;
  config?: string;
  budget?: number;
  json: boolean;
  verbose: boolean;
  help: boolean;
}

export interface CheckResult {
  exitCode: 0 | 1;
  output: string;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = `
Usage: check-handbook --events <path> [options]

Options:
  --events <path>   Events document (JSON), required
  --config <path>   Engine config (JSON)
  --budget <n>      Budget override (takes precedence over --config)
  --json            Output the report and plan as JSON
  --verbose         Log every stage at debug level
  -h, --help        Show this help message
`;

// ============================================================
// CLI Parsing
// ============================================================

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * @throws CliUsageError on a missing --events or a malformed --budget
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      events: { type: "string" },
      config: { type: "string" },
      budget: { type: "string" },
      json: { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const options: CliOptions = {
    events: values.events,
    config: values.config,
    json: values.json ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };

  if (options.help) {
    return options;
  }

  if (!options.events) {
    throw new CliUsageError("Missing required option --events <path>");
  }

  if (values.budget !== undefined) {
    const budget = Number(values.budget);
    if (values.budget.trim() === "" || Number.isNaN(budget) || budget <= 0) {
      throw new CliUsageError(`--budget must be a positive number, got "${values.budget}"`);
    }
    options.budget = budget;
  }

  return options;
}

// ============================================================
// Check
// ============================================================

function loadConfigInput(options: CliOptions): unknown {
  const overrides = options.budget !== undefined ? { budget: options.budget } : {};
  if (options.config) {
    return loadEngineConfigFile(resolve(options.config), overrides);
  }
  return { ...DEFAULT_ENGINE_CONFIG, ...overrides };
}

function formatFatal(err: unknown): string {
  if (
    err instanceof PipelineError ||
    err instanceof EventValidationError ||
    err instanceof EngineConfigError
  ) {
    return err.format();
  }
  return `Error: ${err instanceof Error ? err.message : String(err)}`;
}

/**
 * Load the inputs, run the pipeline and render the result.
 * Fatal errors are rendered, not thrown.
 */
export function runCheck(options: CliOptions, logger?: Logger): CheckResult {
  if (!options.events) {
    return { exitCode: 1, output: `Error: Missing required option --events <path>\n${USAGE}` };
  }

  try {
    const document = loadEventsFile(resolve(options.events));
    const engineConfig = loadConfigInput(options);
    const { runId, graph, report, plan } = runPipeline(document.events, engineConfig, { logger });

    const exitCode = report.isClean ? 0 : 1;

    if (options.json) {
      return {
        exitCode,
        output: JSON.stringify(
          {
            runId,
            handbook: document.name ?? null,
            clean: report.isClean,
            errorCount: report.errorCount,
            warningCount: report.warningCount,
            stats: graph.getStats(),
            diagnostics: report.diagnostics,
            plan: plan ?? null,
          },
          null,
          2
        ),
      };
    }

    const sections = [formatReport(report)];
    if (plan) {
      sections.push(formatStudyPlan(plan));
    }
    return { exitCode, output: sections.join("\n\n") };
  } catch (err) {
    if (options.json) {
      return {
        exitCode: 1,
        output: JSON.stringify({ clean: false, fatal: formatFatal(err) }, null, 2),
      };
    }
    return { exitCode: 1, output: formatFatal(err) };
  }
}

// ============================================================
// Main
// ============================================================

function main(): void {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    console.error(USAGE);
    process.exit(1);
  }

  if (options.help) {
    console.log(USAGE);
    process.exit(0);
  }

  let logger: Logger;
  try {
    logger = createLogger({
      level: options.verbose ? "debug" : resolveLogLevel(config),
      console: !options.json,
      file: config.logToFile,
      logDir: config.logDir,
      logFile: `${config.appName}.log`,
    });
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(`Error: ${err.message}`);
    process.exit(1);
  }

  const result = runCheck(options, logger);
  console.log(result.output);
  process.exit(result.exitCode);
}

const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("check-handbook.ts") ||
   process.argv[1].endsWith("check-handbook.js"));

if (isDirectExecution) {
  main();
}
