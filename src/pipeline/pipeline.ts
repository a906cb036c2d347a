/**
 * Handbook pipeline.
 *
 *   events ─▶ load ─▶ build ─▶ resolve ─▶ validate ─┬─▶ plan ─▶ report
 *                                                   └─(not clean)──▶ report
 *
 * Validation findings flow into the report. Anything fatal (bad input,
 * structure errors, ambiguous references, planner refusals) is logged and
 * rethrown as a PipelineError naming the stage and the input item.
 */

import { loadEngineConfig, EngineConfigError } from "../config/engine/index.js";
import { EventValidationError, parseEvents, type DocumentEventInput } from "../events/index.js";
import { buildGraphWithSummary, StructureError, type BuildOptions, type ContentGraph } from "../graph/index.js";
import { AmbiguousReferenceError, resolveReferencesWithSummary } from "../references/index.js";
import { validateGraphWithSummary } from "../validation/index.js";
import { createStudyPlan, PlanningError, type StudyPlan } from "../planner/index.js";
import { createReport, type Diagnostic, type DiagnosticReport } from "../diagnostics/index.js";
import { createSilentLogger, initRunId, type Logger } from "../logging/index.js";

export type PipelineStage = "load" | "build" | "resolve" | "plan";

/**
 * Where in the input a fatal error was raised.
 */
export interface PipelineItem {
  eventIndex?: number;
  nodeId?: string;
}

export class PipelineError extends Error {
  public readonly stage: PipelineStage;
  public readonly item: PipelineItem;

  constructor(stage: PipelineStage, message: string, item: PipelineItem, cause: unknown) {
    super(message, { cause });
    this.name = "PipelineError";
    this.stage = stage;
    this.item = item;
  }

  format(): string {
    const where: string[] = [];
    if (this.item.eventIndex !== undefined) where.push(`event ${this.item.eventIndex}`);
    if (this.item.nodeId !== undefined) where.push(`node ${this.item.nodeId}`);
    const location = where.length > 0 ? ` (${where.join(", ")})` : "";
    const detail = hasFormat(this.cause) ? `\n${this.cause.format()}` : "";
    return `PIPELINE FAILED at ${this.stage}${location}: ${this.message}${detail}`;
  }
}

function hasFormat(value: unknown): value is { format(): string } {
  return value instanceof StructureError ||
    value instanceof AmbiguousReferenceError ||
    value instanceof PlanningError ||
    value instanceof EventValidationError ||
    value instanceof EngineConfigError;
}

function itemOf(err: unknown): PipelineItem {
  if (err instanceof StructureError) {
    return { eventIndex: err.eventIndex, nodeId: err.nodeId };
  }
  if (err instanceof AmbiguousReferenceError) {
    return { nodeId: err.nodeId };
  }
  if (err instanceof PlanningError) {
    return { nodeId: err.nodeIds[0] };
  }
  if (err instanceof EventValidationError) {
    return { eventIndex: err.issues[0]?.eventIndex };
  }
  return {};
}

export interface PipelineOptions {
  /** Defaults to a silent logger */
  logger?: Logger;
  /** Explicit run id; otherwise a fresh one per run */
  runId?: string;
  build?: BuildOptions;
}

export interface PipelineResult {
  runId: string;
  graph: ContentGraph;
  report: DiagnosticReport;
  /** Present only when the graph is clean */
  plan?: StudyPlan;
}

/**
 * Run every stage over one handbook.
 *
 * @param events - Events as a parser emits them; validated here
 * @param engineConfig - Raw engine configuration; validated here
 * @throws PipelineError on any fatal stage error
 */
export function runPipeline(
  events: readonly DocumentEventInput[],
  engineConfig: unknown,
  options: PipelineOptions = {}
): PipelineResult {
  const log = (options.logger ?? createSilentLogger()).child("pipeline");

  function stage<T>(name: PipelineStage, work: () => T): T {
    try {
      return work();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      const item = itemOf(err);
      log.error(`${name} failed: ${message}`, { stage: name, ...item });
      throw new PipelineError(name, message, item, err);
    }
  }

  // Every run gets its own id unless the caller supplies one.
  const runId = stage("load", () => initRunId(options.runId));
  log.info("Pipeline started", { events: events.length });

  const { parsed, config } = stage("load", () => ({
    parsed: parseEvents(events),
    config: loadEngineConfig(engineConfig),
  }));

  const built = stage("build", () => buildGraphWithSummary(parsed, options.build));
  log.child("builder").debug("Graph built", { ...built.summary });

  const resolved = stage("resolve", () => resolveReferencesWithSummary(built.graph));
  log.child("resolver").debug("References resolved", { ...resolved.summary });

  const validation = validateGraphWithSummary(resolved.graph);
  log.child("validator").info("Validation finished", {
    errors: validation.errorCount,
    warnings: validation.warningCount,
  });

  let plan: StudyPlan | undefined;
  let plannerDiagnostics: Diagnostic[] = [];

  if (validation.isClean) {
    const result = stage("plan", () => createStudyPlan(resolved.graph, config));
    plan = result.plan;
    plannerDiagnostics = result.diagnostics;
    log.child("planner").info("Plan computed", {
      steps: plan.steps.length,
      deferred: plan.deferred.length,
      totalCost: plan.totalCost,
    });
  } else {
    log.child("planner").warn("Planning skipped: graph has errors", {
      errors: validation.errorCount,
    });
  }

  const report = createReport(validation.diagnostics, plannerDiagnostics);
  log.info("Pipeline finished", { clean: report.isClean, diagnostics: report.diagnostics.length });

  return { runId, graph: resolved.graph, report, plan };
}
