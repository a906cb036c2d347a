/**
 * Handbook graph engine.
 *
 * Builds a chapter → section → topic graph from document events, resolves
 * cross references and prerequisites, validates the result and plans a
 * study order within a budget.
 *
 * @example
 *   import { runPipeline } from "handbook-graph";
 *
 *   const { report, plan } = runPipeline(events, { budget: 20 });
 */

export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./events/index.js";
export * from "./graph/index.js";
export * from "./references/index.js";
export * from "./validation/index.js";
export * from "./planner/index.js";
export * from "./diagnostics/index.js";
export * from "./pipeline/index.js";
