/**
 * End-to-end run: events in, graph, report and plan out.
 */

export {
  runPipeline,
  PipelineError,
  type PipelineStage,
  type PipelineItem,
  type PipelineOptions,
  type PipelineResult,
} from "./pipeline.js";
