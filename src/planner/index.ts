/**
 * Study planning over a clean content graph.
 */

export {
  planStudy,
  createStudyPlan,
  PlanningError,
  type PlanningErrorKind,
  type PlanOptions,
  type PlanResult,
  type StudyPlan,
  type StudyPlanStep,
} from "./planner.js";
