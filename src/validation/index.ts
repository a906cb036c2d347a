/**
 * Graph validation.
 */

export {
  validateGraph,
  validateGraphWithSummary,
  checkDanglingReferences,
  checkOrphanNodes,
  checkPrerequisiteCycles,
  checkNumbering,
  ROOT_PARENT,
  type GraphValidationResult,
} from "./validator.js";
