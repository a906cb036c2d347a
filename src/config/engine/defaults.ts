/**
 * Default engine configuration.
 *
 * One effort unit per node and no priorities: with a large enough budget
 * the plan is the handbook read top to bottom.
 */

import type { EngineConfig } from "./schema.js";

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  budget: 100,
  effortOverrides: {},
  priorityOverrides: {},
  defaultEffort: 1,
};
