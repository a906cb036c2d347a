/**
 * Engine configuration module.
 *
 * Usage:
 *   import { loadEngineConfig } from "./config/engine/index.js";
 *
 *   const config = loadEngineConfig({
 *     budget: 7,
 *     priorityOverrides: { "1-strings": 10 },
 *   });
 */

export type { EngineConfig, EngineConfigInput } from "./schema.js";
export { EngineConfigSchema } from "./schema.js";

export {
  loadEngineConfig,
  loadEngineConfigFile,
  validateEngineConfig,
  EngineConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_ENGINE_CONFIG } from "./defaults.js";
