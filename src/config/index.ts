/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, optionalEnv, optionalEnvBool } from "./env.js";
import { isLogLevel, type LogLevel } from "../logging/index.js";

export { ConfigError, requireEnv, optionalEnv, optionalEnvInt, optionalEnvBool } from "./env.js";

// Engine (planner/budget) configuration
export * from "./engine/index.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level as read from LOG_LEVEL; checked by validateConfig() */
  readonly logLevel: string;
  /** Application name */
  readonly appName: string;
  /** Directory for log files */
  readonly logDir: string;
  /** Append log lines to a file in logDir */
  readonly logToFile: boolean;
}

/**
 * Load application configuration from an environment map.
 * Exposed for tests; the application uses the `config` singleton.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development", env),
    logLevel: optionalEnv("LOG_LEVEL", "info", env),
    appName: optionalEnv("APP_NAME", "handbook-graph", env),
    logDir: optionalEnv("LOG_DIR", "output/logs", env),
    logToFile: optionalEnvBool("LOG_TO_FILE", false, env),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate that the configuration is usable.
 * Call this at application startup to fail fast.
 */
export function validateConfig(appConfig: AppConfig = config): void {
  if (!ENVIRONMENTS.some((env) => env === appConfig.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${appConfig.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(appConfig.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${appConfig.logLevel}. Must be debug, info, warn, or error.`
    );
  }
}

/**
 * The configured log level, validated.
 */
export function resolveLogLevel(appConfig: AppConfig = config): LogLevel {
  validateConfig(appConfig);
  return isLogLevel(appConfig.logLevel) ? appConfig.logLevel : "info";
}
