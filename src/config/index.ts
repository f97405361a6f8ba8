/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
} from "./env.js";

export { ConfigError, optionalEnv, optionalEnvInt, optionalEnvBool } from "./env.js";

const ENVIRONMENTS: readonly string[] = ["development", "production", "test"];
const LOG_LEVELS: readonly string[] = ["debug", "info", "warn", "error"];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Application name, used as the root logger component */
  readonly appName: string;
  /** Directory holding one sub-directory per downloaded standard set */
  readonly standardSetsDir: string;
  /** Directory for log files */
  readonly logDir: string;
  /** Indentation of written processed.json files */
  readonly outputIndent: number;
}

/**
 * Load configuration from environment variables.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development", env),
    debug: optionalEnvBool("DEBUG", false, env),
    logLevel: optionalEnv("LOG_LEVEL", "info", env),
    appName: optionalEnv("APP_NAME", "standards-engine", env),
    standardSetsDir: optionalEnv("STANDARD_SETS_DIR", "data/raw/standardSets", env),
    logDir: optionalEnv("LOG_DIR", "output/logs", env),
    outputIndent: optionalEnvInt("OUTPUT_INDENT", 2, env),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate configuration values.
 * Call this at application startup to fail fast.
 */
export function validateConfig(cfg: AppConfig = config): void {
  if (!ENVIRONMENTS.includes(cfg.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${cfg.env}. Must be ${ENVIRONMENTS.join(", ")}.`
    );
  }

  if (!LOG_LEVELS.includes(cfg.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${cfg.logLevel}. Must be ${LOG_LEVELS.join(", ")}.`
    );
  }

  if (cfg.outputIndent < 0 || cfg.outputIndent > 10) {
    throw new ConfigError(
      `Invalid OUTPUT_INDENT: ${cfg.outputIndent}. Must be between 0 and 10.`
    );
  }
}
