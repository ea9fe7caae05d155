/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { join, resolve } from "node:path";

import { isLogLevel, type LogLevel } from "../logging/logger.js";
import {
  ConfigError,
  optionalEnv,
  optionalEnvList,
  type EnvSource,
} from "./env.js";

export {
  ConfigError,
  optionalEnv,
  optionalEnvList,
  type EnvSource,
} from "./env.js";

export type AppEnvironment = "development" | "production" | "test";

const ENVIRONMENTS: readonly AppEnvironment[] = ["development", "production", "test"];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: AppEnvironment;
  /** Log level */
  readonly logLevel: LogLevel;
  /** Append log lines to this file; console only when null */
  readonly logFile: string | null;
  /** Application name */
  readonly appName: string;
  /** Root directory of the exported archive */
  readonly dataPath: string;
  /** Directory holding the archive's image assets */
  readonly imagesPath: string;
  /** Extensions (with leading dot) recognized as topic files */
  readonly topicExtensions: readonly string[];
}

function isEnvironment(value: string): value is AppEnvironment {
  return (ENVIRONMENTS as readonly string[]).includes(value);
}

function normalizeExtension(ext: string): string {
  const lower = ext.toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

/**
 * Load and validate application configuration.
 * Fails fast on values that cannot be used.
 */
export function loadConfig(env: EnvSource = process.env): AppConfig {
  const nodeEnv = optionalEnv("NODE_ENV", "development", env);
  if (!isEnvironment(nodeEnv)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${nodeEnv}. Must be development, production, or test.`
    );
  }

  const logLevel = optionalEnv("LOG_LEVEL", "info", env);
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${logLevel}. Must be debug, info, warn, or error.`
    );
  }

  const dataPath = resolve(optionalEnv("ARCHIVE_DATA_PATH", "./data", env));
  const imagesPath = resolve(
    optionalEnv("ARCHIVE_IMAGES_PATH", join(dataPath, "images"), env)
  );

  const config: AppConfig = {
    env: nodeEnv,
    logLevel,
    logFile: env["LOG_FILE"] ? resolve(env["LOG_FILE"]) : null,
    appName: optionalEnv("APP_NAME", "forum-archive", env),
    dataPath,
    imagesPath,
    topicExtensions: optionalEnvList("ARCHIVE_TOPIC_EXTENSIONS", [".md"], env).map(
      normalizeExtension
    ),
  };

  validateConfig(config);
  return Object.freeze(config);
}

/**
 * Validate cross-field constraints that single-variable parsing cannot catch.
 */
export function validateConfig(config: AppConfig): void {
  if (config.topicExtensions.length === 0) {
    throw new ConfigError(
      "ARCHIVE_TOPIC_EXTENSIONS must name at least one extension (e.g. .md)"
    );
  }

  for (const ext of config.topicExtensions) {
    if (!/^\.[a-z0-9]+$/.test(ext)) {
      throw new ConfigError(
        `Invalid topic extension "${ext}". Use letters and digits only, e.g. .md`
      );
    }
  }
}
