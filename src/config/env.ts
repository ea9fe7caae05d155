/**
 * Environment variable loading and validation.
 *
 * Every helper reads from an explicit {@link EnvSource}, which defaults to
 * `process.env` after `.env` has been applied.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Key/value source the helpers read from. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

function readEnv(env: EnvSource, key: string): string | undefined {
  const value = env[key];
  return value !== undefined && value !== "" ? value : undefined;
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(
  key: string,
  defaultValue: string,
  env: EnvSource = process.env
): string {
  return readEnv(env, key) ?? defaultValue;
}

/**
 * Get an optional comma-separated list. Entries are trimmed; empty entries
 * are dropped.
 */
export function optionalEnvList(
  key: string,
  defaultValue: readonly string[],
  env: EnvSource = process.env
): string[] {
  const value = readEnv(env, key);
  if (value === undefined) {
    return [...defaultValue];
  }
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}
