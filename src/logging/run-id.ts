/**
 * Run and load ID generation.
 *
 * The run ID tags every log line of a process. Each archive load gets its
 * own load ID so reloads can be told apart in the logs.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

/**
 * Generate an ID for one archive load, e.g. "load-5f3a9c1d".
 */
export function generateLoadId(): string {
  return `load-${randomBytes(4).toString("hex")}`;
}

let currentRunId: string | null = null;

/**
 * Initialize a new run ID for this process.
 * Should be called once at startup.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
