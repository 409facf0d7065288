/**
 * Run IDs.
 *
 * One per pipeline invocation, shared by its log lines and its saved
 * report. Format: `<pipeline>-<YYYYMMDD>-<hex6>`,
 * e.g. "iedb-20240115-a1b2c3", so a report file name says which pipeline
 * and day it came from.
 */

import { randomBytes } from "node:crypto";

export function generateRunId(pipeline: string, now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  return `${pipeline}-${datePart}-${randomBytes(3).toString("hex")}`;
}

let currentRunId: string | null = null;

/**
 * Set the process-wide run ID. Called once at startup, before the first
 * log line.
 */
export function initRunId(pipeline: string): string {
  currentRunId = generateRunId(pipeline);
  return currentRunId;
}

export function getRunId(): string | null {
  return currentRunId;
}
