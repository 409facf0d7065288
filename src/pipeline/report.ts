/**
 * Pipeline report formatting and persistence.
 *
 * Reports are saved as pipeline-{runId}.json, next to the log file of the
 * same run ID.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import {
  StageStatus,
  type PipelineReport,
  type StageOutcome,
  type StagePlan,
} from "../types/index.js";
import { StageExecutionError, StageError } from "../stages/index.js";
import { RunMetadataSchema, type RunMetadata } from "./metadata.js";

const SerializedErrorSchema = z
  .object({
    name: z.string(),
    message: z.string(),
    stage: z.string().optional(),
    exitCode: z.number().int().nullable().optional(),
    capturedOutput: z.string().optional(),
  })
  .strict();

const SerializedOutcomeSchema = z
  .object({
    stage: z.string(),
    kind: z.enum(["command", "fetch", "expand"]),
    status: z.enum([StageStatus.Skipped, StageStatus.Succeeded, StageStatus.Failed]),
    durationMs: z.number().min(0),
    artifacts: z.array(
      z.object({ name: z.string(), path: z.string(), checksum: z.string().optional() }).strict()
    ),
    error: SerializedErrorSchema.optional(),
  })
  .strict();

export const SerializedReportSchema = z
  .object({
    pipeline: z.string(),
    runId: z.string().min(1),
    startedAt: z.string().datetime(),
    finishedAt: z.string().datetime(),
    status: z.enum(["succeeded", "failed"]),
    outcomes: z.array(SerializedOutcomeSchema),
    failure: z.object({ stage: z.string(), error: SerializedErrorSchema }).strict().optional(),
    metadata: RunMetadataSchema.optional(),
  })
  .strict();

export type SerializedReport = z.infer<typeof SerializedReportSchema>;
export type SerializedError = z.infer<typeof SerializedErrorSchema>;

export class ReportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ReportError";
  }
}

export function serializeError(error: Error): SerializedError {
  const serialized: SerializedError = { name: error.name, message: error.message };
  if (error instanceof StageError) {
    serialized.stage = error.stageName;
  }
  if (error instanceof StageExecutionError) {
    serialized.exitCode = error.exitCode;
    serialized.capturedOutput = error.capturedOutput;
  }
  return serialized;
}

function serializeOutcome(outcome: StageOutcome): SerializedReport["outcomes"][number] {
  return {
    stage: outcome.stage,
    kind: outcome.kind,
    status: outcome.status,
    durationMs: outcome.durationMs,
    artifacts: outcome.artifacts.map((a) =>
      a.checksum === undefined
        ? { name: a.name, path: a.path }
        : { name: a.name, path: a.path, checksum: a.checksum }
    ),
    ...(outcome.error ? { error: serializeError(outcome.error) } : {}),
  };
}

export function serializeReport(
  report: PipelineReport,
  metadata?: RunMetadata
): SerializedReport {
  return {
    pipeline: report.pipeline,
    runId: report.runId,
    startedAt: report.startedAt,
    finishedAt: report.finishedAt,
    status: report.status,
    outcomes: report.outcomes.map(serializeOutcome),
    ...(report.failure
      ? { failure: { stage: report.failure.stage, error: serializeError(report.failure.error) } }
      : {}),
    ...(metadata ? { metadata } : {}),
  };
}

export function getReportFilename(runId: string): string {
  return `pipeline-${runId}.json`;
}

/**
 * Write a report to `directory` and return the file path.
 */
export async function saveReport(
  report: PipelineReport,
  directory: string,
  metadata?: RunMetadata
): Promise<string> {
  const filePath = join(directory, getReportFilename(report.runId));
  await mkdir(directory, { recursive: true });
  await writeFile(filePath, JSON.stringify(serializeReport(report, metadata), null, 2) + "\n");
  return filePath;
}

/**
 * Read a saved report.
 *
 * @throws ReportError if the file is unreadable or not a report
 */
export async function loadReport(filePath: string): Promise<SerializedReport> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(filePath, "utf-8"));
  } catch (err) {
    throw new ReportError(`Failed to read report ${filePath}`, { cause: err });
  }

  const result = SerializedReportSchema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ReportError(`Invalid report ${filePath}: ${errors}`);
  }
  return result.data;
}

const STATUS_ICONS: Record<StageOutcome["status"], string> = {
  [StageStatus.Succeeded]: "✓",
  [StageStatus.Skipped]: "-",
  [StageStatus.Failed]: "✗",
};

/**
 * Human-readable summary of a report.
 */
export function formatReport(report: PipelineReport): string {
  const lines = [`Pipeline ${report.pipeline} (run ${report.runId}): ${report.status}`];

  for (const outcome of report.outcomes) {
    lines.push(
      `  ${STATUS_ICONS[outcome.status]} ${outcome.stage.padEnd(28)} ${outcome.status}`
    );
  }

  if (report.failure) {
    lines.push("");
    lines.push(`Failed stage: ${report.failure.stage}`);
    lines.push(`  ${report.failure.error.name}: ${report.failure.error.message}`);
    const error = report.failure.error;
    if (error instanceof StageExecutionError && error.capturedOutput.trim() !== "") {
      lines.push("  Output (tail):");
      for (const line of error.capturedOutput.trimEnd().split("\n").slice(-20)) {
        lines.push(`    ${line}`);
      }
    }
  }

  return lines.join("\n");
}

/**
 * Human-readable listing of a plan.
 */
export function formatPlan(plans: readonly StagePlan[]): string {
  const lines: string[] = [];
  for (const plan of plans) {
    const state = plan.willSkip ? "up to date" : "will run";
    lines.push(`  ${plan.willSkip ? "-" : "*"} ${plan.stage.padEnd(28)} ${plan.kind.padEnd(8)} ${state}`);
    for (const path of plan.missingOutputs) {
      lines.push(`      missing ${path}`);
    }
  }
  const pending = plans.filter((p) => !p.willSkip).length;
  lines.push("");
  lines.push(`${pending} of ${plans.length} stage(s) would run`);
  return lines.join("\n");
}
