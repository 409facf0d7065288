/**
 * Shared startup for the command-line entry points.
 */

import type { AppConfig } from "../config/index.js";
import { ArtifactStore } from "../artifacts/index.js";
import { createIedbPipeline, createLayout, type WorkspaceLayout } from "../datasets/index.js";
import { createLogger, type Logger } from "../logging/index.js";
import type { Pipeline, PipelineReport } from "../types/index.js";
import { StageExecutionError } from "../stages/index.js";

export interface PipelineContext {
  readonly layout: WorkspaceLayout;
  readonly logger: Logger;
  readonly store: ArtifactStore;
  readonly pipeline: Readonly<Pipeline>;
}

export async function createPipelineContext(
  config: Readonly<AppConfig>,
  options: { console?: boolean; file?: boolean } = {}
): Promise<PipelineContext> {
  const layout = createLayout(config.workDir);
  const logger = createLogger({
    level: config.logLevel,
    logDir: layout.logDir,
    console: options.console ?? true,
    file: options.file ?? true,
  });

  const pipeline = createIedbPipeline({
    workDir: config.workDir,
    toolsDir: config.toolsDir,
    scriptsDir: config.scriptsDir,
    python: config.python,
  });

  const store = await ArtifactStore.open({
    manifestPath: layout.manifestPath,
    verifyChecksums: config.verifyChecksums,
    logger,
  });

  return { layout, logger, store, pipeline };
}

/**
 * Process exit code for a finished run: 0 on success, the failing tool's
 * status when it has one, 1 otherwise.
 */
export function exitCodeFor(report: PipelineReport): number {
  if (report.status === "succeeded") {
    return 0;
  }
  const error = report.failure?.error;
  if (
    error instanceof StageExecutionError &&
    error.exitCode !== null &&
    error.exitCode > 0 &&
    error.exitCode < 256
  ) {
    return error.exitCode;
  }
  return 1;
}
