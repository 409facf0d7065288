#!/usr/bin/env node
/**
 * Entry point: runs the whole IEDB dataset pipeline, top to bottom.
 *
 * Takes no flags. Configuration comes from the environment (see .env.example).
 *
 * Exit codes:
 *   0       - every stage succeeded or was skipped
 *   1-255   - the failing tool's exit status, or 1 for any other failure
 *   130/143 - interrupted by SIGINT/SIGTERM
 */

import { loadConfig, ConfigError } from "./config/index.js";
import { initRunId } from "./logging/index.js";
import { PipelineRunner, createRunMetadata, formatReport, saveReport } from "./pipeline/index.js";
import { PipelineDefinitionError } from "./stages/index.js";
import { IEDB_PIPELINE_NAME } from "./datasets/index.js";
import { createPipelineContext, exitCodeFor } from "./cli/bootstrap.js";

async function main(): Promise<number> {
  const runId = initRunId(IEDB_PIPELINE_NAME);
  const config = loadConfig();
  const { layout, logger, store, pipeline } = await createPipelineContext(config);

  for (const [signal, code] of [
    ["SIGINT", 130],
    ["SIGTERM", 143],
  ] as const) {
    process.once(signal, () => {
      logger.warn("Interrupted, aborting", { signal });
      process.exit(code);
    });
  }

  logger.info("Pipeline invocation", {
    runId,
    workDir: config.workDir,
    toolsDir: config.toolsDir,
  });

  const runner = new PipelineRunner(pipeline, { store, logger, runId });
  const report = await runner.run();

  const reportPath = await saveReport(
    report,
    layout.reportDir,
    createRunMetadata({ runId, gitDir: config.scriptsDir })
  );

  console.log(`\n${formatReport(report)}\n`);
  logger.info("Report saved", { path: reportPath });

  return exitCodeFor(report);
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof ConfigError || err instanceof PipelineDefinitionError) {
      console.error(err instanceof ConfigError ? err.format() : err.message);
    } else {
      console.error("Pipeline failed:", err);
    }
    process.exitCode = 1;
  }
);
