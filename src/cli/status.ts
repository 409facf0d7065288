#!/usr/bin/env node
/**
 * Show which stages of the IEDB pipeline a run would execute.
 *
 * Usage:
 *   npx tsx src/cli/status.ts [options]
 *   npm run status
 *
 * Options:
 *   --json      Output the plan as JSON
 *   -h, --help  Show help
 *
 * Exit codes:
 *   0 - every stage is up to date
 *   2 - at least one stage would run
 *   1 - configuration or definition error
 */

import { parseArgs } from "node:util";
import { loadConfig, ConfigError } from "../config/index.js";
import { PipelineRunner, formatPlan } from "../pipeline/index.js";
import { createPipelineContext } from "./bootstrap.js";

const HELP = `Usage: ligand-pipeline-status [--json] [-h]

Lists every stage of the pipeline with whether its outputs are present.

Options:
  --json      Output the plan as JSON
  -h, --help  Show help`;

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  });

  if (values.help) {
    console.log(HELP);
    return 0;
  }

  const config = loadConfig();
  const { store, pipeline } = await createPipelineContext(config, {
    console: false,
    file: false,
  });

  const plans = await new PipelineRunner(pipeline, { store }).plan();

  if (values.json) {
    console.log(JSON.stringify(plans, null, 2));
  } else {
    console.log(`Pipeline ${pipeline.name} at ${pipeline.root}\n`);
    console.log(formatPlan(plans));
  }

  return plans.every((p) => p.willSkip) ? 0 : 2;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err instanceof ConfigError ? err.format() : err instanceof Error ? err.message : err);
    process.exitCode = 1;
  }
);
