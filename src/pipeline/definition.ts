/**
 * Pipeline definition and validation.
 *
 * Stage order is fixed at definition time, so validation is a single
 * forward pass: every non-external input must already have been declared
 * as an output by an earlier stage.
 */

import { isAbsolute } from "node:path";
import { finalPath, type Pipeline, type Stage } from "../types/index.js";
import { findPlaceholders, PipelineDefinitionError } from "../stages/index.js";

/** Pipeline names prefix run IDs and report file names */
const PIPELINE_NAME = /^[a-z0-9][a-z0-9-]*$/;

/**
 * Problems found in a pipeline definition, in stage order.
 */
export function validatePipeline(pipeline: Pipeline): string[] {
  const problems: string[] = [];
  const stageNames = new Set<string>();
  const produced = new Map<string, string>();

  if (!PIPELINE_NAME.test(pipeline.name)) {
    problems.push(
      `pipeline name "${pipeline.name}" may only contain lowercase letters, digits and dashes`
    );
  }
  if (!isAbsolute(pipeline.root)) {
    problems.push(`root must be an absolute path, got "${pipeline.root}"`);
  }

  for (const stage of pipeline.stages) {
    const where = `stage "${stage.name}"`;

    if (stage.name.trim() === "") {
      problems.push("stage names must not be empty");
    }
    if (stageNames.has(stage.name)) {
      problems.push(`${where}: duplicate stage name`);
    }
    stageNames.add(stage.name);

    problems.push(...checkNames(stage, where));

    for (const input of stage.inputs) {
      if (!isAbsolute(input.path)) {
        problems.push(`${where}: input "${input.name}" path must be absolute`);
      }
      if (!input.external && !produced.has(input.path)) {
        problems.push(
          `${where}: input "${input.name}" (${input.path}) is not produced by an earlier stage`
        );
      }
    }

    for (const output of stage.outputs) {
      if (!isAbsolute(output.path)) {
        problems.push(`${where}: output "${output.name}" path must be absolute`);
      }
      const path = finalPath(output);
      const owner = produced.get(path);
      if (owner !== undefined) {
        problems.push(`${where}: output ${path} is already produced by stage "${owner}"`);
      }
      produced.set(path, stage.name);
    }

    problems.push(...checkKind(stage, where));
  }

  return problems;
}

function checkNames(stage: Stage, where: string): string[] {
  const problems: string[] = [];
  for (const [role, specs] of [
    ["input", stage.inputs],
    ["output", stage.outputs],
  ] as const) {
    const seen = new Set<string>();
    for (const spec of specs) {
      if (seen.has(spec.name)) {
        problems.push(`${where}: duplicate ${role} name "${spec.name}"`);
      }
      seen.add(spec.name);
    }
  }
  return problems;
}

function checkKind(stage: Stage, where: string): string[] {
  const problems: string[] = [];

  switch (stage.kind) {
    case "command": {
      if (stage.commands.length === 0) {
        problems.push(`${where}: no commands`);
      }
      const inputs = new Set(stage.inputs.map((input) => input.name));
      const outputs = new Set(stage.outputs.map((output) => output.name));
      for (const command of stage.commands) {
        for (const placeholder of command.args.flatMap(findPlaceholders)) {
          const names = placeholder.role === "input" ? inputs : outputs;
          if (!names.has(placeholder.name)) {
            problems.push(
              `${where}: placeholder {${placeholder.role}:${placeholder.name}} has no matching ${placeholder.role}`
            );
          }
        }
      }
      break;
    }
    case "fetch":
      if (stage.outputs[0].compress !== undefined) {
        problems.push(`${where}: a download cannot be compressed`);
      }
      break;
    case "expand":
      if (!stage.inputs.some((input) => input.name === stage.archive)) {
        problems.push(`${where}: archive "${stage.archive}" is not one of its inputs`);
      }
      if (!isAbsolute(stage.destination)) {
        problems.push(`${where}: destination must be an absolute path`);
      }
      if (stage.outputs.length === 0) {
        problems.push(`${where}: declare at least one expected member`);
      }
      break;
  }

  return problems;
}

/**
 * Validate and freeze a pipeline definition.
 *
 * @throws PipelineDefinitionError listing every problem
 */
export function definePipeline(pipeline: Pipeline): Readonly<Pipeline> {
  const problems = validatePipeline(pipeline);
  if (problems.length > 0) {
    throw new PipelineDefinitionError(
      `Invalid pipeline "${pipeline.name}": ${problems.length} problem(s)`,
      problems
    );
  }
  return Object.freeze({ ...pipeline, stages: Object.freeze([...pipeline.stages]) });
}
