/**
 * Stage error taxonomy.
 *
 * None of these are retried. The pipeline halts on the first one and
 * reports it with the name of the stage that raised it.
 */

/**
 * Base class for errors raised while running a stage.
 */
export class StageError extends Error {
  public readonly stageName: string;

  constructor(message: string, stageName: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StageError";
    this.stageName = stageName;
  }
}

/**
 * An external program exited non-zero, was killed, or could not start.
 */
export class StageExecutionError extends StageError {
  /** Exit status; null when killed by a signal or never started */
  public readonly exitCode: number | null;
  public readonly signal: string | null;
  /** Tail of the combined stdout and stderr */
  public readonly capturedOutput: string;
  /** Command line that failed */
  public readonly command: string;

  constructor(
    stageName: string,
    details: {
      exitCode: number | null;
      signal: string | null;
      capturedOutput: string;
      command: string;
    },
    options?: ErrorOptions
  ) {
    const status =
      details.exitCode !== null
        ? `exited with status ${details.exitCode}`
        : details.signal !== null
          ? `was killed by ${details.signal}`
          : "could not be started";
    super(`Stage "${stageName}": command ${status}: ${details.command}`, stageName, options);
    this.name = "StageExecutionError";
    this.exitCode = details.exitCode;
    this.signal = details.signal;
    this.capturedOutput = details.capturedOutput;
    this.command = details.command;
  }
}

/**
 * The action succeeded but a declared output is missing.
 * The contract between the pipeline definition and the tool is broken.
 */
export class StageContractViolation extends StageError {
  public readonly missingOutput: string;

  constructor(stageName: string, missingOutput: string) {
    super(
      `Stage "${stageName}" succeeded but did not produce declared output ${missingOutput}`,
      stageName
    );
    this.name = "StageContractViolation";
    this.missingOutput = missingOutput;
  }
}

/**
 * Post-processing (compression) of an output failed.
 */
export class PostProcessError extends StageError {
  public readonly output: string;

  constructor(stageName: string, output: string, options?: ErrorOptions) {
    const reason =
      options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Stage "${stageName}": post-processing of ${output} failed${reason}`, stageName, options);
    this.name = "PostProcessError";
    this.output = output;
  }
}

/**
 * A declared input is absent when the stage is about to run.
 */
export class MissingInputError extends StageError {
  public readonly missingInput: string;

  constructor(stageName: string, missingInput: string) {
    super(`Stage "${stageName}" is missing input ${missingInput}`, stageName);
    this.name = "MissingInputError";
    this.missingInput = missingInput;
  }
}

/**
 * The pipeline definition itself is inconsistent.
 */
export class PipelineDefinitionError extends Error {
  public readonly problems: readonly string[];

  constructor(message: string, problems: readonly string[] = []) {
    super(problems.length > 0 ? `${message}\n  - ${problems.join("\n  - ")}` : message);
    this.name = "PipelineDefinitionError";
    this.problems = problems;
  }
}
