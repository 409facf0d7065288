/**
 * Stage execution.
 *
 * Runs one stage against the artifact store:
 *   1. all outputs valid          -> Skipped, nothing else happens
 *   2. inputs present             -> else MissingInputError
 *   3. outputs marked pending, action runs
 *   4. non-zero exit              -> StageExecutionError
 *   5. declared output missing    -> StageContractViolation
 *   6. outputs compressed         -> else PostProcessError
 *   7. outputs registered final   -> Succeeded
 *
 * Each stage moves Pending -> {Skipped | Running -> {Succeeded | Failed}}.
 */

import { rm } from "node:fs/promises";
import {
  StageStatus,
  toArtifact,
  type Artifact,
  type CommandStage,
  type CompressionFormat,
  type ExpandStage,
  type FetchStage,
  type OutputSpec,
  type Stage,
  type StageResult,
} from "../types/index.js";
import { ArtifactStore, fileExists } from "../artifacts/index.js";
import { Fetcher } from "../fetch/index.js";
import { ArchiveExpander } from "../archive/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import { formatCommand, resolveCommand, runCommand, OUTPUT_LIMIT_BYTES } from "./command.js";
import { DEFAULT_COMPRESSORS, type Compressor } from "./post-process.js";
import {
  MissingInputError,
  PipelineDefinitionError,
  PostProcessError,
  StageContractViolation,
  StageExecutionError,
} from "./errors.js";

const TRANSITIONS: Record<StageStatus, readonly StageStatus[]> = {
  [StageStatus.Pending]: [StageStatus.Skipped, StageStatus.Running],
  [StageStatus.Running]: [StageStatus.Succeeded, StageStatus.Failed],
  [StageStatus.Skipped]: [],
  [StageStatus.Succeeded]: [],
  [StageStatus.Failed]: [],
};

/**
 * Status of a single stage execution. Terminal states cannot be left.
 */
export class StageExecution {
  private current: StageStatus = StageStatus.Pending;

  constructor(
    public readonly stageName: string,
    private readonly logger: Logger
  ) {}

  get status(): StageStatus {
    return this.current;
  }

  transition(next: StageStatus): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(
        `Stage "${this.stageName}" cannot move from ${this.current} to ${next}`
      );
    }
    this.logger.debug("Stage status", { from: this.current, to: next });
    this.current = next;
  }
}

export interface StageRunnerOptions {
  /** Pipeline root; relative command working directories resolve here */
  root: string;
  store: ArtifactStore;
  fetcher?: Fetcher;
  expander?: ArchiveExpander;
  compressors?: Partial<Record<CompressionFormat, Compressor>>;
  outputLimit?: number;
  logger?: Logger;
}

export class StageRunner {
  private readonly root: string;
  private readonly store: ArtifactStore;
  private readonly fetcher: Fetcher;
  private readonly expander: ArchiveExpander;
  private readonly compressors: Record<CompressionFormat, Compressor>;
  private readonly outputLimit: number;
  private readonly logger: Logger;

  constructor(options: StageRunnerOptions) {
    this.root = options.root;
    this.store = options.store;
    this.logger = options.logger ?? createSilentLogger();
    this.fetcher = options.fetcher ?? new Fetcher({ logger: this.logger });
    this.expander = options.expander ?? new ArchiveExpander({ logger: this.logger });
    this.compressors = { ...DEFAULT_COMPRESSORS, ...options.compressors };
    this.outputLimit = options.outputLimit ?? OUTPUT_LIMIT_BYTES;
  }

  /**
   * Final paths of a stage's outputs that are not yet valid.
   */
  async missingOutputs(stage: Stage): Promise<string[]> {
    return this.store.missing(stage.outputs.map((output) => toArtifact(output).path));
  }

  /**
   * Run a stage.
   *
   * @throws StageError subclasses, FetchError or ExpandError on failure
   */
  async run(stage: Stage): Promise<StageResult> {
    const logger = this.logger.child({ stage: stage.name });
    const execution = new StageExecution(stage.name, logger);
    const startedAt = Date.now();
    const finals = stage.outputs.map(toArtifact);

    const missing = await this.missingOutputs(stage);
    if (missing.length === 0) {
      execution.transition(StageStatus.Skipped);
      logger.info("Stage skipped, outputs present");
      return {
        stage: stage.name,
        status: StageStatus.Skipped,
        artifacts: finals.map((artifact) => this.withRecordedChecksum(artifact)),
        durationMs: Date.now() - startedAt,
      };
    }

    execution.transition(StageStatus.Running);
    logger.info("Stage running", { kind: stage.kind, missing });

    try {
      await this.checkInputs(stage);
      await this.store.markPending(
        finals.map((artifact) => artifact.path),
        stage.name
      );

      switch (stage.kind) {
        case "command":
          await this.runCommands(stage, logger);
          break;
        case "fetch":
          await this.runFetch(stage);
          break;
        case "expand":
          await this.runExpand(stage);
          break;
      }

      await this.checkOutputs(stage);
      await this.postProcess(stage, logger);

      const artifacts: Artifact[] = [];
      for (const artifact of finals) {
        artifacts.push(await this.store.register(artifact, stage.name));
      }

      execution.transition(StageStatus.Succeeded);
      const durationMs = Date.now() - startedAt;
      logger.info("Stage succeeded", { durationMs });
      return { stage: stage.name, status: StageStatus.Succeeded, artifacts, durationMs };
    } catch (err) {
      execution.transition(StageStatus.Failed);
      logger.error("Stage failed", {
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  private withRecordedChecksum(artifact: Artifact): Artifact {
    const checksum = this.store.record(artifact.path)?.checksum;
    return checksum === undefined ? artifact : { ...artifact, checksum };
  }

  private async checkInputs(stage: Stage): Promise<void> {
    for (const input of stage.inputs) {
      if (!(await this.store.isValid(input.path))) {
        throw new MissingInputError(stage.name, input.path);
      }
    }
  }

  private async runCommands(stage: CommandStage, logger: Logger): Promise<void> {
    // Stale raw files would hide a tool that writes nothing
    for (const output of stage.outputs) {
      await rm(output.path, { force: true });
    }

    const bindings = {
      inputs: new Map(stage.inputs.map((input) => [input.name, input.path])),
      outputs: new Map(stage.outputs.map((output) => [output.name, output.path])),
    };

    for (const spec of stage.commands) {
      const command = resolveCommand(spec, bindings, this.root);
      const commandLine = formatCommand(command);
      logger.info("Running command", { command: commandLine, cwd: command.cwd });

      const result = await runCommand(command, this.outputLimit);
      if (result.exitCode !== 0) {
        throw new StageExecutionError(
          stage.name,
          {
            exitCode: result.exitCode,
            signal: result.signal,
            capturedOutput: result.error ? result.error.message : result.output,
            command: commandLine,
          },
          result.error ? { cause: result.error } : undefined
        );
      }
      logger.debug("Command finished", { command: commandLine });
    }
  }

  private async runFetch(stage: FetchStage): Promise<void> {
    const [output] = stage.outputs;
    // Present but invalid (pending or checksum mismatch): fetch again
    await rm(output.path, { force: true });
    await this.fetcher.fetchResource({ url: stage.resource.url, destination: output.path });
  }

  private async runExpand(stage: ExpandStage): Promise<void> {
    const archive = stage.inputs.find((input) => input.name === stage.archive);
    if (archive === undefined) {
      throw new PipelineDefinitionError(
        `Stage "${stage.name}" expands unknown input "${stage.archive}"`
      );
    }
    await this.expander.expand(archive.path, stage.destination);
  }

  private async checkOutputs(stage: Stage): Promise<void> {
    for (const output of stage.outputs) {
      if (!(await fileExists(output.path))) {
        throw new StageContractViolation(stage.name, output.path);
      }
    }
  }

  private async postProcess(stage: Stage, logger: Logger): Promise<void> {
    const compressed = stage.outputs.filter(
      (output): output is OutputSpec & { compress: CompressionFormat } =>
        output.compress !== undefined
    );

    for (const output of compressed) {
      logger.info("Compressing output", { path: output.path, format: output.compress });
      try {
        await this.compressors[output.compress](output.path);
      } catch (err) {
        throw new PostProcessError(stage.name, output.path, { cause: err });
      }
    }
  }
}
