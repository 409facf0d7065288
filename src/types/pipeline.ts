/**
 * Pipeline and stage definitions.
 * A pipeline is an ordered chain of stages; each stage declares the files it
 * reads and the files it promises to write.
 */

import type { Artifact, InputSpec, OutputSpec, RemoteResource } from "./artifact.js";

export enum StageStatus {
  Pending = "pending",
  Running = "running",
  Succeeded = "succeeded",
  Skipped = "skipped",
  Failed = "failed",
}

/**
 * External program invocation.
 * `args` may contain `{input:<name>}` and `{output:<name>}` placeholders.
 */
export interface CommandSpec {
  readonly program: string;
  readonly args: readonly string[];
  /** Working directory of the child process (defaults to the pipeline root) */
  readonly cwd?: string;
}

export interface StageMetadata {
  readonly name: string;
  readonly description?: string;
}

export interface CommandStage extends StageMetadata {
  readonly kind: "command";
  readonly inputs: readonly InputSpec[];
  readonly outputs: readonly OutputSpec[];
  /** Run in order; the first failure stops the stage */
  readonly commands: readonly CommandSpec[];
}

export interface FetchStage extends StageMetadata {
  readonly kind: "fetch";
  /** Destination comes from the single output */
  readonly resource: Pick<RemoteResource, "url">;
  readonly inputs: readonly InputSpec[];
  /** Exactly one output: the download destination */
  readonly outputs: readonly [OutputSpec];
}

export interface ExpandStage extends StageMetadata {
  readonly kind: "expand";
  /** Name of the input holding the archive */
  readonly archive: string;
  /** Directory the archive is unpacked into */
  readonly destination: string;
  readonly inputs: readonly InputSpec[];
  /** Members the archive is expected to contain */
  readonly outputs: readonly OutputSpec[];
}

export type Stage = CommandStage | FetchStage | ExpandStage;

export type StageKind = Stage["kind"];

export interface Pipeline {
  readonly name: string;
  /** Root directory; relative command working directories resolve here */
  readonly root: string;
  readonly stages: readonly Stage[];
}

export interface StageResult {
  readonly stage: string;
  readonly status: StageStatus.Skipped | StageStatus.Succeeded;
  /** Final artifacts, registered in the store */
  readonly artifacts: readonly Artifact[];
  readonly durationMs: number;
}

export interface StageOutcome {
  readonly stage: string;
  readonly kind: StageKind;
  readonly status: StageStatus.Skipped | StageStatus.Succeeded | StageStatus.Failed;
  readonly durationMs: number;
  readonly artifacts: readonly Artifact[];
  /** Present when status is Failed */
  readonly error?: Error;
}

export interface PipelineFailure {
  readonly stage: string;
  readonly error: Error;
}

export interface PipelineReport {
  readonly pipeline: string;
  readonly runId: string;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly status: "succeeded" | "failed";
  /** Attempted stages, in order; stages after a failure are absent */
  readonly outcomes: readonly StageOutcome[];
  readonly failure?: PipelineFailure;
}

export interface StagePlan {
  readonly stage: string;
  readonly kind: StageKind;
  readonly willSkip: boolean;
  readonly missingOutputs: readonly string[];
}
