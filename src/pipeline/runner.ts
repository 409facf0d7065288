/**
 * Sequential pipeline execution.
 *
 * Stages run strictly in declaration order. The first failure halts the
 * run; later stages are not attempted and nothing is rolled back, so a
 * re-run after fixing the cause skips straight to the failed stage.
 */

import {
  StageStatus,
  type Pipeline,
  type PipelineReport,
  type StageOutcome,
  type StagePlan,
} from "../types/index.js";
import type { ArtifactStore } from "../artifacts/index.js";
import type { Fetcher } from "../fetch/index.js";
import type { ArchiveExpander } from "../archive/index.js";
import { StageRunner, type Compressor } from "../stages/index.js";
import type { CompressionFormat } from "../types/index.js";
import { createSilentLogger, generateRunId, getRunId, type Logger } from "../logging/index.js";

export interface PipelineRunnerOptions {
  store: ArtifactStore;
  fetcher?: Fetcher;
  expander?: ArchiveExpander;
  compressors?: Partial<Record<CompressionFormat, Compressor>>;
  logger?: Logger;
  /** Defaults to the process run ID, or a fresh one */
  runId?: string;
}

export class PipelineRunner {
  private readonly stageRunner: StageRunner;
  private readonly logger: Logger;
  private readonly runId: string;

  constructor(
    private readonly pipeline: Pipeline,
    options: PipelineRunnerOptions
  ) {
    this.logger = (options.logger ?? createSilentLogger()).child({
      pipeline: pipeline.name,
    });
    this.runId = options.runId ?? getRunId() ?? generateRunId(pipeline.name);
    this.stageRunner = new StageRunner({
      root: pipeline.root,
      store: options.store,
      fetcher: options.fetcher,
      expander: options.expander,
      compressors: options.compressors,
      logger: this.logger,
    });
  }

  /**
   * Which stages a run would skip. No side effects.
   */
  async plan(): Promise<StagePlan[]> {
    const plans: StagePlan[] = [];
    for (const stage of this.pipeline.stages) {
      const missingOutputs = await this.stageRunner.missingOutputs(stage);
      plans.push({
        stage: stage.name,
        kind: stage.kind,
        willSkip: missingOutputs.length === 0,
        missingOutputs,
      });
    }
    return plans;
  }

  /**
   * Run every stage in order, halting at the first failure.
   * Stage errors are reported, not thrown.
   */
  async run(): Promise<PipelineReport> {
    const startedAt = new Date().toISOString();
    const outcomes: StageOutcome[] = [];

    this.logger.info("Pipeline starting", {
      runId: this.runId,
      stages: this.pipeline.stages.length,
    });

    for (const stage of this.pipeline.stages) {
      const stageStart = Date.now();
      try {
        const result = await this.stageRunner.run(stage);
        outcomes.push({
          stage: stage.name,
          kind: stage.kind,
          status: result.status,
          durationMs: result.durationMs,
          artifacts: result.artifacts,
        });
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        outcomes.push({
          stage: stage.name,
          kind: stage.kind,
          status: StageStatus.Failed,
          durationMs: Date.now() - stageStart,
          artifacts: [],
          error,
        });

        this.logger.error("Pipeline halted", { stage: stage.name, error: error.message });
        return {
          pipeline: this.pipeline.name,
          runId: this.runId,
          startedAt,
          finishedAt: new Date().toISOString(),
          status: "failed",
          outcomes,
          failure: { stage: stage.name, error },
        };
      }
    }

    this.logger.info("Pipeline finished", {
      executed: outcomes.filter((o) => o.status === StageStatus.Succeeded).length,
      skipped: outcomes.filter((o) => o.status === StageStatus.Skipped).length,
    });

    return {
      pipeline: this.pipeline.name,
      runId: this.runId,
      startedAt,
      finishedAt: new Date().toISOString(),
      status: "succeeded",
      outcomes,
    };
  }
}
