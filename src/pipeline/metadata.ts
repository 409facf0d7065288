/**
 * Run metadata capture.
 *
 * Records where and from which checkout a pipeline run was made, so a
 * saved report can be traced back to the code that produced it.
 */

import { execSync } from "node:child_process";
import { hostname } from "node:os";
import { z } from "zod";

export const GitStateSchema = z
  .object({
    commitSha: z.string().regex(/^[a-f0-9]{40}$/),
    branch: z.string(),
    isDirty: z.boolean(),
  })
  .strict();

export type GitState = z.infer<typeof GitStateSchema>;

export const RunMetadataSchema = z
  .object({
    runId: z.string().min(1),
    hostname: z.string().optional(),
    nodeVersion: z.string(),
    git: GitStateSchema.optional(),
  })
  .strict();

export type RunMetadata = z.infer<typeof RunMetadataSchema>;

/**
 * Git state of the checkout at `cwd`.
 * Returns undefined if not in a git repository or git is unavailable.
 */
export function captureGitState(cwd: string = process.cwd()): GitState | undefined {
  const git = (args: string): string =>
    execSync(`git ${args}`, { cwd, stdio: "pipe" }).toString().trim();

  try {
    git("rev-parse --git-dir");
    return {
      commitSha: git("rev-parse HEAD"),
      branch: git("rev-parse --abbrev-ref HEAD"),
      isDirty: git("status --porcelain").length > 0,
    };
  } catch {
    // Not a git checkout
    return undefined;
  }
}

export interface RunMetadataOptions {
  runId: string;
  /** Checkout to describe; skipped when false */
  gitDir?: string | false;
}

export function createRunMetadata(options: RunMetadataOptions): RunMetadata {
  const metadata: RunMetadata = {
    runId: options.runId,
    hostname: hostname(),
    nodeVersion: process.version,
  };

  if (options.gitDir !== false) {
    const git = captureGitState(options.gitDir);
    if (git) {
      metadata.git = git;
    }
  }

  return metadata;
}
