/**
 * Tests for pipeline definition, execution and reporting.
 *
 * Run: node --import tsx src/pipeline/pipeline.test.ts
 *
 * Tests cover:
 *   1. Definition validation (ordering, names, placeholders)
 *   2. Idempotent re-runs
 *   3. Fail-fast halting
 *   4. Resumption after a fix
 *   5. Report formatting and persistence
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync, readFileSync, existsSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { ArtifactStore, defaultManifestPath } from "../artifacts/index.js";
import { PipelineDefinitionError, StageExecutionError } from "../stages/index.js";
import { StageStatus, type CommandSpec, type Pipeline, type Stage } from "../types/index.js";
import { exitCodeFor } from "../cli/bootstrap.js";
import { generateRunId } from "../logging/index.js";
import {
  definePipeline,
  formatPlan,
  formatReport,
  loadReport,
  PipelineRunner,
  saveReport,
  validatePipeline,
} from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => Promise<void> | void): Promise<void> {
  try {
    await fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

const TMP_ROOT = mkdtempSync(join(tmpdir(), "ligand-pipeline-"));
let counter = 0;

function freshRoot(): string {
  const dir = join(TMP_ROOT, `case-${++counter}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

function node(script: string, ...args: string[]): CommandSpec {
  return { program: process.execPath, args: ["-e", script, ...args] };
}

/** Appends "." to argv[1] (a run counter), then writes argv[3] to argv[2] */
const COUNT_AND_WRITE =
  "const fs = require('fs'); fs.appendFileSync(process.argv[1], '.'); fs.writeFileSync(process.argv[2], process.argv[3])";

/** Like COUNT_AND_WRITE, but exits 4 unless argv[4] exists */
const WRITE_IF_FIXED =
  "const fs = require('fs'); fs.appendFileSync(process.argv[1], '.'); if (!fs.existsSync(process.argv[4])) { process.stderr.write('reference missing'); process.exit(4); } fs.writeFileSync(process.argv[2], process.argv[3])";

async function runOnce(pipeline: Pipeline) {
  const store = await ArtifactStore.open({ manifestPath: defaultManifestPath(pipeline.root) });
  return new PipelineRunner(pipeline, { store, runId: "test-run" }).run();
}

function statuses(report: { outcomes: readonly { status: StageStatus }[] }): StageStatus[] {
  return report.outcomes.map((o) => o.status);
}

/**
 * Stage A (no inputs, produces raw.csv) and stage B (reads raw.csv,
 * produces curated.csv.gz). B fails with status 4 until `fixFlag` exists
 * when one is given.
 */
function twoStagePipeline(root: string, fixFlag?: string): Pipeline {
  const raw = join(root, "raw.csv");
  const stages: Stage[] = [
    {
      kind: "command",
      name: "A",
      inputs: [],
      outputs: [{ name: "raw", path: raw }],
      commands: [node(COUNT_AND_WRITE, join(root, "runs-a"), "{output:raw}", "allele,peptide\n")],
    },
    {
      kind: "command",
      name: "B",
      inputs: [{ name: "raw", path: raw }],
      outputs: [{ name: "curated", path: join(root, "curated.csv"), compress: "gzip" }],
      commands: [
        fixFlag === undefined
          ? node(COUNT_AND_WRITE, join(root, "runs-b"), "{output:curated}", "curated\n")
          : node(WRITE_IF_FIXED, join(root, "runs-b"), "{output:curated}", "curated\n", fixFlag),
      ],
    },
  ];
  return definePipeline({ name: "two-stage", root, stages });
}

// ═══════════════════════════════════════════════════════════════════════════
// DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

section("Definition");

await test("valid pipeline is frozen", () => {
  const pipeline = twoStagePipeline("/w");
  assert.equal(Object.isFrozen(pipeline), true);
  assert.equal(Object.isFrozen(pipeline.stages), true);
});

await test("input consumed before it is produced is rejected", () => {
  const stages: Stage[] = [
    {
      kind: "command",
      name: "consumer",
      inputs: [{ name: "raw", path: "/w/raw.csv" }],
      outputs: [{ name: "out", path: "/w/out.csv" }],
      commands: [node("0")],
    },
    {
      kind: "command",
      name: "producer",
      inputs: [],
      outputs: [{ name: "raw", path: "/w/raw.csv" }],
      commands: [node("0")],
    },
  ];
  assert.deepEqual(validatePipeline({ name: "p", root: "/w", stages }), [
    'stage "consumer": input "raw" (/w/raw.csv) is not produced by an earlier stage',
  ]);
});

await test("inputs must reference the compressed path of an earlier output", () => {
  const stages: Stage[] = [
    {
      kind: "command",
      name: "curate",
      inputs: [],
      outputs: [{ name: "ms", path: "/w/ms.csv", compress: "bzip2" }],
      commands: [node("0")],
    },
    {
      kind: "command",
      name: "annotate",
      inputs: [{ name: "hits", path: "/w/ms.csv.bz2" }],
      outputs: [{ name: "out", path: "/w/annotated.csv" }],
      commands: [node("0")],
    },
  ];
  assert.deepEqual(validatePipeline({ name: "p", root: "/w", stages }), []);
});

await test("external inputs need no producer", () => {
  const stages: Stage[] = [
    {
      kind: "command",
      name: "use-reference",
      inputs: [{ name: "ref", path: "/opt/ref.fm", external: true }],
      outputs: [{ name: "out", path: "/w/out.csv" }],
      commands: [node("0", "{input:ref}", "{output:out}")],
    },
  ];
  assert.deepEqual(validatePipeline({ name: "p", root: "/w", stages }), []);
});

await test("duplicate stages, duplicate outputs and stray placeholders are reported", () => {
  const stages: Stage[] = [
    {
      kind: "command",
      name: "s",
      inputs: [],
      outputs: [{ name: "out", path: "/w/out.csv" }],
      commands: [node("0", "{output:missing}")],
    },
    {
      kind: "command",
      name: "s",
      inputs: [],
      outputs: [{ name: "out", path: "/w/out.csv" }],
      commands: [node("0")],
    },
  ];
  assert.deepEqual(validatePipeline({ name: "p", root: "/w", stages }), [
    'stage "s": placeholder {output:missing} has no matching output',
    'stage "s": duplicate stage name',
    'stage "s": output /w/out.csv is already produced by stage "s"',
  ]);
});

await test("expand stage must name one of its inputs as the archive", () => {
  const stages: Stage[] = [
    {
      kind: "expand",
      name: "expand",
      archive: "archive",
      destination: "/w/refs",
      inputs: [{ name: "tarball", path: "/w/refs.tar.bz2", external: true }],
      outputs: [{ name: "fm", path: "/w/refs/uniprot_proteins.fm" }],
    },
  ];
  assert.deepEqual(validatePipeline({ name: "p", root: "/w", stages }), [
    'stage "expand": archive "archive" is not one of its inputs',
  ]);
});

await test("pipeline names must be usable in run IDs", () => {
  assert.deepEqual(validatePipeline({ name: "IEDB ligands", root: "/w", stages: [] }), [
    'pipeline name "IEDB ligands" may only contain lowercase letters, digits and dashes',
  ]);
});

await test("definePipeline throws with every problem listed", () => {
  assert.throws(
    () => definePipeline({ name: "p", root: "relative", stages: [] }),
    (err: unknown) => {
      assert.ok(err instanceof PipelineDefinitionError);
      assert.deepEqual(err.problems, ['root must be an absolute path, got "relative"']);
      assert.equal(
        err.message,
        'Invalid pipeline "p": 1 problem(s)\n  - root must be an absolute path, got "relative"'
      );
      return true;
    }
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// IDEMPOTENCE
// ═══════════════════════════════════════════════════════════════════════════

section("Idempotence");

await test("first run executes, second run skips, deleting one output re-runs its stage", async () => {
  const root = freshRoot();
  const pipeline = twoStagePipeline(root);

  const first = await runOnce(pipeline);
  assert.equal(first.status, "succeeded");
  assert.deepEqual(statuses(first), [StageStatus.Succeeded, StageStatus.Succeeded]);
  assert.equal(existsSync(join(root, "curated.csv.gz")), true);
  assert.equal(existsSync(join(root, "curated.csv")), false);

  const second = await runOnce(pipeline);
  assert.deepEqual(statuses(second), [StageStatus.Skipped, StageStatus.Skipped]);

  rmSync(join(root, "curated.csv.gz"));
  const third = await runOnce(pipeline);
  assert.deepEqual(statuses(third), [StageStatus.Skipped, StageStatus.Succeeded]);

  assert.equal(readFileSync(join(root, "runs-a"), "utf-8"), ".");
  assert.equal(readFileSync(join(root, "runs-b"), "utf-8"), "..");
});

await test("plan reflects what a run would do", async () => {
  const root = freshRoot();
  const pipeline = twoStagePipeline(root);
  const store = await ArtifactStore.open({ manifestPath: defaultManifestPath(root) });
  const runner = new PipelineRunner(pipeline, { store });

  const before = await runner.plan();
  assert.deepEqual(before, [
    { stage: "A", kind: "command", willSkip: false, missingOutputs: [join(root, "raw.csv")] },
    { stage: "B", kind: "command", willSkip: false, missingOutputs: [join(root, "curated.csv.gz")] },
  ]);

  await runner.run();
  const after = await runner.plan();
  assert.deepEqual(
    after.map((p) => p.willSkip),
    [true, true]
  );
  assert.equal(existsSync(join(root, "runs-a")), true);
});

// ═══════════════════════════════════════════════════════════════════════════
// FAIL-FAST
// ═══════════════════════════════════════════════════════════════════════════

section("Fail-fast");

await test("first failure halts the run; later stages are never attempted", async () => {
  const root = freshRoot();
  const stages: Stage[] = [
    {
      kind: "command",
      name: "one",
      inputs: [],
      outputs: [{ name: "out", path: join(root, "one.csv") }],
      commands: [node(COUNT_AND_WRITE, join(root, "runs-one"), "{output:out}", "1")],
    },
    {
      kind: "command",
      name: "two",
      inputs: [{ name: "in", path: join(root, "one.csv") }],
      outputs: [{ name: "out", path: join(root, "two.csv") }],
      commands: [node("process.exit(4)")],
    },
    {
      kind: "command",
      name: "three",
      inputs: [{ name: "in", path: join(root, "two.csv") }],
      outputs: [{ name: "out", path: join(root, "three.csv") }],
      commands: [node(COUNT_AND_WRITE, join(root, "runs-three"), "{output:out}", "3")],
    },
  ];

  const report = await runOnce(definePipeline({ name: "chain", root, stages }));

  assert.equal(report.status, "failed");
  assert.deepEqual(statuses(report), [StageStatus.Succeeded, StageStatus.Failed]);
  assert.equal(report.failure?.stage, "two");
  assert.ok(report.failure?.error instanceof StageExecutionError);
  assert.equal(report.outcomes[1]?.error, report.failure?.error);
  assert.equal(existsSync(join(root, "runs-three")), false);
  assert.equal(existsSync(join(root, "one.csv")), true);
  assert.equal(exitCodeFor(report), 4);
});

// ═══════════════════════════════════════════════════════════════════════════
// RESUMPTION
// ═══════════════════════════════════════════════════════════════════════════

section("Resumption");

await test("after fixing the cause, only the failed stage and later ones run", async () => {
  const root = freshRoot();
  const fixFlag = join(root, "reference.fm");
  const pipeline = twoStagePipeline(root, fixFlag);

  const broken = await runOnce(pipeline);
  assert.deepEqual(statuses(broken), [StageStatus.Succeeded, StageStatus.Failed]);

  writeFileSync(fixFlag, "index");
  const fixed = await runOnce(pipeline);
  assert.equal(fixed.status, "succeeded");
  assert.deepEqual(statuses(fixed), [StageStatus.Skipped, StageStatus.Succeeded]);

  assert.equal(readFileSync(join(root, "runs-a"), "utf-8"), ".");
  assert.equal(readFileSync(join(root, "runs-b"), "utf-8"), "..");
  assert.equal(exitCodeFor(fixed), 0);
});

// ═══════════════════════════════════════════════════════════════════════════
// REPORTS
// ═══════════════════════════════════════════════════════════════════════════

section("Reports");

await test("run IDs carry the pipeline name and date", async () => {
  assert.match(generateRunId("iedb", new Date("2024-01-15T12:00:00Z")), /^iedb-20240115-[0-9a-f]{6}$/);

  const root = freshRoot();
  const store = await ArtifactStore.open({ manifestPath: defaultManifestPath(root) });
  const report = await new PipelineRunner(twoStagePipeline(root), { store }).run();
  assert.match(report.runId, /^two-stage-\d{8}-[0-9a-f]{6}$/);
});

await test("failed report names the stage and shows the tool output", async () => {
  const root = freshRoot();
  const report = await runOnce(twoStagePipeline(root, join(root, "never")));
  const text = formatReport(report).split("\n");

  assert.equal(text[0], "Pipeline two-stage (run test-run): failed");
  assert.equal(text[1], `  ✓ ${"A".padEnd(28)} succeeded`);
  assert.equal(text[2], `  ✗ ${"B".padEnd(28)} failed`);
  assert.equal(text[4], "Failed stage: B");
  assert.equal(text[6], "  Output (tail):");
  assert.equal(text[7], "    reference missing");
});

await test("saved report can be read back", async () => {
  const root = freshRoot();
  const report = await runOnce(twoStagePipeline(root, join(root, "never")));
  const path = await saveReport(report, join(root, "reports"), {
    runId: "test-run",
    nodeVersion: "v20.0.0",
  });

  assert.equal(path, join(root, "reports", "pipeline-test-run.json"));
  const loaded = await loadReport(path);
  assert.equal(loaded.status, "failed");
  assert.equal(loaded.failure?.stage, "B");
  assert.equal(loaded.failure?.error.name, "StageExecutionError");
  assert.equal(loaded.failure?.error.exitCode, 4);
  assert.equal(loaded.failure?.error.capturedOutput, "reference missing");
  assert.equal(loaded.outcomes[0]?.artifacts[0]?.path, join(root, "raw.csv"));
  assert.equal(loaded.metadata?.nodeVersion, "v20.0.0");
});

await test("plan listing marks stages that would run", () => {
  const text = formatPlan([
    { stage: "fetch-references", kind: "fetch", willSkip: true, missingOutputs: [] },
    { stage: "annotate", kind: "command", willSkip: false, missingOutputs: ["/w/a.csv.bz2"] },
  ]);
  assert.equal(
    text,
    [
      `  - ${"fetch-references".padEnd(28)} fetch    up to date`,
      `  * ${"annotate".padEnd(28)} command  will run`,
      "      missing /w/a.csv.bz2",
      "",
      "1 of 2 stage(s) would run",
    ].join("\n")
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════════════════

rmSync(TMP_ROOT, { recursive: true, force: true });

console.log(`\nResults: ${passed} passed, ${failed} failed\n`);

if (failed > 0) {
  process.exit(1);
}
