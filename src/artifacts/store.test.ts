/**
 * Tests for the artifact store.
 *
 * Run: node --import tsx src/artifacts/store.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync, readFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createHash } from "node:crypto";

import { ArtifactStore, ArtifactStoreError, defaultManifestPath, sha256File } from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => Promise<void>): Promise<void> {
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

const TMP_ROOT = mkdtempSync(join(tmpdir(), "ligand-store-"));
let counter = 0;

function freshRoot(): string {
  const dir = join(TMP_ROOT, `case-${++counter}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

function sha256(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

// ═══════════════════════════════════════════════════════════════════════════
// EXISTENCE AND VALIDITY
// ═══════════════════════════════════════════════════════════════════════════

section("Existence and validity");

await test("missing file is not valid", async () => {
  const root = freshRoot();
  const store = await ArtifactStore.open({ manifestPath: defaultManifestPath(root) });
  assert.equal(await store.isValid(join(root, "absent.csv")), false);
});

await test("file without a record is valid by existence", async () => {
  const root = freshRoot();
  const path = join(root, "raw.csv");
  writeFileSync(path, "a,b\n");
  const store = await ArtifactStore.open({ manifestPath: defaultManifestPath(root) });
  assert.equal(await store.isValid({ name: "raw", path }), true);
});

await test("directory is not an artifact", async () => {
  const root = freshRoot();
  const store = await ArtifactStore.open({ manifestPath: defaultManifestPath(root) });
  assert.equal(await store.isValid(root), false);
});

await test("pending record makes an existing file invalid", async () => {
  const root = freshRoot();
  const path = join(root, "partial.csv");
  writeFileSync(path, "a,b\n1,");
  const store = await ArtifactStore.open({ manifestPath: defaultManifestPath(root) });
  await store.markPending([path], "curate");
  assert.equal(await store.isValid(path), false);
  assert.equal(store.record(path)?.status, "pending");
});

await test("missing() lists invalid paths in order", async () => {
  const root = freshRoot();
  const present = join(root, "present.csv");
  writeFileSync(present, "x\n");
  const store = await ArtifactStore.open({ manifestPath: defaultManifestPath(root) });
  const result = await store.missing([join(root, "b.csv"), present, join(root, "a.csv")]);
  assert.deepEqual(result, [join(root, "b.csv"), join(root, "a.csv")]);
});

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

section("Registration");

await test("register records checksum and size and clears pending", async () => {
  const root = freshRoot();
  const path = join(root, "out.csv");
  writeFileSync(path, "allele,peptide\n");
  const store = await ArtifactStore.open({ manifestPath: defaultManifestPath(root) });
  await store.markPending([path], "curate");

  const artifact = await store.register({ name: "out", path }, "curate");

  assert.equal(artifact.checksum, sha256("allele,peptide\n"));
  assert.equal(store.record(path)?.status, "final");
  assert.equal(store.record(path)?.size, 15);
  assert.equal(await store.isValid(path), true);
});

await test("manifest survives reopening", async () => {
  const root = freshRoot();
  const path = join(root, "out.csv");
  writeFileSync(path, "x\n");
  const manifestPath = defaultManifestPath(root);
  const first = await ArtifactStore.open({ manifestPath });
  await first.register({ name: "out", path }, "stage-a");

  const second = await ArtifactStore.open({ manifestPath });
  assert.equal(second.record(path)?.stage, "stage-a");
  assert.equal(second.record(path)?.checksum, sha256("x\n"));

  assert.match(readFileSync(manifestPath, "utf-8"), /^\{\n  "version": 1,/);
});

await test("registering a missing file fails", async () => {
  const root = freshRoot();
  const store = await ArtifactStore.open({ manifestPath: defaultManifestPath(root) });
  await assert.rejects(
    store.register({ name: "gone", path: join(root, "gone.csv") }, "stage"),
    ArtifactStoreError
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// CHECKSUMS
// ═══════════════════════════════════════════════════════════════════════════

section("Checksums");

await test("sha256File hashes file contents", async () => {
  const root = freshRoot();
  const path = join(root, "h.txt");
  writeFileSync(path, "hello");
  assert.equal(
    await sha256File(path),
    "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824"
  );
});

await test("modified file is invalid when verification is on", async () => {
  const root = freshRoot();
  const path = join(root, "out.csv");
  writeFileSync(path, "original\n");
  const manifestPath = defaultManifestPath(root);
  await (await ArtifactStore.open({ manifestPath })).register({ name: "out", path }, "s");
  writeFileSync(path, "tampered\n");

  const verifying = await ArtifactStore.open({ manifestPath, verifyChecksums: true });
  const trusting = await ArtifactStore.open({ manifestPath });
  assert.equal(await verifying.isValid(path), false);
  assert.equal(await trusting.isValid(path), true);
});

// ═══════════════════════════════════════════════════════════════════════════
// MANIFEST ERRORS
// ═══════════════════════════════════════════════════════════════════════════

section("Manifest errors");

await test("malformed JSON is rejected", async () => {
  const root = freshRoot();
  const manifestPath = defaultManifestPath(root);
  mkdirSync(join(root, ".pipeline"));
  writeFileSync(manifestPath, "{not json");
  await assert.rejects(ArtifactStore.open({ manifestPath }), ArtifactStoreError);
});

await test("wrong manifest version is rejected", async () => {
  const root = freshRoot();
  const manifestPath = defaultManifestPath(root);
  mkdirSync(join(root, ".pipeline"));
  writeFileSync(manifestPath, JSON.stringify({ version: 2, artifacts: {} }));
  await assert.rejects(ArtifactStore.open({ manifestPath }), ArtifactStoreError);
});

// ═══════════════════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════════════════

rmSync(TMP_ROOT, { recursive: true, force: true });

console.log(`\nResults: ${passed} passed, ${failed} failed\n`);

if (failed > 0) {
  process.exit(1);
}
