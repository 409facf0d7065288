/**
 * Path-addressed artifact store.
 *
 * The filesystem holds the artifacts; a manifest beside them records which
 * ones a stage is still writing (pending) and which ones were registered as
 * final, with their checksums.
 *
 * VALIDITY:
 * - a missing file is never valid
 * - a pending record makes the file invalid, so a stage that failed halfway
 *   is not skipped on the next run
 * - a file with no record is valid by existence (placed by hand, or
 *   produced before the manifest existed)
 * - with checksum verification on, a final record must match the file
 */

import { stat, readFile, writeFile, rename, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";
import type { Artifact } from "../types/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import { sha256File } from "./checksum.js";

export const MANIFEST_VERSION = 1;

const ManifestEntrySchema = z
  .object({
    status: z.enum(["pending", "final"]),
    stage: z.string(),
    checksum: z.string().optional(),
    size: z.number().int().min(0).optional(),
    updatedAt: z.string(),
  })
  .strict();

const ManifestSchema = z
  .object({
    version: z.literal(MANIFEST_VERSION),
    artifacts: z.record(ManifestEntrySchema),
  })
  .strict();

export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;
export type Manifest = z.infer<typeof ManifestSchema>;

export class ArtifactStoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ArtifactStoreError";
  }
}

export interface ArtifactStoreOptions {
  /** Path of the manifest file */
  manifestPath: string;
  /** Re-hash final artifacts when checking validity */
  verifyChecksums?: boolean;
  logger?: Logger;
}

/**
 * Default manifest location for a pipeline root.
 */
export function defaultManifestPath(root: string): string {
  return join(root, ".pipeline", "artifacts.json");
}

/**
 * Whether a regular file exists at `path`.
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export class ArtifactStore {
  private readonly entries: Map<string, ManifestEntry>;
  private readonly verifyChecksums: boolean;
  private readonly logger: Logger;

  private constructor(
    public readonly manifestPath: string,
    entries: Map<string, ManifestEntry>,
    options: ArtifactStoreOptions
  ) {
    this.entries = entries;
    this.verifyChecksums = options.verifyChecksums ?? false;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Open the store, reading the manifest if one exists.
   *
   * @throws ArtifactStoreError if the manifest is unreadable or malformed
   */
  static async open(options: ArtifactStoreOptions): Promise<ArtifactStore> {
    const entries = new Map<string, ManifestEntry>();

    if (await fileExists(options.manifestPath)) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(await readFile(options.manifestPath, "utf-8"));
      } catch (err) {
        throw new ArtifactStoreError(
          `Failed to read artifact manifest ${options.manifestPath}`,
          { cause: err }
        );
      }

      const result = ManifestSchema.safeParse(parsed);
      if (!result.success) {
        const errors = result.error.issues
          .map((i) => `${i.path.join(".")}: ${i.message}`)
          .join("; ");
        throw new ArtifactStoreError(
          `Invalid artifact manifest ${options.manifestPath}: ${errors}`
        );
      }

      for (const [path, entry] of Object.entries(result.data.artifacts)) {
        entries.set(path, entry);
      }
    }

    return new ArtifactStore(options.manifestPath, entries, options);
  }

  /**
   * Manifest record for a path, if any.
   */
  record(path: string): ManifestEntry | undefined {
    return this.entries.get(path);
  }

  /**
   * Whether the artifact exists and can be reused.
   */
  async isValid(artifact: Artifact | string): Promise<boolean> {
    const path = typeof artifact === "string" ? artifact : artifact.path;

    if (!(await fileExists(path))) {
      return false;
    }

    const entry = this.entries.get(path);
    if (entry === undefined) {
      return true;
    }
    if (entry.status === "pending") {
      this.logger.debug("Artifact left pending by an unfinished stage", {
        path,
        stage: entry.stage,
      });
      return false;
    }

    if (this.verifyChecksums && entry.checksum !== undefined) {
      const actual = await sha256File(path);
      if (actual !== entry.checksum) {
        this.logger.warn("Artifact checksum mismatch", {
          path,
          expected: entry.checksum,
          actual,
        });
        return false;
      }
    }

    return true;
  }

  /**
   * Paths among `paths` that are not valid, in the given order.
   */
  async missing(paths: readonly string[]): Promise<string[]> {
    const result: string[] = [];
    for (const path of paths) {
      if (!(await this.isValid(path))) {
        result.push(path);
      }
    }
    return result;
  }

  /**
   * Record that `stage` is about to (re)write these paths.
   */
  async markPending(paths: readonly string[], stage: string): Promise<void> {
    const updatedAt = new Date().toISOString();
    for (const path of paths) {
      this.entries.set(path, { status: "pending", stage, updatedAt });
    }
    await this.persist();
  }

  /**
   * Register a produced artifact as final, with its checksum.
   */
  async register(artifact: Artifact, stage: string): Promise<Artifact> {
    let size: number;
    let checksum: string;
    try {
      size = (await stat(artifact.path)).size;
      checksum = await sha256File(artifact.path);
    } catch (err) {
      throw new ArtifactStoreError(`Cannot register ${artifact.path}`, { cause: err });
    }

    this.entries.set(artifact.path, {
      status: "final",
      stage,
      checksum,
      size,
      updatedAt: new Date().toISOString(),
    });
    await this.persist();

    return { ...artifact, checksum };
  }

  private async persist(): Promise<void> {
    const manifest: Manifest = {
      version: MANIFEST_VERSION,
      artifacts: Object.fromEntries(
        [...this.entries.entries()].sort(([a], [b]) => a.localeCompare(b))
      ),
    };
    const tmpPath = `${this.manifestPath}.tmp`;
    await mkdir(dirname(this.manifestPath), { recursive: true });
    await writeFile(tmpPath, JSON.stringify(manifest, null, 2) + "\n");
    await rename(tmpPath, this.manifestPath);
  }
}
