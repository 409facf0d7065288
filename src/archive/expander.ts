/**
 * Archive expansion.
 *
 * Supported formats, chosen by extension:
 *   .tar, .tar.gz / .tgz, .tar.bz2 / .tbz2 / .tbz, .zip
 *
 * Extraction overwrites existing files. Whether to extract at all is the
 * caller's decision.
 */

import { createReadStream, createWriteStream } from "node:fs";
import { mkdir, rm } from "node:fs/promises";
import { dirname, join, normalize } from "node:path";
import { randomBytes } from "node:crypto";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { extract } from "tar";
import unbzip2Stream from "unbzip2-stream";
import yauzl from "yauzl";
import type { Entry, ZipFile } from "yauzl";
import type { Artifact } from "../types/index.js";
import { fileExists } from "../artifacts/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";

export type ArchiveFormat = "tar" | "tar.gz" | "tar.bz2" | "zip";

export class ExpandError extends Error {
  public readonly archivePath: string;

  constructor(message: string, archivePath: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ExpandError";
    this.archivePath = archivePath;
  }
}

const FORMAT_SUFFIXES: ReadonlyArray<readonly [string, ArchiveFormat]> = [
  [".tar.bz2", "tar.bz2"],
  [".tbz2", "tar.bz2"],
  [".tbz", "tar.bz2"],
  [".tar.gz", "tar.gz"],
  [".tgz", "tar.gz"],
  [".tar", "tar"],
  [".zip", "zip"],
];

/**
 * Archive format for a file name, or undefined if unsupported.
 */
export function detectArchiveFormat(path: string): ArchiveFormat | undefined {
  const lower = path.toLowerCase();
  return FORMAT_SUFFIXES.find(([suffix]) => lower.endsWith(suffix))?.[1];
}

export interface ArchiveExpanderOptions {
  logger?: Logger;
}

export class ArchiveExpander {
  private readonly logger: Logger;

  constructor(options: ArchiveExpanderOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Extract `archivePath` into `destinationDir`.
   *
   * @returns One artifact per extracted regular file, in archive order
   * @throws ExpandError on a missing, malformed or unsupported archive
   */
  async expand(archivePath: string, destinationDir: string): Promise<Artifact[]> {
    const format = detectArchiveFormat(archivePath);
    if (format === undefined) {
      throw new ExpandError(`Unsupported archive format: ${archivePath}`, archivePath);
    }

    await mkdir(destinationDir, { recursive: true });
    this.logger.info("Expanding archive", { archive: archivePath, destination: destinationDir, format });

    let members: string[];
    try {
      members =
        format === "zip"
          ? await this.expandZip(archivePath, destinationDir)
          : await this.expandTar(archivePath, destinationDir, format);
    } catch (err) {
      if (err instanceof ExpandError) {
        throw err;
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new ExpandError(`Failed to expand ${archivePath}: ${reason}`, archivePath, {
        cause: err,
      });
    }

    const artifacts: Artifact[] = [];
    const seen = new Set<string>();
    for (const member of members) {
      const name = normalize(member).replace(/\/+$/, "");
      if (name === "" || name === "." || seen.has(name)) {
        continue;
      }
      seen.add(name);

      const path = join(destinationDir, name);
      if (await fileExists(path)) {
        artifacts.push({ name, path });
      }
    }

    this.logger.info("Archive expanded", { archive: archivePath, members: artifacts.length });
    return artifacts;
  }

  /**
   * Members are inflated one at a time, straight to disk.
   */
  private expandZip(archivePath: string, destinationDir: string): Promise<string[]> {
    return new Promise((resolve, reject) => {
      yauzl.open(archivePath, { lazyEntries: true, autoClose: true }, (openErr, opened) => {
        if (openErr || opened === undefined) {
          reject(openErr ?? new Error("zip could not be opened"));
          return;
        }
        const zipfile: ZipFile = opened;

        const members: string[] = [];
        const fail = (err: unknown): void => {
          if (zipfile.isOpen) {
            zipfile.close();
          }
          reject(err);
        };

        zipfile.on("error", fail);
        zipfile.on("end", () => resolve(members));
        zipfile.on("entry", (entry: Entry) => {
          extractZipEntry(zipfile, entry, destinationDir).then((member) => {
            if (member !== undefined) {
              members.push(member);
            }
            zipfile.readEntry();
          }, fail);
        });
        zipfile.readEntry();
      });
    });
  }

  private async expandTar(
    archivePath: string,
    destinationDir: string,
    format: Exclude<ArchiveFormat, "zip">
  ): Promise<string[]> {
    if (!(await fileExists(archivePath))) {
      throw new ExpandError(`Archive not found: ${archivePath}`, archivePath);
    }

    const members: string[] = [];
    const options = {
      cwd: destinationDir,
      strict: true,
      filter: (path: string) => {
        members.push(path);
        return true;
      },
    };

    if (format !== "tar.bz2") {
      // tar detects gzip on its own
      await extract({ ...options, file: archivePath });
      return members;
    }

    const tarPath = join(destinationDir, `.expand-${randomBytes(4).toString("hex")}.tar`);
    try {
      await pipeline(createReadStream(archivePath), unbzip2Stream(), createWriteStream(tarPath));
      await extract({ ...options, file: tarPath });
    } finally {
      await rm(tarPath, { force: true });
    }
    return members;
  }
}

function openEntryStream(zipfile: ZipFile, entry: Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (err, stream) => {
      if (err || stream === undefined) {
        reject(err ?? new Error(`zip member ${entry.fileName} could not be read`));
        return;
      }
      resolve(stream);
    });
  });
}

/**
 * Write one zip entry under `destinationDir`. Returns the member name, or
 * undefined for a directory entry.
 */
async function extractZipEntry(
  zipfile: ZipFile,
  entry: Entry,
  destinationDir: string
): Promise<string | undefined> {
  const target = join(destinationDir, entry.fileName);
  if (entry.fileName.endsWith("/")) {
    await mkdir(target, { recursive: true });
    return undefined;
  }

  await mkdir(dirname(target), { recursive: true });
  await pipeline(await openEntryStream(zipfile, entry), createWriteStream(target));
  return entry.fileName;
}
