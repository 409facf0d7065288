/**
 * Output post-processing: in-place compression.
 *
 * A compressor takes the raw file the action wrote and leaves the
 * compressed file beside it, removing the original.
 */

import { createReadStream, createWriteStream } from "node:fs";
import { rename, rm } from "node:fs/promises";
import { dirname } from "node:path";
import { pipeline } from "node:stream/promises";
import { createGzip } from "node:zlib";
import { COMPRESSION_EXTENSIONS, type CompressionFormat } from "../types/index.js";
import { fileExists } from "../artifacts/index.js";
import { formatCommand, runCommand } from "./command.js";

/**
 * Compress `rawPath` in place and return the compressed path.
 */
export type Compressor = (rawPath: string) => Promise<string>;

export type CompressorRegistry = Readonly<Record<CompressionFormat, Compressor>>;

/**
 * gzip through node:zlib.
 */
export const gzipCompressor: Compressor = async (rawPath) => {
  const target = rawPath + COMPRESSION_EXTENSIONS.gzip;
  const tmpPath = `${target}.tmp`;
  try {
    await pipeline(createReadStream(rawPath), createGzip(), createWriteStream(tmpPath));
    await rename(tmpPath, target);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
  await rm(rawPath);
  return target;
};

/**
 * bzip2 through the external `bzip2 -f`, which replaces the original.
 */
export function createBzip2Compressor(program = "bzip2"): Compressor {
  return async (rawPath) => {
    const target = rawPath + COMPRESSION_EXTENSIONS.bzip2;
    const command = { program, args: ["-f", rawPath], cwd: dirname(rawPath) };
    const result = await runCommand(command);

    if (result.error) {
      throw result.error;
    }
    if (result.exitCode !== 0) {
      const output = result.output.trim();
      throw new Error(
        `${formatCommand(command)} exited with status ${result.exitCode ?? result.signal}` +
          (output ? `: ${output}` : "")
      );
    }
    if (!(await fileExists(target))) {
      throw new Error(`${formatCommand(command)} did not produce ${target}`);
    }
    return target;
  };
}

export const DEFAULT_COMPRESSORS: CompressorRegistry = {
  bzip2: createBzip2Compressor(),
  gzip: gzipCompressor,
};
