/**
 * Artifact and remote resource definitions.
 * Artifacts are addressed by absolute filesystem path.
 */

export type CompressionFormat = "bzip2" | "gzip";

export interface Artifact {
  /** Logical name, unique within the stage that declares it */
  readonly name: string;
  /** Absolute path of the file */
  readonly path: string;
  /** SHA-256 of the file contents, once registered */
  readonly checksum?: string;
}

/**
 * A download: fetched once to `destination`, then cached there.
 */
export interface RemoteResource {
  readonly url: string;
  readonly destination: string;
}

/**
 * A file a stage promises to produce.
 * With `compress`, the action writes `path` and the final artifact is the
 * compressed file next to it.
 */
export interface OutputSpec {
  readonly name: string;
  readonly path: string;
  readonly compress?: CompressionFormat;
}

/**
 * A file a stage reads. Unless `external`, it must be the final path of an
 * output declared by an earlier stage.
 */
export interface InputSpec {
  readonly name: string;
  readonly path: string;
  readonly external?: boolean;
}

export const COMPRESSION_EXTENSIONS: Record<CompressionFormat, string> = {
  bzip2: ".bz2",
  gzip: ".gz",
};

/**
 * Path of the artifact an output settles into after post-processing.
 */
export function finalPath(output: OutputSpec): string {
  return output.compress
    ? output.path + COMPRESSION_EXTENSIONS[output.compress]
    : output.path;
}

/**
 * Final artifact for an output declaration.
 */
export function toArtifact(output: OutputSpec): Artifact {
  return { name: output.name, path: finalPath(output) };
}
