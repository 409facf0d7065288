/**
 * Working directory layout.
 *
 * Every path is a pure function of the root and the dataset or file name:
 *
 *   <root>/
 *     mhcflurry_data/<dataset>/   release archives and their contents
 *     <file>                      direct downloads (IEDB export)
 *     generated/                  pipeline outputs
 *     logs/                       log files
 *     .pipeline/                  artifact manifest, run reports
 */

import { join } from "node:path";
import { defaultManifestPath } from "../artifacts/index.js";

export interface WorkspaceLayout {
  readonly root: string;
  dataset(name: string, file?: string): string;
  download(file: string): string;
  generated(file: string): string;
  readonly logDir: string;
  readonly reportDir: string;
  readonly manifestPath: string;
}

export function createLayout(root: string): WorkspaceLayout {
  const datasetsRoot = join(root, "mhcflurry_data");
  return {
    root,
    dataset: (name, file) =>
      file === undefined ? join(datasetsRoot, name) : join(datasetsRoot, name, file),
    download: (file) => join(root, file),
    generated: (file) => join(root, "generated", file),
    logDir: join(root, "logs"),
    reportDir: join(root, ".pipeline", "reports"),
    manifestPath: defaultManifestPath(root),
  };
}
