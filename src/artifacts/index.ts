export {
  ArtifactStore,
  ArtifactStoreError,
  defaultManifestPath,
  fileExists,
  MANIFEST_VERSION,
  type ArtifactStoreOptions,
  type Manifest,
  type ManifestEntry,
} from "./store.js";
export { sha256File } from "./checksum.js";
