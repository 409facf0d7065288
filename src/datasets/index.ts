export { createLayout, type WorkspaceLayout } from "./layout.js";
export {
  createIedbPipeline,
  IEDB_LIGAND_EXPORT_URL,
  IEDB_PIPELINE_NAME,
  MHCFLURRY_RELEASES,
  PEPTIDE_LENGTHS,
  RELEASES,
  type IedbPipelineOptions,
} from "./iedb.js";
