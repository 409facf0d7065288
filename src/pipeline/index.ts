/**
 * Pipeline definition, execution and reporting.
 */

export { definePipeline, validatePipeline } from "./definition.js";
export { PipelineRunner, type PipelineRunnerOptions } from "./runner.js";
export {
  formatPlan,
  formatReport,
  getReportFilename,
  loadReport,
  saveReport,
  serializeError,
  serializeReport,
  ReportError,
  SerializedReportSchema,
  type SerializedError,
  type SerializedReport,
} from "./report.js";
export {
  captureGitState,
  createRunMetadata,
  GitStateSchema,
  RunMetadataSchema,
  type GitState,
  type RunMetadata,
  type RunMetadataOptions,
} from "./metadata.js";
