/**
 * Stage execution: command invocation, post-processing and the runner.
 */

export {
  StageError,
  StageExecutionError,
  StageContractViolation,
  PostProcessError,
  MissingInputError,
  PipelineDefinitionError,
} from "./errors.js";
export {
  findPlaceholders,
  formatCommand,
  resolveCommand,
  runCommand,
  UnboundPlaceholderError,
  OUTPUT_LIMIT_BYTES,
  type CommandResult,
  type Placeholder,
  type PlaceholderBindings,
  type ResolvedCommand,
} from "./command.js";
export {
  createBzip2Compressor,
  gzipCompressor,
  DEFAULT_COMPRESSORS,
  type Compressor,
  type CompressorRegistry,
} from "./post-process.js";
export { StageRunner, StageExecution, type StageRunnerOptions } from "./runner.js";
