export {
  ArchiveExpander,
  ExpandError,
  detectArchiveFormat,
  type ArchiveFormat,
  type ArchiveExpanderOptions,
} from "./expander.js";
