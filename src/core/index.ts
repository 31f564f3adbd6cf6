export type {
  Block,
  BlockKind,
  ConfigurationSet,
  FileBinding,
  FilenameMatch,
  FileRevisionResult,
  FileRevisionStatus,
  ManuscriptMetadata,
  ManuscriptRevisionReport,
  PromptResolution,
  ResolverRule,
  RevisionConfig,
  RevisionModel,
  RuleSource,
} from "./types";
export {
  ConfigError,
  ManuscriptEditorError,
  ManuscriptNotFoundError,
  ModelError,
  PromptNotFoundError,
  StructuralMismatchError,
} from "./errors";
export { isStructuralLine, structuralLines } from "./lines";
export {
  assembleBlocks,
  assertStructurePreserved,
  joinParagraph,
  normalizeRevision,
  segmentDocument,
  segmentLines,
  splitDocument,
} from "./segmenter";
export {
  formatKeywords,
  hasPlaceholder,
  renderPrompt,
  sectionFromFilename,
} from "./prompt-template";
export { loadConfigurationSet } from "./config";
export { loadMetadata } from "./metadata";
export {
  CONFLICTING_MATCHINGS_WARNING,
  matchFilename,
  PromptResolver,
} from "./resolver";
export { ManuscriptEditor } from "./editor";
export type { ManuscriptEditorOptions, ReviseManuscriptOptions } from "./editor";
