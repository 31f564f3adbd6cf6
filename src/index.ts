// Re-export all public APIs from focused source files
export type {
  Block,
  BlockKind,
  ConfigurationSet,
  FileBinding,
  FilenameMatch,
  FileRevisionResult,
  FileRevisionStatus,
  ManuscriptEditorOptions,
  ManuscriptMetadata,
  ManuscriptRevisionReport,
  PromptResolution,
  ResolverRule,
  ReviseManuscriptOptions,
  RevisionConfig,
  RevisionModel,
  RuleSource,
} from "./core";
export {
  ConfigError,
  ManuscriptEditorError,
  ManuscriptNotFoundError,
  ModelError,
  PromptNotFoundError,
  StructuralMismatchError,
  CONFLICTING_MATCHINGS_WARNING,
  ManuscriptEditor,
  PromptResolver,
  isStructuralLine,
  segmentDocument,
  segmentLines,
  assembleBlocks,
  joinParagraph,
  normalizeRevision,
  loadConfigurationSet,
  loadMetadata,
  renderPrompt,
  sectionFromFilename,
} from "./core";
export {
  createRevisionModel,
  DummyRevisionModel,
  RandomRevisionModel,
  OpenAIRevisionModel,
  MODEL_KINDS,
  type ModelKind,
  type ChatCompletionClient,
} from "./models";
export { loadSettings, type Settings } from "./settings";
export { warn, error } from "./logging";
