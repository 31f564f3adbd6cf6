/**
 * A filename rule: a regular expression (searched, not anchored) bound to a
 * prompt name. A `null` prompt name means the file is ignored.
 */
export interface FileBinding {
  pattern: string;
  promptName: string | null;
}

/** Structured configuration from ai-revision-config.yaml */
export interface RevisionConfig {
  /** Fallback prompt text for files no rule matches */
  default: string | null;
  files: {
    /** Ordered bindings; takes precedence over `prompts_files` */
    matchings: readonly FileBinding[] | null;
    /** Patterns of files that are never revised */
    ignore: readonly string[] | null;
  };
}

/**
 * The merged configuration of a manuscript. Each source is `null` when its
 * file (or key) is absent, which is not the same as an empty mapping.
 */
export interface ConfigurationSet {
  /** Named prompt catalogue */
  prompts: Readonly<Record<string, string>> | null;
  /** Ordered bindings from ai-revision-prompts.yaml */
  promptsFiles: readonly FileBinding[] | null;
  config: RevisionConfig | null;
}

/** Span of a filename matched by a rule */
export interface FilenameMatch {
  pattern: string;
  filename: string;
  /** The matched substring, `filename.slice(start, end)` */
  matched: string;
  start: number;
  end: number;
}

export type PromptResolution =
  | {
      kind: "ignored";
      match: FilenameMatch;
    }
  | {
      kind: "resolved";
      prompt: string;
      /** Null when the prompt is the configured default */
      match: FilenameMatch | null;
    }
  | {
      kind: "unmatched";
    };

/** Where a rule the resolver evaluates comes from */
export type RuleSource = "files.ignore" | "files.matchings" | "prompts_files";

export interface ResolverRule {
  source: RuleSource;
  pattern: string;
  /** Prompt name, or null for ignore rules */
  promptName: string | null;
}

export interface ManuscriptMetadata {
  title: string;
  keywords: string[];
}

export type BlockKind = "structural" | "paragraph";

export interface Block {
  kind: BlockKind;
  lines: string[];
}

/** A completion model that revises one paragraph at a time */
export interface RevisionModel {
  revise(
    paragraph: string,
    prompt: string,
    title: string,
    keywords: string[],
  ): Promise<string>;
}

export type FileRevisionStatus = "revised" | "copied";

export interface FileRevisionResult {
  filename: string;
  status: FileRevisionStatus;
  /** Paragraph blocks sent to the model */
  paragraphs: number;
  outputPath: string;
}

export interface ManuscriptRevisionReport {
  revised: FileRevisionResult[];
  ignored: string[];
  failed: { filename: string; error: Error }[];
}
