import { CONFIG_FILENAME, PROMPTS_FILENAME } from "../constants";
import { warn } from "../logging";
import { PromptNotFoundError } from "./errors";
import type {
  ConfigurationSet,
  FileBinding,
  FilenameMatch,
  PromptResolution,
  ResolverRule,
  RuleSource,
} from "./types";

export const CONFLICTING_MATCHINGS_WARNING =
  `Both '${CONFIG_FILENAME}' and '${PROMPTS_FILENAME}' specify filename-to-prompt mappings. ` +
  `Only the '${CONFIG_FILENAME}' file's files.matchings section will be used; prompts_files will be ignored.`;

interface CompiledRule extends ResolverRule {
  regex: RegExp;
}

function compileRule(
  source: RuleSource,
  pattern: string,
  promptName: string | null,
): CompiledRule {
  return { source, pattern, promptName, regex: new RegExp(pattern) };
}

function compileBindings(
  source: RuleSource,
  bindings: readonly FileBinding[],
): CompiledRule[] {
  return bindings.map((binding) =>
    compileRule(source, binding.pattern, binding.promptName),
  );
}

/** Searches the filename for the rule's pattern (not anchored) */
export function matchFilename(
  rule: { pattern: string; regex: RegExp },
  filename: string,
): FilenameMatch | null {
  const result = rule.regex.exec(filename);
  if (!result) return null;

  const start = result.index;
  return {
    pattern: rule.pattern,
    filename,
    matched: result[0],
    start,
    end: start + result[0].length,
  };
}

function firstMatch(
  rules: readonly CompiledRule[],
  filename: string,
): { rule: CompiledRule; match: FilenameMatch } | null {
  for (const rule of rules) {
    const match = matchFilename(rule, filename);
    if (match) return { rule, match };
  }
  return null;
}

/**
 * Picks the prompt for each manuscript file.
 *
 * Ignore rules (`files.ignore`) are checked first. Then the active bindings
 * are tried in the order they are declared and the first matching pattern
 * wins: `files.matchings` when it has entries, `prompts_files` otherwise.
 * Overlapping patterns are the caller's responsibility: they are not
 * detected and declaration order decides. Files no rule matches get
 * `config.default`, if any.
 *
 * Binding values name a prompt in the `prompts` catalogue. A prompts file
 * without a catalogue binds `prompts_files` patterns to prompt text instead.
 */
export class PromptResolver {
  private readonly ignoreRules: CompiledRule[];
  private readonly bindingRules: CompiledRule[];
  /** True when files.matchings shadows prompts_files */
  readonly hasConflict: boolean;

  constructor(private readonly configSet: ConfigurationSet) {
    const matchings = configSet.config?.files.matchings ?? null;
    const promptsFiles = configSet.promptsFiles;
    const hasMatchings = matchings !== null && matchings.length > 0;

    this.hasConflict =
      hasMatchings && promptsFiles !== null && promptsFiles.length > 0;
    if (this.hasConflict) {
      warn(CONFLICTING_MATCHINGS_WARNING);
    }

    if (hasMatchings) {
      this.bindingRules = compileBindings("files.matchings", matchings);
    } else if (promptsFiles !== null) {
      this.bindingRules = compileBindings("prompts_files", promptsFiles);
    } else {
      this.bindingRules = [];
    }

    this.ignoreRules = (configSet.config?.files.ignore ?? []).map((pattern) =>
      compileRule("files.ignore", pattern, null),
    );
  }

  getPromptForFilename(filename: string): PromptResolution {
    const ignored = firstMatch(this.ignoreRules, filename);
    if (ignored) {
      return { kind: "ignored", match: ignored.match };
    }

    const bound = firstMatch(this.bindingRules, filename);
    if (bound) {
      const { rule, match } = bound;
      if (!rule.promptName) {
        return { kind: "ignored", match };
      }
      const prompt =
        rule.source === "prompts_files" && this.configSet.prompts === null
          ? rule.promptName
          : this.lookupPrompt(rule.promptName, filename, rule.pattern);
      return { kind: "resolved", prompt, match };
    }

    const fallback = this.configSet.config?.default ?? null;
    if (fallback !== null) {
      return { kind: "resolved", prompt: fallback, match: null };
    }

    return { kind: "unmatched" };
  }

  /** The rules in evaluation order */
  describeRules(): ResolverRule[] {
    return [...this.ignoreRules, ...this.bindingRules].map(
      ({ source, pattern, promptName }) => ({ source, pattern, promptName }),
    );
  }

  private lookupPrompt(
    promptName: string,
    filename: string,
    pattern: string,
  ): string {
    const prompts = this.configSet.prompts;
    if (!prompts || !Object.hasOwn(prompts, promptName)) {
      throw new PromptNotFoundError(promptName, filename, pattern);
    }
    return prompts[promptName];
  }
}
