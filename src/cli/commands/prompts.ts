import { command, positional, option, restPositionals, string, optional, flag } from "cmd-ts";
import { info, fail, raw, colors } from "../../logging";
import { promptPreview } from "../utils";
import { ManuscriptEditor } from "../../core/editor";
import { ManuscriptEditorError } from "../../core/errors";
import type { PromptResolution } from "../../core/types";
import { CONFIG_FILENAME, PROMPTS_FILENAME } from "../../constants";

function describeResolution(resolution: PromptResolution): string {
  switch (resolution.kind) {
    case "ignored":
      return colors.yellow(`ignored (${resolution.match.pattern})`);
    case "resolved":
      return resolution.match
        ? colors.green(`matched '${resolution.match.pattern}'`)
        : colors.cyan("default");
    case "unmatched":
      return colors.dim("built-in default");
  }
}

function describeTarget(promptName: string | null): string {
  return promptName ? promptName.trim().split("\n")[0] : colors.yellow("ignore");
}

function sourceState(value: unknown): string {
  return value === null ? colors.dim("absent") : colors.green("loaded");
}

export const prompts = command({
  name: "prompts",
  description: "Show which prompt each manuscript file is revised with",
  args: {
    contentDir: positional({
      type: string,
      displayName: "content-dir",
      description: "Directory holding the manuscript's Markdown files",
    }),
    filenames: restPositionals({
      type: string,
      displayName: "filename",
      description: "Files to resolve (defaults to every manuscript file)",
    }),
    configDir: option({
      type: optional(string),
      long: "config-dir",
      short: "c",
      description: "Directory holding ai-revision-*.yaml (defaults to the content directory)",
    }),
    full: flag({
      long: "full",
      description: "Print the whole prompt instead of its first line",
    }),
  },
  handler: async ({ contentDir, filenames, configDir, full }) => {
    let editor: ManuscriptEditor;
    try {
      editor = await ManuscriptEditor.load(contentDir, { configDir });
    } catch (err) {
      if (err instanceof ManuscriptEditorError) {
        fail(err.message);
        process.exit(1);
      }
      throw err;
    }

    const { prompts: catalogue, promptsFiles, config } = editor.promptConfig;
    info(
      `${PROMPTS_FILENAME}: prompts ${sourceState(catalogue)}, prompts_files ${sourceState(promptsFiles)}`,
    );
    info(`${CONFIG_FILENAME}: ${sourceState(config)}`);

    const rules = editor.describeRules();
    info(rules.length > 0 ? "Rules, in evaluation order:" : "No filename rules");
    for (const rule of rules) {
      raw(`  ${colors.dim(rule.source)}  '${rule.pattern}' -> ${describeTarget(rule.promptName)}`);
    }

    const targets = filenames.length > 0 ? filenames : await editor.listFiles();
    for (const filename of targets) {
      let resolution: PromptResolution;
      try {
        resolution = editor.getPromptForFilename(filename);
      } catch (err) {
        if (!(err instanceof ManuscriptEditorError)) throw err;
        raw(`${colors.bold(filename)}  ${colors.red(err.message)}`);
        continue;
      }

      raw(`${colors.bold(filename)}  ${describeResolution(resolution)}`);
      const prompt = editor.promptTemplateFor(filename, resolution);
      if (prompt !== null) {
        raw(full ? `${prompt}\n` : `  ${colors.dim(promptPreview(prompt))}`);
      }
    }
  },
});
