import {
  command,
  positional,
  option,
  multioption,
  flag,
  string,
  optional,
  array,
  oneOf,
} from "cmd-ts";
import * as path from "node:path";
import { info, success, fail, start, colors, setVerbose } from "../../logging";
import { shortenPath } from "../utils";
import { ManuscriptEditor } from "../../core/editor";
import { ManuscriptEditorError } from "../../core/errors";
import { createRevisionModel, MODEL_KINDS } from "../../models";
import { loadSettings } from "../../settings";

export const revise = command({
  name: "revise",
  description: "Revise every paragraph of a manuscript into an output directory",
  args: {
    contentDir: positional({
      type: string,
      displayName: "content-dir",
      description: "Directory holding the manuscript's Markdown files",
    }),
    output: option({
      type: string,
      long: "output",
      short: "o",
      description: "Directory the revised files are written to",
    }),
    model: option({
      type: oneOf(MODEL_KINDS),
      long: "model",
      short: "m",
      description: "Revision model: openai, dummy (no changes) or random (shuffled words)",
      defaultValue: () => "openai" as const,
      defaultValueIsSerializable: true,
    }),
    configDir: option({
      type: optional(string),
      long: "config-dir",
      short: "c",
      description: "Directory holding ai-revision-*.yaml (defaults to the content directory)",
    }),
    files: multioption({
      type: array(string),
      long: "file",
      short: "f",
      description: "Only revise this file (can be repeated)",
    }),
    verbose: flag({
      long: "verbose",
      short: "v",
      description: "Log every paragraph sent to the model",
    }),
  },
  handler: async ({ contentDir, output, model, configDir, files, verbose }) => {
    setVerbose(verbose);

    try {
      const settings = loadSettings();
      const editor = await ManuscriptEditor.load(contentDir, {
        configDir,
        customPrompt: settings.customPrompt,
      });
      const revisionModel = createRevisionModel(model, settings);
      const filenames =
        files.length > 0 ? files : (settings.filenamesToRevise ?? undefined);

      start(
        `Revising ${colors.bold(editor.title || path.basename(editor.contentDir))} with the ${colors.cyan(model)} model`,
      );
      const outputDir = path.resolve(output);
      const report = await editor.reviseManuscript(outputDir, revisionModel, {
        filenames,
      });

      if (report.ignored.length > 0) {
        info(`Ignored: ${report.ignored.join(", ")}`);
      }

      if (report.failed.length > 0) {
        fail(
          `${report.failed.length} file(s) failed: ${report.failed.map((f) => f.filename).join(", ")}`,
        );
        process.exit(1);
      }

      success(
        `${report.revised.length} file(s) written to ${shortenPath(outputDir)}`,
      );
    } catch (err) {
      if (err instanceof ManuscriptEditorError) {
        fail(err.message);
        process.exit(1);
      }
      throw err;
    }
  },
});
