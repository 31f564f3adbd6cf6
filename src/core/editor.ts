import { existsSync, statSync } from "node:fs";
import { copyFile, mkdir, readFile, readdir, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { DEFAULT_PROMPT, MANUSCRIPT_FILE_EXTENSION } from "../constants";
import { debug, error, info, start, success, warn } from "../logging";
import { loadConfigurationSet } from "./config";
import {
  ManuscriptNotFoundError,
  ModelError,
  StructuralMismatchError,
} from "./errors";
import { loadMetadata } from "./metadata";
import { renderPrompt, sectionFromFilename } from "./prompt-template";
import { PromptResolver } from "./resolver";
import {
  assembleBlocks,
  assertStructurePreserved,
  joinParagraph,
  normalizeRevision,
  segmentLines,
  splitDocument,
} from "./segmenter";
import type {
  Block,
  ConfigurationSet,
  FileRevisionResult,
  ManuscriptMetadata,
  ManuscriptRevisionReport,
  PromptResolution,
  RevisionModel,
} from "./types";

export interface ManuscriptEditorOptions {
  /** Directory holding the ai-revision-*.yaml files. Defaults to the content directory */
  configDir?: string;
  /** Prompt for files the configuration says nothing about */
  defaultPrompt?: string;
  /** Replaces every resolved prompt; ignored files stay ignored */
  customPrompt?: string | null;
}

export interface ReviseManuscriptOptions {
  /** Only revise these files (in this order) instead of every manuscript file */
  filenames?: readonly string[];
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class ManuscriptEditor {
  private readonly resolver: PromptResolver;

  private constructor(
    readonly contentDir: string,
    readonly metadata: ManuscriptMetadata,
    readonly promptConfig: ConfigurationSet,
    private readonly options: ManuscriptEditorOptions,
  ) {
    this.resolver = new PromptResolver(promptConfig);
  }

  /**
   * Opens a manuscript: checks the content directory, then reads its metadata
   * and prompt configuration once.
   */
  static async load(
    contentDir: string,
    options: ManuscriptEditorOptions = {},
  ): Promise<ManuscriptEditor> {
    const dir = resolve(contentDir);
    if (!existsSync(dir) || !statSync(dir).isDirectory()) {
      throw new ManuscriptNotFoundError(dir);
    }

    const metadata = await loadMetadata(dir);
    const promptConfig = await loadConfigurationSet(
      options.configDir ? resolve(options.configDir) : dir,
    );
    return new ManuscriptEditor(dir, metadata, promptConfig, options);
  }

  get title(): string {
    return this.metadata.title;
  }

  get keywords(): string[] {
    return this.metadata.keywords;
  }

  get hasConflictingMatchings(): boolean {
    return this.resolver.hasConflict;
  }

  getPromptForFilename(filename: string): PromptResolution {
    return this.resolver.getPromptForFilename(filename);
  }

  describeRules() {
    return this.resolver.describeRules();
  }

  /** Markdown files of the manuscript, sorted by name */
  async listFiles(): Promise<string[]> {
    const entries = await readdir(this.contentDir, { withFileTypes: true });
    return entries
      .filter(
        (entry) =>
          entry.isFile() && entry.name.endsWith(MANUSCRIPT_FILE_EXTENSION),
      )
      .map((entry) => entry.name)
      .sort();
  }

  /**
   * The prompt template a file is revised with, or null when it is ignored.
   * `{section_name}` is already filled in.
   */
  promptTemplateFor(
    filename: string,
    resolution: PromptResolution = this.getPromptForFilename(filename),
  ): string | null {
    if (resolution.kind === "ignored") return null;

    const template =
      this.options.customPrompt ??
      (resolution.kind === "resolved"
        ? resolution.prompt
        : (this.options.defaultPrompt ?? DEFAULT_PROMPT));
    return renderPrompt(template, {
      section_name: sectionFromFilename(filename),
    });
  }

  /**
   * Revises one file into `outputDir` under the same name. Ignored files are
   * copied unchanged. Nothing is written when a paragraph fails.
   */
  async reviseFile(
    filename: string,
    outputDir: string,
    model: RevisionModel,
  ): Promise<FileRevisionResult> {
    return this.revise(
      filename,
      outputDir,
      model,
      this.getPromptForFilename(filename),
    );
  }

  /**
   * Revises every manuscript file except ignored ones. A file that fails is
   * reported and skipped; the others are still revised.
   */
  async reviseManuscript(
    outputDir: string,
    model: RevisionModel,
    options: ReviseManuscriptOptions = {},
  ): Promise<ManuscriptRevisionReport> {
    const filenames = options.filenames ?? (await this.listFiles());
    const report: ManuscriptRevisionReport = {
      revised: [],
      ignored: [],
      failed: [],
    };

    for (const filename of filenames) {
      try {
        const resolution = this.getPromptForFilename(filename);
        if (resolution.kind === "ignored") {
          info(`Skipping ${filename} (ignored by '${resolution.match.pattern}')`);
          report.ignored.push(filename);
          continue;
        }
        report.revised.push(
          await this.revise(filename, outputDir, model, resolution),
        );
      } catch (err) {
        if (err instanceof StructuralMismatchError) throw err;
        const failure = toError(err);
        error(`Failed to revise ${filename}: ${failure.message}`);
        report.failed.push({ filename, error: failure });
      }
    }

    return report;
  }

  private async revise(
    filename: string,
    outputDir: string,
    model: RevisionModel,
    resolution: PromptResolution,
  ): Promise<FileRevisionResult> {
    const inputPath = join(this.contentDir, filename);
    const outputPath = join(outputDir, filename);
    const prompt = this.promptTemplateFor(filename, resolution);

    if (prompt === null) {
      await mkdir(outputDir, { recursive: true });
      await copyFile(inputPath, outputPath);
      return { filename, status: "copied", paragraphs: 0, outputPath };
    }

    start(`Revising ${filename}`);
    const content = await readFile(inputPath, "utf-8");
    const { lines, eol } = splitDocument(content);
    const blocks = segmentLines(lines);

    const revised: Block[] = [];
    let paragraphs = 0;
    for (const block of blocks) {
      if (block.kind === "structural") {
        revised.push(block);
        continue;
      }
      paragraphs++;
      debug(`${filename}: paragraph ${paragraphs}`);
      revised.push({
        kind: "paragraph",
        lines: await this.reviseParagraph(filename, block, prompt, model),
      });
    }

    const outputLines = revised.flatMap((block) => block.lines);
    assertStructurePreserved(filename, lines, outputLines);

    await mkdir(outputDir, { recursive: true });
    await writeFile(outputPath, assembleBlocks(revised, eol));
    success(`Revised ${filename} (${paragraphs} paragraphs)`);

    return { filename, status: "revised", paragraphs, outputPath };
  }

  private async reviseParagraph(
    filename: string,
    block: Block,
    prompt: string,
    model: RevisionModel,
  ): Promise<string[]> {
    const text = joinParagraph(block);

    let revision: string;
    try {
      revision = await model.revise(text, prompt, this.title, this.keywords);
    } catch (err) {
      if (err instanceof ModelError) throw err;
      throw new ModelError(
        `Could not revise a paragraph of ${filename}: ${toError(err).message}`,
        { cause: err },
      );
    }

    const lines = normalizeRevision(revision);
    if (lines.length > 0) return lines;

    warn(`Empty revision for a paragraph of ${filename}; keeping the original`);
    return normalizeRevision(text);
  }
}
