/**
 * End-to-end tests for the manuscript-reviser commands, run through cmd-ts
 * against a manuscript in a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import * as path from "node:path";
import { run } from "cmd-ts";
import { revise } from "./commands/revise";
import { prompts } from "./commands/prompts";
import { logger } from "../logging";
import { CONFIG_FILENAME, METADATA_FILENAME, PROMPTS_FILENAME } from "../constants";
import {
  CONFIG_YAML,
  MANUSCRIPT_FILENAMES,
  METADATA_YAML,
  PROMPTS_YAML,
  createManuscript,
  makeTempDir,
  removeDir,
  sectionMarkdown,
} from "../test-utils";

describe("manuscript-reviser CLI", () => {
  let tempDir: string;
  let contentDir: string;
  let printed: string[];

  beforeEach(async () => {
    tempDir = await makeTempDir();
    contentDir = path.join(tempDir, "content");
    printed = [];
    for (const level of ["info", "start", "success", "warn", "error", "debug", "fail"] as const) {
      vi.spyOn(logger, level).mockImplementation(() => {});
    }
    vi.spyOn(console, "log").mockImplementation((message: unknown) => {
      printed.push(String(message));
    });

    const files: Record<string, string> = {
      [METADATA_FILENAME]: METADATA_YAML,
      [PROMPTS_FILENAME]: PROMPTS_YAML,
      [CONFIG_FILENAME]: CONFIG_YAML,
    };
    for (const filename of MANUSCRIPT_FILENAMES) {
      files[filename] = sectionMarkdown(filename);
    }
    await createManuscript(contentDir, files);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(tempDir);
  });

  describe("revise", () => {
    it("writes the revised manuscript with the dummy model", async () => {
      const outputDir = path.join(tempDir, "output");

      await run(revise, [contentDir, "--output", outputDir, "--model", "dummy"]);

      const abstract = readFileSync(path.join(outputDir, "01.abstract.md"), "utf-8");
      expect(abstract).toBe(sectionMarkdown("01.abstract.md"));
      expect(existsSync(path.join(outputDir, "10.references.md"))).toBe(false);
      expect(logger.success).toHaveBeenCalledWith(
        expect.stringContaining("9 file(s) written to"),
      );
    });

    it("revises only the files passed with --file", async () => {
      const outputDir = path.join(tempDir, "output");

      await run(revise, [
        contentDir,
        "-o",
        outputDir,
        "-m",
        "random",
        "-f",
        "05.discussion.md",
        "-f",
        "06.conclusions.md",
      ]);

      expect(existsSync(path.join(outputDir, "05.discussion.md"))).toBe(true);
      expect(existsSync(path.join(outputDir, "06.conclusions.md"))).toBe(true);
      expect(existsSync(path.join(outputDir, "01.abstract.md"))).toBe(false);
    });
  });

  describe("prompts", () => {
    it("prints the rules in evaluation order", async () => {
      await run(prompts, [contentDir, "01.abstract.md"]);

      const rules = printed.slice(0, 9);
      expect(rules[0]).toContain("files.ignore");
      expect(rules[0]).toContain("'front-matter' -> ");
      expect(rules[3]).toContain("'supplementary_material' -> ");
      expect(rules[4]).toContain("files.matchings");
      expect(rules[4]).toContain("'abstract' -> abstract");
      expect(rules[7]).toContain("'04\\..+\\.md' -> results");
      expect(rules[8]).toContain("'methods' -> methods");
      expect(printed[9]).toContain("01.abstract.md");
    });

    it("prints the resolution of each requested file", async () => {
      await run(prompts, [contentDir, "01.abstract.md", "10.references.md", "06.conclusions.md"]);

      const files = printed.slice(9);
      expect(files).toHaveLength(5);
      expect(files[0]).toContain("01.abstract.md");
      expect(files[0]).toContain("matched 'abstract'");
      expect(files[1]).toContain("Test match abstract.");
      expect(files[2]).toContain("ignored (references)");
      expect(files[3]).toContain("default");
      expect(files[4]).toContain("default prompt text");
    });

    it("shows prompt text bound directly by prompts_files", async () => {
      await createManuscript(contentDir, {
        [PROMPTS_FILENAME]: "prompts_files:\n  abstract: Tighten this abstract.\n",
        [CONFIG_FILENAME]: "default: Fallback.\n",
      });

      await run(prompts, [contentDir, "01.abstract.md"]);

      expect(printed).toHaveLength(3);
      expect(printed[0]).toContain("prompts_files");
      expect(printed[0]).toContain("'abstract' -> Tighten this abstract.");
      expect(printed[2]).toContain("Tighten this abstract.");
    });

    it("reports a binding to an undefined prompt", async () => {
      await createManuscript(contentDir, {
        [CONFIG_FILENAME]: "files:\n  matchings:\n    abstract: missing\n",
      });

      await run(prompts, [contentDir, "01.abstract.md"]);

      expect(printed).toHaveLength(2);
      expect(printed[0]).toContain("'abstract' -> missing");
      expect(printed[1]).toContain("Prompt 'missing' (bound to 'abstract'");
    });
  });
});
