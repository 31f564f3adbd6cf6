import { describe, it, expect } from "vitest";

import {
  formatKeywords,
  hasPlaceholder,
  renderPrompt,
  sectionFromFilename,
} from "./prompt-template";

describe("prompt-template", () => {
  describe("renderPrompt", () => {
    it("fills known placeholders", () => {
      const prompt = renderPrompt("Revise the {section_name} of '{title}'.", {
        section_name: "abstract",
        title: "A study",
      });

      expect(prompt).toBe("Revise the abstract of 'A study'.");
    });

    it("leaves placeholders without a value and unknown ones intact", () => {
      const prompt = renderPrompt("{section_name} {paragraph_text} {other}", {
        section_name: "methods",
      });

      expect(prompt).toBe("methods {paragraph_text} {other}");
    });

    it("inserts values verbatim, including braces and dollar signs", () => {
      const prompt = renderPrompt("Text: {paragraph_text}", {
        paragraph_text: "costs $1 {title} $&",
      });

      expect(prompt).toBe("Text: costs $1 {title} $&");
    });
  });

  describe("hasPlaceholder", () => {
    it("detects a placeholder", () => {
      expect(hasPlaceholder("Fix {paragraph_text}", "paragraph_text")).toBe(true);
      expect(hasPlaceholder("Fix this", "paragraph_text")).toBe(false);
    });
  });

  describe("sectionFromFilename", () => {
    it("drops numeric prefixes and the extension", () => {
      expect(sectionFromFilename("01.abstract.md")).toBe("abstract");
      expect(sectionFromFilename("04.05.01.crispr.md")).toBe("crispr");
    });

    it("turns underscores and dashes into spaces", () => {
      expect(sectionFromFilename("50.00.supplementary_material.md")).toBe(
        "supplementary material",
      );
      expect(sectionFromFilename("00.front-matter.md")).toBe("front matter");
    });

    it("keeps names without a prefix", () => {
      expect(sectionFromFilename("discussion.md")).toBe("discussion");
    });
  });

  describe("formatKeywords", () => {
    it("joins keywords with commas", () => {
      expect(formatKeywords(["genes", "correlation"])).toBe("genes, correlation");
      expect(formatKeywords([])).toBe("");
    });
  });
});
