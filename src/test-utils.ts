import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { RevisionModel } from "./core/types";

export async function makeTempDir(prefix = "manuscript-reviser-"): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Writes files (name → content) into `dir`, creating it first.
 * Returns `dir`.
 */
export async function createManuscript(
  dir: string,
  files: Record<string, string>,
): Promise<string> {
  await mkdir(dir, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    await writeFile(path.join(dir, name), content);
  }
  return dir;
}

/** An abstract with headings, comments, blank lines and indented prose */
export const ABSTRACT_MD = `## Abstract {.page_break_before}

<!-- Keep this under 250 words -->
Correlation coefficients are widely used to find relationships
  between variables in large datasets.
We introduce a coefficient that captures nonlinear patterns.

<!-- results summary -->
Applied to gene expression data, it reveals biologically meaningful
relationships missed by linear methods.
`;

export const INTRODUCTION_MD = `## Introduction

New technologies have vastly improved data collection.
Computational tools are needed to analyze them.

### Related work

Pearson and Spearman coefficients are the most common choices.
`;

export const METADATA_YAML = `title: "An efficient not-only-linear correlation coefficient"
keywords:
  - correlation coefficient
  - nonlinear relationships
  - gene expression
authors:
  - name: Test Author
`;

export const PROMPTS_YAML = `prompts:
  abstract: |
    Test match abstract.
  introduction_discussion: |
    Test match introduction or discussion.
  results: |
    Test match results.
  methods: |
    Test match methods.
`;

export const CONFIG_YAML = `default: |
  default prompt text
files:
  matchings:
    abstract: abstract
    introduction: introduction_discussion
    discussion: introduction_discussion
    '04\\..+\\.md': results
    methods: methods
  ignore:
    - front-matter
    - references
    - acknowledgements
    - supplementary_material
`;

/** Twelve manuscript files; front matter, references and acknowledgements are ignored by CONFIG_YAML */
export const MANUSCRIPT_FILENAMES = [
  "00.front-matter.md",
  "01.abstract.md",
  "02.introduction.md",
  "04.00.results.md",
  "04.05.01.crispr.md",
  "04.15.drug_disease_prediction.md",
  "04.20.00.traits_clustering.md",
  "05.discussion.md",
  "06.conclusions.md",
  "07.00.methods.md",
  "10.references.md",
  "15.acknowledgements.md",
] as const;

export function sectionMarkdown(filename: string): string {
  return `## ${filename}\n\nFirst paragraph of ${filename}.\nIt has two lines.\n\n<!-- note -->\nSecond paragraph.\n`;
}

/** Records every call and answers with `respond` */
export class RecordingModel implements RevisionModel {
  readonly calls: {
    paragraph: string;
    prompt: string;
    title: string;
    keywords: string[];
  }[] = [];

  constructor(
    private readonly respond: (paragraph: string) => string = (p) =>
      p.toUpperCase(),
  ) {}

  async revise(
    paragraph: string,
    prompt: string,
    title: string,
    keywords: string[],
  ): Promise<string> {
    this.calls.push({ paragraph, prompt, title, keywords });
    return this.respond(paragraph);
  }
}
