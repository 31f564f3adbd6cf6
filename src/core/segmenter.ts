import { STRUCTURAL_ESCAPE } from "../constants";
import { StructuralMismatchError } from "./errors";
import { isStructuralLine } from "./lines";
import type { Block } from "./types";

export type LineEnding = "\n" | "\r\n";

export interface SplitDocument {
  lines: string[];
  eol: LineEnding;
}

/**
 * Splits file content into lines. A trailing newline yields a final empty
 * line, so joining the lines with `eol` gives the content back.
 */
export function splitDocument(text: string): SplitDocument {
  const eol: LineEnding = text.includes("\r\n") ? "\r\n" : "\n";
  return { lines: text.split(/\r?\n/), eol };
}

/**
 * Groups lines into blocks. A maximal run of paragraph lines is one paragraph
 * block; every structural line is a block of its own. Concatenating the blocks'
 * lines reproduces the input.
 */
export function segmentLines(lines: readonly string[]): Block[] {
  const blocks: Block[] = [];
  let paragraph: string[] | null = null;

  for (const line of lines) {
    if (isStructuralLine(line)) {
      paragraph = null;
      blocks.push({ kind: "structural", lines: [line] });
      continue;
    }

    if (paragraph === null) {
      paragraph = [];
      blocks.push({ kind: "paragraph", lines: paragraph });
    }
    paragraph.push(line);
  }

  return blocks;
}

export function segmentDocument(text: string): Block[] {
  return segmentLines(splitDocument(text).lines);
}

/** The text sent to the model for a paragraph block */
export function joinParagraph(block: Block): string {
  return block.lines.map((line) => line.trimEnd()).join("\n");
}

/**
 * Turns model output into paragraph lines. Lines lose surrounding whitespace,
 * blank lines are dropped and lines that would read as a heading or comment
 * are escaped, so a revision can never add structural lines.
 */
export function normalizeRevision(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "")
    .map((line) =>
      isStructuralLine(line) ? `${STRUCTURAL_ESCAPE}${line}` : line,
    );
}

export function assembleBlocks(
  blocks: readonly Block[],
  eol: LineEnding = "\n",
): string {
  return blocks.flatMap((block) => block.lines).join(eol);
}

/**
 * Throws if the structural lines of `output` differ from those of `input` in
 * content or order.
 */
export function assertStructurePreserved(
  filename: string,
  input: readonly string[],
  output: readonly string[],
): void {
  const expected = input.filter(isStructuralLine);
  const actual = output.filter(isStructuralLine);
  const count = Math.max(expected.length, actual.length);

  for (let i = 0; i < count; i++) {
    if (expected[i] !== actual[i]) {
      throw new StructuralMismatchError(filename, i + 1, expected[i], actual[i]);
    }
  }
}
