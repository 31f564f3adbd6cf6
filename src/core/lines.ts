import { COMMENT_MARKER, HEADING_MARKER } from "../constants";

/**
 * True for lines that are never revised: blank lines, Markdown headings and
 * HTML comment openers. Everything else is part of a paragraph.
 *
 * @example
 * isStructuralLine("## Methods");          // true
 * isStructuralLine("<!-- figure notes -->"); // true
 * isStructuralLine("   ");                 // true
 * isStructuralLine("  indented prose");    // false
 */
export function isStructuralLine(line: string): boolean {
  if (line.trim() === "") return true;
  return line.startsWith(HEADING_MARKER) || line.startsWith(COMMENT_MARKER);
}

/** Structural lines of a document in order, trailing whitespace removed */
export function structuralLines(lines: readonly string[]): string[] {
  return lines.filter(isStructuralLine).map((line) => line.trimEnd());
}
