export type PromptPlaceholder =
  | "title"
  | "keywords"
  | "paragraph_text"
  | "section_name";

export type PromptValues = Partial<Record<PromptPlaceholder, string>>;

const PLACEHOLDER_PATTERN = /\{([a-z_]+)\}/g;

function isPlaceholder(name: string): name is PromptPlaceholder {
  return (
    name === "title" ||
    name === "keywords" ||
    name === "paragraph_text" ||
    name === "section_name"
  );
}

/**
 * Fills `{placeholder}`s with the given values. Placeholders without a value
 * (and unknown ones) are left as written.
 */
export function renderPrompt(template: string, values: PromptValues): string {
  return template.replace(PLACEHOLDER_PATTERN, (whole, name: string) => {
    if (!isPlaceholder(name)) return whole;
    return values[name] ?? whole;
  });
}

export function hasPlaceholder(
  template: string,
  placeholder: PromptPlaceholder,
): boolean {
  return template.includes(`{${placeholder}}`);
}

/**
 * Section name from a manuscript filename: numeric ordering prefixes and the
 * extension are dropped, underscores and dashes become spaces.
 *
 * @example
 * sectionFromFilename("04.05.01.crispr.md");               // "crispr"
 * sectionFromFilename("50.00.supplementary_material.md");  // "supplementary material"
 */
export function sectionFromFilename(filename: string): string {
  return filename
    .replace(/\.[^.]+$/, "")
    .replace(/^(\d+[._-])+/, "")
    .replace(/[_-]+/g, " ")
    .trim();
}

export function formatKeywords(keywords: readonly string[]): string {
  return keywords.join(", ");
}
