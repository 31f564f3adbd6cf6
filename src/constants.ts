/** CLI and package version */
export const VERSION = "0.1.0";

/** Structured configuration (default prompt, file matchings, ignores) */
export const CONFIG_FILENAME = "ai-revision-config.yaml";

/** Prompt catalogue and filename-to-prompt bindings */
export const PROMPTS_FILENAME = "ai-revision-prompts.yaml";

/** Manuscript metadata (title, keywords) inside the content directory */
export const METADATA_FILENAME = "metadata.yaml";

/** Extension of the manuscript files that get revised */
export const MANUSCRIPT_FILE_EXTENSION = ".md";

/** Markdown heading marker */
export const HEADING_MARKER = "#";

/** HTML comment opener */
export const COMMENT_MARKER = "<!--";

/** Escape prepended to revised lines that would otherwise read as structural */
export const STRUCTURAL_ESCAPE = "\\";

/** Default OpenAI chat model */
export const DEFAULT_LANGUAGE_MODEL = "gpt-4o-mini";

export const DEFAULT_TEMPERATURE = 0.5;

export const DEFAULT_MAX_TOKENS = 2048;

/**
 * Prompt used when nothing in the manuscript configuration applies to a file.
 * Placeholders are filled per paragraph.
 */
export const DEFAULT_PROMPT = `You are revising a paragraph from the {section_name} section of a scientific manuscript titled "{title}" (keywords: {keywords}).
Rewrite the paragraph so it is clear, concise and grammatically correct. Keep its meaning, citations, equations and Markdown formatting. Reply with the revised paragraph only.

{paragraph_text}`;
