import { z } from "zod";
import {
  DEFAULT_LANGUAGE_MODEL,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
} from "./constants";
import { error } from "./logging";
import { ConfigError } from "./core/errors";

/** Empty variables count as unset */
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value : undefined));

const SettingsSchema = z.object({
  OPENAI_API_KEY: optionalString,
  AI_EDITOR_LANGUAGE_MODEL: optionalString.transform(
    (value) => value ?? DEFAULT_LANGUAGE_MODEL,
  ),
  AI_EDITOR_TEMPERATURE: optionalString.pipe(
    z.coerce.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
  ),
  AI_EDITOR_MAX_TOKENS_PER_REQUEST: optionalString.pipe(
    z.coerce.number().int().positive().default(DEFAULT_MAX_TOKENS),
  ),
  /** Comma-separated manuscript filenames */
  AI_EDITOR_FILENAMES_TO_REVISE: optionalString.transform((value) =>
    value
      ? value
          .split(",")
          .map((name) => name.trim())
          .filter(Boolean)
      : null,
  ),
  AI_EDITOR_CUSTOM_PROMPT: optionalString.transform((value) => value ?? null),
});

export interface Settings {
  apiKey: string | undefined;
  languageModel: string;
  temperature: number;
  maxTokens: number;
  filenamesToRevise: string[] | null;
  customPrompt: string | null;
}

/** Reads editor settings from environment variables */
export function loadSettings(
  env: Record<string, string | undefined> = process.env,
): Settings {
  const parsed = SettingsSchema.safeParse(env);
  if (!parsed.success) {
    error("Invalid environment settings:");
    for (const issue of parsed.error.issues) {
      error(` - ${issue.path.join(".")}: ${issue.message}`);
    }
    throw new ConfigError("environment", "invalid settings", {
      cause: parsed.error,
    });
  }

  const data = parsed.data;
  return {
    apiKey: data.OPENAI_API_KEY,
    languageModel: data.AI_EDITOR_LANGUAGE_MODEL,
    temperature: data.AI_EDITOR_TEMPERATURE,
    maxTokens: data.AI_EDITOR_MAX_TOKENS_PER_REQUEST,
    filenamesToRevise: data.AI_EDITOR_FILENAMES_TO_REVISE,
    customPrompt: data.AI_EDITOR_CUSTOM_PROMPT,
  };
}
