import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { isMap, isScalar, parseDocument, type Document } from "yaml";
import { z } from "zod";
import { CONFIG_FILENAME, PROMPTS_FILENAME } from "../constants";
import { error } from "../logging";
import { ConfigError } from "./errors";
import type { ConfigurationSet, FileBinding, RevisionConfig } from "./types";

/** Bindings map a filename regex to a prompt name; null ignores the file */
const BindingsSchema = z.record(z.string(), z.string().nullable());

const PromptsFileSchema = z.object({
  /** Named prompt catalogue */
  prompts: z.record(z.string(), z.string()).nullish(),
  /** Filename regex to prompt name */
  prompts_files: BindingsSchema.nullish(),
});

const RevisionConfigSchema = z.object({
  /** Prompt text for files no rule matches */
  default: z.string().nullish(),
  files: z
    .object({
      /** Filename regex to prompt name; wins over prompts_files */
      matchings: BindingsSchema.nullish(),
      /** Filename regexes of files that are never revised */
      ignore: z.array(z.string()).nullish(),
    })
    .nullish(),
});

type PromptsFile = z.infer<typeof PromptsFileSchema>;

function logSchemaErrors(filePath: string, issues: z.ZodIssue[]) {
  error(`Invalid configuration in ${filePath}:`);
  for (const issue of issues) {
    error(` - ${issue.path.join(".")}: ${issue.message}`);
  }
}

/**
 * Reads and parses a YAML file. Returns null when the file does not exist.
 */
export async function readYamlDocument(
  filePath: string,
): Promise<Document | null> {
  if (!existsSync(filePath)) return null;

  const source = await readFile(filePath, "utf-8");
  const doc = parseDocument(source);
  if (doc.errors.length > 0) {
    throw new ConfigError(filePath, doc.errors[0].message, {
      cause: doc.errors[0],
    });
  }
  return doc;
}

/** Validates a document against a schema, logging every issue on failure */
export function validateDocument<T extends z.ZodTypeAny>(
  filePath: string,
  doc: Document,
  schema: T,
): z.infer<T> {
  const parsed = schema.safeParse(doc.toJS() ?? {});
  if (!parsed.success) {
    logSchemaErrors(filePath, parsed.error.issues);
    throw new ConfigError(filePath, "does not match the expected structure", {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/**
 * Reads the keys of a mapping in the order they are written. Plain objects
 * would move integer-like keys (such as "2") to the front.
 */
function orderedKeys(
  filePath: string,
  doc: Document,
  path: readonly string[],
): string[] {
  const node = doc.getIn(path, true);
  if (!isMap(node)) return [];

  return node.items.map((pair) => {
    const key = isScalar(pair.key) ? pair.key.value : pair.key;
    if (typeof key !== "string") {
      throw new ConfigError(
        filePath,
        `${path.join(".")}: pattern ${JSON.stringify(key)} must be a string (quote it)`,
      );
    }
    return key;
  });
}

function readBindings(
  filePath: string,
  doc: Document,
  path: readonly string[],
  values: Record<string, string | null>,
): FileBinding[] {
  return orderedKeys(filePath, doc, path).map((pattern) =>
    Object.freeze({ pattern, promptName: values[pattern] ?? null }),
  );
}

function compileCheck(filePath: string, section: string, pattern: string) {
  try {
    new RegExp(pattern);
  } catch (err) {
    throw new ConfigError(
      filePath,
      `${section}: invalid regular expression ${JSON.stringify(pattern)}`,
      { cause: err },
    );
  }
}

async function loadPromptsFile(
  configDir: string,
): Promise<Pick<ConfigurationSet, "prompts" | "promptsFiles">> {
  const filePath = join(configDir, PROMPTS_FILENAME);
  const doc = await readYamlDocument(filePath);
  if (!doc) return { prompts: null, promptsFiles: null };

  const data: PromptsFile = validateDocument(filePath, doc, PromptsFileSchema);
  const promptsFiles = data.prompts_files
    ? readBindings(filePath, doc, ["prompts_files"], data.prompts_files)
    : null;
  for (const binding of promptsFiles ?? []) {
    compileCheck(filePath, "prompts_files", binding.pattern);
  }

  return {
    prompts: data.prompts ? Object.freeze({ ...data.prompts }) : null,
    promptsFiles: promptsFiles ? Object.freeze(promptsFiles) : null,
  };
}

async function loadRevisionConfig(
  configDir: string,
): Promise<RevisionConfig | null> {
  const filePath = join(configDir, CONFIG_FILENAME);
  const doc = await readYamlDocument(filePath);
  if (!doc) return null;

  const data = validateDocument(filePath, doc, RevisionConfigSchema);
  const matchings = data.files?.matchings
    ? readBindings(filePath, doc, ["files", "matchings"], data.files.matchings)
    : null;
  const ignore = data.files?.ignore ? [...data.files.ignore] : null;

  for (const binding of matchings ?? []) {
    compileCheck(filePath, "files.matchings", binding.pattern);
  }
  for (const pattern of ignore ?? []) {
    compileCheck(filePath, "files.ignore", pattern);
  }

  return Object.freeze({
    default: data.default ?? null,
    files: Object.freeze({
      matchings: matchings ? Object.freeze(matchings) : null,
      ignore: ignore ? Object.freeze(ignore) : null,
    }),
  });
}

/**
 * Loads ai-revision-prompts.yaml and ai-revision-config.yaml from a directory.
 * Each source stays null when its file or key is absent.
 */
export async function loadConfigurationSet(
  configDir: string,
): Promise<ConfigurationSet> {
  const { prompts, promptsFiles } = await loadPromptsFile(configDir);
  const config = await loadRevisionConfig(configDir);

  return Object.freeze({ prompts, promptsFiles, config });
}
