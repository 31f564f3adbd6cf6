import { join } from "node:path";
import { z } from "zod";
import { METADATA_FILENAME } from "../constants";
import { readYamlDocument, validateDocument } from "./config";
import type { ManuscriptMetadata } from "./types";

const MetadataSchema = z
  .object({
    title: z.string().nullish(),
    /** A list, or a single comma-separated string */
    keywords: z
      .union([
        z.array(
          z.union([z.string(), z.number(), z.boolean()]).transform(String),
        ),
        z.string(),
      ])
      .nullish(),
  })
  .passthrough();

function parseKeywords(keywords: string[] | string | null | undefined) {
  if (!keywords) return [];
  const list = typeof keywords === "string" ? keywords.split(",") : keywords;
  return list.map((keyword) => keyword.trim()).filter(Boolean);
}

/**
 * Reads title and keywords from the manuscript's metadata.yaml. A missing
 * file or key gives empty values.
 */
export async function loadMetadata(
  contentDir: string,
): Promise<ManuscriptMetadata> {
  const filePath = join(contentDir, METADATA_FILENAME);
  const doc = await readYamlDocument(filePath);
  if (!doc) return { title: "", keywords: [] };

  const data = validateDocument(filePath, doc, MetadataSchema);
  return {
    title: data.title?.trim() ?? "",
    keywords: parseKeywords(data.keywords),
  };
}
