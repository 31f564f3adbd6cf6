import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFile } from "node:fs/promises";
import path from "node:path";

import { loadMetadata } from "./metadata";
import { ConfigError } from "./errors";
import { METADATA_YAML, makeTempDir, removeDir } from "../test-utils";
import { METADATA_FILENAME } from "../constants";

describe("metadata", () => {
  let tempDir: string;

  const writeMetadata = (content: string) =>
    writeFile(path.join(tempDir, METADATA_FILENAME), content);

  beforeEach(async () => {
    tempDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(tempDir);
  });

  it("reads title and keywords", async () => {
    await writeMetadata(METADATA_YAML);

    expect(await loadMetadata(tempDir)).toEqual({
      title: "An efficient not-only-linear correlation coefficient",
      keywords: [
        "correlation coefficient",
        "nonlinear relationships",
        "gene expression",
      ],
    });
  });

  it("returns empty values when the file is missing", async () => {
    expect(await loadMetadata(tempDir)).toEqual({ title: "", keywords: [] });
  });

  it("returns empty values for missing keys", async () => {
    await writeMetadata("lang: en-US\n");

    expect(await loadMetadata(tempDir)).toEqual({ title: "", keywords: [] });
  });

  it("reads numeric keywords as text", async () => {
    await writeMetadata("title: Yearly report\nkeywords:\n  - 2020\n  - trends\n  - true\n");

    expect(await loadMetadata(tempDir)).toEqual({
      title: "Yearly report",
      keywords: ["2020", "trends", "true"],
    });
  });

  it("splits comma-separated keywords", async () => {
    await writeMetadata("title: '  Spaced title '\nkeywords: genes, networks ,\n");

    expect(await loadMetadata(tempDir)).toEqual({
      title: "Spaced title",
      keywords: ["genes", "networks"],
    });
  });

  it("rejects a title that is not a string", async () => {
    await writeMetadata("title:\n  - a\n  - b\n");

    await expect(loadMetadata(tempDir)).rejects.toBeInstanceOf(ConfigError);
  });
});
