import { describe, it, expect } from "vitest";
import { DummyRevisionModel } from "./dummy";
import { RandomRevisionModel } from "./random";

describe("DummyRevisionModel", () => {
  it("returns the paragraph unchanged", async () => {
    const model = new DummyRevisionModel();

    expect(await model.revise("  Some text\nacross lines.")).toBe(
      "  Some text\nacross lines.",
    );
  });
});

describe("RandomRevisionModel", () => {
  it("shuffles words with the given random source", async () => {
    const model = new RandomRevisionModel(() => 0);

    expect(await model.revise("alpha beta\n  gamma")).toBe("beta gamma alpha");
  });

  it("keeps every word", async () => {
    const model = new RandomRevisionModel();
    const paragraph = "one two three four five six seven";

    const revised = await model.revise(paragraph);

    expect(revised.split(" ").sort()).toEqual(paragraph.split(" ").sort());
  });

  it("returns an empty string for a paragraph without words", async () => {
    expect(await new RandomRevisionModel().revise("   ")).toBe("");
  });
});
