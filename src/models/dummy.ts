import type { RevisionModel } from "../core/types";

/** Returns every paragraph unchanged. Useful to check what a run would touch. */
export class DummyRevisionModel implements RevisionModel {
  async revise(paragraph: string): Promise<string> {
    return paragraph;
  }
}
