import type { RevisionModel } from "../core/types";

/**
 * Shuffles the words of each paragraph. Output changes on every run unless a
 * deterministic `random` is given.
 */
export class RandomRevisionModel implements RevisionModel {
  constructor(private readonly random: () => number = Math.random) {}

  async revise(paragraph: string): Promise<string> {
    const words = paragraph.split(/\s+/).filter(Boolean);

    for (let i = words.length - 1; i > 0; i--) {
      const j = Math.floor(this.random() * (i + 1));
      [words[i], words[j]] = [words[j], words[i]];
    }

    return words.join(" ");
  }
}
