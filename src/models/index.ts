import type { RevisionModel } from "../core/types";
import type { Settings } from "../settings";
import { DummyRevisionModel } from "./dummy";
import { OpenAIRevisionModel } from "./openai";
import { RandomRevisionModel } from "./random";

export const MODEL_KINDS = ["openai", "dummy", "random"] as const;

export type ModelKind = (typeof MODEL_KINDS)[number];

export function isModelKind(value: string): value is ModelKind {
  return MODEL_KINDS.some((kind) => kind === value);
}

export function createRevisionModel(
  kind: ModelKind,
  settings: Settings,
): RevisionModel {
  switch (kind) {
    case "dummy":
      return new DummyRevisionModel();
    case "random":
      return new RandomRevisionModel();
    case "openai":
      return new OpenAIRevisionModel({
        apiKey: settings.apiKey,
        model: settings.languageModel,
        temperature: settings.temperature,
        maxTokens: settings.maxTokens,
      });
  }
}

export { DummyRevisionModel } from "./dummy";
export { RandomRevisionModel } from "./random";
export {
  buildMessages,
  OpenAIRevisionModel,
  type ChatCompletionClient,
  type ChatCompletionRequest,
  type ChatMessage,
  type OpenAIRevisionModelOptions,
} from "./openai";
