import OpenAI from "openai";
import {
  DEFAULT_LANGUAGE_MODEL,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
} from "../constants";
import { ModelError } from "../core/errors";
import {
  formatKeywords,
  hasPlaceholder,
  renderPrompt,
} from "../core/prompt-template";
import type { RevisionModel } from "../core/types";

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string };

export interface ChatCompletionRequest {
  model: string;
  temperature: number;
  max_tokens: number;
  messages: ChatMessage[];
}

/** The part of the OpenAI client the model uses */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(request: ChatCompletionRequest): Promise<{
        choices: Array<{ message: { content: string | null } }>;
      }>;
    };
  };
}

export interface OpenAIRevisionModelOptions {
  apiKey?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Injected client; built from `apiKey` otherwise */
  client?: ChatCompletionClient;
}

/**
 * Builds the chat messages for one paragraph. A template that places
 * `{paragraph_text}` itself is sent as a single user message; otherwise the
 * template becomes the system message and the paragraph the user message.
 */
export function buildMessages(
  paragraph: string,
  prompt: string,
  title: string,
  keywords: readonly string[],
): ChatMessage[] {
  const values = {
    title,
    keywords: formatKeywords(keywords),
    paragraph_text: paragraph,
  };

  if (hasPlaceholder(prompt, "paragraph_text")) {
    return [{ role: "user", content: renderPrompt(prompt, values) }];
  }

  return [
    { role: "system", content: renderPrompt(prompt, values) },
    { role: "user", content: paragraph },
  ];
}

/** Revises paragraphs through the OpenAI Chat Completions API */
export class OpenAIRevisionModel implements RevisionModel {
  private readonly client: ChatCompletionClient;
  readonly model: string;
  readonly temperature: number;
  readonly maxTokens: number;

  constructor(options: OpenAIRevisionModelOptions = {}) {
    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      this.client = new OpenAI({ apiKey: options.apiKey });
    } else {
      throw new ModelError(
        "An OpenAI API key is required (set OPENAI_API_KEY)",
      );
    }

    this.model = options.model ?? DEFAULT_LANGUAGE_MODEL;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
  }

  async revise(
    paragraph: string,
    prompt: string,
    title: string,
    keywords: string[],
  ): Promise<string> {
    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        temperature: this.temperature,
        max_tokens: this.maxTokens,
        messages: buildMessages(paragraph, prompt, title, keywords),
      });
      content = response.choices[0]?.message.content;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ModelError(`OpenAI request failed: ${message}`, {
        cause: err,
      });
    }

    const revised = content?.trim();
    if (!revised) {
      throw new ModelError("OpenAI returned an empty completion");
    }
    return revised;
  }
}
