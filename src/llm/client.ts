import pLimit from "p-limit";
import { ChatOpenAI } from "@langchain/openai";
import { APIConnectionError, APIConnectionTimeoutError, APIError, RateLimitError } from "openai";
import { LanguageModelError } from "../errors";
import type { RequestOptions } from "../types";

/** Text-in, text-out model capability consumed by the oracle. */
export interface LanguageModel {
  generate(prompt: string, options?: RequestOptions): Promise<string>;
}

export interface OpenAiModelSettings {
  apiKey?: string;
  model: string;
  temperature: number;
  maxTokens?: number;
  maxConcurrency?: number;
}

export class OpenAiLanguageModel implements LanguageModel {
  private readonly chat: ChatOpenAI | null;

  private readonly limit: ReturnType<typeof pLimit>;

  constructor(settings: OpenAiModelSettings) {
    this.chat = settings.apiKey
      ? new ChatOpenAI({
          apiKey: settings.apiKey,
          model: settings.model,
          temperature: settings.temperature,
          maxTokens: settings.maxTokens ?? 800,
          maxRetries: 1
        })
      : null;
    this.limit = pLimit(settings.maxConcurrency ?? 4);
  }

  get configured(): boolean {
    return this.chat !== null;
  }

  generate(prompt: string, options: RequestOptions = {}): Promise<string> {
    const chat = this.chat;
    if (!chat) {
      return Promise.reject(new LanguageModelError("configuration", "OPENAI_API_KEY is not configured"));
    }

    return this.limit(async () => {
      try {
        const response = await chat.invoke(prompt, { signal: options.signal });
        const text = readMessageContent(response.content);
        if (!text.trim()) {
          throw new LanguageModelError("empty_response", "Model returned empty response");
        }
        return text;
      } catch (error) {
        throw toLanguageModelError(error);
      }
    });
  }
}

export function readMessageContent(content: unknown): string {
  if (typeof content === "string") {
    return content;
  }
  if (Array.isArray(content)) {
    return content
      .map((part: unknown) => {
        if (typeof part === "string") {
          return part;
        }
        if (part && typeof part === "object" && "text" in part && typeof part.text === "string") {
          return part.text;
        }
        return "";
      })
      .join("");
  }
  return "";
}

export function toLanguageModelError(error: unknown): LanguageModelError {
  if (error instanceof LanguageModelError) {
    return error;
  }
  if (error instanceof APIConnectionTimeoutError || (error instanceof Error && error.name === "TimeoutError")) {
    return new LanguageModelError("timeout", error.message);
  }
  if (error instanceof RateLimitError) {
    return new LanguageModelError("rate_limit", error.message);
  }
  if (error instanceof APIConnectionError || error instanceof APIError) {
    return new LanguageModelError("transport", error.message);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new LanguageModelError("transport", message);
}
