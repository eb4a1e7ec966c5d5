import { chat } from "@tanstack/ai";
import { anthropicText } from "@tanstack/ai-anthropic";
import { geminiText } from "@tanstack/ai-gemini";
import { openaiText } from "@tanstack/ai-openai";
import { validateEnvForModel } from "../config.js";
import type { GenerationRequest, TextGenerator } from "../client.js";
import type { ModelSettings } from "../types.js";

/**
 * Create a TanStack AI text adapter for the configured model.
 * Built-in providers: openai, anthropic, gemini.
 * Any other provider uses the OpenAI-compatible adapter.
 */
export function createAdapter(settings: ModelSettings) {
  switch (settings.provider) {
    case "anthropic":
      return anthropicText(settings.model as any);
    case "gemini":
      return geminiText(settings.model as any);
    default:
      return openaiText(settings.model as any);
  }
}

/**
 * Text generator backed by a hosted chat-completion model.
 * The API key is checked on every call so a missing key surfaces as a
 * failed recommendation rather than a startup crash.
 */
export function createChatGenerator(settings: ModelSettings): TextGenerator {
  return {
    async generate(request: GenerationRequest): Promise<string> {
      validateEnvForModel(settings);

      // stream: false returns Promise<string> instead of AsyncIterable<StreamChunk>
      return chat({
        adapter: createAdapter(settings),
        systemPrompts: [request.systemPrompt],
        messages: [
          {
            role: "user",
            content: [{ type: "text", content: request.prompt }],
          },
        ],
        temperature: request.temperature,
        maxTokens: request.maxTokens,
        stream: false as const,
      });
    },
  };
}
