import OpenAI from "openai";
import { CompletionError, classifyStatus } from "../../errors.js";
import type { CompletionProvider } from "../types.js";
import { requireText, type ProviderSettings } from "./types.js";

export function toOpenAIError(e: unknown): CompletionError {
  if (e instanceof CompletionError) return e;
  if (e instanceof OpenAI.APIError) {
    return new CompletionError(e.message, classifyStatus(e.status), e.status ?? null);
  }
  return new CompletionError(e instanceof Error ? e.message : String(e), "rejected");
}

/**
 * Chat-completions provider. The SDK's own retries are disabled; backoff is
 * handled by `requestCompletion`.
 */
export function createOpenAIProvider(model: string, settings: ProviderSettings): CompletionProvider {
  let client: OpenAI | null = null;

  function getClient(): OpenAI {
    if (!client) {
      client = new OpenAI({ apiKey: settings.apiKey, maxRetries: 0 });
    }
    return client;
  }

  return {
    id: "openai",
    model,
    async complete(prompt: string): Promise<string> {
      if (!settings.apiKey) {
        throw new CompletionError("OPENAI_API_KEY not configured", "rejected");
      }
      try {
        const response = await getClient().chat.completions.create({
          model,
          max_tokens: settings.maxOutputTokens,
          messages: [{ role: "user", content: prompt }],
          ...(settings.temperature !== null ? { temperature: settings.temperature } : {}),
        });
        return requireText(response.choices[0]?.message?.content, model);
      } catch (e: unknown) {
        throw toOpenAIError(e);
      }
    },
  };
}
