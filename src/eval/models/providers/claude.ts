import Anthropic from "@anthropic-ai/sdk";
import { CompletionError, classifyStatus } from "../../errors.js";
import type { CompletionProvider } from "../types.js";
import { requireText, type ProviderSettings } from "./types.js";

export function toAnthropicError(e: unknown): CompletionError {
  if (e instanceof CompletionError) return e;
  if (e instanceof Anthropic.APIError) {
    return new CompletionError(e.message, classifyStatus(e.status), e.status ?? null);
  }
  return new CompletionError(e instanceof Error ? e.message : String(e), "rejected");
}

export function createClaudeProvider(model: string, settings: ProviderSettings): CompletionProvider {
  let client: Anthropic | null = null;

  function getClient(): Anthropic {
    if (!client) {
      client = new Anthropic({ apiKey: settings.apiKey, maxRetries: 0 });
    }
    return client;
  }

  return {
    id: "anthropic",
    model,
    async complete(prompt: string): Promise<string> {
      if (!settings.apiKey) {
        throw new CompletionError("ANTHROPIC_API_KEY not configured", "rejected");
      }
      try {
        const response = await getClient().messages.create({
          model,
          max_tokens: settings.maxOutputTokens,
          messages: [{ role: "user", content: prompt }],
          ...(settings.temperature !== null ? { temperature: settings.temperature } : {}),
        });
        const first = response.content[0];
        return requireText(first?.type === "text" ? first.text : null, model);
      } catch (e: unknown) {
        throw toAnthropicError(e);
      }
    },
  };
}
