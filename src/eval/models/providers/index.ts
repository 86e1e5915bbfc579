import type { AppConfig } from "../../../config.js";
import type { CompletionProvider, ProviderId } from "../types.js";
import { createClaudeProvider } from "./claude.js";
import { createGeminiProvider } from "./gemini.js";
import { createOpenAIProvider } from "./openai.js";

export function providerForModel(model: string): ProviderId {
  const m = model.toLowerCase();
  if (m.startsWith("claude")) return "anthropic";
  if (m.startsWith("gemini")) return "google";
  return "openai";
}

export function apiKeyFor(provider: ProviderId, cfg: AppConfig): string {
  switch (provider) {
    case "anthropic":
      return cfg.providers.anthropicApiKey;
    case "google":
      return cfg.providers.googleAiApiKey;
    case "openai":
      return cfg.providers.openaiApiKey;
  }
}

export const API_KEY_VARIABLE: Record<ProviderId, string> = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  google: "GOOGLE_AI_API_KEY",
};

/** Build the completion provider for a model id, with credentials taken from `cfg`. */
export function createProvider(model: string, cfg: AppConfig): CompletionProvider {
  const id = providerForModel(model);
  const settings = {
    apiKey: apiKeyFor(id, cfg),
    temperature: cfg.model.temperature,
    maxOutputTokens: cfg.model.maxOutputTokens,
  };
  switch (id) {
    case "anthropic":
      return createClaudeProvider(model, settings);
    case "google":
      return createGeminiProvider(model, settings);
    case "openai":
      return createOpenAIProvider(model, settings);
  }
}
