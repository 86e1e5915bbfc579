import { ApiError, GoogleGenAI } from "@google/genai";
import { CompletionError, classifyStatus } from "../../errors.js";
import type { CompletionProvider } from "../types.js";
import { requireText, type ProviderSettings } from "./types.js";

export function toGeminiError(e: unknown): CompletionError {
  if (e instanceof CompletionError) return e;
  if (e instanceof ApiError) {
    return new CompletionError(e.message, classifyStatus(e.status), e.status);
  }
  // fetch-level failures (DNS, reset connections) never reach an HTTP status
  if (e instanceof TypeError) {
    return new CompletionError(e.message, "transient");
  }
  return new CompletionError(e instanceof Error ? e.message : String(e), "rejected");
}

export function createGeminiProvider(model: string, settings: ProviderSettings): CompletionProvider {
  let genAI: GoogleGenAI | null = null;

  function getGenAI(): GoogleGenAI {
    if (!genAI) {
      genAI = new GoogleGenAI({ apiKey: settings.apiKey });
    }
    return genAI;
  }

  return {
    id: "google",
    model,
    async complete(prompt: string): Promise<string> {
      if (!settings.apiKey) {
        throw new CompletionError("GOOGLE_AI_API_KEY not configured", "rejected");
      }
      try {
        const response = await getGenAI().models.generateContent({
          model,
          contents: prompt,
          config: {
            ...(settings.temperature !== null ? { temperature: settings.temperature } : {}),
            maxOutputTokens: settings.maxOutputTokens,
          },
        });
        return requireText(response.text, model);
      } catch (e: unknown) {
        throw toGeminiError(e);
      }
    },
  };
}
