import { CompletionError } from "../../errors.js";

export interface ProviderSettings {
  apiKey: string;
  /** null leaves the provider default */
  temperature: number | null;
  maxOutputTokens: number;
}

/** A reply without text (null content, a refusal, a non-text block) counts as a failed request. */
export function requireText(text: string | null | undefined, model: string): string {
  if (text === null || text === undefined || text.trim() === "") {
    throw new CompletionError(`${model} returned no text`, "transient");
  }
  return text;
}
