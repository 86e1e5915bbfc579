import dotenv from "dotenv";

dotenv.config();

export const DEFAULT_REDUCTION_STEPS = ["contacts-locations"] as const;

export interface AppConfig {
  providers: {
    openaiApiKey: string;
    anthropicApiKey: string;
    googleAiApiKey: string;
  };
  model: {
    defaultModel: string;
    /** null leaves the provider's own default in place */
    temperature: number | null;
    timeoutMs: number;
    maxOutputTokens: number;
  };
  retry: {
    maxAttempts: number;
    initialDelayMs: number;
  };
  pipeline: {
    /** Pause after every written evaluation, a crude throttle against upstream rate limits */
    pacingMs: number;
    reductionSteps: string[];
  };
  logging: {
    level: string;
    file: string;
  };
}

function parseList(value: string | undefined, fallback: readonly string[]): string[] {
  if (value === undefined) return [...fallback];
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function parseOptionalFloat(value: string | undefined): number | null {
  if (value === undefined || value.trim() === "") return null;
  return parseFloat(value);
}

export function buildConfig(env: NodeJS.ProcessEnv): AppConfig {
  return {
    providers: {
      openaiApiKey: env.OPENAI_API_KEY ?? "",
      anthropicApiKey: env.ANTHROPIC_API_KEY ?? "",
      googleAiApiKey: env.GOOGLE_AI_API_KEY ?? env.GOOGLE_API_KEY ?? "",
    },
    model: {
      defaultModel: env.DEFAULT_MODEL ?? "gpt-4o-mini",
      temperature: parseOptionalFloat(env.MODEL_TEMPERATURE),
      timeoutMs: parseInt(env.MODEL_TIMEOUT_MS ?? "120000", 10),
      maxOutputTokens: parseInt(env.MODEL_MAX_OUTPUT_TOKENS ?? "2048", 10),
    },
    retry: {
      maxAttempts: parseInt(env.RETRY_MAX_ATTEMPTS ?? "5", 10),
      initialDelayMs: parseInt(env.RETRY_INITIAL_DELAY_MS ?? "1000", 10),
    },
    pipeline: {
      pacingMs: parseInt(env.PACING_MS ?? "1000", 10),
      reductionSteps: parseList(env.REDUCTION_STEPS, DEFAULT_REDUCTION_STEPS),
    },
    logging: {
      level: env.LOG_LEVEL ?? "info",
      file: env.LOG_FILE ?? "",
    },
  };
}

export const config: AppConfig = buildConfig(process.env);
