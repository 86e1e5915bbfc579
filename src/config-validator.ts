import type { AppConfig } from "./config.js";
import { API_KEY_VARIABLE, apiKeyFor, providerForModel } from "./eval/models/providers/index.js";
import { unknownReductionSteps } from "./eval/models/reduction.js";

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

// Beyond this the backoff alone would wait more than an hour per request.
const MAX_REASONABLE_ATTEMPTS = 12;

/**
 * Validates configuration values for a run against `model`.
 *
 * Checks:
 * - An API key is configured for the model's provider
 * - retry.maxAttempts is a positive integer (warning above 12)
 * - retry.initialDelayMs and pipeline.pacingMs are non-negative
 * - model.timeoutMs and model.maxOutputTokens are positive
 * - model.temperature, when set, is a number in 0-2
 * - Every reduction step is known (warning when the ladder is empty)
 *
 * @param cfg - Configuration object from config.ts
 * @param model - Model identifier the run will use
 * @returns ValidationResult with arrays of error and warning messages
 */
export function validateConfig(cfg: AppConfig, model: string): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const provider = providerForModel(model);
  if (!apiKeyFor(provider, cfg)) {
    errors.push(`${API_KEY_VARIABLE[provider]} is required for model ${model}`);
  }

  if (!Number.isInteger(cfg.retry.maxAttempts) || cfg.retry.maxAttempts < 1) {
    errors.push(`retry.maxAttempts must be a positive integer, got ${cfg.retry.maxAttempts}`);
  } else if (cfg.retry.maxAttempts > MAX_REASONABLE_ATTEMPTS) {
    warnings.push(`retry.maxAttempts is ${cfg.retry.maxAttempts}; backoff delays double on every attempt`);
  }

  if (!Number.isFinite(cfg.retry.initialDelayMs) || cfg.retry.initialDelayMs < 0) {
    errors.push(`retry.initialDelayMs must be non-negative, got ${cfg.retry.initialDelayMs}`);
  }

  if (!Number.isFinite(cfg.pipeline.pacingMs) || cfg.pipeline.pacingMs < 0) {
    errors.push(`pipeline.pacingMs must be non-negative, got ${cfg.pipeline.pacingMs}`);
  }

  if (!Number.isFinite(cfg.model.timeoutMs) || cfg.model.timeoutMs <= 0) {
    errors.push(`model.timeoutMs must be positive, got ${cfg.model.timeoutMs}`);
  }

  if (!Number.isInteger(cfg.model.maxOutputTokens) || cfg.model.maxOutputTokens <= 0) {
    errors.push(`model.maxOutputTokens must be a positive integer, got ${cfg.model.maxOutputTokens}`);
  }

  const temperature = cfg.model.temperature;
  if (temperature !== null && (!Number.isFinite(temperature) || temperature < 0 || temperature > 2)) {
    errors.push(`model.temperature must be between 0 and 2, got ${temperature}`);
  }

  const unknown = unknownReductionSteps(cfg.pipeline.reductionSteps);
  if (unknown.length > 0) {
    errors.push(`Unknown reduction step(s): ${unknown.join(", ")}`);
  }
  if (cfg.pipeline.reductionSteps.length === 0) {
    warnings.push("No reduction steps configured; a failed trial will not be retried with a smaller payload");
  }

  return { errors, warnings };
}
