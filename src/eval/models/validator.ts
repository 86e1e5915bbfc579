import { logEval } from "../../logging.js";
import { EvaluationResponseSchema } from "./schema.js";
import type { EvaluationRecord } from "./types.js";

const FENCE_OPEN = "```json";
const FENCE_CLOSE = "```";

export const EMPTY_EVALUATION: Readonly<EvaluationRecord> = Object.freeze({
  unclear_criteria: null,
  eligibility_probability: null,
  clinical_benefit_score: null,
  total_score: null,
  reasoning: null,
  treatment_type: null,
  number_of_patients: null,
  trial_phase: null,
  start_date: null,
  location: null,
  link: null,
  drug: null,
});

export function emptyEvaluation(): EvaluationRecord {
  return { ...EMPTY_EVALUATION };
}

/** Drop a ```json ... ``` wrapper around the whole response, if there is one. */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (
    trimmed.length >= FENCE_OPEN.length + FENCE_CLOSE.length &&
    trimmed.startsWith(FENCE_OPEN) &&
    trimmed.endsWith(FENCE_CLOSE)
  ) {
    return trimmed.slice(FENCE_OPEN.length, -FENCE_CLOSE.length).trim();
  }
  return trimmed;
}

/** A 0-100 score, or null when absent or invalid. */
function checkScore(field: string, value: unknown): number | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 100) {
    logEval.warn({ field, value }, `${field} out of valid range, recording null`);
    return null;
  }
  return value;
}

export function computeTotalScore(clinicalBenefit: number, eligibility: number): number {
  // two decimals
  return Math.round(clinicalBenefit * eligibility) / 100;
}

/**
 * Turn the model's raw text into an evaluation record. Never throws: text that
 * is not a JSON object yields the all-null record.
 */
export function parseEvaluationResponse(raw: string): EvaluationRecord {
  let doc: unknown;
  try {
    doc = JSON.parse(stripCodeFence(raw));
  } catch {
    logEval.error({ length: raw.length }, "Failed to decode JSON response, recording empty evaluation");
    return emptyEvaluation();
  }

  const parsed = EvaluationResponseSchema.safeParse(doc);
  if (!parsed.success) {
    logEval.error("Response is not a JSON object, recording empty evaluation");
    return emptyEvaluation();
  }
  const r = parsed.data;

  const eligibility = checkScore("eligibility_probability", r.eligibility_probability);
  const benefit = checkScore("clinical_benefit_score", r.clinical_benefit_score);
  const upstreamTotal = checkScore("total_score", r.total_score);

  let total = upstreamTotal;
  if (eligibility !== null && benefit !== null) {
    total = computeTotalScore(benefit, eligibility);
    if (upstreamTotal !== null && Math.abs(upstreamTotal - total) >= 0.5) {
      logEval.debug({ upstream: upstreamTotal, computed: total }, "Replacing model-reported total_score");
    }
  }

  return {
    unclear_criteria: r.unclear_criteria ?? null,
    eligibility_probability: eligibility,
    clinical_benefit_score: benefit,
    total_score: total,
    reasoning: r.reasoning ?? null,
    treatment_type: r.treatment_type ?? null,
    number_of_patients: r.number_of_patients ?? null,
    trial_phase: r.trial_phase ?? null,
    start_date: r.start_date ?? null,
    location: r.location ?? null,
    link: r.link ?? null,
    drug: r.drug ?? null,
  };
}
