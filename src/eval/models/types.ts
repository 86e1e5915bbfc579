export type ProviderId = "openai" | "anthropic" | "google";

/** Any value a JSON document can hold. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Scores and trial summary returned by the model for one trial-patient pairing.
 * Descriptive fields keep whatever JSON the model sent (a list of drugs for a
 * combination arm, an object for a planned enrollment); only scores are checked.
 */
export interface EvaluationRecord {
  unclear_criteria: JsonValue;
  /** 0-100 */
  eligibility_probability: number | null;
  /** 0-100 */
  clinical_benefit_score: number | null;
  /** clinical_benefit_score * eligibility_probability / 100 */
  total_score: number | null;
  reasoning: JsonValue;
  treatment_type: JsonValue;
  number_of_patients: JsonValue;
  trial_phase: JsonValue;
  start_date: JsonValue;
  location: JsonValue;
  link: JsonValue;
  drug: JsonValue;
}

export interface StoredEvaluation {
  trial_id: string;
  evaluation: EvaluationRecord;
}

/**
 * A text-completion service: one free-text request in, one free-text response out.
 * Implementations throw `CompletionError` for service failures.
 */
export interface CompletionProvider {
  readonly id: ProviderId;
  readonly model: string;
  complete(prompt: string): Promise<string>;
}
