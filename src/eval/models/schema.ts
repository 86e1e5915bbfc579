import { z } from "zod";
import type { EvaluationRecord, JsonValue } from "./types.js";

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)]),
);

// Descriptive fields pass through in whatever shape they arrive; a score of the
// wrong type degrades to null instead of failing the whole document.
const descriptive = jsonValue.optional();
const score = z.number().nullish().catch(null);

const descriptiveFields = {
  unclear_criteria: descriptive,
  reasoning: descriptive,
  treatment_type: descriptive,
  number_of_patients: descriptive,
  trial_phase: descriptive,
  start_date: descriptive,
  location: descriptive,
  link: descriptive,
  drug: descriptive,
};

/**
 * The model's response document. Scores stay `unknown` so the validator can
 * tell an absent score from an out-of-range one.
 */
export const EvaluationResponseSchema = z.object({
  ...descriptiveFields,
  eligibility_probability: z.unknown(),
  clinical_benefit_score: z.unknown(),
  total_score: z.unknown(),
});

export type EvaluationResponse = z.infer<typeof EvaluationResponseSchema>;

/** A record as persisted by the output store. */
export const EvaluationRecordSchema = z
  .object({
    ...descriptiveFields,
    eligibility_probability: score,
    clinical_benefit_score: score,
    total_score: score,
  })
  .transform(
    (r): EvaluationRecord => ({
      unclear_criteria: r.unclear_criteria ?? null,
      eligibility_probability: r.eligibility_probability ?? null,
      clinical_benefit_score: r.clinical_benefit_score ?? null,
      total_score: r.total_score ?? null,
      reasoning: r.reasoning ?? null,
      treatment_type: r.treatment_type ?? null,
      number_of_patients: r.number_of_patients ?? null,
      trial_phase: r.trial_phase ?? null,
      start_date: r.start_date ?? null,
      location: r.location ?? null,
      link: r.link ?? null,
      drug: r.drug ?? null,
    }),
  );

export const StoredEvaluationSchema = z.union([
  z.object({ trial_id: z.string(), evaluation: EvaluationRecordSchema }),
  // older output files keep the record under gpt_response
  z
    .object({ trial_id: z.string(), gpt_response: EvaluationRecordSchema })
    .transform(({ trial_id, gpt_response }) => ({ trial_id, evaluation: gpt_response })),
]);

export const StoredEvaluationListSchema = z.array(StoredEvaluationSchema);
