import { describe, it, expect } from "vitest";
import { EvaluationRecordSchema, StoredEvaluationListSchema, StoredEvaluationSchema } from "../schema.js";
import { makeEvaluation } from "../../../../test/helpers.js";

describe("EvaluationRecordSchema", () => {
  it("accepts a complete record", () => {
    const record = makeEvaluation();
    expect(EvaluationRecordSchema.parse(record)).toEqual(record);
  });

  it("fills absent fields with null", () => {
    const parsed = EvaluationRecordSchema.parse({ drug: "Drug Z" });
    expect(parsed.drug).toBe("Drug Z");
    expect(parsed.total_score).toBeNull();
    expect(parsed.unclear_criteria).toBeNull();
    expect(Object.keys(parsed)).toHaveLength(12);
  });

  it("nulls scores that are not numbers and keeps other values as stored", () => {
    const parsed = EvaluationRecordSchema.parse({
      total_score: "high",
      trial_phase: ["Phase 1", "Phase 2"],
      drug: ["Drug A", "Drug B"],
      number_of_patients: { planned: 80 },
    });
    expect(parsed.total_score).toBeNull();
    expect(parsed.trial_phase).toEqual(["Phase 1", "Phase 2"]);
    expect(parsed.drug).toEqual(["Drug A", "Drug B"]);
    expect(parsed.number_of_patients).toEqual({ planned: 80 });
  });

  it("strips unknown fields", () => {
    const parsed = EvaluationRecordSchema.parse({ ...makeEvaluation(), confidence: 90 });
    expect(parsed).not.toHaveProperty("confidence");
  });

  it("rejects non-objects", () => {
    expect(EvaluationRecordSchema.safeParse("text").success).toBe(false);
  });
});

describe("StoredEvaluationSchema", () => {
  it("reads current entries", () => {
    const entry = { trial_id: "NCT300", evaluation: makeEvaluation() };
    expect(StoredEvaluationSchema.parse(entry)).toEqual(entry);
  });

  it("reads entries written under the legacy gpt_response key", () => {
    const parsed = StoredEvaluationSchema.parse({ trial_id: "NCT300", gpt_response: makeEvaluation() });
    expect(parsed).toEqual({ trial_id: "NCT300", evaluation: makeEvaluation() });
  });

  it("rejects entries without a trial id", () => {
    expect(StoredEvaluationSchema.safeParse({ evaluation: makeEvaluation() }).success).toBe(false);
  });

  it("parses a mixed list in order", () => {
    const list = StoredEvaluationListSchema.parse([
      { trial_id: "A", evaluation: makeEvaluation({ total_score: 10 }) },
      { trial_id: "B", gpt_response: makeEvaluation({ total_score: 20 }) },
    ]);
    expect(list.map((e) => [e.trial_id, e.evaluation.total_score])).toEqual([
      ["A", 10],
      ["B", 20],
    ]);
  });
});
