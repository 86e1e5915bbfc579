import type { EvaluationRecord, StoredEvaluation } from "../eval/models/types.js";

/**
 * Persisted, incrementally grown collection of evaluations. A single writer is
 * assumed; nothing guards against two runs sharing one output.
 */
export interface EvaluationStore {
  /** File (or database) backing the store */
  readonly location: string;
  /** Whether an evaluation for this trial has already been written. */
  has(trialId: string): boolean;
  append(trialId: string, evaluation: EvaluationRecord): void;
  /** Every stored evaluation, in write order. */
  readAll(): StoredEvaluation[];
  close(): void;
}
