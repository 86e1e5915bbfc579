import { CompletionError, type FailureKind } from "../src/eval/errors.js";
import type {
  CompletionProvider,
  EvaluationRecord,
  StoredEvaluation,
} from "../src/eval/models/types.js";
import type { EvaluationStore } from "../src/store/types.js";
import type { Trial } from "../src/trials/types.js";

/**
 * Minimal ClinicalTrials.gov-shaped study with a contacts/locations module
 * whose facility name ("Site <id>") can be looked for in prompts.
 */
export function makeTrial(nctId: string, overrides: Record<string, unknown> = {}): Trial {
  return {
    protocolSection: {
      identificationModule: { nctId, briefTitle: `Study ${nctId}` },
      designModule: { phases: ["PHASE2"] },
      contactsLocationsModule: {
        locations: [{ facility: `Site ${nctId}`, city: "Springfield" }],
      },
    },
    ...overrides,
  };
}

export function makeEvaluation(overrides: Partial<EvaluationRecord> = {}): EvaluationRecord {
  return {
    unclear_criteria: [],
    eligibility_probability: 50,
    clinical_benefit_score: 60,
    total_score: 30,
    reasoning: "Plausible fit.",
    treatment_type: "KRAS inhibitor",
    number_of_patients: 120,
    trial_phase: "Phase 2",
    start_date: "2024-03-01",
    location: "Springfield",
    link: "https://clinicaltrials.gov/study/NCT00000000",
    drug: "Drug X",
    ...overrides,
  };
}

export function stored(trialId: string, totalScore: number | null): StoredEvaluation {
  return { trial_id: trialId, evaluation: makeEvaluation({ total_score: totalScore }) };
}

/** A model response document as the model would send it. */
export function responseJson(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    unclear_criteria: ["Prior lines of therapy"],
    eligibility_probability: 80,
    clinical_benefit_score: 50,
    total_score: 40,
    reasoning: "Matches the primary diagnosis.",
    treatment_type: "Checkpoint inhibitor",
    number_of_patients: 200,
    trial_phase: "Phase 3",
    start_date: "2025-01-15",
    location: ["Springfield", "Shelbyville"],
    link: "https://clinicaltrials.gov/study/NCT00000001",
    drug: "Drug Y",
    ...overrides,
  });
}

export function failure(kind: FailureKind, message = `${kind} failure`): CompletionError {
  return new CompletionError(message, kind);
}

export interface ScriptedProvider extends CompletionProvider {
  prompts: string[];
}

/**
 * Provider that answers from a script: strings resolve, errors reject.
 * Once the script runs out, the last step repeats.
 */
export function scriptedProvider(steps: Array<string | Error>): ScriptedProvider {
  const prompts: string[] = [];
  return {
    id: "openai",
    model: "test-model",
    prompts,
    async complete(prompt: string): Promise<string> {
      const step = steps[Math.min(prompts.length, steps.length - 1)];
      prompts.push(prompt);
      if (step instanceof Error) throw step;
      return step;
    },
  };
}

/** Provider driven by a function of the prompt. */
export function promptProvider(answer: (prompt: string) => string): ScriptedProvider {
  const prompts: string[] = [];
  return {
    id: "openai",
    model: "test-model",
    prompts,
    async complete(prompt: string): Promise<string> {
      prompts.push(prompt);
      return answer(prompt);
    },
  };
}

export class MemoryStore implements EvaluationStore {
  readonly location = ":memory:";
  readonly entries: StoredEvaluation[];

  constructor(initial: StoredEvaluation[] = []) {
    this.entries = [...initial];
  }

  has(trialId: string): boolean {
    return this.entries.some((e) => e.trial_id === trialId);
  }

  append(trialId: string, evaluation: EvaluationRecord): void {
    this.entries.push({ trial_id: trialId, evaluation });
  }

  readAll(): StoredEvaluation[] {
    return [...this.entries];
  }

  close(): void {}
}

/** Records requested delays instead of waiting. */
export function recordingSleep(): { delays: number[]; sleep: (ms: number) => Promise<void> } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}
