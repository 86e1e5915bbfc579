import { logEval } from "../../logging.js";
import { trialId, type Trial } from "../../trials/types.js";
import type { EvaluationStore } from "../../store/types.js";
import { requestCompletion, sleep } from "../retry.js";
import { selectTopTrials } from "../selector.js";
import { buildEvaluationPrompt, hashPrompt } from "./prompt.js";
import { reduceTrial, type PayloadReduction } from "./reduction.js";
import type { CompletionProvider, StoredEvaluation } from "./types.js";
import { parseEvaluationResponse } from "./validator.js";

/**
 * pending → skipped (already stored) | attempted-full
 * attempted-full / attempted-degraded → done (written) | attempted-degraded (next rung)
 * last rung failed → skipped (nothing written, retried on the next run)
 */
export type TrialState = "pending" | "attempted-full" | "attempted-degraded" | "done" | "skipped";

export interface TrialOutcome {
  trialId: string;
  state: Extract<TrialState, "done" | "skipped">;
  reason: "evaluated" | "already-processed" | "request-failed";
  /** Reduction rung of the last request; 0 is the full payload, -1 when none was sent */
  rung: number;
  totalScore: number | null;
}

export interface RunSummary {
  total: number;
  evaluated: number;
  /** already in the store */
  skipped: number;
  /** every rung failed */
  failed: number;
  /** evaluated on a reduced payload */
  degraded: number;
  outcomes: TrialOutcome[];
}

export interface RunInput {
  trials: readonly Trial[];
  patient: string;
  provider: CompletionProvider;
  store: EvaluationStore;
}

export interface RunOptions {
  retry: {
    maxAttempts: number;
    initialDelayMs: number;
    timeoutMs: number;
  };
  pacingMs: number;
  /** Applied cumulatively, one more step per failed rung */
  reductionLadder: readonly PayloadReduction[];
  /** Restrict the run to the `count` best trials of an earlier run */
  prior?: { entries: readonly StoredEvaluation[]; count: number };
  sleep?: (ms: number) => Promise<void>;
}

/** Keep the trials (in input order) whose ids are among the top `count` of a prior run. */
export function restrictToTopTrials(
  trials: readonly Trial[],
  prior: readonly StoredEvaluation[],
  count: number,
): Trial[] {
  const keep = new Set(selectTopTrials(prior, count).map((e) => e.trial_id));
  return trials.filter((t) => keep.has(trialId(t)));
}

async function evaluateTrial(
  trial: Trial,
  id: string,
  progress: string,
  input: RunInput,
  opts: RunOptions,
): Promise<TrialOutcome> {
  const { provider, store, patient } = input;
  const ladder = opts.reductionLadder;
  const pause = opts.sleep ?? sleep;

  for (let rung = 0; rung <= ladder.length; rung++) {
    const state: TrialState = rung === 0 ? "attempted-full" : "attempted-degraded";
    if (rung > 0) {
      logEval.warn(`${progress} Trying ${id} again without ${ladder[rung - 1].name}`);
    }

    const prompt = buildEvaluationPrompt(reduceTrial(trial, ladder, rung), patient);
    logEval.debug(
      { trial_id: id, state, rung, prompt_hash: hashPrompt(prompt), prompt_chars: prompt.length },
      "Sending evaluation request",
    );

    const result = await requestCompletion(provider, prompt, {
      ...opts.retry,
      sleep: opts.sleep,
      label: `${provider.model} ${id}`,
    });
    if (!result.ok) continue;

    const evaluation = parseEvaluationResponse(result.text);
    store.append(id, evaluation);
    logEval.info(
      { trial_id: id, rung, attempts: result.attempts, total_score: evaluation.total_score },
      `${progress} ${id} evaluated${evaluation.total_score !== null ? `, score ${evaluation.total_score.toFixed(1)}` : ""}`,
    );

    if (opts.pacingMs > 0) await pause(opts.pacingMs);
    return { trialId: id, state: "done", reason: "evaluated", rung, totalScore: evaluation.total_score };
  }

  logEval.error({ trial_id: id }, `${progress} Skipping ${id} due to error`);
  return { trialId: id, state: "skipped", reason: "request-failed", rung: ladder.length, totalScore: null };
}

/**
 * Evaluate every trial not yet in the store, one at a time. Per-trial failures
 * never stop the run; whatever has been written is always a valid state to
 * resume from.
 */
export async function runEvaluation(input: RunInput, opts: RunOptions): Promise<RunSummary> {
  let trials: readonly Trial[] = input.trials;
  if (opts.prior) {
    trials = restrictToTopTrials(trials, opts.prior.entries, opts.prior.count);
    logEval.info(`Selected ${trials.length} trial(s) from the top ${opts.prior.count} of the previous run`);
  }

  logEval.info(
    { model: input.provider.model, provider: input.provider.id, store: input.store.location },
    `Processing ${trials.length} trial(s)`,
  );

  const outcomes: TrialOutcome[] = [];
  for (const [index, trial] of trials.entries()) {
    const id = trialId(trial);
    const progress = `[${index + 1}/${trials.length}]`;

    if (input.store.has(id)) {
      logEval.info(`${progress} Skipping ${id}, already processed`);
      outcomes.push({ trialId: id, state: "skipped", reason: "already-processed", rung: -1, totalScore: null });
      continue;
    }

    outcomes.push(await evaluateTrial(trial, id, progress, input, opts));
  }

  const summary: RunSummary = {
    total: outcomes.length,
    evaluated: outcomes.filter((o) => o.reason === "evaluated").length,
    skipped: outcomes.filter((o) => o.reason === "already-processed").length,
    failed: outcomes.filter((o) => o.reason === "request-failed").length,
    degraded: outcomes.filter((o) => o.reason === "evaluated" && o.rung > 0).length,
    outcomes,
  };

  logEval.info(
    { evaluated: summary.evaluated, skipped: summary.skipped, failed: summary.failed, degraded: summary.degraded },
    `Run complete: ${summary.evaluated} evaluated, ${summary.skipped} already done, ${summary.failed} failed`,
  );
  return summary;
}
