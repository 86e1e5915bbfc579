import { mkdirSync, writeFileSync } from "node:fs";
import path from "node:path";
import { config as defaultConfig, type AppConfig } from "./config.js";
import { validateConfig } from "./config-validator.js";
import { createProvider } from "./eval/models/providers/index.js";
import { resolveReductionLadder } from "./eval/models/reduction.js";
import { runEvaluation, type RunSummary } from "./eval/models/runner.js";
import type { CompletionProvider } from "./eval/models/types.js";
import { exportEvaluationsCsv } from "./export/csv.js";
import { logCli } from "./logging.js";
import { loadPriorEvaluations, openStore } from "./store/index.js";
import { loadPatientProfile, loadTrials } from "./trials/loader.js";

export interface EvaluateArgs {
  patient: string;
  trials: string;
  output: string;
  model?: string;
  previousOutput?: string;
  numOfTrials?: number;
}

/** Collaborators the CLI builds itself; tests pass their own. */
export interface CommandDeps {
  config?: AppConfig;
  provider?: CompletionProvider;
  sleep?: (ms: number) => Promise<void>;
}

export function parseTrialCount(value: unknown): number | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  const n = typeof value === "number" ? value : Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`--num-of-trials must be a positive integer, got ${String(value)}`);
  }
  return n;
}

export async function evaluateCommand(args: EvaluateArgs, deps: CommandDeps = {}): Promise<RunSummary> {
  const cfg = deps.config ?? defaultConfig;
  const model = args.model ?? cfg.model.defaultModel;

  const validation = validateConfig(cfg, model);
  for (const warning of validation.warnings) {
    logCli.warn(warning);
  }
  if (validation.errors.length > 0) {
    for (const error of validation.errors) {
      logCli.error(error);
    }
    throw new Error("Configuration validation failed. Please fix the errors above.");
  }

  const trials = loadTrials(args.trials);
  const patient = loadPatientProfile(args.patient);

  let prior: { entries: ReturnType<typeof loadPriorEvaluations>; count: number } | undefined;
  if (args.previousOutput && args.numOfTrials !== undefined) {
    logCli.info(`Selecting top ${args.numOfTrials} trials from previous output ${args.previousOutput}`);
    prior = { entries: loadPriorEvaluations(args.previousOutput), count: args.numOfTrials };
  } else if (args.previousOutput || args.numOfTrials !== undefined) {
    logCli.warn("--previous-output and --num-of-trials only take effect together; processing every trial");
  }

  const provider = deps.provider ?? createProvider(model, cfg);
  const store = openStore(args.output);
  try {
    return await runEvaluation(
      { trials, patient, provider, store },
      {
        retry: { ...cfg.retry, timeoutMs: cfg.model.timeoutMs },
        pacingMs: cfg.pipeline.pacingMs,
        reductionLadder: resolveReductionLadder(cfg.pipeline.reductionSteps),
        prior,
        sleep: deps.sleep,
      },
    );
  } finally {
    store.close();
  }
}

/**
 * Write an evaluation store (JSON or SQLite) out as CSV.
 * @returns Number of rows written
 */
export function exportCommand(input: string, output: string): number {
  const entries = loadPriorEvaluations(input);
  const resolved = path.resolve(output);
  mkdirSync(path.dirname(resolved), { recursive: true });
  writeFileSync(resolved, exportEvaluationsCsv(entries), "utf-8");
  logCli.info({ rows: entries.length }, `Saved CSV to ${resolved}`);
  return entries.length;
}
