#!/usr/bin/env node
import { cac } from "cac";
import { readFileSync } from "node:fs";
import { evaluateCommand, exportCommand, parseTrialCount } from "./commands.js";
import { logCli } from "./logging.js";

function packageVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch (e: unknown) {
    logCli.debug({ err: e }, "package.json not readable, reporting version 0.0.0");
  }
  return "0.0.0";
}

interface EvaluateFlags {
  previousOutput?: string;
  numOfTrials?: number | string;
}

const cli = cac("trial-scout");

cli
  .command("evaluate <patient> <trials> <output> [model]", "Score how relevant each trial is for the patient")
  .option("--previous-output <path>", "Evaluations from an earlier run to take the top trials from")
  .option("--num-of-trials <n>", "Number of top trials from --previous-output to evaluate")
  .example("trial-scout evaluate patient.txt trials.json results.json gpt-4o-mini")
  .action(
    async (patient: string, trials: string, output: string, model: string | undefined, flags: EvaluateFlags) => {
      const summary = await evaluateCommand({
        patient,
        trials,
        output,
        model,
        previousOutput: flags.previousOutput,
        numOfTrials: parseTrialCount(flags.numOfTrials),
      });
      console.log(`\nProcessed ${summary.total} trial(s). Results saved to ${output}`);
      console.log(`  Evaluated: ${summary.evaluated} (${summary.degraded} on a reduced payload)`);
      console.log(`  Skipped:   ${summary.skipped} (already processed)`);
      console.log(`  Failed:    ${summary.failed}`);
    },
  );

cli
  .command("export <input> <output>", "Convert an evaluation file (JSON or SQLite) to CSV")
  .action((input: string, output: string) => {
    const rows = exportCommand(input, output);
    console.log(`Saved ${rows} row(s) to ${output}`);
  });

cli.help();
cli.version(packageVersion());

async function main(): Promise<void> {
  const parsed = cli.parse(process.argv, { run: false });
  if (parsed.options.help || parsed.options.version) return;
  if (!cli.matchedCommand) {
    cli.outputHelp();
    process.exitCode = 1;
    return;
  }
  await cli.runMatchedCommand();
}

main().catch((e: unknown) => {
  const msg = e instanceof Error ? e.message : String(e);
  logCli.fatal({ err: e }, msg);
  process.exitCode = 1;
});
