import type { Trial } from "../../trials/types.js";

/**
 * One rung of the payload reduction ladder. Steps receive a private copy of the
 * trial and may mutate it.
 */
export interface PayloadReduction {
  readonly name: string;
  apply(trial: Trial): void;
}

export const REDUCTIONS: Record<string, PayloadReduction> = {
  // Site lists and contact details are by far the largest part of most study documents
  "contacts-locations": {
    name: "contacts-locations",
    apply(trial) {
      if (trial.protocolSection) trial.protocolSection.contactsLocationsModule = "";
    },
  },
  references: {
    name: "references",
    apply(trial) {
      if (trial.protocolSection) trial.protocolSection.referencesModule = "";
    },
  },
  derived: {
    name: "derived",
    apply(trial) {
      delete trial.derivedSection;
    },
  },
  results: {
    name: "results",
    apply(trial) {
      delete trial.resultsSection;
    },
  },
};

export function unknownReductionSteps(names: readonly string[]): string[] {
  return names.filter((n) => !Object.hasOwn(REDUCTIONS, n));
}

/** Resolve configured step names, in order. Throws on an unknown name. */
export function resolveReductionLadder(names: readonly string[]): PayloadReduction[] {
  const unknown = unknownReductionSteps(names);
  if (unknown.length > 0) {
    throw new Error(`Unknown reduction step(s): ${unknown.join(", ")}`);
  }
  return names.map((n) => REDUCTIONS[n]);
}

/**
 * The trial payload for a given rung: rung 0 is the full document, rung n has
 * the first n steps applied cumulatively. The input trial is never modified.
 */
export function reduceTrial(trial: Trial, ladder: readonly PayloadReduction[], rung: number): Trial {
  const copy = structuredClone(trial);
  for (const step of ladder.slice(0, rung)) {
    step.apply(copy);
  }
  return copy;
}
