/**
 * Evaluation store → CSV, one row per trial, for review in a spreadsheet.
 */

import { stringify } from "csv-stringify/sync";
import type { JsonValue, StoredEvaluation } from "../eval/models/types.js";

export const CSV_COLUMNS = [
  "trial_id",
  "link",
  "treatment_type",
  "drug",
  "number_of_patients",
  "trial_phase",
  "start_date",
  "location",
  "eligibility_probability",
  "clinical_benefit_score",
  "total_score",
  "unclear_criteria",
  "reasoning",
] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];
export type CsvRow = Record<CsvColumn, string>;

function cellText(value: JsonValue): string {
  if (value === null) return "";
  if (Array.isArray(value)) return value.map(cellText).join("; ");
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/** Lists joined with "; ", objects as JSON, line breaks flattened to spaces, null as an empty cell. */
export function formatCell(value: JsonValue): string {
  return cellText(value).replace(/\r\n|[\r\n]/g, " ");
}

export function toCsvRow({ trial_id, evaluation: e }: StoredEvaluation): CsvRow {
  return {
    trial_id,
    link: formatCell(e.link),
    treatment_type: formatCell(e.treatment_type),
    drug: formatCell(e.drug),
    number_of_patients: formatCell(e.number_of_patients),
    trial_phase: formatCell(e.trial_phase),
    start_date: formatCell(e.start_date),
    location: formatCell(e.location),
    eligibility_probability: formatCell(e.eligibility_probability),
    clinical_benefit_score: formatCell(e.clinical_benefit_score),
    total_score: formatCell(e.total_score),
    unclear_criteria: formatCell(e.unclear_criteria),
    reasoning: formatCell(e.reasoning),
  };
}

export function exportEvaluationsCsv(entries: readonly StoredEvaluation[]): string {
  return stringify(entries.map(toCsvRow), {
    header: true,
    columns: [...CSV_COLUMNS],
  });
}
