import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { InputError } from "../errors.js";
import { TrialFileSchema, type Trial } from "./types.js";

function readInput(filePath: string, label: string): string {
  const resolved = path.resolve(filePath);
  if (!existsSync(resolved)) {
    throw new InputError(`${label} not found: ${resolved}`, resolved);
  }
  return readFileSync(resolved, "utf-8");
}

/**
 * Load the trial list. Accepts a JSON array of study documents or an object
 * with a `studies` array.
 */
export function loadTrials(filePath: string): Trial[] {
  const raw = readInput(filePath, "Trials file");

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new InputError(`Trials file is not valid JSON: ${msg}`, filePath);
  }

  const result = TrialFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new InputError(`Trials file has an unexpected shape: ${result.error.message}`, filePath);
  }
  return Array.isArray(result.data) ? result.data : result.data.studies;
}

export function loadPatientProfile(filePath: string): string {
  const text = readInput(filePath, "Patient file");
  if (text.trim().length === 0) {
    throw new InputError("Patient file is empty", filePath);
  }
  return text;
}
