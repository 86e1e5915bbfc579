import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { InputError } from "../errors.js";
import { StoredEvaluationListSchema } from "../eval/models/schema.js";
import type { StoredEvaluation } from "../eval/models/types.js";
import { JsonFileStore } from "./json-file-store.js";
import { SqliteStore } from "./sqlite-store.js";
import type { EvaluationStore } from "./types.js";

export type { EvaluationStore } from "./types.js";
export { JsonFileStore } from "./json-file-store.js";
export { SqliteStore } from "./sqlite-store.js";

const SQLITE_EXTENSIONS = new Set([".db", ".sqlite", ".sqlite3"]);

export function isSqlitePath(filePath: string): boolean {
  return SQLITE_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

/** SQLite for .db/.sqlite/.sqlite3 paths, a JSON array file for anything else. */
export function openStore(filePath: string): EvaluationStore {
  return isSqlitePath(filePath) ? new SqliteStore(filePath) : new JsonFileStore(filePath);
}

/**
 * Read a prior run's output for top-N selection or export. Unlike the output
 * store itself, a missing or unreadable file here is an input error.
 */
export function loadPriorEvaluations(filePath: string): StoredEvaluation[] {
  const resolved = path.resolve(filePath);
  if (!existsSync(resolved)) {
    throw new InputError(`Evaluation file not found: ${resolved}`, resolved);
  }

  if (isSqlitePath(resolved)) {
    const store = new SqliteStore(resolved);
    try {
      return store.readAll();
    } finally {
      store.close();
    }
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(resolved, "utf-8"));
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new InputError(`Evaluation file is not valid JSON: ${msg}`, resolved);
  }
  const result = StoredEvaluationListSchema.safeParse(parsed);
  if (!result.success) {
    throw new InputError(`Evaluation file is not a list of evaluations: ${result.error.message}`, resolved);
  }
  return result.data;
}
