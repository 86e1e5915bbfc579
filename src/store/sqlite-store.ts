import Database, { type Database as DatabaseType } from "better-sqlite3";
import { mkdirSync } from "node:fs";
import path from "node:path";
import { EvaluationRecordSchema } from "../eval/models/schema.js";
import type { EvaluationRecord, StoredEvaluation } from "../eval/models/types.js";
import { logStore } from "../logging.js";
import type { EvaluationStore } from "./types.js";

interface EvaluationRow {
  trial_id: string;
  evaluation: string;
}

function prepareStatements(db: DatabaseType) {
  return {
    exists: db.prepare<[string], { found: number }>(`SELECT 1 AS found FROM evaluations WHERE trial_id = ?`),
    insert: db.prepare<[string, string]>(
      `INSERT OR IGNORE INTO evaluations (trial_id, evaluation) VALUES (?, ?)`,
    ),
    all: db.prepare<[], EvaluationRow>(`SELECT trial_id, evaluation FROM evaluations ORDER BY rowid`),
  };
}

type Statements = ReturnType<typeof prepareStatements>;

/**
 * Output store keyed by trial_id. Appends are single-row inserts, so the cost
 * of a write does not grow with the size of the collection.
 */
export class SqliteStore implements EvaluationStore {
  private readonly db: DatabaseType;
  private readonly stmts: Statements;

  constructor(readonly location: string) {
    if (location !== ":memory:") {
      mkdirSync(path.dirname(location), { recursive: true });
    }
    this.db = new Database(location);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS evaluations (
        trial_id TEXT PRIMARY KEY,
        evaluation TEXT NOT NULL,  -- JSON
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );
    `);

    this.stmts = prepareStatements(this.db);
  }

  has(trialId: string): boolean {
    return this.stmts.exists.get(trialId) !== undefined;
  }

  append(trialId: string, evaluation: EvaluationRecord): void {
    const result = this.stmts.insert.run(trialId, JSON.stringify(evaluation));
    if (result.changes === 0) {
      logStore.warn({ trial_id: trialId }, "Evaluation already stored for this trial, keeping the existing one");
    }
  }

  readAll(): StoredEvaluation[] {
    const entries: StoredEvaluation[] = [];
    for (const row of this.stmts.all.all()) {
      const evaluation = parseRow(row);
      if (evaluation) entries.push({ trial_id: row.trial_id, evaluation });
    }
    return entries;
  }

  close(): void {
    this.db.close();
  }
}

function parseRow(row: EvaluationRow): EvaluationRecord | null {
  let doc: unknown;
  try {
    doc = JSON.parse(row.evaluation);
  } catch {
    logStore.warn({ trial_id: row.trial_id }, "Stored evaluation is not valid JSON, skipping it");
    return null;
  }
  const result = EvaluationRecordSchema.safeParse(doc);
  if (!result.success) {
    logStore.warn({ trial_id: row.trial_id }, "Stored evaluation has an unexpected shape, skipping it");
    return null;
  }
  return result.data;
}
