import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import path from "node:path";
import { StoredEvaluationSchema } from "../eval/models/schema.js";
import type { EvaluationRecord, StoredEvaluation } from "../eval/models/types.js";
import { logStore } from "../logging.js";
import type { EvaluationStore } from "./types.js";

interface Snapshot {
  /** array elements as read; rewritten unchanged on append */
  items: unknown[];
  entries: StoredEvaluation[];
  /** every readable trial_id, including those of malformed entries */
  ids: Set<string>;
  /** content existed but was not a JSON array */
  corrupt: boolean;
}

function emptySnapshot(corrupt: boolean): Snapshot {
  return { items: [], entries: [], ids: new Set(), corrupt };
}

function readTrialId(item: unknown): string | null {
  if (typeof item === "object" && item !== null && "trial_id" in item && typeof item.trial_id === "string") {
    return item.trial_id;
  }
  return null;
}

/**
 * The whole collection lives in one JSON array. Every append re-reads and
 * rewrites the file, so cost grows with the square of the run length; use
 * `SqliteStore` for large trial lists.
 *
 * Entries are validated one by one. A malformed entry is left in the file and
 * its trial still counts as processed; it is only missing from `readAll`.
 */
export class JsonFileStore implements EvaluationStore {
  private readonly warned = new Set<string>();

  constructor(readonly location: string) {}

  has(trialId: string): boolean {
    return this.load().ids.has(trialId);
  }

  readAll(): StoredEvaluation[] {
    return this.load().entries;
  }

  append(trialId: string, evaluation: EvaluationRecord): void {
    const { items, corrupt } = this.load();
    if (corrupt) {
      const backup = `${this.location}.corrupt-${Date.now()}`;
      renameSync(this.location, backup);
      logStore.warn({ backup }, "Moved unreadable output file aside before rewriting it");
    }
    items.push({ trial_id: trialId, evaluation });
    this.write(items);
  }

  close(): void {
    // nothing held open between calls
  }

  private load(): Snapshot {
    if (!existsSync(this.location)) return emptySnapshot(false);

    let raw: string;
    try {
      raw = readFileSync(this.location, "utf-8");
    } catch (e: unknown) {
      logStore.warn({ err: e, file: this.location }, "Could not read output file, treating it as empty");
      return emptySnapshot(false);
    }
    if (raw.trim() === "") return emptySnapshot(false);

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.warnOnce("corrupt", "Output file is not valid JSON, treating it as empty");
      return emptySnapshot(true);
    }
    if (!Array.isArray(parsed)) {
      this.warnOnce("corrupt", "Output file is not a list of evaluations, treating it as empty");
      return emptySnapshot(true);
    }

    const items: unknown[] = parsed;
    const entries: StoredEvaluation[] = [];
    const ids = new Set<string>();
    let malformed = 0;
    for (const item of items) {
      const result = StoredEvaluationSchema.safeParse(item);
      if (result.success) {
        entries.push(result.data);
        ids.add(result.data.trial_id);
        continue;
      }
      malformed++;
      const id = readTrialId(item);
      if (id !== null) ids.add(id);
    }
    if (malformed > 0) {
      this.warnOnce("malformed", `${malformed} malformed entries in output file, kept as they are`);
    }
    return { items, entries, ids, corrupt: false };
  }

  private warnOnce(key: string, message: string): void {
    if (this.warned.has(key)) return;
    this.warned.add(key);
    logStore.warn({ file: this.location }, message);
  }

  private write(items: unknown[]): void {
    mkdirSync(path.dirname(this.location), { recursive: true });
    // write-then-rename so an interrupted run never leaves a truncated file
    const tmp = `${this.location}.${process.pid}.tmp`;
    writeFileSync(tmp, `${JSON.stringify(items, null, 2)}\n`, "utf-8");
    renameSync(tmp, this.location);
  }
}
