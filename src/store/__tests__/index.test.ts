import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { InputError } from "../../errors.js";
import { JsonFileStore, SqliteStore, isSqlitePath, loadPriorEvaluations, openStore } from "../index.js";
import { makeEvaluation, stored } from "../../../test/helpers.js";

describe("openStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "store-index-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("picks the backend from the file extension", () => {
    expect(isSqlitePath("out/results.DB")).toBe(true);
    expect(isSqlitePath("results.sqlite3")).toBe(true);
    expect(isSqlitePath("results.json")).toBe(false);
    expect(isSqlitePath("results")).toBe(false);

    const json = openStore(path.join(dir, "results.json"));
    expect(json).toBeInstanceOf(JsonFileStore);

    const db = openStore(path.join(dir, "results.db"));
    expect(db).toBeInstanceOf(SqliteStore);
    db.close();
  });

  describe("loadPriorEvaluations", () => {
    it("reads a JSON output file", () => {
      const file = path.join(dir, "prior.json");
      writeFileSync(file, JSON.stringify([stored("NCT001", 70), stored("NCT002", null)]));
      expect(loadPriorEvaluations(file).map((e) => e.trial_id)).toEqual(["NCT001", "NCT002"]);
    });

    it("reads a SQLite output file", () => {
      const file = path.join(dir, "prior.db");
      const store = new SqliteStore(file);
      store.append("NCT005", makeEvaluation({ total_score: 55 }));
      store.close();

      expect(loadPriorEvaluations(file)).toEqual([
        { trial_id: "NCT005", evaluation: makeEvaluation({ total_score: 55 }) },
      ]);
    });

    it("fails on a missing file", () => {
      expect(() => loadPriorEvaluations(path.join(dir, "absent.json"))).toThrow(InputError);
    });

    it("fails on invalid JSON", () => {
      const file = path.join(dir, "broken.json");
      writeFileSync(file, "{");
      expect(() => loadPriorEvaluations(file)).toThrow(/^Evaluation file is not valid JSON: /);
    });

    it("fails on a document that is not a list of evaluations", () => {
      const file = path.join(dir, "wrong.json");
      writeFileSync(file, JSON.stringify({ trial_id: "NCT001" }));
      expect(() => loadPriorEvaluations(file)).toThrow(/^Evaluation file is not a list of evaluations/);
    });
  });
});
