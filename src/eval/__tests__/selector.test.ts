import { describe, it, expect } from "vitest";
import { selectTopTrials } from "../selector.js";
import { stored } from "../../../test/helpers.js";

describe("selectTopTrials", () => {
  const entries = [
    stored("NCT001", 30),
    stored("NCT002", null),
    stored("NCT003", 90),
    stored("NCT004", 60),
  ];

  it("returns the highest total scores, best first", () => {
    const top = selectTopTrials(entries, 2);
    expect(top.map((e) => e.trial_id)).toEqual(["NCT003", "NCT004"]);
    expect(top.map((e) => e.evaluation.total_score)).toEqual([90, 60]);
  });

  it("ranks a missing score as zero", () => {
    expect(selectTopTrials(entries, 4).map((e) => e.trial_id)).toEqual([
      "NCT003",
      "NCT004",
      "NCT001",
      "NCT002",
    ]);
  });

  it("keeps input order for equal scores", () => {
    const tied = [stored("A", 50), stored("B", 70), stored("C", 50), stored("D", 0), stored("E", null)];
    expect(selectTopTrials(tied, 5).map((e) => e.trial_id)).toEqual(["B", "A", "C", "D", "E"]);
  });

  it("returns everything when asked for more than exists", () => {
    expect(selectTopTrials(entries, 10)).toHaveLength(4);
  });

  it("returns nothing for a non-positive count", () => {
    expect(selectTopTrials(entries, 0)).toEqual([]);
  });

  it("does not reorder its input", () => {
    selectTopTrials(entries, 2);
    expect(entries.map((e) => e.trial_id)).toEqual(["NCT001", "NCT002", "NCT003", "NCT004"]);
  });
});
