import { describe, it, expect } from "vitest";
import { CSV_COLUMNS, exportEvaluationsCsv, formatCell, toCsvRow } from "../csv.js";
import { makeEvaluation } from "../../../test/helpers.js";

describe("formatCell", () => {
  it("joins lists and flattens line breaks", () => {
    expect(formatCell(["A", "B"])).toBe("A; B");
    expect(formatCell("line1\nline2\r\nline3")).toBe("line1 line2 line3");
    expect(formatCell(42)).toBe("42");
    expect(formatCell(null)).toBe("");
  });

  it("flattens a lone carriage return", () => {
    expect(formatCell("before\rafter")).toBe("before after");
  });

  it("writes objects as JSON and formats list items the same way", () => {
    expect(formatCell({ planned: 120 })).toBe('{"planned":120}');
    expect(formatCell([{ criterion: "ECOG" }, "Prior surgery"])).toBe('{"criterion":"ECOG"}; Prior surgery');
    expect(formatCell(true)).toBe("true");
  });
});

describe("toCsvRow", () => {
  it("maps every column from the stored evaluation", () => {
    const row = toCsvRow({
      trial_id: "NCT010",
      evaluation: makeEvaluation({
        location: ["Springfield", "Shelbyville"],
        unclear_criteria: null,
        drug: ["Drug A", "Drug B"],
      }),
    });
    expect(Object.keys(row)).toEqual([...CSV_COLUMNS]);
    expect(row.trial_id).toBe("NCT010");
    expect(row.location).toBe("Springfield; Shelbyville");
    expect(row.unclear_criteria).toBe("");
    expect(row.number_of_patients).toBe("120");
    expect(row.drug).toBe("Drug A; Drug B");
  });
});

describe("exportEvaluationsCsv", () => {
  it("writes a header and one row per evaluation", () => {
    const csv = exportEvaluationsCsv([
      {
        trial_id: "NCT011",
        evaluation: makeEvaluation({
          reasoning: "line1\nline2",
          unclear_criteria: ["Prior surgery", "ECOG"],
          location: "Springfield",
        }),
      },
    ]);
    const lines = csv.trimEnd().split("\n");

    expect(lines).toHaveLength(2);
    expect(lines[0]).toBe(CSV_COLUMNS.join(","));
    expect(lines[1]).toBe(
      "NCT011,https://clinicaltrials.gov/study/NCT00000000,KRAS inhibitor,Drug X,120,Phase 2,2024-03-01," +
        "Springfield,50,60,30,Prior surgery; ECOG,line1 line2",
    );
  });

  it("quotes cells that contain the delimiter", () => {
    const csv = exportEvaluationsCsv([
      { trial_id: "NCT012", evaluation: makeEvaluation({ drug: "Drug A, Drug B" }) },
    ]);
    expect(csv.split("\n")[1]).toContain(',"Drug A, Drug B",');
  });

  it("writes only the header for an empty collection", () => {
    expect(exportEvaluationsCsv([])).toBe(`${CSV_COLUMNS.join(",")}\n`);
  });
});
