import { describe, expect, it } from "vitest";
import { SERIES_PALETTE, buildChartRows, seriesFor } from "./chartData";
import { type Dataset, buildMatrix } from "./matrix";
import { computeRatios } from "./ratios";

const ds = (threads: Dataset["threads"], sims: Dataset["sims"], times: Record<string, number>): Dataset => ({
  threads,
  sims,
  file: "f.json",
  totalTime: 1,
  functions: Object.fromEntries(Object.entries(times).map(([k, v]) => [k, { totalTime: v }])),
});

const matrix = buildMatrix([ds(1, 1, { A: 10, B: 4 }), ds(2, 2, { A: 20 }), ds(4, 4, { A: 5 })]);
const report = computeRatios(
  matrix,
  [
    { threads: 1, sims: 1 },
    { threads: 2, sims: 2 },
    { threads: 4, sims: 4 },
  ],
  { mode: "single", cell: { threads: 1, sims: 1 } }
);

describe("seriesFor", () => {
  it("gives every selected cell its own colour", () => {
    expect(seriesFor(report).map((s) => [s.key, s.label, s.color])).toEqual([
      ["1x1", "T1·S1", SERIES_PALETTE[0]],
      ["2x2", "T2·S2", SERIES_PALETTE[1]],
      ["4x4", "T4·S4", SERIES_PALETTE[2]],
    ]);
  });
});

describe("buildChartRows", () => {
  it("has one row per function with null for pairs without a ratio", () => {
    expect(buildChartRows(report)).toEqual([
      { function: "A", "1x1": 1, "2x2": 2, "4x4": 0.5 },
      { function: "B", "1x1": 1, "2x2": null, "4x4": null },
    ]);
  });

  it("stores ratio - 1 for deviation bars", () => {
    expect(buildChartRows(report, { deviation: true })[0]).toEqual({
      function: "A",
      "1x1": 0,
      "2x2": 1,
      "4x4": -0.5,
    });
  });

  it("filters functions, treating an empty filter as none", () => {
    expect(buildChartRows(report, { functionFilter: new Set(["B"]) }).map((r) => r.function)).toEqual(["B"]);
    expect(buildChartRows(report, { functionFilter: new Set() }).map((r) => r.function)).toEqual(["A", "B"]);
  });
});
