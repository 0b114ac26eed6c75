import { describe, expect, it } from "vitest";
import {
  type Cell,
  type Dataset,
  type SimCount,
  type ThreadCount,
  buildMatrix,
  cellKey,
} from "./matrix";
import {
  chartDomain,
  computeRatios,
  groupInvalidByReason,
  speedupLabel,
  topDeviations,
} from "./ratios";

const ds = (threads: ThreadCount, sims: SimCount, times: Record<string, number>, totalTime?: number): Dataset => ({
  threads,
  sims,
  file: `sim_${sims}_${threads}.json`,
  totalTime: totalTime ?? Object.values(times).reduce((s, v) => s + v, 0),
  functions: Object.fromEntries(Object.entries(times).map(([k, v]) => [k, { totalTime: v }])),
});

const c = (threads: ThreadCount, sims: SimCount): Cell => ({ threads, sims });
const single = (cell: Cell) => ({ mode: "single", cell }) as const;

describe("computeRatios", () => {
  it("gives 1 for every function when a dataset is compared with itself", () => {
    const matrix = buildMatrix([ds(1, 1, { A: 10, B: 20 })]);
    const report = computeRatios(matrix, [c(1, 1)], single(c(1, 1)));
    expect(report.ratios.map((r) => [r.function, r.ratio])).toEqual([
      ["A", 1],
      ["B", 1],
    ]);
    expect(report.invalid).toEqual([]);
    expect(report.cells[0]).toMatchObject({ validCount: 2, invalidCount: 0, meanRatio: 1, totalRatio: 1 });
  });

  it("compares each cell with the baseline row's cell of the same sim count in row mode", () => {
    const matrix = buildMatrix([
      ds(1, 1, { A: 10 }),
      ds(1, 2, { A: 30 }),
      ds(2, 1, { A: 5 }),
      ds(2, 2, { A: 15 }),
    ]);
    const report = computeRatios(matrix, [c(2, 2), c(1, 1), c(2, 1), c(1, 2)], { mode: "row", threads: 1 });
    expect(report.ratios.map((r) => [cellKey(r.cell), cellKey(r.baselineCell), r.ratio])).toEqual([
      ["1x1", "1x1", 1],
      ["1x2", "1x2", 1],
      ["2x1", "1x1", 0.5],
      ["2x2", "1x2", 0.5],
    ]);
  });

  it("compares with the baseline column's cell of the same thread count in column mode", () => {
    const matrix = buildMatrix([
      ds(8, 1, { HeatBalanceManager: 100 }),
      ds(8, 4, { HeatBalanceManager: 150 }),
    ]);
    const report = computeRatios(matrix, [c(8, 4)], { mode: "column", sims: 1 });
    expect(report.ratios).toEqual([
      {
        cell: c(8, 4),
        baselineCell: c(8, 1),
        function: "HeatBalanceManager",
        targetTime: 150,
        baselineTime: 100,
        ratio: 1.5,
      },
    ]);
  });

  it("keeps a function missing from the target out of ratios and statistics", () => {
    const matrix = buildMatrix([ds(1, 1, { A: 10, B: 20 }), ds(2, 2, { A: 5 })]);
    const report = computeRatios(matrix, [c(2, 2)], single(c(1, 1)));
    expect(report.ratios.map((r) => r.function)).toEqual(["A"]);
    expect(report.functions).toEqual(["A"]);
    expect(report.stats.has("B")).toBe(false);
    expect(report.invalid).toEqual([
      { cell: c(2, 2), baselineCell: c(1, 1), function: "B", reason: "missing-in-target", baselineTime: 20 },
    ]);
    expect(report.cells[0]).toMatchObject({ validCount: 1, invalidCount: 1, meanRatio: 0.5 });
  });

  it("flags a function missing from the baseline", () => {
    const matrix = buildMatrix([ds(1, 1, { A: 10 }), ds(2, 2, { A: 5, C: 3 })]);
    const report = computeRatios(matrix, [c(2, 2)], single(c(1, 1)));
    expect(report.invalid.map((i) => [i.function, i.reason, i.targetTime])).toEqual([
      ["C", "missing-in-baseline", 3],
    ]);
  });

  it("flags a zero baseline time instead of dividing by it", () => {
    const matrix = buildMatrix([ds(1, 1, { A: 0, B: 10 }), ds(2, 1, { A: 5, B: 5 })]);
    const report = computeRatios(matrix, [c(2, 1)], single(c(1, 1)));
    expect(report.ratios.map((r) => [r.function, r.ratio])).toEqual([["B", 0.5]]);
    expect(report.invalid.map((i) => [i.function, i.reason])).toEqual([["A", "zero-baseline"]]);
    expect(report.ratios.every((r) => Number.isFinite(r.ratio))).toBe(true);
  });

  it("flags non-numeric timings", () => {
    const matrix = buildMatrix([ds(1, 1, { A: 10 }), ds(2, 1, { A: Number.NaN }, 1)]);
    const report = computeRatios(matrix, [c(2, 1)], single(c(1, 1)));
    expect(report.ratios).toEqual([]);
    expect(report.invalid.map((i) => i.reason)).toEqual(["non-finite"]);
  });

  it("reports a selected cell without a dataset as one invalid entry", () => {
    const matrix = buildMatrix([ds(1, 1, { A: 10 })]);
    const report = computeRatios(matrix, [c(16, 64)], single(c(1, 1)));
    expect(report.invalid).toEqual([
      { cell: c(16, 64), baselineCell: c(1, 1), function: null, reason: "missing-target-dataset" },
    ]);
    expect(report.cells).toEqual([{ cell: c(16, 64), baselineCell: c(1, 1), validCount: 0, invalidCount: 1 }]);
  });

  it("reports a missing baseline dataset", () => {
    const matrix = buildMatrix([ds(1, 1, { A: 10 })]);
    const report = computeRatios(matrix, [c(1, 1)], single(c(32, 64)));
    expect(report.invalid.map((i) => i.reason)).toEqual(["missing-baseline-dataset"]);
    expect(report.ratios).toEqual([]);
    expect(report.overall).toEqual({});
  });

  it("computes the ratio of total simulation times", () => {
    const matrix = buildMatrix([ds(1, 1, { A: 10 }, 40), ds(4, 1, { A: 5 }, 10)]);
    const report = computeRatios(matrix, [c(4, 1)], single(c(1, 1)));
    expect(report.cells[0].totalRatio).toBe(0.25);
  });

  it("keeps functions named like Object.prototype members", () => {
    const times = { constructor: 10, toString: 10, valueOf: 10, hasOwnProperty: 10, A: 10 };
    const doubled = { constructor: 20, toString: 20, valueOf: 20, hasOwnProperty: 20, A: 20 };
    const matrix = buildMatrix([ds(1, 1, times), ds(2, 1, doubled)]);
    const report = computeRatios(matrix, [c(2, 1)], single(c(1, 1)));
    expect(report.functions).toEqual(["A", "constructor", "hasOwnProperty", "toString", "valueOf"]);
    expect(report.stats.get("toString")).toMatchObject({ count: 1, min: 2, max: 2, mean: 2 });
    expect(report.invalid).toEqual([]);
    expect(Object.hasOwn(Object.prototype.toString, "count")).toBe(false);
  });

  it("treats an inherited name absent from one dataset as missing", () => {
    const matrix = buildMatrix([ds(1, 1, { A: 10, toString: 4 }), ds(2, 1, { A: 5 })]);
    const report = computeRatios(matrix, [c(2, 1)], single(c(1, 1)));
    expect(report.invalid.map((i) => [i.function, i.reason, i.baselineTime])).toEqual([
      ["toString", "missing-in-target", 4],
    ]);
  });

  it("ignores duplicate selections", () => {
    const matrix = buildMatrix([ds(1, 1, { A: 10 })]);
    const report = computeRatios(matrix, [c(1, 1), c(1, 1)], single(c(1, 1)));
    expect(report.cells).toHaveLength(1);
    expect(report.ratios).toHaveLength(1);
  });
});

describe("statistics", () => {
  const matrix = buildMatrix([ds(1, 1, { A: 10 }), ds(2, 2, { A: 20 }), ds(4, 4, { A: 5 })]);
  const report = computeRatios(matrix, [c(4, 4), c(1, 1), c(2, 2)], single(c(1, 1)));

  it("summarises each function with the population standard deviation", () => {
    const s = report.stats.get("A");
    expect(s).toMatchObject({ count: 3, min: 0.5, max: 2, minCell: c(4, 4), maxCell: c(2, 2) });
    expect(s?.mean).toBeCloseTo(7 / 6);
    expect(s?.stdDev).toBeCloseTo(Math.sqrt(7 / 18));
  });

  it("picks the best and worst cells by mean ratio", () => {
    expect(report.overall.best?.cell).toEqual(c(4, 4));
    expect(report.overall.worst?.cell).toEqual(c(2, 2));
    expect(report.overall.mean).toBeCloseTo(7 / 6);
    expect(report.overall.stdDev).toBeCloseTo(Math.sqrt(7 / 18));
  });

  it("orders deviations by distance from 1", () => {
    expect(topDeviations(report).map((r) => cellKey(r.cell))).toEqual(["2x2", "4x4", "1x1"]);
    expect(topDeviations(report, 1).map((r) => r.ratio)).toEqual([2]);
  });

  it("lists ten deviations by default", () => {
    const names = Array.from({ length: 12 }, (_, i) => `F${String(i).padStart(2, "0")}`);
    const base = Object.fromEntries(names.map((n) => [n, 10]));
    const slower = Object.fromEntries(names.map((n, i) => [n, 10 + i]));
    const wide = computeRatios(
      buildMatrix([ds(1, 1, base), ds(2, 1, slower)]),
      [c(2, 1)],
      single(c(1, 1))
    );
    expect(topDeviations(wide).map((r) => r.function)).toEqual([
      "F11",
      "F10",
      "F09",
      "F08",
      "F07",
      "F06",
      "F05",
      "F04",
      "F03",
      "F02",
    ]);
  });

  it("pads the chart domain around the ratios", () => {
    const [lo, hi] = chartDomain(report);
    expect(lo).toBeCloseTo(0.45);
    expect(hi).toBeCloseTo(2.2);
    const [dlo, dhi] = chartDomain(report, { deviation: true });
    expect(dlo).toBeCloseTo(0.45);
    expect(dhi).toBeCloseTo(2.1);
  });

  it("keeps the 1.0 line in view with no ratios", () => {
    const empty = computeRatios(matrix, [], single(c(1, 1)));
    const [lo, hi] = chartDomain(empty);
    expect(lo).toBeCloseTo(0.72);
    expect(hi).toBeCloseTo(1.32);
    const [dlo, dhi] = chartDomain(empty, { deviation: true });
    expect(dlo).toBeCloseTo(0.78);
    expect(dhi).toBeCloseTo(1.22);
  });
});

describe("groupInvalidByReason", () => {
  it("buckets invalid pairs by reason", () => {
    const matrix = buildMatrix([ds(1, 1, { A: 0, B: 10 }), ds(2, 1, { A: 5 })]);
    const report = computeRatios(matrix, [c(2, 1), c(8, 8)], single(c(1, 1)));
    const groups = groupInvalidByReason(report.invalid);
    expect(Array.from(groups.keys())).toEqual(["zero-baseline", "missing-in-target", "missing-target-dataset"]);
    expect(groups.get("missing-in-target")?.map((i) => i.function)).toEqual(["B"]);
  });
});

describe("speedupLabel", () => {
  it("describes a ratio as a speed change", () => {
    expect(speedupLabel(1.5)).toBe("1.50x slower");
    expect(speedupLabel(0.5)).toBe("2.00x faster");
    expect(speedupLabel(1.003)).toBe("no change");
    expect(speedupLabel(0)).toBe("∞x faster");
  });
});
