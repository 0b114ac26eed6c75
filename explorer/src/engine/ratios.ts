import { type BaselinePolicy, resolveBaselineCell } from "./baseline";
import { type Cell, type DatasetMatrix, cellKey, compareCells, functionTime } from "./matrix";

export type InvalidReason =
  | "missing-target-dataset"
  | "missing-baseline-dataset"
  | "missing-in-target"
  | "missing-in-baseline"
  | "zero-baseline"
  | "non-finite";

export interface RatioEntry {
  cell: Cell;
  baselineCell: Cell;
  function: string;
  targetTime: number;
  baselineTime: number;
  ratio: number;
}

export interface InvalidRatio {
  cell: Cell;
  baselineCell: Cell;
  /** `null` when a whole dataset is missing on one side. */
  function: string | null;
  reason: InvalidReason;
  targetTime?: number;
  baselineTime?: number;
}

export interface FunctionStats {
  function: string;
  count: number;
  min: number;
  max: number;
  mean: number;
  stdDev: number;
  minCell: Cell;
  maxCell: Cell;
}

export interface CellSummary {
  cell: Cell;
  baselineCell: Cell;
  validCount: number;
  invalidCount: number;
  meanRatio?: number;
  /** Ratio of the datasets' total simulation times. */
  totalRatio?: number;
}

export interface OverallStats {
  best?: CellSummary;
  worst?: CellSummary;
  mean?: number;
  stdDev?: number;
}

export interface RatioReport {
  policy: BaselinePolicy;
  cells: CellSummary[];
  ratios: RatioEntry[];
  invalid: InvalidRatio[];
  functions: string[];
  stats: ReadonlyMap<string, FunctionStats>;
  overall: OverallStats;
}

export const INVALID_REASON_LABELS: Record<InvalidReason, string> = {
  "missing-target-dataset": "Dataset not loaded",
  "missing-baseline-dataset": "Baseline dataset not loaded",
  "missing-in-target": "Function missing in dataset",
  "missing-in-baseline": "Function missing in baseline",
  "zero-baseline": "Baseline time is zero",
  "non-finite": "Non-numeric timing",
};

const mean = (arr: number[]) =>
  arr.length ? arr.reduce((s, v) => s + v, 0) / arr.length : undefined;

// Population standard deviation.
const stdDev = (arr: number[]) => {
  const m = mean(arr);
  if (m == null) return undefined;
  return Math.sqrt(arr.reduce((s, v) => s + (v - m) * (v - m), 0) / arr.length);
};

const uniqueSortedCells = (cells: Iterable<Cell>) => {
  const byKey = new Map<string, Cell>();
  for (const c of cells) byKey.set(cellKey(c), c);
  return Array.from(byKey.values()).sort(compareCells);
};

const pairRatio = (
  cell: Cell,
  baselineCell: Cell,
  name: string,
  target: number | undefined,
  baseline: number | undefined
): RatioEntry | InvalidRatio => {
  const base = { cell, baselineCell, function: name };
  if (target == null) return { ...base, reason: "missing-in-target", baselineTime: baseline };
  if (baseline == null) return { ...base, reason: "missing-in-baseline", targetTime: target };
  if (!Number.isFinite(target) || !Number.isFinite(baseline)) {
    return { ...base, reason: "non-finite", targetTime: target, baselineTime: baseline };
  }
  if (baseline <= 0) {
    return { ...base, reason: "zero-baseline", targetTime: target, baselineTime: baseline };
  }
  return { ...base, targetTime: target, baselineTime: baseline, ratio: target / baseline };
};

const isRatioEntry = (r: RatioEntry | InvalidRatio): r is RatioEntry => "ratio" in r;

/**
 * Divides every selected cell's per-function times by its baseline cell's.
 *
 * Pairs that cannot produce a ratio are listed in `invalid` and kept out of
 * `ratios`, `functions` and every aggregate.
 */
export function computeRatios(
  matrix: DatasetMatrix,
  selection: Iterable<Cell>,
  policy: BaselinePolicy
): RatioReport {
  const ratios: RatioEntry[] = [];
  const invalid: InvalidRatio[] = [];
  const cells: CellSummary[] = [];

  for (const cell of uniqueSortedCells(selection)) {
    const baselineCell = resolveBaselineCell(policy, cell);
    const target = matrix.get(cellKey(cell));
    const baseline = matrix.get(cellKey(baselineCell));

    if (!target || !baseline) {
      invalid.push({
        cell,
        baselineCell,
        function: null,
        reason: target ? "missing-baseline-dataset" : "missing-target-dataset",
      });
      cells.push({ cell, baselineCell, validCount: 0, invalidCount: 1 });
      continue;
    }

    const names = Array.from(
      new Set([...Object.keys(target.functions), ...Object.keys(baseline.functions)])
    ).sort();
    const cellRatios: number[] = [];
    let invalidCount = 0;
    for (const name of names) {
      const r = pairRatio(
        cell,
        baselineCell,
        name,
        functionTime(target, name),
        functionTime(baseline, name)
      );
      if (isRatioEntry(r)) {
        ratios.push(r);
        cellRatios.push(r.ratio);
      } else {
        invalid.push(r);
        invalidCount++;
      }
    }

    cells.push({
      cell,
      baselineCell,
      validCount: cellRatios.length,
      invalidCount,
      meanRatio: mean(cellRatios),
      totalRatio:
        baseline.totalTime > 0 && Number.isFinite(target.totalTime)
          ? target.totalTime / baseline.totalTime
          : undefined,
    });
  }

  const stats = new Map<string, FunctionStats>();
  for (const r of ratios) {
    const s = stats.get(r.function);
    if (!s) {
      stats.set(r.function, {
        function: r.function,
        count: 1,
        min: r.ratio,
        max: r.ratio,
        mean: r.ratio,
        stdDev: 0,
        minCell: r.cell,
        maxCell: r.cell,
      });
      continue;
    }
    s.count++;
    if (r.ratio < s.min) {
      s.min = r.ratio;
      s.minCell = r.cell;
    }
    if (r.ratio > s.max) {
      s.max = r.ratio;
      s.maxCell = r.cell;
    }
  }
  for (const s of stats.values()) {
    const values = ratios.filter((r) => r.function === s.function).map((r) => r.ratio);
    s.mean = mean(values) ?? 0;
    s.stdDev = stdDev(values) ?? 0;
  }

  return {
    policy,
    cells,
    ratios,
    invalid,
    functions: Array.from(stats.keys()).sort(),
    stats,
    overall: overallStats(cells),
  };
}

function overallStats(cells: CellSummary[]): OverallStats {
  const scored = cells.filter(
    (c): c is CellSummary & { meanRatio: number } => typeof c.meanRatio === "number"
  );
  if (!scored.length) return {};
  let best = scored[0];
  let worst = scored[0];
  for (const c of scored) {
    if (c.meanRatio < best.meanRatio) best = c;
    if (c.meanRatio > worst.meanRatio) worst = c;
  }
  const values = scored.map((c) => c.meanRatio);
  return { best, worst, mean: mean(values), stdDev: stdDev(values) };
}

export const groupInvalidByReason = (invalid: InvalidRatio[]) => {
  const out = new Map<InvalidReason, InvalidRatio[]>();
  for (const i of invalid) {
    const list = out.get(i.reason) ?? [];
    list.push(i);
    out.set(i.reason, list);
  }
  return out;
};

/** Valid entries furthest from the baseline first. */
export const topDeviations = (report: RatioReport, limit = 10): RatioEntry[] =>
  [...report.ratios]
    .sort(
      (a, b) =>
        Math.abs(b.ratio - 1) - Math.abs(a.ratio - 1) ||
        a.function.localeCompare(b.function) ||
        compareCells(a.cell, b.cell)
    )
    .slice(0, limit);

/**
 * Y-axis bounds in ratio space. Always leaves room to see the 1.0 line; in
 * deviation mode the bounds are symmetric padding around it.
 */
export const chartDomain = (
  report: RatioReport,
  opts: { deviation?: boolean } = {}
): [number, number] => {
  const values = report.ratios.map((r) => r.ratio);
  const min = values.length ? Math.min(...values) : 1;
  const max = values.length ? Math.max(...values) : 1;
  const padding = 0.1;
  if (opts.deviation) {
    const up = Math.max(max - 1, 0.2);
    const down = Math.max(1 - min, 0.2);
    return [1 - down * (1 + padding), 1 + up * (1 + padding)];
  }
  return [Math.min(min, 0.8) * (1 - padding), Math.max(max, 1.2) * (1 + padding)];
};

export const speedupLabel = (ratio: number) => {
  if (Math.abs(ratio - 1) < 0.005) return "no change";
  if (ratio > 1) return `${ratio.toFixed(2)}x slower`;
  if (ratio === 0) return "∞x faster";
  return `${(1 / ratio).toFixed(2)}x faster`;
};
