import { type Cell, type CellKey, cellKey, shortCellLabel } from "./matrix";
import type { RatioReport } from "./ratios";

export const SERIES_PALETTE = [
  "#6366f1", // indigo-500
  "#10b981", // emerald-500
  "#f59e0b", // amber-500
  "#ef4444", // red-500
  "#8b5cf6", // violet-500
  "#ec4899", // pink-500
  "#06b6d4", // cyan-500
  "#d946ef", // fuchsia-500
] as const;

export interface ChartSeries {
  key: CellKey;
  cell: Cell;
  label: string;
  color: string;
}

export type ChartRow = { function: string } & Partial<Record<CellKey, number | null>>;

export const seriesColor = (index: number) => SERIES_PALETTE[index % SERIES_PALETTE.length];

/** One series per selected cell, in axis order. */
export const seriesFor = (report: RatioReport): ChartSeries[] =>
  report.cells.map(({ cell }, i) => ({
    key: cellKey(cell),
    cell,
    label: shortCellLabel(cell),
    color: seriesColor(i),
  }));

/**
 * One row per function, one field per selected cell. Pairs without a valid
 * ratio are `null` so the chart leaves a gap. Deviation mode stores
 * `ratio - 1`.
 */
export function buildChartRows(
  report: RatioReport,
  opts: { deviation?: boolean; functionFilter?: ReadonlySet<string> } = {}
): ChartRow[] {
  const filter = opts.functionFilter?.size ? opts.functionFilter : null;
  const names = filter ? report.functions.filter((f) => filter.has(f)) : report.functions;
  const keys = report.cells.map(({ cell }) => cellKey(cell));

  const byFunction = new Map<string, ChartRow>();
  for (const name of names) {
    const row: ChartRow = { function: name };
    for (const k of keys) row[k] = null;
    byFunction.set(name, row);
  }
  for (const r of report.ratios) {
    const row = byFunction.get(r.function);
    if (!row) continue;
    row[cellKey(r.cell)] = opts.deviation ? r.ratio - 1 : r.ratio;
  }
  return names.map((n) => byFunction.get(n)).filter((r): r is ChartRow => r != null);
}
