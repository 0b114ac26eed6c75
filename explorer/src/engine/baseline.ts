import {
  type Cell,
  type SimCount,
  type ThreadCount,
  columnCells,
  formatCell,
  rowCells,
} from "./matrix";

export type BaselineMode = "single" | "row" | "column";

export type BaselinePolicy =
  | { mode: "single"; cell: Cell }
  | { mode: "row"; threads: ThreadCount }
  | { mode: "column"; sims: SimCount };

/**
 * The cell whose timings divide the target's.
 *
 * Row mode keeps the target's sim count and takes the baseline row's thread
 * count; column mode keeps the target's thread count and takes the baseline
 * column's sim count.
 */
export const resolveBaselineCell = (policy: BaselinePolicy, target: Cell): Cell => {
  switch (policy.mode) {
    case "single":
      return policy.cell;
    case "row":
      return { threads: policy.threads, sims: target.sims };
    case "column":
      return { threads: target.threads, sims: policy.sims };
  }
};

export const baselineCells = (policy: BaselinePolicy): Cell[] => {
  switch (policy.mode) {
    case "single":
      return [policy.cell];
    case "row":
      return rowCells(policy.threads);
    case "column":
      return columnCells(policy.sims);
  }
};

export const describeBaseline = (policy: BaselinePolicy) => {
  switch (policy.mode) {
    case "single":
      return formatCell(policy.cell);
    case "row":
      return `Row: ${policy.threads} threads`;
    case "column":
      return `Column: ${policy.sims} sims`;
  }
};

export const describeMode = (mode: BaselineMode) => {
  switch (mode) {
    case "single":
      return "All datasets compared to a single baseline";
    case "row":
      return "Each dataset compared to the baseline row's dataset with the same sim count";
    case "column":
      return "Each dataset compared to the baseline column's dataset with the same thread count";
  }
};
