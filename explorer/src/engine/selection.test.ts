import { describe, expect, it } from "vitest";
import {
  type SelectionAction,
  baselinePolicy,
  initialSelectionState,
  selectedCells,
  selectionReducer,
  statusLine,
} from "./selection";

const run = (...actions: SelectionAction[]) => actions.reduce(selectionReducer, initialSelectionState);

describe("selectionReducer", () => {
  it("starts with the diagonal selected against a 1x1 baseline", () => {
    expect(initialSelectionState.selected).toEqual(["1x1", "2x2", "4x4"]);
    expect(baselinePolicy(initialSelectionState)).toEqual({ mode: "single", cell: { threads: 1, sims: 1 } });
    expect(statusLine(initialSelectionState)).toBe("Selected: 3 datasets | Baseline (single): 1 threads, 1 sims");
  });

  it("toggles cells and keeps them in axis order", () => {
    const s = run(
      { type: "TOGGLE_CELL", payload: { threads: 1, sims: 64 } },
      { type: "TOGGLE_CELL", payload: { threads: 2, sims: 2 } }
    );
    expect(s.selected).toEqual(["1x1", "1x64", "4x4"]);
    expect(selectedCells(s)[1]).toEqual({ threads: 1, sims: 64 });
  });

  it("selects the single baseline's row and column", () => {
    const base = { type: "SET_SINGLE_BASELINE", payload: { threads: 8, sims: 4 } } as const;
    expect(run({ type: "CLEAR" }, base, { type: "SELECT_ROW" }).selected).toEqual([
      "8x1",
      "8x2",
      "8x4",
      "8x8",
      "8x16",
      "8x32",
      "8x64",
    ]);
    expect(run({ type: "CLEAR" }, base, { type: "SELECT_COLUMN" }).selected).toEqual([
      "1x4",
      "2x4",
      "4x4",
      "8x4",
      "16x4",
      "32x4",
    ]);
  });

  it("selects the baseline row in row mode", () => {
    const s = run(
      { type: "CLEAR" },
      { type: "SET_MODE", payload: "row" },
      { type: "SET_ROW_BASELINE", payload: 32 },
      { type: "SELECT_ROW" }
    );
    expect(s.selected[0]).toBe("32x1");
    expect(s.selected).toHaveLength(7);
    expect(statusLine(s)).toBe("Selected: 7 datasets | Baseline (row): Row: 32 threads");
  });

  it("adds to an existing selection without duplicates", () => {
    const s = run({ type: "SET_COLUMN_BASELINE", payload: 1 }, { type: "SET_MODE", payload: "column" }, {
      type: "SELECT_COLUMN",
    });
    expect(s.selected).toEqual(["1x1", "2x1", "2x2", "4x1", "4x4", "8x1", "16x1", "32x1"]);
    expect(baselinePolicy(s)).toEqual({ mode: "column", sims: 1 });
  });

  it("replaces the selection with every loaded cell", () => {
    const s = run({ type: "SELECT_ALL_LOADED", payload: ["8x4", "1x1", "8x4"] });
    expect(s.selected).toEqual(["1x1", "8x4"]);
  });

  it("keeps the per-mode baselines when the mode changes", () => {
    const s = run(
      { type: "SET_SINGLE_BASELINE", payload: { threads: 2, sims: 8 } },
      { type: "SET_MODE", payload: "row" },
      { type: "SET_MODE", payload: "single" }
    );
    expect(baselinePolicy(s)).toEqual({ mode: "single", cell: { threads: 2, sims: 8 } });
    expect(s.selected).toEqual(initialSelectionState.selected);
  });

  it("toggles highlighted functions and the display flags", () => {
    const s = run(
      { type: "TOGGLE_FUNCTION", payload: "SimulateHVAC" },
      { type: "TOGGLE_FUNCTION", payload: "GetInput" },
      { type: "TOGGLE_STATS" },
      { type: "TOGGLE_DEVIATION_BARS" },
      { type: "TOGGLE_FUNCTION_LABELS" }
    );
    expect(s.selectedFunctions).toEqual(["GetInput", "SimulateHVAC"]);
    expect([s.showStats, s.deviationBars, s.showFunctionLabels]).toEqual([false, true, false]);
    expect(run({ type: "TOGGLE_FUNCTION", payload: "A" }, { type: "TOGGLE_FUNCTION", payload: "A" }).selectedFunctions).toEqual([]);
    expect(selectionReducer(s, { type: "CLEAR_FUNCTIONS" }).selectedFunctions).toEqual([]);
  });
});
