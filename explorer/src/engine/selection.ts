import { type BaselineMode, type BaselinePolicy, describeBaseline } from "./baseline";
import {
  type Cell,
  type CellKey,
  type SimCount,
  type ThreadCount,
  cellKey,
  columnCells,
  compareCells,
  parseCellKey,
  rowCells,
} from "./matrix";

export interface SelectionState {
  selected: CellKey[];
  mode: BaselineMode;
  singleBaseline: Cell;
  rowBaseline: ThreadCount;
  columnBaseline: SimCount;
  /** Functions highlighted in the chart and listed in the statistics panel. */
  selectedFunctions: string[];
  showStats: boolean;
  showFunctionLabels: boolean;
  deviationBars: boolean;
}

export type SelectionAction =
  | { type: "TOGGLE_CELL"; payload: Cell }
  | { type: "SELECT_ROW" }
  | { type: "SELECT_COLUMN" }
  | { type: "SELECT_ALL_LOADED"; payload: CellKey[] }
  | { type: "CLEAR" }
  | { type: "SET_MODE"; payload: BaselineMode }
  | { type: "SET_SINGLE_BASELINE"; payload: Cell }
  | { type: "SET_ROW_BASELINE"; payload: ThreadCount }
  | { type: "SET_COLUMN_BASELINE"; payload: SimCount }
  | { type: "TOGGLE_FUNCTION"; payload: string }
  | { type: "CLEAR_FUNCTIONS" }
  | { type: "TOGGLE_STATS" }
  | { type: "TOGGLE_FUNCTION_LABELS" }
  | { type: "TOGGLE_DEVIATION_BARS" };

export const initialSelectionState: SelectionState = {
  selected: ["1x1", "2x2", "4x4"],
  mode: "single",
  singleBaseline: { threads: 1, sims: 1 },
  rowBaseline: 1,
  columnBaseline: 1,
  selectedFunctions: [],
  showStats: true,
  showFunctionLabels: true,
  deviationBars: false,
};

const sortKeys = (keys: Iterable<CellKey>): CellKey[] =>
  Array.from(new Set(keys))
    .map((k) => parseCellKey(k))
    .filter((c): c is Cell => c != null)
    .sort(compareCells)
    .map(cellKey);

const addCells = (state: SelectionState, cells: Cell[]): SelectionState => ({
  ...state,
  selected: sortKeys([...state.selected, ...cells.map(cellKey)]),
});

export function selectionReducer(state: SelectionState, action: SelectionAction): SelectionState {
  switch (action.type) {
    case "TOGGLE_CELL": {
      const key = cellKey(action.payload);
      const selected = state.selected.includes(key)
        ? state.selected.filter((k) => k !== key)
        : sortKeys([...state.selected, key]);
      return { ...state, selected };
    }
    case "SELECT_ROW":
      return addCells(
        state,
        rowCells(state.mode === "row" ? state.rowBaseline : state.singleBaseline.threads)
      );
    case "SELECT_COLUMN":
      return addCells(
        state,
        columnCells(state.mode === "column" ? state.columnBaseline : state.singleBaseline.sims)
      );
    case "SELECT_ALL_LOADED":
      return { ...state, selected: sortKeys(action.payload) };
    case "CLEAR":
      return { ...state, selected: [] };
    case "SET_MODE":
      return { ...state, mode: action.payload };
    case "SET_SINGLE_BASELINE":
      return { ...state, singleBaseline: action.payload };
    case "SET_ROW_BASELINE":
      return { ...state, rowBaseline: action.payload };
    case "SET_COLUMN_BASELINE":
      return { ...state, columnBaseline: action.payload };
    case "TOGGLE_FUNCTION":
      return {
        ...state,
        selectedFunctions: state.selectedFunctions.includes(action.payload)
          ? state.selectedFunctions.filter((f) => f !== action.payload)
          : [...state.selectedFunctions, action.payload].sort(),
      };
    case "CLEAR_FUNCTIONS":
      return { ...state, selectedFunctions: [] };
    case "TOGGLE_STATS":
      return { ...state, showStats: !state.showStats };
    case "TOGGLE_FUNCTION_LABELS":
      return { ...state, showFunctionLabels: !state.showFunctionLabels };
    case "TOGGLE_DEVIATION_BARS":
      return { ...state, deviationBars: !state.deviationBars };
  }
}

export const baselinePolicy = (state: SelectionState): BaselinePolicy => {
  switch (state.mode) {
    case "single":
      return { mode: "single", cell: state.singleBaseline };
    case "row":
      return { mode: "row", threads: state.rowBaseline };
    case "column":
      return { mode: "column", sims: state.columnBaseline };
  }
};

export const selectedCells = (state: SelectionState): Cell[] =>
  state.selected
    .map((k) => parseCellKey(k))
    .filter((c): c is Cell => c != null)
    .sort(compareCells);

export const statusLine = (state: SelectionState) =>
  `Selected: ${state.selected.length} datasets | Baseline (${state.mode}): ${describeBaseline(
    baselinePolicy(state)
  )}`;
