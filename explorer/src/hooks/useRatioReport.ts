import { useMemo } from "react";
import { computeRatios } from "../engine/ratios";
import { baselinePolicy, selectedCells } from "../engine/selection";
import { useExplorerStore } from "./useExplorerStore";
import { useProject } from "./useProject";

/** The ratio report for the current selection and baseline policy. */
export function useRatioReport() {
  const { matrix } = useProject();
  const { state } = useExplorerStore();
  return useMemo(
    () => computeRatios(matrix, selectedCells(state), baselinePolicy(state)),
    // eslint-disable-next-line react-hooks/exhaustive-deps
    [matrix, state.selected, state.mode, state.singleBaseline, state.rowBaseline, state.columnBaseline]
  );
}
