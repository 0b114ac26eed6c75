import React, { useMemo } from "react";
import { AlertTriangle } from "lucide-react";
import type { DatasetLoadIssue } from "../api/client";
import { baselineCells } from "../engine/baseline";
import {
  type Cell,
  type CellKey,
  type DatasetMatrix,
  SIM_COUNTS,
  THREAD_COUNTS,
  cellKey,
  formatCell,
} from "../engine/matrix";
import {
  type SelectionAction,
  type SelectionState,
  baselinePolicy,
} from "../engine/selection";
import { fmtSeconds } from "../utils/format";

interface SelectionMatrixProps {
  matrix: DatasetMatrix;
  issues: DatasetLoadIssue[];
  state: SelectionState;
  dispatch: React.Dispatch<SelectionAction>;
}

const issueKey = (i: DatasetLoadIssue) =>
  i.threads != null && i.sims != null ? `${i.threads}x${i.sims}` : null;

export const SelectionMatrix: React.FC<SelectionMatrixProps> = ({
  matrix,
  issues,
  state,
  dispatch,
}) => {
  const single = state.mode === "single";
  const colsPerSim = single ? 3 : 2;

  const issueByKey = useMemo(() => {
    const m = new Map<string, DatasetLoadIssue>();
    issues.forEach((i) => {
      const k = issueKey(i);
      if (k) m.set(k, i);
    });
    return m;
  }, [issues]);

  const baselineKeys = useMemo(
    () => new Set<CellKey>(baselineCells(baselinePolicy(state)).map(cellKey)),
    [state]
  );
  const selected = useMemo(() => new Set(state.selected), [state.selected]);

  const cellClass = "border border-slate-200 dark:border-slate-800 px-2 py-1 text-center";
  const headClass = `${cellClass} text-xs font-bold text-slate-500 bg-slate-50 dark:bg-slate-950/40`;

  const renderTime = (cell: Cell) => {
    const k = cellKey(cell);
    const ds = matrix.get(k);
    const issue = issueByKey.get(k);
    if (ds) return <span className="tabular-nums">{fmtSeconds(ds.totalTime)}</span>;
    if (issue)
      return (
        <span
          className="inline-flex items-center gap-1 text-rose-500"
          title={`${issue.file}: ${issue.message}`}
        >
          <AlertTriangle className="w-3.5 h-3.5" /> err
        </span>
      );
    return <span className="text-slate-400">—</span>;
  };

  return (
    <div className="overflow-x-auto">
      <table className="text-sm border-collapse">
        <thead>
          <tr>
            <th rowSpan={2} className={headClass}>
              Threads
            </th>
            {SIM_COUNTS.map((sims) => (
              <th key={`sim_${sims}`} colSpan={colsPerSim} className={headClass}>
                <div className="flex items-center justify-center gap-2">
                  <span>{sims} Sim</span>
                  {state.mode === "column" && (
                    <input
                      type="radio"
                      name="column-baseline"
                      aria-label={`Baseline column ${sims} sims`}
                      checked={state.columnBaseline === sims}
                      onChange={() => dispatch({ type: "SET_COLUMN_BASELINE", payload: sims })}
                    />
                  )}
                </div>
              </th>
            ))}
          </tr>
          <tr>
            {SIM_COUNTS.map((sims) => (
              <React.Fragment key={`sub_${sims}`}>
                <th className={headClass}>Time</th>
                <th className={headClass}>☑</th>
                {single && <th className={headClass}>Base</th>}
              </React.Fragment>
            ))}
          </tr>
        </thead>
        <tbody>
          {THREAD_COUNTS.map((threads) => (
            <tr key={`row_${threads}`}>
              <th className={headClass}>
                <div className="flex items-center justify-center gap-2">
                  <span>{threads}</span>
                  {state.mode === "row" && (
                    <input
                      type="radio"
                      name="row-baseline"
                      aria-label={`Baseline row ${threads} threads`}
                      checked={state.rowBaseline === threads}
                      onChange={() => dispatch({ type: "SET_ROW_BASELINE", payload: threads })}
                    />
                  )}
                </div>
              </th>
              {SIM_COUNTS.map((sims) => {
                const cell: Cell = { threads, sims };
                const k = cellKey(cell);
                const isBase = baselineKeys.has(k);
                const tint = isBase ? "bg-indigo-500/10" : "";
                return (
                  <React.Fragment key={`cell_${k}`}>
                    <td className={`${cellClass} ${tint}`}>{renderTime(cell)}</td>
                    <td className={`${cellClass} ${tint}`}>
                      <input
                        type="checkbox"
                        aria-label={`Select ${formatCell(cell)}`}
                        checked={selected.has(k)}
                        onChange={() => dispatch({ type: "TOGGLE_CELL", payload: cell })}
                      />
                    </td>
                    {single && (
                      <td className={`${cellClass} ${tint}`}>
                        <input
                          type="radio"
                          name="single-baseline"
                          aria-label={`Baseline ${formatCell(cell)}`}
                          checked={isBase}
                          onChange={() => dispatch({ type: "SET_SINGLE_BASELINE", payload: cell })}
                        />
                      </td>
                    )}
                  </React.Fragment>
                );
              })}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
};
