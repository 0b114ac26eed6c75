import React, { useMemo } from "react";
import { Link, useParams } from "react-router-dom";
import { ArrowLeft, Sigma } from "lucide-react";
import { baselineCells } from "../engine/baseline";
import { SIM_COUNTS, THREAD_COUNTS, cellKey, formatCell } from "../engine/matrix";
import { INVALID_REASON_LABELS, speedupLabel } from "../engine/ratios";
import { useExplorerStore } from "../hooks/useExplorerStore";
import { useProject } from "../hooks/useProject";
import { useRatioReport } from "../hooks/useRatioReport";
import { fmtRatio, fmtSeconds } from "../utils/format";

/** One function's timings across the whole matrix, plus its ratios for the current selection. */
export const FunctionDetail: React.FC = () => {
  const { name = "" } = useParams();
  const { matrix } = useProject();
  const { dispatch, state } = useExplorerStore();
  const report = useRatioReport();

  const entries = useMemo(() => report.ratios.filter((r) => r.function === name), [report, name]);
  const invalid = useMemo(() => report.invalid.filter((i) => i.function === name), [report, name]);
  const stats = report.stats.get(name);
  const baseKeys = useMemo(() => new Set(baselineCells(report.policy).map(cellKey)), [report]);
  const highlighted = state.selectedFunctions.includes(name);

  const cellClass = "border border-slate-200 dark:border-slate-800 px-2 py-1 text-center";
  const headClass = `${cellClass} text-xs font-bold text-slate-500 bg-slate-50 dark:bg-slate-950/40`;

  return (
    <div className="p-6 h-full overflow-y-auto bg-slate-50 text-slate-900 dark:bg-slate-950 dark:text-slate-200">
      <div className="flex items-center gap-4 mb-6">
        <Link
          to="/"
          className="p-2 hover:bg-slate-100 rounded-lg text-slate-500 dark:hover:bg-slate-900 dark:text-slate-400"
        >
          <ArrowLeft className="w-5 h-5" />
        </Link>
        <div className="flex items-center justify-between gap-4 w-full">
          <h1 className="text-xl font-bold flex items-center gap-2 min-w-0">
            <Sigma className="w-5 h-5 shrink-0" />
            <span className="truncate">{name}</span>
          </h1>
          <button
            type="button"
            onClick={() => dispatch({ type: "TOGGLE_FUNCTION", payload: name })}
            className="text-xs px-2.5 py-1.5 rounded-md border border-slate-200 hover:bg-slate-50 text-slate-700 dark:border-slate-700 dark:hover:bg-slate-800 dark:text-slate-200"
          >
            {highlighted ? "Remove highlight" : "Highlight in chart"}
          </button>
        </div>
      </div>

      <div className="rounded-xl border border-slate-200 bg-white p-4 mb-4 dark:border-slate-800 dark:bg-slate-900">
        <div className="text-xs text-slate-500 uppercase font-bold mb-2">Time per dataset</div>
        <div className="overflow-x-auto">
          <table className="text-sm border-collapse">
            <thead>
              <tr>
                <th className={headClass}>Threads \ Sims</th>
                {SIM_COUNTS.map((s) => (
                  <th key={s} className={headClass}>
                    {s}
                  </th>
                ))}
              </tr>
            </thead>
            <tbody>
              {THREAD_COUNTS.map((threads) => (
                <tr key={threads}>
                  <th className={headClass}>{threads}</th>
                  {SIM_COUNTS.map((sims) => {
                    const k = cellKey({ threads, sims });
                    const ds = matrix.get(k);
                    const timing = ds && Object.hasOwn(ds.functions, name) ? ds.functions[name] : undefined;
                    return (
                      <td
                        key={k}
                        className={`${cellClass} tabular-nums ${baseKeys.has(k) ? "bg-indigo-500/10" : ""}`}
                        title={timing?.callCount != null ? `${timing.callCount} calls` : undefined}
                      >
                        {fmtSeconds(timing?.totalTime)}
                      </td>
                    );
                  })}
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      </div>

      <div className="rounded-xl border border-slate-200 bg-white p-4 dark:border-slate-800 dark:bg-slate-900">
        <div className="text-xs text-slate-500 uppercase font-bold mb-2">Ratios for the current selection</div>
        {stats && (
          <div className="text-sm mb-3">
            Range {fmtRatio(stats.min)} ({formatCell(stats.minCell)}) – {fmtRatio(stats.max)} (
            {formatCell(stats.maxCell)}) · mean {fmtRatio(stats.mean)} · std {fmtRatio(stats.stdDev)}
          </div>
        )}
        {entries.length === 0 && invalid.length === 0 ? (
          <div className="text-sm text-slate-500">No selected dataset reports this function.</div>
        ) : (
          <table className="w-full text-sm">
            <thead>
              <tr className="text-xs text-slate-500 border-b border-slate-200 dark:border-slate-800">
                <th className="text-left py-1">Dataset</th>
                <th className="text-left py-1">Baseline</th>
                <th className="text-right py-1">Time</th>
                <th className="text-right py-1">Ratio</th>
                <th className="text-right py-1">Change</th>
              </tr>
            </thead>
            <tbody>
              {entries.map((e) => (
                <tr key={cellKey(e.cell)} className="border-b border-slate-200 dark:border-slate-800/50">
                  <td className="py-1">{formatCell(e.cell)}</td>
                  <td className="py-1 text-slate-500">{formatCell(e.baselineCell)}</td>
                  <td className="py-1 text-right tabular-nums">
                    {fmtSeconds(e.targetTime)} / {fmtSeconds(e.baselineTime)}
                  </td>
                  <td className="py-1 text-right tabular-nums">{fmtRatio(e.ratio, 3)}</td>
                  <td className={`py-1 text-right ${e.ratio > 1 ? "text-rose-500" : "text-emerald-500"}`}>
                    {speedupLabel(e.ratio)}
                  </td>
                </tr>
              ))}
              {invalid.map((i) => (
                <tr key={`invalid_${cellKey(i.cell)}`} className="border-b border-slate-200 dark:border-slate-800/50">
                  <td className="py-1">{formatCell(i.cell)}</td>
                  <td className="py-1 text-slate-500">{formatCell(i.baselineCell)}</td>
                  <td className="py-1 text-right tabular-nums">
                    {fmtSeconds(i.targetTime)} / {fmtSeconds(i.baselineTime)}
                  </td>
                  <td colSpan={2} className="py-1 text-right text-amber-600 dark:text-amber-300">
                    {INVALID_REASON_LABELS[i.reason]}
                  </td>
                </tr>
              ))}
            </tbody>
          </table>
        )}
      </div>
    </div>
  );
};
