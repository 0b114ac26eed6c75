import React, { useState } from "react";
import { AlertTriangle, BarChart3, Download, FileDown, Loader } from "lucide-react";
import { RatioChart } from "../components/RatioChart";
import { SelectionMatrix } from "../components/SelectionMatrix";
import { StatisticsPanel } from "../components/StatisticsPanel";
import type { BaselineMode } from "../engine/baseline";
import { statusLine } from "../engine/selection";
import { useExplorerStore } from "../hooks/useExplorerStore";
import { useProject } from "../hooks/useProject";
import { useRatioReport } from "../hooks/useRatioReport";
import { useTheme } from "../theme";
import {
  buildComparisonPdf,
  captureChartPng,
  exportFilename,
  saveOrDownload,
} from "../utils/comparisonExport";

const CHART_ID = "ratio-chart";

const MODES: Array<{ mode: BaselineMode; label: string }> = [
  { mode: "single", label: "Single" },
  { mode: "row", label: "Row" },
  { mode: "column", label: "Column" },
];

const buttonClass =
  "inline-flex items-center gap-1.5 text-xs px-2.5 py-1.5 rounded-md border border-slate-200 hover:bg-slate-50 text-slate-700 disabled:opacity-50 dark:border-slate-700 dark:hover:bg-slate-800 dark:text-slate-200";

const Toggle: React.FC<{ label: string; checked: boolean; onChange: () => void }> = ({
  label,
  checked,
  onChange,
}) => (
  <label className="inline-flex items-center gap-1.5 text-xs text-slate-600 dark:text-slate-300 cursor-pointer">
    <input type="checkbox" checked={checked} onChange={onChange} />
    {label}
  </label>
);

export const Explorer: React.FC = () => {
  const { project, matrix, loading, error } = useProject();
  const { state, dispatch } = useExplorerStore();
  const { theme } = useTheme();
  const report = useRatioReport();
  const [exporting, setExporting] = useState<"png" | "pdf" | null>(null);

  const chartElement = () => document.getElementById(CHART_ID);
  const background = theme === "dark" ? "#020617" : "#ffffff";
  const projectName = project?.name ?? "project";
  const policy = report.policy;

  const exportPng = async () => {
    const el = chartElement();
    if (!el) return;
    try {
      setExporting("png");
      const png = await captureChartPng(el, background);
      const saved = await saveOrDownload(exportFilename(projectName, policy, "png"), png);
      if (saved) alert(`Chart saved to ${saved}`);
    } catch (e) {
      console.error("PNG export failed", e);
      alert(`Export failed: ${e instanceof Error ? e.message : String(e)}`);
    } finally {
      setExporting(null);
    }
  };

  const exportPdf = async () => {
    try {
      setExporting("pdf");
      const el = chartElement();
      const chartPng = el ? await captureChartPng(el, "#ffffff") : undefined;
      const pdf = buildComparisonPdf({
        projectName,
        report,
        chartPng,
        chartSize: el ? { width: el.offsetWidth, height: el.offsetHeight } : undefined,
      });
      const saved = await saveOrDownload(exportFilename(projectName, policy, "pdf"), pdf);
      if (saved) alert(`Report saved to ${saved}`);
    } catch (e) {
      console.error("PDF export failed", e);
      alert(`Export failed: ${e instanceof Error ? e.message : String(e)}`);
    } finally {
      setExporting(null);
    }
  };

  if (loading && !project)
    return (
      <div className="flex h-full items-center justify-center text-slate-500">
        <Loader className="animate-spin w-6 h-6 mr-2" /> Loading project...
      </div>
    );

  if (!project)
    return (
      <div className="p-8 text-rose-400 flex items-center gap-2">
        <AlertTriangle className="w-5 h-5" /> {error ?? "No project loaded"}
      </div>
    );

  return (
    <div className="p-6 h-full overflow-y-auto bg-slate-50 text-slate-900 dark:bg-slate-950 dark:text-slate-200">
      <div className="flex items-center justify-between gap-4 mb-4">
        <div className="min-w-0">
          <h1 className="text-xl font-bold flex items-center gap-2">
            <BarChart3 className="w-5 h-5" /> {project.name}
          </h1>
          {project.description && (
            <p className="text-sm text-slate-500 truncate">{project.description}</p>
          )}
        </div>
        <div className="flex items-center gap-2 shrink-0">
          <button type="button" className={buttonClass} disabled={exporting != null} onClick={() => void exportPng()}>
            <Download className="w-3.5 h-3.5" /> {exporting === "png" ? "Exporting…" : "Export PNG"}
          </button>
          <button type="button" className={buttonClass} disabled={exporting != null} onClick={() => void exportPdf()}>
            <FileDown className="w-3.5 h-3.5" /> {exporting === "pdf" ? "Exporting…" : "Export PDF"}
          </button>
        </div>
      </div>

      {error && (
        <div className="mb-4 rounded-lg border border-rose-500/30 bg-rose-500/10 px-3 py-2 text-sm text-rose-500 flex items-center gap-2">
          <AlertTriangle className="w-4 h-4 shrink-0" /> {error}
        </div>
      )}

      <div className="rounded-xl border border-slate-200 bg-white p-4 mb-4 dark:border-slate-800 dark:bg-slate-900 flex flex-wrap items-center gap-3">
        <button type="button" className={buttonClass} onClick={() => dispatch({ type: "CLEAR" })}>
          Clear All
        </button>
        <button type="button" className={buttonClass} onClick={() => dispatch({ type: "SELECT_ROW" })}>
          Select Row
        </button>
        <button type="button" className={buttonClass} onClick={() => dispatch({ type: "SELECT_COLUMN" })}>
          Select Column
        </button>
        <button
          type="button"
          className={buttonClass}
          onClick={() => dispatch({ type: "SELECT_ALL_LOADED", payload: Array.from(matrix.keys()) })}
        >
          Select All Loaded
        </button>
        {state.selectedFunctions.length > 0 && (
          <button type="button" className={buttonClass} onClick={() => dispatch({ type: "CLEAR_FUNCTIONS" })}>
            Clear functions ({state.selectedFunctions.length})
          </button>
        )}

        <div className="h-5 w-px bg-slate-200 dark:bg-slate-700" />

        <Toggle label="Show statistics" checked={state.showStats} onChange={() => dispatch({ type: "TOGGLE_STATS" })} />
        <Toggle
          label="Function labels"
          checked={state.showFunctionLabels}
          onChange={() => dispatch({ type: "TOGGLE_FUNCTION_LABELS" })}
        />
        <Toggle
          label="Deviation bars"
          checked={state.deviationBars}
          onChange={() => dispatch({ type: "TOGGLE_DEVIATION_BARS" })}
        />

        <div className="h-5 w-px bg-slate-200 dark:bg-slate-700" />

        <div className="inline-flex items-center gap-3 text-xs" role="radiogroup" aria-label="Baseline mode">
          <span className="text-slate-500">Baseline:</span>
          {MODES.map((m) => (
            <label key={m.mode} className="inline-flex items-center gap-1 cursor-pointer">
              <input
                type="radio"
                name="baseline-mode"
                checked={state.mode === m.mode}
                onChange={() => dispatch({ type: "SET_MODE", payload: m.mode })}
              />
              {m.label}
            </label>
          ))}
        </div>
      </div>

      <div className="text-xs text-slate-500 mb-2 tabular-nums">{statusLine(state)}</div>

      <div className={`grid gap-4 ${state.showStats ? "lg:grid-cols-[1fr_320px]" : ""}`}>
        <div className="space-y-4 min-w-0">
          <div className="rounded-xl border border-slate-200 bg-white p-4 h-[460px] dark:border-slate-800 dark:bg-slate-900">
            <RatioChart
              id={CHART_ID}
              report={report}
              deviation={state.deviationBars}
              showLabels={state.showFunctionLabels}
              selectedFunctions={state.selectedFunctions}
              onToggleFunction={(name) => dispatch({ type: "TOGGLE_FUNCTION", payload: name })}
            />
          </div>
          <div className="rounded-xl border border-slate-200 bg-white p-4 dark:border-slate-800 dark:bg-slate-900">
            <SelectionMatrix matrix={matrix} issues={project.issues} state={state} dispatch={dispatch} />
          </div>
        </div>
        {state.showStats && (
          <div className="rounded-xl border border-slate-200 bg-white p-4 dark:border-slate-800 dark:bg-slate-900 lg:max-h-[calc(100vh-200px)] overflow-y-auto">
            <StatisticsPanel
              report={report}
              selectedCount={state.selected.length}
              selectedFunctions={state.selectedFunctions}
              issues={project.issues}
            />
          </div>
        )}
      </div>
    </div>
  );
};
