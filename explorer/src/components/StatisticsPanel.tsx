import React, { useMemo } from "react";
import { Link } from "react-router-dom";
import { AlertTriangle, TrendingDown, TrendingUp } from "lucide-react";
import type { DatasetLoadIssue } from "../api/client";
import { describeBaseline, describeMode } from "../engine/baseline";
import { formatCell } from "../engine/matrix";
import {
  INVALID_REASON_LABELS,
  type RatioReport,
  groupInvalidByReason,
  topDeviations,
} from "../engine/ratios";
import { fmtRatio, fmtSeconds } from "../utils/format";

interface StatisticsPanelProps {
  report: RatioReport;
  selectedCount: number;
  selectedFunctions: string[];
  issues: DatasetLoadIssue[];
}

const Section: React.FC<{ title: string; children: React.ReactNode }> = ({ title, children }) => (
  <div className="mb-4">
    <div className="text-xs text-slate-500 uppercase font-bold mb-2">{title}</div>
    {children}
  </div>
);

const ratioBadge = (ratio: number) => {
  const worse = ratio > 1;
  const cls = worse
    ? "text-rose-400 bg-rose-500/10 border-rose-500/30"
    : "text-emerald-400 bg-emerald-500/10 border-emerald-500/30";
  const Icon = worse ? TrendingUp : TrendingDown;
  return (
    <span className={`inline-flex items-center gap-1 px-1.5 py-0.5 rounded-md border text-xs tabular-nums ${cls}`}>
      <Icon className="w-3 h-3" />
      {fmtRatio(ratio)}
    </span>
  );
};

export const StatisticsPanel: React.FC<StatisticsPanelProps> = ({
  report,
  selectedCount,
  selectedFunctions,
  issues,
}) => {
  const deviations = useMemo(() => topDeviations(report), [report]);
  const invalidByReason = useMemo(() => groupInvalidByReason(report.invalid), [report]);
  const { overall } = report;

  return (
    <div className="text-sm">
      <Section title="Performance analysis">
        <div>Selected datasets: {selectedCount}</div>
        <div>Baseline: {describeBaseline(report.policy)}</div>
        <div className="text-xs text-slate-500 mt-1">{describeMode(report.policy.mode)}</div>
      </Section>

      {selectedFunctions.length > 0 && (
        <Section title="Selected functions">
          <ul className="space-y-1">
            {selectedFunctions.map((f) => {
              const s = report.stats.get(f);
              return (
                <li key={f} className="flex items-center justify-between gap-2">
                  <Link to={`/functions/${encodeURIComponent(f)}`} className="truncate text-indigo-500 hover:underline">
                    {f}
                  </Link>
                  <span className="text-xs tabular-nums text-slate-500 shrink-0">
                    {s ? `${fmtRatio(s.min)} – ${fmtRatio(s.max)}` : "no valid ratio"}
                  </span>
                </li>
              );
            })}
          </ul>
        </Section>
      )}

      {report.cells.length === 0 ? (
        <div className="text-slate-500">
          No datasets selected. Select datasets from the matrix below to see analysis.
        </div>
      ) : report.cells.length === 1 ? (
        <Section title="Single dataset analysis">
          {report.cells.map((c) => (
            <div key="single" className="space-y-1">
              <div>{formatCell(c.cell)}</div>
              <div>Mean function ratio: {fmtRatio(c.meanRatio)}</div>
              <div>Total time ratio: {fmtRatio(c.totalRatio)}</div>
              <div className="text-xs text-slate-500">
                {c.validCount} valid · {c.invalidCount} invalid
              </div>
            </div>
          ))}
        </Section>
      ) : (
        <Section title="Multi-dataset comparison">
          <div className="space-y-1">
            <div>
              Best: {fmtRatio(overall.best?.meanRatio)}{" "}
              {overall.best && <span className="text-slate-500">({formatCell(overall.best.cell)})</span>}
            </div>
            <div>
              Worst: {fmtRatio(overall.worst?.meanRatio)}{" "}
              {overall.worst && <span className="text-slate-500">({formatCell(overall.worst.cell)})</span>}
            </div>
            <div>Average: {fmtRatio(overall.mean)}</div>
            <div>Std deviation: {fmtRatio(overall.stdDev)}</div>
          </div>
          <table className="w-full text-xs mt-3">
            <thead>
              <tr className="text-slate-500 border-b border-slate-200 dark:border-slate-800">
                <th className="text-left py-1">Dataset</th>
                <th className="text-right py-1">Mean</th>
                <th className="text-right py-1">Total</th>
              </tr>
            </thead>
            <tbody>
              {report.cells.map((c) => (
                <tr key={formatCell(c.cell)} className="border-b border-slate-200 dark:border-slate-800/50">
                  <td className="py-1">{formatCell(c.cell)}</td>
                  <td className="py-1 text-right tabular-nums">{fmtRatio(c.meanRatio)}</td>
                  <td className="py-1 text-right tabular-nums">{fmtRatio(c.totalRatio)}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </Section>
      )}

      {deviations.length > 0 && (
        <Section title="Largest deviations">
          <ul className="space-y-1">
            {deviations.map((d) => (
              <li key={`${d.function}_${formatCell(d.cell)}`} className="flex items-center justify-between gap-2">
                <div className="min-w-0">
                  <div className="truncate">{d.function}</div>
                  <div className="text-xs text-slate-500">
                    {formatCell(d.cell)} · {fmtSeconds(d.targetTime)} vs {fmtSeconds(d.baselineTime)}
                  </div>
                </div>
                {ratioBadge(d.ratio)}
              </li>
            ))}
          </ul>
        </Section>
      )}

      {invalidByReason.size > 0 && (
        <Section title="Invalid ratios">
          <div className="space-y-2">
            {Array.from(invalidByReason.entries()).map(([reason, list]) => (
              <div key={reason}>
                <div className="text-xs text-amber-600 dark:text-amber-300">
                  {INVALID_REASON_LABELS[reason]} ({list.length})
                </div>
                <ul className="text-xs text-slate-500">
                  {list.slice(0, 6).map((i, idx) => (
                    <li key={`${reason}_${idx}`} className="truncate">
                      {i.function ?? "—"} · {formatCell(i.cell)} vs {formatCell(i.baselineCell)}
                    </li>
                  ))}
                  {list.length > 6 && <li>… {list.length - 6} more</li>}
                </ul>
              </div>
            ))}
          </div>
        </Section>
      )}

      {issues.length > 0 && (
        <Section title="Datasets not loaded">
          <ul className="space-y-1 text-xs">
            {issues.map((i) => (
              <li key={i.file} className="flex items-start gap-2 text-rose-500">
                <AlertTriangle className="w-3.5 h-3.5 shrink-0 mt-0.5" />
                <span className="break-all">
                  {i.threads != null && i.sims != null ? `${i.threads}×${i.sims} ` : ""}
                  {i.file}: {i.message}
                </span>
              </li>
            ))}
          </ul>
        </Section>
      )}
    </div>
  );
};
