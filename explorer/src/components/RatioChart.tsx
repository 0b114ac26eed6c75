import React, { useMemo } from "react";
import {
  Bar,
  BarChart,
  CartesianGrid,
  Cell as BarCell,
  Legend,
  ReferenceLine,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from "recharts";
import { buildChartRows, seriesFor } from "../engine/chartData";
import { cellKey, formatCell } from "../engine/matrix";
import { type RatioEntry, type RatioReport, chartDomain, speedupLabel } from "../engine/ratios";
import { useTheme } from "../theme";
import { fmtRatio, fmtSeconds } from "../utils/format";

interface RatioChartProps {
  id?: string;
  report: RatioReport;
  deviation: boolean;
  showLabels: boolean;
  selectedFunctions: string[];
  onToggleFunction: (name: string) => void;
}

interface TooltipItem {
  dataKey?: unknown;
  color?: string;
}

interface RatioTooltipProps {
  active?: boolean;
  label?: unknown;
  payload?: TooltipItem[];
  lookup: Map<string, RatioEntry>;
}

const RatioTooltip: React.FC<RatioTooltipProps> = ({ active, label, payload, lookup }) => {
  const { colors } = useTheme();
  if (!active || typeof label !== "string" || !payload?.length) return null;
  return (
    <div className="rounded-lg border px-3 py-2 text-xs shadow-lg" style={colors.tooltip}>
      <div className="font-bold mb-1">{label}</div>
      {payload.map((p) => {
        const entry = lookup.get(`${label}|${String(p.dataKey)}`);
        if (!entry) return null;
        return (
          <div key={String(p.dataKey)} className="flex items-center gap-2 tabular-nums">
            <span className="inline-block w-2 h-2 rounded-full" style={{ backgroundColor: p.color }} />
            <span>{formatCell(entry.cell)}:</span>
            <span className="font-medium">{fmtRatio(entry.ratio)}</span>
            <span className="text-slate-500">
              ({fmtSeconds(entry.targetTime)} vs {fmtSeconds(entry.baselineTime)}, {speedupLabel(entry.ratio)})
            </span>
          </div>
        );
      })}
    </div>
  );
};

export const RatioChart: React.FC<RatioChartProps> = ({
  id,
  report,
  deviation,
  showLabels,
  selectedFunctions,
  onToggleFunction,
}) => {
  const { colors } = useTheme();
  const rows = useMemo(() => buildChartRows(report, { deviation }), [report, deviation]);
  const series = useMemo(() => seriesFor(report), [report]);
  const lookup = useMemo(() => {
    const m = new Map<string, RatioEntry>();
    report.ratios.forEach((r) => m.set(`${r.function}|${cellKey(r.cell)}`, r));
    return m;
  }, [report]);

  const [lo, hi] = chartDomain(report, { deviation });
  const domain: [number, number] = deviation ? [lo - 1, hi - 1] : [lo, hi];
  const highlighted = new Set(selectedFunctions);

  if (!rows.length) {
    return (
      <div id={id} className="h-full flex items-center justify-center text-sm text-slate-500">
        Select datasets with a loaded baseline to compare.
      </div>
    );
  }

  return (
    <div id={id} className="h-full w-full">
      <ResponsiveContainer width="100%" height="100%">
        <BarChart
          data={rows}
          margin={{ top: 10, right: 16, left: 8, bottom: showLabels ? 70 : 10 }}
          onClick={(s) => {
            if (s?.activeLabel) onToggleFunction(s.activeLabel);
          }}
        >
          <CartesianGrid strokeDasharray="3 3" stroke={colors.grid} />
          <XAxis
            dataKey="function"
            stroke={colors.axis}
            tick={showLabels ? { fill: colors.tick, fontSize: 10 } : false}
            angle={showLabels ? -35 : 0}
            textAnchor={showLabels ? "end" : "middle"}
            interval={0}
            height={showLabels ? 80 : 10}
          />
          <YAxis
            stroke={colors.axis}
            tick={{ fill: colors.tick }}
            fontSize={12}
            domain={domain}
            allowDataOverflow
            tickFormatter={(v: number) => (deviation ? (v + 1).toFixed(2) : v.toFixed(2))}
            label={{
              value: "Ratio to baseline",
              angle: -90,
              position: "insideLeft",
              fill: colors.tick,
              fontSize: 12,
            }}
          />
          <Tooltip content={<RatioTooltip lookup={lookup} />} cursor={{ fillOpacity: 0.1 }} />
          <Legend wrapperStyle={{ color: colors.tick }} verticalAlign="top" />
          <ReferenceLine
            y={deviation ? 0 : 1}
            stroke={colors.baseline}
            strokeDasharray="6 4"
            strokeWidth={2}
          />
          {series.map((s) => (
            <Bar key={s.key} dataKey={s.key} name={s.label} fill={s.color} isAnimationActive={false}>
              {rows.map((r) => (
                <BarCell
                  key={`${s.key}_${r.function}`}
                  fillOpacity={highlighted.size && !highlighted.has(r.function) ? 0.25 : 0.85}
                  stroke={highlighted.has(r.function) ? colors.baseline : undefined}
                />
              ))}
            </Bar>
          ))}
        </BarChart>
      </ResponsiveContainer>
    </div>
  );
};
