import jsPDF from "jspdf";
import html2canvas from "html2canvas";
import { saveExport } from "../api/client";
import { type BaselinePolicy, describeBaseline } from "../engine/baseline";
import { formatCell } from "../engine/matrix";
import { INVALID_REASON_LABELS, type RatioReport, topDeviations } from "../engine/ratios";
import { fmtRatio, fmtSeconds, slugify } from "./format";

const policySlug = (policy: BaselinePolicy) => {
  switch (policy.mode) {
    case "single":
      return `t${policy.cell.threads}-s${policy.cell.sims}`;
    case "row":
      return `row-t${policy.threads}`;
    case "column":
      return `column-s${policy.sims}`;
  }
};

export const exportFilename = (projectName: string, policy: BaselinePolicy, ext: "png" | "pdf") =>
  `${slugify(projectName) || "project"}_${policySlug(policy)}_comparison.${ext}`;

export async function captureChartPng(el: HTMLElement, background = "#ffffff"): Promise<string> {
  const canvas = await html2canvas(el, { backgroundColor: background, scale: 2 });
  return canvas.toDataURL("image/png");
}

/**
 * Hands the file to the server's export directory. When the server cannot take
 * it, the browser downloads it instead; returns the saved path, or null.
 */
export async function saveOrDownload(filename: string, dataUri: string): Promise<string | null> {
  try {
    return await saveExport(filename, dataUri);
  } catch (e) {
    console.error("saveExport failed, downloading instead", e);
    const a = document.createElement("a");
    a.href = dataUri;
    a.download = filename;
    a.click();
    return null;
  }
}

interface PdfInput {
  projectName: string;
  report: RatioReport;
  chartPng?: string;
  chartSize?: { width: number; height: number };
}

export function buildComparisonPdf({ projectName, report, chartPng, chartSize }: PdfInput): string {
  const doc = new jsPDF({ unit: "pt", format: "a4" });
  const pageW = doc.internal.pageSize.getWidth();
  const pageH = doc.internal.pageSize.getHeight();
  const margin = 44;
  const maxW = pageW - margin * 2;
  const lineH = 14;
  let y = margin;

  const ensureSpace = (needed: number) => {
    if (y + needed <= pageH - margin) return;
    doc.addPage();
    y = margin;
  };

  const addHeading = (t: string) => {
    ensureSpace(24);
    doc.setFont("helvetica", "bold");
    doc.setFontSize(14);
    doc.text(t, margin, y);
    y += 18;
    doc.setFont("helvetica", "normal");
    doc.setFontSize(10);
  };

  const addLine = (t: string) => {
    const parts: string[] = doc.splitTextToSize(t, maxW);
    ensureSpace(parts.length * lineH);
    doc.text(parts, margin, y);
    y += parts.length * lineH;
  };

  doc.setFont("helvetica", "bold");
  doc.setFontSize(18);
  doc.text(projectName, margin, y);
  y += 22;
  doc.setFont("helvetica", "normal");
  doc.setFontSize(10);
  addLine(`Baseline (${report.policy.mode}): ${describeBaseline(report.policy)}`);
  addLine(`Generated: ${new Date().toLocaleString()}`);
  y += 6;

  addHeading("Datasets");
  report.cells.forEach((c) => {
    addLine(
      `${formatCell(c.cell)} vs ${formatCell(c.baselineCell)}: mean ${fmtRatio(c.meanRatio)} · total ${fmtRatio(
        c.totalRatio
      )} · ${c.validCount} valid, ${c.invalidCount} invalid`
    );
  });
  const { overall } = report;
  if (overall.best && overall.worst) {
    addLine(
      `Best ${fmtRatio(overall.best.meanRatio)} (${formatCell(overall.best.cell)}) · worst ${fmtRatio(
        overall.worst.meanRatio
      )} (${formatCell(overall.worst.cell)}) · mean ${fmtRatio(overall.mean)} · std ${fmtRatio(overall.stdDev)}`
    );
  }
  y += 6;

  const deviations = topDeviations(report);
  if (deviations.length) {
    addHeading("Top 10 deviations");
    deviations.forEach((d, i) => {
      addLine(
        `${i + 1}. ${d.function} @ ${formatCell(d.cell)}: ${fmtRatio(d.ratio)} (${fmtSeconds(
          d.targetTime
        )} vs ${fmtSeconds(d.baselineTime)})`
      );
    });
    y += 6;
  }

  if (report.invalid.length) {
    addHeading("Invalid ratios");
    report.invalid.forEach((i) => {
      addLine(
        `${i.function ?? "(dataset)"} @ ${formatCell(i.cell)} vs ${formatCell(i.baselineCell)}: ${
          INVALID_REASON_LABELS[i.reason]
        }`
      );
    });
  }

  if (chartPng && chartSize && chartSize.width > 0) {
    doc.addPage();
    y = margin;
    addHeading("Appendix: ratio chart");
    const imgW = maxW;
    const imgH = (chartSize.height / chartSize.width) * imgW;
    doc.addImage(chartPng, "PNG", margin, y, imgW, Math.min(imgH, pageH - y - margin));
  }

  return doc.output("datauristring");
}
