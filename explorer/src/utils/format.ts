export const fmtSeconds = (v?: number | null) =>
  typeof v === "number" && Number.isFinite(v) ? `${v.toFixed(1)}s` : "—";

export const fmtRatio = (v?: number | null, digits = 2) =>
  typeof v === "number" && Number.isFinite(v) ? `${v.toFixed(digits)}x` : "—";

export const slugify = (s: string) =>
  s
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
