import {
  type Dataset,
  type FunctionTiming,
  isSimCount,
  isThreadCount,
} from "../engine/matrix";

// Wire shapes as served by explorer-server under /api/v1.

export interface DatasetPayload {
  threads: number;
  sims: number;
  file: string;
  totalTime: number;
  functions: Record<string, FunctionTiming>;
}

export interface DatasetLoadIssue {
  threads?: number;
  sims?: number;
  file: string;
  message: string;
}

export interface ProjectPayload {
  name: string;
  description?: string;
  projectFile: string;
  loadedAt: string;
  datasets: DatasetPayload[];
  issues: DatasetLoadIssue[];
}

export interface LoadedProject {
  name: string;
  description?: string;
  projectFile: string;
  loadedAt: string;
  datasets: Dataset[];
  issues: DatasetLoadIssue[];
}

export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly details?: string
  ) {
    super(message);
    this.name = "ApiError";
  }
}

const API_BASE = "/api/v1";

const readError = async (res: Response) => {
  try {
    const body: unknown = await res.json();
    if (body && typeof body === "object") {
      const error = "error" in body && typeof body.error === "string" ? body.error : undefined;
      const details =
        "details" in body && typeof body.details === "string" ? body.details : undefined;
      return { error: error ?? res.statusText, details };
    }
  } catch {
    // body was not JSON
  }
  return { error: res.statusText || `HTTP ${res.status}` };
};

async function request<T>(path: string, init?: RequestInit): Promise<T> {
  const res = await fetch(`${API_BASE}${path}`, {
    ...init,
    headers: { "Content-Type": "application/json" },
  });
  if (!res.ok) {
    const { error, details } = await readError(res);
    throw new ApiError(error, res.status, details);
  }
  const data: T = await res.json();
  return data;
}

const toDataset = (d: DatasetPayload): Dataset | null => {
  const threads: number = d.threads;
  const sims: number = d.sims;
  if (!isThreadCount(threads) || !isSimCount(sims)) return null;
  return {
    threads,
    sims,
    file: d.file,
    totalTime: d.totalTime,
    functions: d.functions,
  };
};

/** Drops (and reports as issues) any dataset whose axis key the explorer does not know. */
export const normalizeProject = (p: ProjectPayload): LoadedProject => {
  const datasets: Dataset[] = [];
  const issues = [...p.issues];
  for (const d of p.datasets) {
    const ds = toDataset(d);
    if (ds) datasets.push(ds);
    else
      issues.push({
        threads: d.threads,
        sims: d.sims,
        file: d.file,
        message: `Axis key ${d.threads} threads / ${d.sims} sims is outside the matrix`,
      });
  }
  return { ...p, datasets, issues };
};

export const fetchProject = async () =>
  normalizeProject(await request<ProjectPayload>("/project"));

export const reloadProject = async () =>
  normalizeProject(await request<ProjectPayload>("/project/reload", { method: "POST" }));

export const openProject = async (path: string) =>
  normalizeProject(
    await request<ProjectPayload>("/project/open", {
      method: "POST",
      body: JSON.stringify({ path }),
    })
  );

export const saveExport = async (filename: string, dataUri: string) =>
  (
    await request<{ path: string }>("/exports", {
      method: "POST",
      body: JSON.stringify({ filename, dataUri }),
    })
  ).path;
