import fs from "fs/promises";
import path from "path";
import {
  DatasetFileSchema,
  type DatasetFile,
  ProjectFileSchema,
  formatZodError,
  isSimCount,
  isThreadCount,
  parseAxisKey,
} from "./schema.js";

export interface FunctionTiming {
  totalTime: number;
  callCount?: number;
}

export interface Dataset {
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

export interface LoadedProject {
  name: string;
  description?: string;
  projectFile: string;
  loadedAt: string;
  datasets: Dataset[];
  issues: DatasetLoadIssue[];
}

/** The project file itself could not be read or is not a project. */
export class ProjectLoadError extends Error {
  constructor(
    message: string,
    readonly projectFile: string
  ) {
    super(message);
    this.name = "ProjectLoadError";
  }
}

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

async function readJson(file: string): Promise<unknown> {
  const raw = await fs.readFile(file, "utf8");
  return JSON.parse(raw);
}

export function normalizeDataset(
  threads: number,
  sims: number,
  file: string,
  data: DatasetFile
): Dataset {
  const functions: Record<string, FunctionTiming> = Object.fromEntries(
    Object.entries(data.functions).map(([name, entry]): [string, FunctionTiming] => [
      name,
      typeof entry === "number"
        ? { totalTime: entry }
        : entry.call_count != null
        ? { totalTime: entry.total_time, callCount: entry.call_count }
        : { totalTime: entry.total_time },
    ])
  );
  const sum = Object.values(functions).reduce((acc, t) => acc + t.totalTime, 0);
  return {
    threads,
    sims,
    file,
    totalTime: data.metadata?.total_simulation_time ?? sum,
    functions,
  };
}

async function loadDataset(
  threads: number,
  sims: number,
  file: string
): Promise<Dataset | DatasetLoadIssue> {
  let raw: unknown;
  try {
    raw = await readJson(file);
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    const message = code === "ENOENT" ? "File not found" : `Unreadable JSON: ${errorMessage(err)}`;
    return { threads, sims, file, message };
  }
  const parsed = DatasetFileSchema.safeParse(raw);
  if (!parsed.success) {
    return { threads, sims, file, message: `Invalid dataset: ${formatZodError(parsed.error)}` };
  }
  return normalizeDataset(threads, sims, file, parsed.data);
}

const isIssue = (r: Dataset | DatasetLoadIssue): r is DatasetLoadIssue => "message" in r;

/**
 * Reads a project file and every dataset it references.
 *
 * Throws `ProjectLoadError` only for the project file itself; each dataset that
 * cannot be used is reported in `issues` and left out of `datasets`.
 */
export async function loadProject(projectFile: string): Promise<LoadedProject> {
  const abs = path.resolve(projectFile);
  let raw: unknown;
  try {
    raw = await readJson(abs);
  } catch (err) {
    throw new ProjectLoadError(`Cannot read project file: ${errorMessage(err)}`, abs);
  }
  const parsed = ProjectFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProjectLoadError(`Invalid project file: ${formatZodError(parsed.error)}`, abs);
  }

  const baseDir = path.dirname(abs);
  const jobs: Array<Promise<Dataset | DatasetLoadIssue>> = [];
  for (const [simsKey, byThreads] of Object.entries(parsed.data.datasets)) {
    for (const [threadsKey, rel] of Object.entries(byThreads)) {
      const file = path.resolve(baseDir, rel);
      const sims = parseAxisKey(simsKey);
      const threads = parseAxisKey(threadsKey);
      if (sims == null || threads == null) {
        jobs.push(
          Promise.resolve({
            file,
            message: `Axis key "${threadsKey}" threads / "${simsKey}" sims is not a plain integer`,
          })
        );
        continue;
      }
      if (!isSimCount(sims) || !isThreadCount(threads)) {
        jobs.push(
          Promise.resolve({
            file,
            message: `Axis key "${threadsKey}" threads / "${simsKey}" sims is outside the matrix`,
          })
        );
        continue;
      }
      jobs.push(loadDataset(threads, sims, file));
    }
  }

  const results = await Promise.all(jobs);
  const datasets: Dataset[] = [];
  const issues: DatasetLoadIssue[] = [];
  for (const r of results) {
    if (isIssue(r)) {
      console.warn(`⚠️  Skipped dataset ${r.file}: ${r.message}`);
      issues.push(r);
    } else {
      datasets.push(r);
    }
  }
  datasets.sort((a, b) => a.threads - b.threads || a.sims - b.sims);

  console.log(
    `✅ Loaded project "${parsed.data.project_info.name}": ${datasets.length} datasets, ${issues.length} skipped`
  );

  return {
    name: parsed.data.project_info.name,
    description: parsed.data.project_info.description,
    projectFile: abs,
    loadedAt: new Date().toISOString(),
    datasets,
    issues,
  };
}

/** Holds the session's current project; a failed open keeps the previous one. */
export class ProjectStore {
  private current: LoadedProject | null = null;

  constructor(private projectFile: string) {}

  get project(): LoadedProject | null {
    return this.current;
  }

  async load(): Promise<LoadedProject> {
    this.current = await loadProject(this.projectFile);
    return this.current;
  }

  async open(projectFile: string): Promise<LoadedProject> {
    const next = await loadProject(projectFile);
    this.projectFile = projectFile;
    this.current = next;
    return next;
  }

  findDataset(threads: number, sims: number): Dataset | undefined {
    return this.current?.datasets.find((d) => d.threads === threads && d.sims === sims);
  }
}
