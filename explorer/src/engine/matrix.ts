export const THREAD_COUNTS = [1, 2, 4, 8, 16, 32] as const;
export const SIM_COUNTS = [1, 2, 4, 8, 16, 32, 64] as const;

export type ThreadCount = (typeof THREAD_COUNTS)[number];
export type SimCount = (typeof SIM_COUNTS)[number];

export interface Cell {
  threads: ThreadCount;
  sims: SimCount;
}

/** `"<threads>x<sims>"`, e.g. `"8x4"`. */
export type CellKey = `${ThreadCount}x${SimCount}`;

export interface FunctionTiming {
  /** Elapsed seconds. */
  totalTime: number;
  callCount?: number;
}

export interface Dataset {
  threads: ThreadCount;
  sims: SimCount;
  file: string;
  totalTime: number;
  functions: Record<string, FunctionTiming>;
}

export type DatasetMatrix = ReadonlyMap<CellKey, Dataset>;

export const isThreadCount = (n: number): n is ThreadCount =>
  (THREAD_COUNTS as readonly number[]).includes(n);

export const isSimCount = (n: number): n is SimCount =>
  (SIM_COUNTS as readonly number[]).includes(n);

/** Own entries only, so names like `constructor` never resolve to `Object.prototype`. */
export const functionTime = (dataset: Dataset, name: string): number | undefined =>
  Object.hasOwn(dataset.functions, name) ? dataset.functions[name].totalTime : undefined;

export const cellKey = (cell: Cell): CellKey => `${cell.threads}x${cell.sims}`;

export const parseCellKey = (key: string): Cell | null => {
  const m = /^(\d+)x(\d+)$/.exec(key);
  if (!m) return null;
  const threads = Number(m[1]);
  const sims = Number(m[2]);
  if (!isThreadCount(threads) || !isSimCount(sims)) return null;
  return { threads, sims };
};

/** Row-major: threads outer, sims inner. */
export const allCells = (): Cell[] =>
  THREAD_COUNTS.flatMap((threads) => SIM_COUNTS.map((sims) => ({ threads, sims })));

export const rowCells = (threads: ThreadCount): Cell[] =>
  SIM_COUNTS.map((sims) => ({ threads, sims }));

export const columnCells = (sims: SimCount): Cell[] =>
  THREAD_COUNTS.map((threads) => ({ threads, sims }));

/** Position of a cell in row-major axis order. */
export const cellIndex = (cell: Cell) =>
  THREAD_COUNTS.indexOf(cell.threads) * SIM_COUNTS.length + SIM_COUNTS.indexOf(cell.sims);

export const compareCells = (a: Cell, b: Cell) => cellIndex(a) - cellIndex(b);

export const buildMatrix = (datasets: Iterable<Dataset>): DatasetMatrix => {
  const m = new Map<CellKey, Dataset>();
  for (const d of datasets) m.set(cellKey(d), d);
  return m;
};

export const formatCell = (cell: Cell) => `${cell.threads} threads, ${cell.sims} sims`;

export const shortCellLabel = (cell: Cell) => `T${cell.threads}·S${cell.sims}`;
