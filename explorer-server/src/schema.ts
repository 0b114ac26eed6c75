import { z } from "zod";

// ====================
// Axes
// ====================
export const THREAD_COUNTS = [1, 2, 4, 8, 16, 32] as const;
export const SIM_COUNTS = [1, 2, 4, 8, 16, 32, 64] as const;

export const isThreadCount = (n: number) => (THREAD_COUNTS as readonly number[]).includes(n);
export const isSimCount = (n: number) => (SIM_COUNTS as readonly number[]).includes(n);

/** `"8"` → 8; `"08"`, `" 8"`, `"8.0"` → null so no two keys can name the same cell. */
export const parseAxisKey = (key: string): number | null => {
  const n = Number(key);
  return Number.isInteger(n) && String(n) === key ? n : null;
};

// ====================
// Project file
// ====================
export const ProjectFileSchema = z.object({
  project_info: z
    .object({
      name: z.string().min(1),
      description: z.string().optional(),
    })
    .passthrough(),
  // { "<sims>": { "<threads>": "path/to/dataset.json" } }
  datasets: z.record(z.string(), z.record(z.string(), z.string().min(1))),
});

// ====================
// Dataset file
// ====================
const FunctionEntrySchema = z.union([
  z.number().nonnegative(),
  z
    .object({
      total_time: z.number().nonnegative(),
      call_count: z.number().int().nonnegative().optional(),
    })
    .passthrough(),
]);

export const DatasetFileSchema = z.object({
  metadata: z
    .object({
      total_simulation_time: z.number().nonnegative().optional(),
    })
    .passthrough()
    .optional(),
  functions: z.record(z.string(), FunctionEntrySchema),
});

export type DatasetFile = z.infer<typeof DatasetFileSchema>;

// ====================
// Request bodies
// ====================
export const OpenProjectBodySchema = z.object({
  path: z.string().min(1),
});

export const ExportBodySchema = z.object({
  filename: z.string().default(""),
  dataUri: z.string().regex(/^data:(image\/png|image\/jpeg|application\/pdf)[^,]*;base64,/, {
    message: "dataUri must be a base64 PNG, JPEG or PDF data URI",
  }),
});

export const formatZodError = (err: z.ZodError) =>
  err.issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
