import { Router } from "express";
import { writeExport } from "../exports.js";
import { ProjectLoadError, type ProjectStore } from "../project.js";
import {
  ExportBodySchema,
  OpenProjectBodySchema,
  formatZodError,
  isSimCount,
  isThreadCount,
  parseAxisKey,
} from "../schema.js";

export interface ApiOptions {
  store: ProjectStore;
  exportDir: string;
}

export function createApiRouter({ store, exportDir }: ApiOptions): Router {
  const apiRouter = Router();

  /**
   * GET /api/v1/health
   */
  apiRouter.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  /**
   * GET /api/v1/project
   * The loaded project: every usable dataset plus the ones that were skipped
   */
  apiRouter.get("/project", (_req, res) => {
    const project = store.project;
    if (!project) {
      return res.status(503).json({ error: "No project loaded" });
    }
    res.json(project);
  });

  /**
   * POST /api/v1/project/reload
   * Re-read the current project file and its datasets from disk
   */
  apiRouter.post("/project/reload", async (_req, res) => {
    try {
      const project = await store.load();
      res.json(project);
    } catch (err) {
      console.error("Reload project failed:", err);
      const status = err instanceof ProjectLoadError ? 422 : 500;
      res.status(status).json({ error: "Reload project failed", details: String(err) });
    }
  });

  /**
   * POST /api/v1/project/open
   * Switch to another project file; the current project stays active on failure
   */
  apiRouter.post("/project/open", async (req, res) => {
    const body = OpenProjectBodySchema.safeParse(req.body);
    if (!body.success) {
      return res.status(400).json({ error: "Invalid request", details: formatZodError(body.error) });
    }
    try {
      const project = await store.open(body.data.path);
      res.json(project);
    } catch (err) {
      console.error("Open project failed:", err);
      const status = err instanceof ProjectLoadError ? 422 : 500;
      res.status(status).json({ error: "Open project failed", details: String(err) });
    }
  });

  /**
   * GET /api/v1/datasets/:threads/:sims
   */
  apiRouter.get("/datasets/:threads/:sims", (req, res) => {
    const threads = parseAxisKey(req.params.threads);
    const sims = parseAxisKey(req.params.sims);
    if (threads == null || sims == null || !isThreadCount(threads) || !isSimCount(sims)) {
      return res.status(400).json({
        error: "Invalid axis key",
        details: `${req.params.threads} threads / ${req.params.sims} sims is outside the matrix`,
      });
    }
    const dataset = store.findDataset(threads, sims);
    if (!dataset) {
      return res.status(404).json({ error: "Dataset not loaded" });
    }
    res.json(dataset);
  });

  /**
   * POST /api/v1/exports
   * Save a rendered chart (PNG/JPEG) or report (PDF) data URI into the export directory
   */
  apiRouter.post("/exports", async (req, res) => {
    const body = ExportBodySchema.safeParse(req.body);
    if (!body.success) {
      return res.status(400).json({ error: "Invalid export", details: formatZodError(body.error) });
    }
    try {
      const saved = await writeExport(exportDir, body.data.filename, body.data.dataUri);
      res.status(201).json({ path: saved });
    } catch (err) {
      console.error("Export failed:", err);
      res.status(500).json({ error: "Export failed", details: String(err) });
    }
  });

  apiRouter.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  return apiRouter;
}
