import express from "express";
import cors from "cors";
import path from "path";
import { createApiRouter } from "./routes/api.js";
import type { ProjectStore } from "./project.js";

export interface AppOptions {
  store: ProjectStore;
  exportDir: string;
  staticDir: string;
}

export function createApp({ store, exportDir, staticDir }: AppOptions) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: "50mb" })); // Exported chart images arrive as data URIs

  // API routes
  app.use("/api/v1", createApiRouter({ store, exportDir }));

  // Serve the built explorer UI
  app.use(express.static(staticDir));

  // SPA fallback for frontend routes
  app.get("*", (req, res) => {
    if (req.path.startsWith("/api")) {
      return res.status(404).json({ error: "Not found" });
    }
    res.sendFile(path.join(staticDir, "index.html"), (err) => {
      if (err && !res.headersSent) res.status(404).json({ error: "Explorer UI not built" });
    });
  });

  return app;
}
