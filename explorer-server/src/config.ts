import { config as loadEnv } from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { formatZodError } from "./schema.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  PROJECT_FILE: z.string().min(1).default("sample/project.json"),
  EXPORT_DIR: z.string().min(1).default("exports"),
  STATIC_DIR: z.string().min(1).default(path.join(__dirname, "..", "..", "explorer", "dist")),
});

export interface ServerConfig {
  port: number;
  projectFile: string;
  exportDir: string;
  staticDir: string;
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatZodError(parsed.error)}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    projectFile: path.resolve(e.PROJECT_FILE),
    exportDir: path.resolve(e.EXPORT_DIR),
    staticDir: path.resolve(e.STATIC_DIR),
  };
}

/** Reads `.env` (if any) into `process.env`, then validates it. */
export function loadConfig(): ServerConfig {
  loadEnv();
  return readConfig();
}
