import fs from "fs/promises";
import type { Server } from "http";
import os from "os";
import path from "path";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../app.js";
import { ProjectStore } from "../project.js";

let dir: string;
let server: Server;
let baseUrl: string;

const listen = (app: ReturnType<typeof createApp>) =>
  new Promise<{ server: Server; url: string }>((resolve, reject) => {
    const s = app.listen(0, () => {
      const addr = s.address();
      if (!addr || typeof addr === "string") return reject(new Error("no port"));
      resolve({ server: s, url: `http://127.0.0.1:${addr.port}` });
    });
  });

const close = (s: Server) => new Promise<void>((resolve) => s.close(() => resolve()));

const post = (url: string, body: unknown) =>
  fetch(url, { method: "POST", headers: { "Content-Type": "application/json" }, body: JSON.stringify(body) });

beforeAll(async () => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);

  dir = await fs.mkdtemp(path.join(os.tmpdir(), "explorer-api-"));
  await fs.mkdir(path.join(dir, "ui"));
  await fs.writeFile(path.join(dir, "ui", "index.html"), '<div id="root"></div>');
  await fs.writeFile(
    path.join(dir, "project.json"),
    JSON.stringify({ project_info: { name: "Study" }, datasets: { "1": { "1": "a.json", "2": "gone.json" } } })
  );
  await fs.writeFile(path.join(dir, "a.json"), JSON.stringify({ functions: { A: 4, B: 6 } }));

  const store = new ProjectStore(path.join(dir, "project.json"));
  await store.load();
  const app = createApp({ store, exportDir: path.join(dir, "exports"), staticDir: path.join(dir, "ui") });
  ({ server, url: baseUrl } = await listen(app));
});

afterAll(async () => {
  await close(server);
  await fs.rm(dir, { recursive: true, force: true });
});

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

describe("project routes", () => {
  it("reports health", async () => {
    const res = await fetch(`${baseUrl}/api/v1/health`);
    expect(await res.json()).toEqual({ status: "ok" });
  });

  it("serves the loaded project with its skipped datasets", async () => {
    const res = await fetch(`${baseUrl}/api/v1/project`);
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.name).toBe("Study");
    expect(body.datasets).toHaveLength(1);
    expect(body.issues).toEqual([{ threads: 2, sims: 1, file: path.join(dir, "gone.json"), message: "File not found" }]);
  });

  it("reloads the project from disk", async () => {
    const res = await post(`${baseUrl}/api/v1/project/reload`, {});
    expect(res.status).toBe(200);
    expect((await res.json()).datasets).toHaveLength(1);
  });

  it("keeps the current project when opening another one fails", async () => {
    const res = await post(`${baseUrl}/api/v1/project/open`, { path: path.join(dir, "nope.json") });
    expect(res.status).toBe(422);
    expect((await res.json()).error).toBe("Open project failed");

    const current = await fetch(`${baseUrl}/api/v1/project`);
    expect((await current.json()).name).toBe("Study");
  });

  it("validates the open request", async () => {
    const res = await post(`${baseUrl}/api/v1/project/open`, {});
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid request", details: "path: Required" });
  });
});

describe("dataset route", () => {
  it("returns one dataset by axis key", async () => {
    const res = await fetch(`${baseUrl}/api/v1/datasets/1/1`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ threads: 1, sims: 1, totalTime: 10 });
  });

  it("rejects keys off the axes and reports cells without data", async () => {
    const bad = await fetch(`${baseUrl}/api/v1/datasets/3/1`);
    expect(bad.status).toBe(400);
    expect((await bad.json()).details).toBe("3 threads / 1 sims is outside the matrix");

    const padded = await fetch(`${baseUrl}/api/v1/datasets/01/1`);
    expect(padded.status).toBe(400);

    const missing = await fetch(`${baseUrl}/api/v1/datasets/32/64`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: "Dataset not loaded" });
  });
});

describe("exports route", () => {
  it("saves a chart image into the export directory", async () => {
    const res = await post(`${baseUrl}/api/v1/exports`, {
      filename: "ratios",
      dataUri: "data:image/png;base64,aGVsbG8=",
    });
    expect(res.status).toBe(201);
    const saved = path.join(dir, "exports", "ratios.png");
    expect(await res.json()).toEqual({ path: saved });
    expect(await fs.readFile(saved, "utf8")).toBe("hello");
  });

  it("refuses other payloads", async () => {
    const res = await post(`${baseUrl}/api/v1/exports`, { filename: "x", dataUri: "data:text/html;base64,AAAA" });
    expect(res.status).toBe(400);
    expect((await res.json()).details).toBe("dataUri: dataUri must be a base64 PNG, JPEG or PDF data URI");
  });
});

describe("fallbacks", () => {
  it("answers unknown API paths with 404 JSON", async () => {
    const res = await fetch(`${baseUrl}/api/v1/nothing`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found" });
  });

  it("serves the UI for client-side routes", async () => {
    const res = await fetch(`${baseUrl}/functions/SimulateHVAC`);
    expect(res.status).toBe(200);
    expect(await res.text()).toBe('<div id="root"></div>');
  });

  it("reports an unbuilt UI and an empty store", async () => {
    const app = createApp({
      store: new ProjectStore(path.join(dir, "project.json")),
      exportDir: path.join(dir, "exports"),
      staticDir: path.join(dir, "no-ui"),
    });
    const { server: bare, url } = await listen(app);
    try {
      const ui = await fetch(`${url}/`);
      expect(ui.status).toBe(404);
      expect(await ui.json()).toEqual({ error: "Explorer UI not built" });

      const project = await fetch(`${url}/api/v1/project`);
      expect(project.status).toBe(503);
      expect(await project.json()).toEqual({ error: "No project loaded" });
    } finally {
      await close(bare);
    }
  });
});
