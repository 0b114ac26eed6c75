import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { ProjectStore } from "./project.js";

async function main() {
  const config = loadConfig();
  const store = new ProjectStore(config.projectFile);

  // An unreadable project file at startup is the one fatal error.
  await store.load();

  const app = createApp({ store, exportDir: config.exportDir, staticDir: config.staticDir });
  app.listen(config.port, () => {
    console.log(`🚀 Simulation Explorer running at http://localhost:${config.port}`);
    console.log(`   API: http://localhost:${config.port}/api/v1`);
    console.log(`   Project: ${config.projectFile}`);
    console.log(`   Exports: ${config.exportDir}`);
  });
}

main().catch((err) => {
  console.error("❌ Failed to start:", err instanceof Error ? err.message : err);
  process.exit(1);
});
