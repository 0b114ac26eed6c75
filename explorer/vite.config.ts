import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";

const apiTarget = process.env.EXPLORER_API ?? "http://localhost:3001";

export default defineConfig({
  plugins: [react()],
  server: {
    port: 5173,
    proxy: {
      "/api": apiTarget,
    },
  },
});
