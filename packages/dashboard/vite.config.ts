import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";
import tailwindcss from "tailwindcss";
import autoprefixer from "autoprefixer";
import { fileURLToPath } from "node:url";

const API_PORT = process.env.OCFG_PORT ?? "3417";

export default defineConfig({
  plugins: [react()],
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  css: {
    postcss: {
      plugins: [
        tailwindcss({
          content: [fileURLToPath(new URL("./index.html", import.meta.url)), fileURLToPath(new URL("./src/**/*.tsx", import.meta.url))],
          darkMode: "class",
          theme: {
            extend: {
              colors: {
                border: "#27272a",
                card: { DEFAULT: "#18181b", foreground: "#f4f4f5" },
                muted: { DEFAULT: "#27272a", foreground: "#a1a1aa" },
                primary: { DEFAULT: "#14b8a6", foreground: "#042f2e" },
                destructive: "#ef4444",
                status: { ok: "#22c55e", warn: "#eab308", error: "#ef4444", idle: "#71717a" },
              },
            },
          },
        }),
        autoprefixer(),
      ],
    },
  },
  server: {
    proxy: {
      "/api": `http://localhost:${API_PORT}`,
    },
  },
  build: {
    outDir: "dist",
    emptyOutDir: true,
  },
});
