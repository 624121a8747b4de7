import express from "express";
import cors from "cors";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { Server } from "node:http";
import type { Express } from "express";
import type { EnvMap } from "@ocfg/core";

import type { AppContext } from "./core/context.js";
import { DEFAULT_PORT } from "./core/fs-helpers.js";
import { registerStateRoutes } from "./routes/state.js";
import { registerProviderRoutes } from "./routes/providers.js";
import { registerModelRoutes } from "./routes/models.js";
import { registerMcpRoutes } from "./routes/mcp.js";
import { registerAgentRoutes } from "./routes/agents.js";
import { registerOhMyRoutes } from "./routes/ohmy.js";
import { registerPermissionRoutes } from "./routes/permissions.js";
import { registerSkillRoutes } from "./routes/skills.js";
import { registerRulesRoutes } from "./routes/rules.js";
import { registerNativeRoutes } from "./routes/native.js";
import { registerBackupRoutes } from "./routes/backups.js";
import { registerImportRoutes } from "./routes/import.js";
import { registerValidateRoutes } from "./routes/validate.js";
import { errorHandler } from "./routes/route-helpers.js";

export interface ServerOptions {
  /** Built dashboard to serve at "/"; unset serves the API only */
  dashboardDir?: string;
  env?: EnvMap;
}

export function defaultDashboardDir(): string {
  const __dirname = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(__dirname, "..", "..", "dashboard", "dist");
}

export function createServer(ctx: AppContext, options: ServerOptions = {}): Express {
  const env = options.env ?? process.env;
  const app = express();
  app.use(cors());
  app.use(express.json());

  registerStateRoutes(app, ctx, env);
  registerProviderRoutes(app, ctx);
  registerModelRoutes(app, ctx);
  registerMcpRoutes(app, ctx);
  registerAgentRoutes(app, ctx);
  registerOhMyRoutes(app, ctx);
  registerPermissionRoutes(app, ctx);
  registerSkillRoutes(app, ctx);
  registerRulesRoutes(app, ctx);
  registerNativeRoutes(app, ctx, env);
  registerBackupRoutes(app, ctx);
  registerImportRoutes(app, ctx);
  registerValidateRoutes(app, ctx);

  app.use("/api", (req, res) => {
    res.status(404).json({ error: `No route for ${req.method} /api${req.path}` });
  });

  const { dashboardDir } = options;
  if (dashboardDir) {
    // Static assets first
    app.use(express.static(dashboardDir));

    // SPA fallback: non-API routes get index.html
    app.use((_req, res) => {
      res.sendFile(path.join(dashboardDir, "index.html"), (err) => {
        if (err) res.status(404).send("Dashboard not built. Run: npm run build -w @ocfg/dashboard");
      });
    });
  }

  app.use(errorHandler);
  return app;
}

export function startServer(ctx: AppContext, port = DEFAULT_PORT, options: ServerOptions = {}): Server {
  const app = createServer(ctx, { dashboardDir: defaultDashboardDir(), ...options });
  return app.listen(port, "127.0.0.1", () => {
    console.log(`ocfg dashboard running on http://localhost:${port}`);
  });
}
