import { Router } from "express";
import type { Express } from "express";
import type { EnvMap } from "@ocfg/core";
import type { AppContext } from "../core/context.js";
import { collectStatus } from "../commands/status.js";
import { APP_VERSION, checkForUpdate } from "../core/version-checker.js";
import { asyncHandler } from "./async-handler.js";

export function registerStateRoutes(app: Express, ctx: AppContext, env: EnvMap): void {
  const stateRouter = Router();
  const versionRouter = Router();

  // GET /api/state
  stateRouter.get("/", asyncHandler(async (_req, res) => {
    const report = await collectStatus(ctx, env);
    res.json({
      ...report,
      projectDir: ctx.paths.projectDir,
      settingsPath: ctx.settingsPath,
      settingsError: ctx.settingsError,
    });
  }));

  // GET /api/version?check=true
  versionRouter.get("/", asyncHandler(async (req, res) => {
    const { enabled, repo } = ctx.settings.updateCheck;
    if (req.query.check !== "true" || !enabled) {
      res.json({ current: APP_VERSION });
      return;
    }
    res.json(await checkForUpdate(repo, APP_VERSION));
  }));

  app.use("/api/state", stateRouter);
  app.use("/api/version", versionRouter);
}
