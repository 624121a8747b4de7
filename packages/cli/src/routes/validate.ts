import { Router } from "express";
import type { Express } from "express";
import type { AppContext } from "../core/context.js";
import { fixOpenCodeConfig } from "../commands/doctor.js";
import { runAllChecks } from "../commands/health-checks/runner.js";
import { asyncHandler } from "./async-handler.js";

export function registerValidateRoutes(app: Express, ctx: AppContext): void {
  const router = Router();

  router.get("/", asyncHandler(async (_req, res) => {
    res.json(await runAllChecks(ctx));
  }));

  router.post("/fix", asyncHandler(async (_req, res) => {
    res.json(await fixOpenCodeConfig(ctx));
  }));

  app.use("/api/validate", router);
}
