import { Router } from "express";
import { z } from "zod";
import type { Express } from "express";
import { ConfigError } from "@ocfg/core";
import type { AppContext } from "../core/context.js";
import { applyImport, convertToOpenCode, parseImportType, readSource, scanSources } from "../core/import-service.js";
import { asyncHandler } from "./async-handler.js";
import { parseBody } from "./route-helpers.js";

const importBody = z.object({ overwrite: z.boolean().optional(), dryRun: z.boolean().optional() });

export function registerImportRoutes(app: Express, ctx: AppContext): void {
  const router = Router();

  router.get("/", asyncHandler(async (_req, res) => {
    const sources = await scanSources(ctx.paths);
    res.json(sources.map(({ type, label, path }) => ({ type, label, path })));
  }));

  router.post("/:type", asyncHandler(async (req, res) => {
    const { overwrite, dryRun } = parseBody(importBody, req.body);
    const type = parseImportType(req.params.type);
    const found = await readSource(ctx.paths, type);
    if (!found) throw new ConfigError("not_found", `No readable ${type} config found`);
    const converted = convertToOpenCode(type, found.data);
    if (dryRun) {
      res.json({ preview: converted });
      return;
    }
    res.json(await ctx.store.edit("opencode", (doc) => applyImport(doc, converted, { overwrite })));
  }));

  app.use("/api/import", router);
}
