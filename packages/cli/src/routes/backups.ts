import { Router } from "express";
import { z } from "zod";
import type { Express } from "express";
import { ConfigError } from "@ocfg/core";
import { resolveBackupTarget, type AppContext } from "../core/context.js";
import { backupTargetPath } from "../commands/backup.js";
import { asyncHandler } from "./async-handler.js";
import { parseBody, queryString } from "./route-helpers.js";

const createBackupBody = z.object({ config: z.string(), tag: z.string().default("manual") });

export function registerBackupRoutes(app: Express, ctx: AppContext): void {
  const router = Router();

  // GET /api/backups?config=opencode
  router.get("/", asyncHandler(async (req, res) => {
    res.json(await ctx.backups.listBackups(queryString(req.query.config)));
  }));

  router.post("/", asyncHandler(async (req, res) => {
    const { config, tag } = parseBody(createBackupBody, req.body);
    const filePath = backupTargetPath(ctx, config);
    const info = await ctx.backups.createBackup(filePath, tag);
    if (!info) throw new ConfigError("not_found", `${filePath} does not exist`);
    res.status(201).json(info);
  }));

  router.post("/:file/restore", asyncHandler(async (req, res) => {
    const backup = await ctx.backups.findBackup(req.params.file);
    const target = resolveBackupTarget(ctx, backup);
    const safety = await ctx.backups.restoreBackup(backup.file, target);
    res.json({ restored: backup.file, target, safety: safety?.file ?? null });
  }));

  router.delete("/:file", asyncHandler(async (req, res) => {
    await ctx.backups.deleteBackup(req.params.file);
    res.json({ removed: req.params.file });
  }));

  app.use("/api/backups", router);
}
