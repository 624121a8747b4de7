import { Router } from "express";
import { z } from "zod";
import type { Express } from "express";
import type { AppContext } from "../core/context.js";
import {
  deletePermission,
  deleteSkillPermission,
  listPermissions,
  listSkillPermissions,
  quickAddPermissions,
  setPermission,
  setSkillPermission,
} from "../core/permission-manager.js";
import { asyncHandler } from "./async-handler.js";
import { parseBody } from "./route-helpers.js";

const levelBody = z.object({ level: z.string() });
const quickAddBody = z.object({ tools: z.array(z.string()).optional() });

export function registerPermissionRoutes(app: Express, ctx: AppContext): void {
  const router = Router();

  router.get("/", asyncHandler(async (_req, res) => {
    const doc = await ctx.store.load("opencode");
    res.json({ tools: listPermissions(doc), skills: listSkillPermissions(doc) });
  }));

  router.post("/quick-add", asyncHandler(async (req, res) => {
    const { tools } = parseBody(quickAddBody, req.body);
    res.json({ added: await ctx.store.edit("opencode", (doc) => quickAddPermissions(doc, tools)) });
  }));

  // skill patterns such as "internal-*" arrive URL-encoded
  router.put("/skills/:pattern", asyncHandler(async (req, res) => {
    const { level } = parseBody(levelBody, req.body);
    await ctx.store.edit("opencode", (doc) => setSkillPermission(doc, req.params.pattern, level));
    res.json({ pattern: req.params.pattern, level });
  }));

  router.delete("/skills/:pattern", asyncHandler(async (req, res) => {
    await ctx.store.edit("opencode", (doc) => deleteSkillPermission(doc, req.params.pattern));
    res.json({ removed: req.params.pattern });
  }));

  router.put("/:tool", asyncHandler(async (req, res) => {
    const { level } = parseBody(levelBody, req.body);
    await ctx.store.edit("opencode", (doc) => setPermission(doc, req.params.tool, level));
    res.json({ tool: req.params.tool, level });
  }));

  router.delete("/:tool", asyncHandler(async (req, res) => {
    await ctx.store.edit("opencode", (doc) => deletePermission(doc, req.params.tool));
    res.json({ removed: req.params.tool });
  }));

  app.use("/api/permissions", router);
}
