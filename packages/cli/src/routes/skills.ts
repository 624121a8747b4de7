import { Router } from "express";
import { z } from "zod";
import type { Express } from "express";
import type { AppContext } from "../core/context.js";
import { createSkill, discoverSkills, readSkill, saveSkill } from "../core/skill-manager.js";
import { installSkill, uninstallSkill } from "../core/skill-installer.js";
import { asyncHandler } from "./async-handler.js";
import { parseBody, parseLocation } from "./route-helpers.js";

const locationSchema = z.enum(["global", "project"]).default("global");

const createSkillBody = z.object({
  name: z.string(),
  description: z.string(),
  body: z.string().optional(),
  license: z.string().optional(),
  compatibility: z.string().optional(),
  location: locationSchema,
});

const installBody = z.object({
  source: z.string(),
  location: locationSchema,
  force: z.boolean().optional(),
});

const contentBody = z.object({ content: z.string() });

export function registerSkillRoutes(app: Express, ctx: AppContext): void {
  const router = Router();

  router.get("/", asyncHandler(async (_req, res) => {
    res.json(await discoverSkills(ctx.paths));
  }));

  router.post("/", asyncHandler(async (req, res) => {
    const input = parseBody(createSkillBody, req.body);
    res.status(201).json({ path: await createSkill(ctx.paths, input) });
  }));

  router.post("/install", asyncHandler(async (req, res) => {
    const { source, ...options } = parseBody(installBody, req.body);
    res.status(201).json(await installSkill(ctx.paths, source, options));
  }));

  router.get("/:location/:name", asyncHandler(async (req, res) => {
    res.json(await readSkill(ctx.paths, req.params.name, parseLocation(req.params.location)));
  }));

  router.put("/:location/:name", asyncHandler(async (req, res) => {
    const { content } = parseBody(contentBody, req.body);
    const location = parseLocation(req.params.location);
    res.json({ path: await saveSkill(ctx.paths, req.params.name, location, content) });
  }));

  router.delete("/:location/:name", asyncHandler(async (req, res) => {
    const location = parseLocation(req.params.location);
    res.json({ removed: await uninstallSkill(ctx.paths, req.params.name, location) });
  }));

  app.use("/api/skills", router);
}
