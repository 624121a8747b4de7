import { Router } from "express";
import { z } from "zod";
import type { Express } from "express";
import { PRESET_CATEGORIES, PRESET_OH_MY_AGENTS } from "@ocfg/core";
import type { AppContext } from "../core/context.js";
import {
  addPresetCategory,
  addPresetOhMyAgent,
  deleteCategory,
  deleteOhMyAgent,
  listCategories,
  listOhMyAgents,
  setCategory,
  setOhMyAgent,
} from "../core/oh-my-manager.js";
import { asyncHandler } from "./async-handler.js";
import { parseBody } from "./route-helpers.js";

const agentBody = z.object({ model: z.string().optional(), description: z.string().optional() });
const categoryBody = agentBody.extend({ temperature: z.number().optional() });
const presetBody = z.object({ model: z.string().optional() });

export function registerOhMyRoutes(app: Express, ctx: AppContext): void {
  const router = Router();

  router.get("/presets", (_req, res) => {
    res.json({ agents: PRESET_OH_MY_AGENTS, categories: PRESET_CATEGORIES });
  });

  // --- Agents ---

  router.get("/agents", asyncHandler(async (_req, res) => {
    res.json(listOhMyAgents(await ctx.store.load("oh-my-opencode")));
  }));

  router.put("/agents/:name", asyncHandler(async (req, res) => {
    const input = parseBody(agentBody, req.body);
    res.json(await ctx.store.edit("oh-my-opencode", (doc) => setOhMyAgent(doc, req.params.name, input)));
  }));

  router.post("/agents/presets/:preset", asyncHandler(async (req, res) => {
    const { model } = parseBody(presetBody, req.body);
    const record = await ctx.store.edit("oh-my-opencode", (doc) => addPresetOhMyAgent(doc, req.params.preset, model));
    res.status(201).json(record);
  }));

  router.delete("/agents/:name", asyncHandler(async (req, res) => {
    await ctx.store.edit("oh-my-opencode", (doc) => deleteOhMyAgent(doc, req.params.name));
    res.json({ removed: req.params.name });
  }));

  // --- Categories ---

  router.get("/categories", asyncHandler(async (_req, res) => {
    res.json(listCategories(await ctx.store.load("oh-my-opencode")));
  }));

  router.put("/categories/:name", asyncHandler(async (req, res) => {
    const input = parseBody(categoryBody, req.body);
    res.json(await ctx.store.edit("oh-my-opencode", (doc) => setCategory(doc, req.params.name, input)));
  }));

  router.post("/categories/presets/:preset", asyncHandler(async (req, res) => {
    const { model } = parseBody(presetBody, req.body);
    const record = await ctx.store.edit("oh-my-opencode", (doc) => addPresetCategory(doc, req.params.preset, model));
    res.status(201).json(record);
  }));

  router.delete("/categories/:name", asyncHandler(async (req, res) => {
    await ctx.store.edit("oh-my-opencode", (doc) => deleteCategory(doc, req.params.name));
    res.json({ removed: req.params.name });
  }));

  app.use("/api/ohmy", router);
}
