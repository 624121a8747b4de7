import { Router } from "express";
import { z } from "zod";
import type { Express } from "express";
import { agentModeSchema, agentPermissionSchema } from "@ocfg/core";
import type { AppContext } from "../core/context.js";
import {
  addAgent,
  addPresetAgent,
  deleteAgent,
  getAgent,
  listAgents,
  listPresetAgents,
  updateAgent,
} from "../core/agent-manager.js";
import { asyncHandler } from "./async-handler.js";
import { parseBody } from "./route-helpers.js";

const agentFields = {
  mode: agentModeSchema.optional(),
  model: z.string().optional(),
  temperature: z.number().optional(),
  maxSteps: z.number().int().optional(),
  hidden: z.boolean().optional(),
  disable: z.boolean().optional(),
  prompt: z.string().optional(),
  tools: z.record(z.boolean()).optional(),
  permission: agentPermissionSchema.optional(),
};

const createAgentBody = z.object({ name: z.string(), description: z.string(), ...agentFields });
const updateAgentBody = z.object({ description: z.string().optional(), ...agentFields });
const presetBody = z.object({ as: z.string().optional() });

export function registerAgentRoutes(app: Express, ctx: AppContext): void {
  const router = Router();

  router.get("/", asyncHandler(async (_req, res) => {
    res.json(listAgents(await ctx.store.load("opencode")));
  }));

  router.get("/presets", (_req, res) => {
    res.json(listPresetAgents());
  });

  router.post("/presets/:preset", asyncHandler(async (req, res) => {
    const { as } = parseBody(presetBody, req.body);
    res.status(201).json(await ctx.store.edit("opencode", (doc) => addPresetAgent(doc, req.params.preset, as)));
  }));

  router.get("/:name", asyncHandler(async (req, res) => {
    res.json(getAgent(await ctx.store.load("opencode"), req.params.name));
  }));

  router.post("/", asyncHandler(async (req, res) => {
    const { name, ...input } = parseBody(createAgentBody, req.body);
    res.status(201).json(await ctx.store.edit("opencode", (doc) => addAgent(doc, name, input)));
  }));

  router.put("/:name", asyncHandler(async (req, res) => {
    const input = parseBody(updateAgentBody, req.body);
    res.json(await ctx.store.edit("opencode", (doc) => updateAgent(doc, req.params.name, input)));
  }));

  router.delete("/:name", asyncHandler(async (req, res) => {
    await ctx.store.edit("opencode", (doc) => deleteAgent(doc, req.params.name));
    res.json({ removed: req.params.name });
  }));

  app.use("/api/agents", router);
}
