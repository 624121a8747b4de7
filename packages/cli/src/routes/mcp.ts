import { Router } from "express";
import { z } from "zod";
import type { Express } from "express";
import type { AppContext } from "../core/context.js";
import { addMcp, deleteMcp, getMcp, listMcps, setMcpEnabled, updateMcp } from "../core/mcp-manager.js";
import { asyncHandler } from "./async-handler.js";
import { parseBody } from "./route-helpers.js";

const mcpFields = {
  command: z.array(z.string()).optional(),
  url: z.string().optional(),
  environment: z.record(z.string()).optional(),
  headers: z.record(z.string()).optional(),
  enabled: z.boolean().optional(),
  timeout: z.number().int().optional(),
};

const createMcpBody = z.object({ name: z.string(), ...mcpFields });
const updateMcpBody = z.object(mcpFields);
const toggleBody = z.object({ enabled: z.boolean() });

export function registerMcpRoutes(app: Express, ctx: AppContext): void {
  const router = Router();

  router.get("/", asyncHandler(async (_req, res) => {
    res.json(listMcps(await ctx.store.load("opencode")));
  }));

  router.get("/:name", asyncHandler(async (req, res) => {
    res.json(getMcp(await ctx.store.load("opencode"), req.params.name));
  }));

  router.post("/", asyncHandler(async (req, res) => {
    const { name, ...input } = parseBody(createMcpBody, req.body);
    res.status(201).json(await ctx.store.edit("opencode", (doc) => addMcp(doc, name, input)));
  }));

  router.put("/:name", asyncHandler(async (req, res) => {
    const input = parseBody(updateMcpBody, req.body);
    res.json(await ctx.store.edit("opencode", (doc) => updateMcp(doc, req.params.name, input)));
  }));

  // POST /api/mcp/:name/toggle { enabled }
  router.post("/:name/toggle", asyncHandler(async (req, res) => {
    const { enabled } = parseBody(toggleBody, req.body);
    await ctx.store.edit("opencode", (doc) => setMcpEnabled(doc, req.params.name, enabled));
    res.json({ name: req.params.name, enabled });
  }));

  router.delete("/:name", asyncHandler(async (req, res) => {
    await ctx.store.edit("opencode", (doc) => deleteMcp(doc, req.params.name));
    res.json({ removed: req.params.name });
  }));

  app.use("/api/mcp", router);
}
