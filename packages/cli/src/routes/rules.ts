import { Router } from "express";
import { z } from "zod";
import type { Express } from "express";
import type { AppContext } from "../core/context.js";
import {
  addInstruction,
  deleteAgentsMd,
  getCompaction,
  listInstructions,
  readAgentsMd,
  removeInstruction,
  setCompaction,
  writeAgentsMd,
} from "../core/rules-manager.js";
import { asyncHandler } from "./async-handler.js";
import { parseBody, parseLocation } from "./route-helpers.js";

const instructionBody = z.object({ instruction: z.string() });
const contentBody = z.object({ content: z.string() });
const compactionBody = z.object({ auto: z.boolean().optional(), prune: z.boolean().optional() });

export function registerRulesRoutes(app: Express, ctx: AppContext): void {
  const rules = Router();

  rules.get("/instructions", asyncHandler(async (_req, res) => {
    res.json(listInstructions(await ctx.store.load("opencode")));
  }));

  rules.post("/instructions", asyncHandler(async (req, res) => {
    const { instruction } = parseBody(instructionBody, req.body);
    const added = await ctx.store.edit("opencode", (doc) => addInstruction(doc, instruction));
    res.status(added ? 201 : 200).json({ instruction, added });
  }));

  rules.delete("/instructions", asyncHandler(async (req, res) => {
    const { instruction } = parseBody(instructionBody, req.body);
    await ctx.store.edit("opencode", (doc) => removeInstruction(doc, instruction));
    res.json({ removed: instruction });
  }));

  rules.get("/agents-md/:location", asyncHandler(async (req, res) => {
    res.json(await readAgentsMd(ctx.paths, parseLocation(req.params.location)));
  }));

  rules.put("/agents-md/:location", asyncHandler(async (req, res) => {
    const { content } = parseBody(contentBody, req.body);
    res.json({ path: await writeAgentsMd(ctx.paths, parseLocation(req.params.location), content) });
  }));

  rules.delete("/agents-md/:location", asyncHandler(async (req, res) => {
    const location = parseLocation(req.params.location);
    await deleteAgentsMd(ctx.paths, location);
    res.json({ removed: location });
  }));

  const compaction = Router();

  compaction.get("/", asyncHandler(async (_req, res) => {
    res.json(getCompaction(await ctx.store.load("opencode")));
  }));

  compaction.put("/", asyncHandler(async (req, res) => {
    const partial = parseBody(compactionBody, req.body);
    const doc = await ctx.store.edit("opencode", (d) => {
      setCompaction(d, partial);
      return d;
    });
    res.json(getCompaction(doc));
  }));

  app.use("/api/rules", rules);
  app.use("/api/compaction", compaction);
}
