import { Router } from "express";
import { z } from "zod";
import type { Express } from "express";
import { PRESET_SDKS } from "@ocfg/core";
import type { AppContext } from "../core/context.js";
import { addProvider, deleteProvider, getProvider, listProviders, updateProvider } from "../core/provider-manager.js";
import { asyncHandler } from "./async-handler.js";
import { parseBody } from "./route-helpers.js";

const providerFields = {
  npm: z.string().optional(),
  displayName: z.string().optional(),
  baseURL: z.string().optional(),
  apiKey: z.string().optional(),
  timeout: z.number().int().optional(),
};

const createProviderBody = z.object({ name: z.string(), ...providerFields });
const updateProviderBody = z.object({ rename: z.string().optional(), ...providerFields });

export function registerProviderRoutes(app: Express, ctx: AppContext): void {
  const router = Router();

  router.get("/", asyncHandler(async (_req, res) => {
    res.json(listProviders(await ctx.store.load("opencode")));
  }));

  router.get("/sdks", (_req, res) => {
    res.json(PRESET_SDKS);
  });

  router.get("/:name", asyncHandler(async (req, res) => {
    res.json(getProvider(await ctx.store.load("opencode"), req.params.name));
  }));

  router.post("/", asyncHandler(async (req, res) => {
    const { name, ...input } = parseBody(createProviderBody, req.body);
    const entry = await ctx.store.edit("opencode", (doc) => addProvider(doc, name, input));
    res.status(201).json(entry);
  }));

  router.put("/:name", asyncHandler(async (req, res) => {
    const input = parseBody(updateProviderBody, req.body);
    res.json(await ctx.store.edit("opencode", (doc) => updateProvider(doc, req.params.name, input)));
  }));

  router.delete("/:name", asyncHandler(async (req, res) => {
    await ctx.store.edit("opencode", (doc) => deleteProvider(doc, req.params.name));
    res.json({ removed: req.params.name });
  }));

  app.use("/api/providers", router);
}
