import { Router } from "express";
import { z } from "zod";
import type { Express } from "express";
import { allPresetModels, presetModelsForSdk } from "@ocfg/core";
import type { AppContext } from "../core/context.js";
import { addModel, addPresetModel, deleteModel, listModels, updateModel } from "../core/model-manager.js";
import { listModelRefs } from "../core/model-registry.js";
import { getProvider } from "../core/provider-manager.js";
import { asyncHandler } from "./async-handler.js";
import { parseBody, queryString } from "./route-helpers.js";

const modelFields = {
  name: z.string().optional(),
  attachment: z.boolean().optional(),
  context: z.number().int().optional(),
  output: z.number().int().optional(),
  modalities: z.object({ input: z.array(z.string()), output: z.array(z.string()) }).optional(),
  options: z.record(z.unknown()).optional(),
  variants: z.record(z.record(z.unknown())).optional(),
};

const createModelBody = z.object({ id: z.string(), preset: z.boolean().optional(), ...modelFields });
const updateModelBody = z.object(modelFields);

export function registerModelRoutes(app: Express, ctx: AppContext): void {
  const router = Router();

  // GET /api/models/presets?provider=<id>
  router.get("/presets", asyncHandler(async (req, res) => {
    const provider = queryString(req.query.provider);
    if (!provider) {
      res.json(allPresetModels());
      return;
    }
    const doc = await ctx.store.load("opencode");
    res.json(presetModelsForSdk(getProvider(doc, provider).npm ?? ""));
  }));

  // provider/model pairs for the agent and category model pickers
  router.get("/refs", asyncHandler(async (_req, res) => {
    res.json(listModelRefs(await ctx.store.load("opencode")));
  }));

  router.get("/:provider", asyncHandler(async (req, res) => {
    res.json(listModels(await ctx.store.load("opencode"), req.params.provider));
  }));

  router.post("/:provider", asyncHandler(async (req, res) => {
    const { id, preset, ...input } = parseBody(createModelBody, req.body);
    const { provider } = req.params;
    const record = await ctx.store.edit("opencode", (doc) =>
      preset ? addPresetModel(doc, provider, id, input) : addModel(doc, provider, id, input),
    );
    res.status(201).json(record);
  }));

  router.put("/:provider/:id", asyncHandler(async (req, res) => {
    const input = parseBody(updateModelBody, req.body);
    const { provider, id } = req.params;
    res.json(await ctx.store.edit("opencode", (doc) => updateModel(doc, provider, id, input)));
  }));

  router.delete("/:provider/:id", asyncHandler(async (req, res) => {
    const { provider, id } = req.params;
    await ctx.store.edit("opencode", (doc) => deleteModel(doc, provider, id));
    res.json({ removed: `${provider}/${id}` });
  }));

  app.use("/api/models", router);
}
