import { Router } from "express";
import { z } from "zod";
import type { Express } from "express";
import { getNativeProvider, type EnvMap } from "@ocfg/core";
import type { AppContext } from "../core/context.js";
import { detect, importFromEnv } from "../core/env-detector.js";
import { nativeProviderStatuses } from "../core/native-status.js";
import { getOptions, removeProvider, setOptions } from "../core/provider-options-manager.js";
import { asyncHandler } from "./async-handler.js";
import { parseBody } from "./route-helpers.js";

const keyBody = z.object({ key: z.string() });
const optionsBody = z.object({ values: z.record(z.unknown()) });
const envImportBody = z.object({ ids: z.array(z.string()).optional() });

export function registerNativeRoutes(app: Express, ctx: AppContext, env: EnvMap): void {
  const router = Router();

  router.get("/", asyncHandler(async (_req, res) => {
    const doc = await ctx.store.load("opencode");
    res.json(nativeProviderStatuses(doc, await ctx.auth.read(), env));
  }));

  // --- auth.json (keys are only ever returned masked) ---

  router.get("/auth", asyncHandler(async (_req, res) => {
    const { error } = await ctx.auth.inspect();
    res.json({ entries: await ctx.auth.list(), error });
  }));

  router.put("/auth/:id", asyncHandler(async (req, res) => {
    const { key } = parseBody(keyBody, req.body);
    await ctx.auth.setApiKey(req.params.id, key);
    res.json({ providerId: req.params.id });
  }));

  router.delete("/auth/:id", asyncHandler(async (req, res) => {
    await ctx.auth.delete(req.params.id);
    res.json({ removed: req.params.id });
  }));

  // --- Environment ---

  router.get("/env", (_req, res) => {
    res.json(detect(env).filter((d) => d.vars.length > 0));
  });

  router.post("/env/import", asyncHandler(async (req, res) => {
    const { ids } = parseBody(envImportBody, req.body);
    res.json(await importFromEnv(ctx.auth, env, ids));
  }));

  // --- Per provider ---

  router.get("/:id", asyncHandler(async (req, res) => {
    const template = getNativeProvider(req.params.id);
    const options = getOptions(await ctx.store.load("opencode"), template.id);
    res.json({ template, options });
  }));

  router.put("/:id/options", asyncHandler(async (req, res) => {
    const { values } = parseBody(optionsBody, req.body);
    res.json(await ctx.store.edit("opencode", (doc) => setOptions(doc, req.params.id, values)));
  }));

  router.delete("/:id", asyncHandler(async (req, res) => {
    await ctx.store.edit("opencode", (doc) => removeProvider(doc, req.params.id));
    res.json({ removed: req.params.id });
  }));

  app.use("/api/native", router);
}
