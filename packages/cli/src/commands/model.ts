/**
 * model command - models under a provider
 *
 * Usage:
 *   ocfg model list <provider>
 *   ocfg model add <provider> <id> [--preset] [--context <n>] [--output <n>]
 *   ocfg model update <provider> <id> ...
 *   ocfg model remove <provider> <id>
 *   ocfg model presets [--provider <id>]
 */

import { Command } from "commander";
import { allPresetModels, presetModelsForSdk, type PresetModelRef } from "@ocfg/core";
import {
  addModel,
  addPresetModel,
  deleteModel,
  listModels,
  updateModel,
  type ModelInput,
  type ModelSummary,
} from "../core/model-manager.js";
import { getProvider } from "../core/provider-manager.js";
import { parseInteger, printList, runAction } from "./command-runner.js";

interface ModelOptions {
  name?: string;
  attachment?: boolean;
  context?: number;
  output?: number;
}

function withModelOptions(command: Command): Command {
  return command
    .option("--name <name>", "Display name")
    .option("--attachment", "Model accepts file attachments")
    .option("--no-attachment", "Model does not accept attachments")
    .option("--context <tokens>", "Context window limit", parseInteger)
    .option("--output <tokens>", "Output token limit", parseInteger);
}

/** Only the flags that were given, so preset values are not blanked out */
function toInput(opts: ModelOptions): ModelInput {
  const input: ModelInput = {};
  if (opts.name !== undefined) input.name = opts.name;
  if (opts.attachment !== undefined) input.attachment = opts.attachment;
  if (opts.context !== undefined) input.context = opts.context;
  if (opts.output !== undefined) input.output = opts.output;
  return input;
}

export function modelRow(m: ModelSummary): string[] {
  return [
    m.valid ? m.id : `${m.id} (malformed)`,
    m.name,
    m.context !== undefined ? String(m.context) : "",
    m.output !== undefined ? String(m.output) : "",
    m.variants.join(", "),
  ];
}

export function presetRow(p: PresetModelRef): string[] {
  return [p.id, p.series, p.model.name, String(p.model.limit.context), Object.keys(p.model.variants).join(", ")];
}

const listCommand = new Command("list")
  .description("List the models of a provider")
  .argument("<provider>", "Provider id")
  .action(async (provider: string, _opts: object, command: Command) => {
    await runAction(command, "listing models", async (run) => {
      const doc = await run.ctx.store.load("opencode");
      printList(
        run,
        listModels(doc, provider),
        `Provider "${provider}" has no models.`,
        ["ID", "NAME", "CONTEXT", "OUTPUT", "VARIANTS"],
        modelRow,
      );
    });
  });

const addCommand = withModelOptions(new Command("add"))
  .description("Add a model to a provider")
  .argument("<provider>", "Provider id")
  .argument("<id>", "Model id")
  .option("--preset", "Fill in limits, modalities and variants from the preset table")
  .action(async (provider: string, id: string, opts: ModelOptions & { preset?: boolean }, command: Command) => {
    await runAction(command, "adding model", async ({ ctx, log }) => {
      await ctx.store.edit("opencode", doc => {
        if (opts.preset) return addPresetModel(doc, provider, id, toInput(opts));
        return addModel(doc, provider, id, toInput(opts));
      });
      log.info({ scope: "model", op: "add", item: `${provider}/${id}`, msg: `Added model ${provider}/${id}` });
      console.log(`Model "${provider}/${id}" added.`);
    });
  });

const updateCommand = withModelOptions(new Command("update"))
  .description("Update a model")
  .argument("<provider>", "Provider id")
  .argument("<id>", "Model id")
  .action(async (provider: string, id: string, opts: ModelOptions, command: Command) => {
    await runAction(command, "updating model", async ({ ctx, log }) => {
      await ctx.store.edit("opencode", doc => updateModel(doc, provider, id, toInput(opts)));
      log.info({ scope: "model", op: "update", item: `${provider}/${id}`, msg: `Updated model ${provider}/${id}` });
      console.log(`Model "${provider}/${id}" updated.`);
    });
  });

const removeCommand = new Command("remove")
  .description("Remove a model")
  .argument("<provider>", "Provider id")
  .argument("<id>", "Model id")
  .action(async (provider: string, id: string, _opts: object, command: Command) => {
    await runAction(command, "removing model", async ({ ctx, log }) => {
      await ctx.store.edit("opencode", doc => deleteModel(doc, provider, id));
      log.info({ scope: "model", op: "remove", item: `${provider}/${id}`, msg: `Removed model ${provider}/${id}` });
      console.log(`Model "${provider}/${id}" removed.`);
    });
  });

const presetsCommand = new Command("presets")
  .description("List preset models, optionally those suited to a provider")
  .option("--provider <id>", "Only presets compatible with this provider's SDK")
  .action(async (opts: { provider?: string }, command: Command) => {
    await runAction(command, "listing preset models", async (run) => {
      let presets: PresetModelRef[] = allPresetModels();
      if (opts.provider) {
        const doc = await run.ctx.store.load("opencode");
        presets = presetModelsForSdk(getProvider(doc, opts.provider).npm ?? "");
      }
      printList(run, presets, "No preset models match.", ["ID", "SERIES", "NAME", "CONTEXT", "VARIANTS"], presetRow);
    });
  });

export const modelCommand = new Command("model")
  .description("Manage provider models")
  .addCommand(listCommand)
  .addCommand(addCommand)
  .addCommand(updateCommand)
  .addCommand(removeCommand)
  .addCommand(presetsCommand);
