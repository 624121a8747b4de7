/**
 * ohmy command - agents and task categories in oh-my-opencode.json
 *
 * Usage:
 *   ocfg ohmy agents
 *   ocfg ohmy agent-set <name> --model provider/model [--description "..."]
 *   ocfg ohmy agent-preset <name> [--model provider/model]
 *   ocfg ohmy categories
 *   ocfg ohmy category-set <name> --model provider/model [--temperature 0.5]
 */

import { Command } from "commander";
import {
  addPresetCategory,
  addPresetOhMyAgent,
  deleteCategory,
  deleteOhMyAgent,
  listCategories,
  listOhMyAgents,
  setCategory,
  setOhMyAgent,
  type CategorySummary,
  type OhMyAgentSummary,
} from "../core/oh-my-manager.js";
import { parseNumber, printList, runAction, warnUnknownModel } from "./command-runner.js";

export function ohMyAgentRow(a: OhMyAgentSummary): string[] {
  return [a.valid ? a.name : `${a.name} (malformed)`, a.model, a.description];
}

export function categoryRow(c: CategorySummary): string[] {
  return [
    c.valid ? c.name : `${c.name} (malformed)`,
    c.model,
    c.temperature !== undefined ? c.temperature.toFixed(1) : "",
    c.description,
  ];
}

// --- Agents ---

const agentsCommand = new Command("agents")
  .description("List oh-my-opencode agents")
  .action(async (_opts: object, command: Command) => {
    await runAction(command, "listing oh-my agents", async (run) => {
      const doc = await run.ctx.store.load("oh-my-opencode");
      printList(run, listOhMyAgents(doc), "No oh-my agents configured.", ["NAME", "MODEL", "DESCRIPTION"], ohMyAgentRow);
    });
  });

const agentSetCommand = new Command("agent-set")
  .description("Create or replace an oh-my agent")
  .argument("<name>", "Agent name")
  .option("--model <ref>", "provider/model")
  .option("--description <text>", "Description")
  .action(async (name: string, opts: { model?: string; description?: string }, command: Command) => {
    await runAction(command, "saving oh-my agent", async (run) => {
      await run.ctx.store.edit("oh-my-opencode", doc => setOhMyAgent(doc, name, opts));
      run.log.info({ scope: "ohmy", op: "agent-set", item: name, msg: `Saved oh-my agent ${name}` });
      console.log(`Oh-my agent "${name}" saved.`);
      await warnUnknownModel(run, "ohmy", opts.model);
    });
  });

const agentPresetCommand = new Command("agent-preset")
  .description("Add a preset oh-my agent")
  .argument("<name>", "Preset agent name")
  .option("--model <ref>", "provider/model")
  .action(async (name: string, opts: { model?: string }, command: Command) => {
    await runAction(command, "adding preset oh-my agent", async ({ ctx, log }) => {
      await ctx.store.edit("oh-my-opencode", doc => addPresetOhMyAgent(doc, name, opts.model));
      log.info({ scope: "ohmy", op: "agent-preset", item: name, msg: `Added preset oh-my agent ${name}` });
      console.log(`Oh-my agent "${name}" added.`);
    });
  });

const agentRemoveCommand = new Command("agent-remove")
  .description("Remove an oh-my agent")
  .argument("<name>", "Agent name")
  .action(async (name: string, _opts: object, command: Command) => {
    await runAction(command, "removing oh-my agent", async ({ ctx, log }) => {
      await ctx.store.edit("oh-my-opencode", doc => deleteOhMyAgent(doc, name));
      log.info({ scope: "ohmy", op: "agent-remove", item: name, msg: `Removed oh-my agent ${name}` });
      console.log(`Oh-my agent "${name}" removed.`);
    });
  });

// --- Categories ---

const categoriesCommand = new Command("categories")
  .description("List task categories")
  .action(async (_opts: object, command: Command) => {
    await runAction(command, "listing categories", async (run) => {
      const doc = await run.ctx.store.load("oh-my-opencode");
      printList(run, listCategories(doc), "No categories configured.", ["NAME", "MODEL", "TEMP", "DESCRIPTION"], categoryRow);
    });
  });

const categorySetCommand = new Command("category-set")
  .description("Create or update a task category")
  .argument("<name>", "Category name")
  .option("--model <ref>", "provider/model")
  .option("--temperature <value>", "Temperature between 0 and 2", parseNumber)
  .option("--description <text>", "Description")
  .action(
    async (name: string, opts: { model?: string; temperature?: number; description?: string }, command: Command) => {
      await runAction(command, "saving category", async (run) => {
        await run.ctx.store.edit("oh-my-opencode", doc => setCategory(doc, name, opts));
        run.log.info({ scope: "ohmy", op: "category-set", item: name, msg: `Saved category ${name}` });
        console.log(`Category "${name}" saved.`);
        await warnUnknownModel(run, "ohmy", opts.model);
      });
    },
  );

const categoryPresetCommand = new Command("category-preset")
  .description("Add a preset task category")
  .argument("<name>", "Preset category name")
  .option("--model <ref>", "provider/model")
  .action(async (name: string, opts: { model?: string }, command: Command) => {
    await runAction(command, "adding preset category", async ({ ctx, log }) => {
      await ctx.store.edit("oh-my-opencode", doc => addPresetCategory(doc, name, opts.model));
      log.info({ scope: "ohmy", op: "category-preset", item: name, msg: `Added preset category ${name}` });
      console.log(`Category "${name}" added.`);
    });
  });

const categoryRemoveCommand = new Command("category-remove")
  .description("Remove a task category")
  .argument("<name>", "Category name")
  .action(async (name: string, _opts: object, command: Command) => {
    await runAction(command, "removing category", async ({ ctx, log }) => {
      await ctx.store.edit("oh-my-opencode", doc => deleteCategory(doc, name));
      log.info({ scope: "ohmy", op: "category-remove", item: name, msg: `Removed category ${name}` });
      console.log(`Category "${name}" removed.`);
    });
  });

export const ohMyCommand = new Command("ohmy")
  .description("Manage oh-my-opencode agents and categories")
  .addCommand(agentsCommand)
  .addCommand(agentSetCommand)
  .addCommand(agentPresetCommand)
  .addCommand(agentRemoveCommand)
  .addCommand(categoriesCommand)
  .addCommand(categorySetCommand)
  .addCommand(categoryPresetCommand)
  .addCommand(categoryRemoveCommand);
