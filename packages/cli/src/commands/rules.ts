/**
 * rules command - instruction files and AGENTS.md
 *
 * Usage:
 *   ocfg rules list
 *   ocfg rules add <path-or-glob>
 *   ocfg rules remove <path-or-glob>
 *   ocfg rules show [--project]
 *   ocfg rules init [--project]
 *   ocfg rules write <file> [--project]
 *   ocfg rules delete [--project]
 */

import { Command } from "commander";
import * as fs from "node:fs/promises";
import { ConfigError, type ConfigLocation } from "@ocfg/core";
import {
  AGENTS_MD_TEMPLATE,
  addInstruction,
  deleteAgentsMd,
  listInstructions,
  readAgentsMd,
  removeInstruction,
  writeAgentsMd,
} from "../core/rules-manager.js";
import { printJson, runAction } from "./command-runner.js";

interface LocationOptions {
  project?: boolean;
}

function locationOf(opts: LocationOptions): ConfigLocation {
  return opts.project ? "project" : "global";
}

const listCommand = new Command("list")
  .description("List instruction files referenced by opencode.json")
  .action(async (_opts: object, command: Command) => {
    await runAction(command, "listing instructions", async (run) => {
      const doc = await run.ctx.store.load("opencode");
      const instructions = listInstructions(doc);
      if (run.json) printJson(instructions);
      else if (instructions.length === 0) console.log("No instructions configured.");
      else for (const entry of instructions) console.log(`  - ${entry}`);
    });
  });

const addCommand = new Command("add")
  .description("Reference an instruction file or glob")
  .argument("<path>", "File path or glob")
  .action(async (entry: string, _opts: object, command: Command) => {
    await runAction(command, "adding instruction", async ({ ctx, log }) => {
      const added = await ctx.store.edit("opencode", doc => addInstruction(doc, entry));
      log.info({ scope: "rules", op: "add", item: entry, msg: added ? `Added ${entry}` : `${entry} already listed` });
      console.log(added ? `Instruction "${entry}" added.` : `Instruction "${entry}" is already listed.`);
    });
  });

const removeCommand = new Command("remove")
  .description("Remove an instruction entry")
  .argument("<path>", "File path or glob")
  .action(async (entry: string, _opts: object, command: Command) => {
    await runAction(command, "removing instruction", async ({ ctx, log }) => {
      await ctx.store.edit("opencode", doc => removeInstruction(doc, entry));
      log.info({ scope: "rules", op: "remove", item: entry, msg: `Removed ${entry}` });
      console.log(`Instruction "${entry}" removed.`);
    });
  });

const showCommand = new Command("show")
  .description("Print AGENTS.md")
  .option("--project", "The project AGENTS.md instead of the global one")
  .action(async (opts: LocationOptions, command: Command) => {
    await runAction(command, "reading AGENTS.md", async (run) => {
      const file = await readAgentsMd(run.ctx.paths, locationOf(opts));
      if (run.json) printJson(file);
      else if (!file.exists) console.log(`No AGENTS.md at ${file.path}. Run 'ocfg rules init' to create one.`);
      else process.stdout.write(file.content);
    });
  });

const initCommand = new Command("init")
  .description("Create AGENTS.md from the template")
  .option("--project", "Create the project AGENTS.md")
  .option("--force", "Overwrite an existing file")
  .action(async (opts: LocationOptions & { force?: boolean }, command: Command) => {
    await runAction(command, "creating AGENTS.md", async ({ ctx, log }) => {
      const location = locationOf(opts);
      const existing = await readAgentsMd(ctx.paths, location);
      if (existing.exists && !opts.force) {
        throw new ConfigError("duplicate", `${existing.path} already exists (use --force to overwrite)`);
      }
      const filePath = await writeAgentsMd(ctx.paths, location, AGENTS_MD_TEMPLATE);
      log.info({ scope: "rules", op: "init", path: filePath, msg: "Created AGENTS.md" });
      console.log(`Created ${filePath}`);
    });
  });

const writeCommand = new Command("write")
  .description("Replace AGENTS.md with the contents of a file")
  .argument("<file>", "Source file")
  .option("--project", "Write the project AGENTS.md")
  .action(async (file: string, opts: LocationOptions, command: Command) => {
    await runAction(command, "writing AGENTS.md", async ({ ctx, log }) => {
      const content = await fs.readFile(file, "utf-8");
      const filePath = await writeAgentsMd(ctx.paths, locationOf(opts), content);
      log.info({ scope: "rules", op: "write", path: filePath, msg: "Wrote AGENTS.md" });
      console.log(`Wrote ${filePath}`);
    });
  });

const deleteCommand = new Command("delete")
  .description("Delete AGENTS.md")
  .option("--project", "Delete the project AGENTS.md")
  .action(async (opts: LocationOptions, command: Command) => {
    await runAction(command, "deleting AGENTS.md", async ({ ctx, log }) => {
      await deleteAgentsMd(ctx.paths, locationOf(opts));
      log.info({ scope: "rules", op: "delete", msg: "Deleted AGENTS.md" });
      console.log("AGENTS.md deleted.");
    });
  });

export const rulesCommand = new Command("rules")
  .description("Manage instructions and AGENTS.md")
  .addCommand(listCommand)
  .addCommand(addCommand)
  .addCommand(removeCommand)
  .addCommand(showCommand)
  .addCommand(initCommand)
  .addCommand(writeCommand)
  .addCommand(deleteCommand);
