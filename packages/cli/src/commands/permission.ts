/**
 * permission command - tool and skill permissions in opencode.json
 *
 * Usage:
 *   ocfg permission list
 *   ocfg permission set <tool> <allow|ask|deny>
 *   ocfg permission quick-add
 *   ocfg permission skill-set <pattern> <allow|ask|deny>
 */

import { Command } from "commander";
import {
  COMMON_TOOLS,
  deletePermission,
  deleteSkillPermission,
  listPermissions,
  listSkillPermissions,
  quickAddPermissions,
  setPermission,
  setSkillPermission,
} from "../core/permission-manager.js";
import { formatTable, printJson, runAction } from "./command-runner.js";

const listCommand = new Command("list")
  .description("List tool and skill permissions")
  .action(async (_opts: object, command: Command) => {
    await runAction(command, "listing permissions", async (run) => {
      const doc = await run.ctx.store.load("opencode");
      const tools = listPermissions(doc);
      const skills = listSkillPermissions(doc);
      if (run.json) {
        printJson({ tools, skills });
        return;
      }
      if (tools.length === 0 && skills.length === 0) {
        console.log("No permissions configured.");
        return;
      }
      const rows = [
        ...tools.map(t => [t.tool, t.level ?? "(patterns)"]),
        ...skills.map(s => [`skill: ${s.pattern}`, s.level ?? "(invalid)"]),
      ];
      console.log(formatTable(["TOOL", "LEVEL"], rows));
    });
  });

const setCommand = new Command("set")
  .description("Set the permission level of a tool")
  .argument("<tool>", "Tool name")
  .argument("<level>", "allow, ask or deny")
  .action(async (tool: string, level: string, _opts: object, command: Command) => {
    await runAction(command, "setting permission", async ({ ctx, log }) => {
      await ctx.store.edit("opencode", doc => setPermission(doc, tool, level));
      log.info({ scope: "permission", op: "set", item: tool, msg: `Set ${tool} to ${level}` });
      console.log(`Permission "${tool}" set to ${level}.`);
    });
  });

const removeCommand = new Command("remove")
  .description("Remove a tool permission")
  .argument("<tool>", "Tool name")
  .action(async (tool: string, _opts: object, command: Command) => {
    await runAction(command, "removing permission", async ({ ctx, log }) => {
      await ctx.store.edit("opencode", doc => deletePermission(doc, tool));
      log.info({ scope: "permission", op: "remove", item: tool, msg: `Removed permission ${tool}` });
      console.log(`Permission "${tool}" removed.`);
    });
  });

const quickAddCommand = new Command("quick-add")
  .description(`Add the common tools (${COMMON_TOOLS.join(", ")}) that have no permission yet, as "allow"`)
  .action(async (_opts: object, command: Command) => {
    await runAction(command, "adding common permissions", async ({ ctx, log }) => {
      const added = await ctx.store.edit("opencode", doc => quickAddPermissions(doc));
      log.info({ scope: "permission", op: "quick-add", msg: `Added ${added.length} permissions`, data: { added } });
      console.log(added.length > 0 ? `Added: ${added.join(", ")}` : "All common tools already have a permission.");
    });
  });

const skillSetCommand = new Command("skill-set")
  .description("Set the permission for skills matching a pattern")
  .argument("<pattern>", 'Skill name or glob, "*" for all skills')
  .argument("<level>", "allow, ask or deny")
  .action(async (pattern: string, level: string, _opts: object, command: Command) => {
    await runAction(command, "setting skill permission", async ({ ctx, log }) => {
      await ctx.store.edit("opencode", doc => setSkillPermission(doc, pattern, level));
      log.info({ scope: "permission", op: "skill-set", item: pattern, msg: `Set skill ${pattern} to ${level}` });
      console.log(`Skill permission "${pattern}" set to ${level}.`);
    });
  });

const skillRemoveCommand = new Command("skill-remove")
  .description("Remove a skill permission pattern")
  .argument("<pattern>", "Skill name or glob")
  .action(async (pattern: string, _opts: object, command: Command) => {
    await runAction(command, "removing skill permission", async ({ ctx, log }) => {
      await ctx.store.edit("opencode", doc => deleteSkillPermission(doc, pattern));
      log.info({ scope: "permission", op: "skill-remove", item: pattern, msg: `Removed skill permission ${pattern}` });
      console.log(`Skill permission "${pattern}" removed.`);
    });
  });

export const permissionCommand = new Command("permission")
  .description("Manage tool and skill permissions")
  .addCommand(listCommand)
  .addCommand(setCommand)
  .addCommand(removeCommand)
  .addCommand(quickAddCommand)
  .addCommand(skillSetCommand)
  .addCommand(skillRemoveCommand);
