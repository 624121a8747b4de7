/**
 * skill command - SKILL.md folders
 *
 * Usage:
 *   ocfg skill list
 *   ocfg skill show <name> [--project]
 *   ocfg skill create <name> --description "..." [--project]
 *   ocfg skill install <path | owner/repo[/path][@ref] | github url> [--project] [--force]
 *   ocfg skill uninstall <name> [--project]
 */

import { Command } from "commander";
import type { ConfigLocation, SkillInfo } from "@ocfg/core";
import { contractPath } from "@ocfg/core";
import { installSkill, uninstallSkill } from "../core/skill-installer.js";
import { createSkill, discoverSkills, readSkill } from "../core/skill-manager.js";
import { printJson, printList, runAction } from "./command-runner.js";

interface LocationOptions {
  project?: boolean;
}

function locationOf(opts: LocationOptions): ConfigLocation {
  return opts.project ? "project" : "global";
}

export function skillRow(s: SkillInfo): string[] {
  return [s.name, s.source, s.description, contractPath(s.path)];
}

const listCommand = new Command("list")
  .description("List skills from OpenCode and Claude skill folders")
  .action(async (_opts: object, command: Command) => {
    await runAction(command, "listing skills", async (run) => {
      const skills = await discoverSkills(run.ctx.paths);
      printList(run, skills, "No skills found.", ["NAME", "SOURCE", "DESCRIPTION", "PATH"], skillRow);
    });
  });

const showCommand = new Command("show")
  .description("Print a skill's SKILL.md")
  .argument("<name>", "Skill name")
  .option("--project", "Read from the project skill folder")
  .action(async (name: string, opts: LocationOptions, command: Command) => {
    await runAction(command, "reading skill", async (run) => {
      const skill = await readSkill(run.ctx.paths, name, locationOf(opts));
      if (run.json) printJson(skill);
      else process.stdout.write(skill.content);
    });
  });

const createCommand = new Command("create")
  .description("Create a skill from the scaffold")
  .argument("<name>", "Skill name (lowercase letters, digits and hyphens)")
  .requiredOption("--description <text>", "What the skill does and when to use it")
  .option("--license <license>", "License field")
  .option("--compatibility <text>", "Compatibility field")
  .option("--project", "Create in the project instead of globally")
  .action(
    async (
      name: string,
      opts: LocationOptions & { description: string; license?: string; compatibility?: string },
      command: Command,
    ) => {
      await runAction(command, "creating skill", async ({ ctx, log }) => {
        const filePath = await createSkill(ctx.paths, {
          name,
          description: opts.description,
          license: opts.license,
          compatibility: opts.compatibility,
          location: locationOf(opts),
        });
        log.info({ scope: "skill", op: "create", item: name, path: filePath, msg: `Created skill ${name}` });
        console.log(`Skill "${name}" created: ${filePath}`);
      });
    },
  );

const installCommand = new Command("install")
  .description("Install a skill from a local folder or GitHub")
  .argument("<source>", "Folder with SKILL.md, owner/repo[/path][@ref], or a github.com URL")
  .option("--project", "Install into the project instead of globally")
  .option("--force", "Replace an installed skill with the same name")
  .action(async (source: string, opts: LocationOptions & { force?: boolean }, command: Command) => {
    await runAction(command, "installing skill", async ({ ctx, log }) => {
      const result = await installSkill(ctx.paths, source, { location: locationOf(opts), force: opts.force });
      log.info({
        scope: "skill",
        op: "install",
        item: result.name,
        source: result.source,
        path: result.path,
        msg: `Installed skill ${result.name} from ${source}`,
        data: { files: result.files.length, replaced: result.replaced },
      });
      console.log(`Skill "${result.name}" ${result.replaced ? "replaced" : "installed"}: ${result.path}`);
    });
  });

const uninstallCommand = new Command("uninstall")
  .description("Delete a skill folder")
  .argument("<name>", "Skill name")
  .option("--project", "Remove from the project skill folder")
  .action(async (name: string, opts: LocationOptions, command: Command) => {
    await runAction(command, "uninstalling skill", async ({ ctx, log }) => {
      const dir = await uninstallSkill(ctx.paths, name, locationOf(opts));
      log.info({ scope: "skill", op: "uninstall", item: name, path: dir, msg: `Removed skill ${name}` });
      console.log(`Skill "${name}" removed.`);
    });
  });

export const skillCommand = new Command("skill")
  .description("Manage skills")
  .addCommand(listCommand)
  .addCommand(showCommand)
  .addCommand(createCommand)
  .addCommand(installCommand)
  .addCommand(uninstallCommand);
