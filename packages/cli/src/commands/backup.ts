/**
 * backup command - timestamped copies of the config files
 *
 * Usage:
 *   ocfg backup list [config]
 *   ocfg backup create <opencode|oh-my-opencode|auth> [--tag <tag>]
 *   ocfg backup restore <file>
 *   ocfg backup delete <file>
 */

import { Command } from "commander";
import { ConfigError, type BackupInfo } from "@ocfg/core";
import { resolveBackupTarget, type AppContext } from "../core/context.js";
import { printList, runAction } from "./command-runner.js";

const BACKUP_TARGETS = ["opencode", "oh-my-opencode", "auth"] as const;

export function backupTargetPath(ctx: Pick<AppContext, "paths" | "store">, target: string): string {
  switch (target) {
    case "auth":
      return ctx.paths.authFile;
    case "opencode":
    case "oh-my-opencode":
      return ctx.store.pathOf(target);
    default:
      throw new ConfigError("invalid", `Unknown config "${target}": use ${BACKUP_TARGETS.join(", ")}`);
  }
}

export function backupRow(b: BackupInfo): string[] {
  return [b.file, b.name, b.timestamp, b.tag];
}

const listCommand = new Command("list")
  .description("List backups, newest first")
  .argument("[config]", "Only backups of this config (opencode, oh-my-opencode, auth)")
  .action(async (config: string | undefined, _opts: object, command: Command) => {
    await runAction(command, "listing backups", async (run) => {
      const backups = await run.ctx.backups.listBackups(config);
      printList(run, backups, `No backups in ${run.ctx.backups.backupDir}.`, ["FILE", "CONFIG", "TIME", "TAG"], backupRow);
    });
  });

const createCommand = new Command("create")
  .description("Back up a config file now")
  .argument("<config>", BACKUP_TARGETS.join(", "))
  .option("--tag <tag>", "Tag stored in the file name", "manual")
  .action(async (config: string, opts: { tag: string }, command: Command) => {
    await runAction(command, "creating backup", async ({ ctx, log }) => {
      const filePath = backupTargetPath(ctx, config);
      const info = await ctx.backups.createBackup(filePath, opts.tag);
      if (!info) throw new ConfigError("not_found", `${filePath} does not exist`);
      log.info({ scope: "backup", op: "create", item: info.file, path: filePath, msg: `Backed up ${config}` });
      console.log(`Backup created: ${info.path}`);
    });
  });

const restoreCommand = new Command("restore")
  .description("Restore a backup over its config file")
  .argument("<file>", "Backup file name")
  .action(async (file: string, _opts: object, command: Command) => {
    await runAction(command, "restoring backup", async ({ ctx, log }) => {
      const backup = await ctx.backups.findBackup(file);
      const target = resolveBackupTarget(ctx, backup);
      const safety = await ctx.backups.restoreBackup(backup.file, target);
      log.info({
        scope: "backup",
        op: "restore",
        item: backup.file,
        path: target,
        msg: `Restored ${backup.file}`,
        data: { safety: safety?.file },
      });
      console.log(`Restored ${target} from ${backup.file}.`);
      if (safety) console.log(`Previous contents saved as ${safety.file}.`);
    });
  });

const deleteCommand = new Command("delete")
  .description("Delete a backup")
  .argument("<file>", "Backup file name")
  .action(async (file: string, _opts: object, command: Command) => {
    await runAction(command, "deleting backup", async ({ ctx, log }) => {
      await ctx.backups.deleteBackup(file);
      log.info({ scope: "backup", op: "delete", item: file, msg: `Deleted ${file}` });
      console.log(`Backup "${file}" deleted.`);
    });
  });

export const backupCommand = new Command("backup")
  .description("Manage config backups")
  .addCommand(listCommand)
  .addCommand(createCommand)
  .addCommand(restoreCommand)
  .addCommand(deleteCommand);
