/**
 * import command - bring providers and permissions over from other AI tools
 *
 * Usage:
 *   ocfg import                 # list detected sources
 *   ocfg import <source> [--overwrite] [--dry-run]
 */

import { Command } from "commander";
import { ConfigError, contractPath } from "@ocfg/core";
import { applyImport, convertToOpenCode, parseImportType, readSource, scanSources } from "../core/import-service.js";
import { printJson, printList, runAction } from "./command-runner.js";

export const importCommand = new Command("import")
  .description("Import providers and permissions from Claude Code, Codex, Gemini or cc-switch")
  .argument("[source]", "claude, claude_providers, codex, gemini or ccswitch")
  .option("--overwrite", "Replace providers that already exist")
  .option("--dry-run", "Show what would be imported without writing")
  .action(async (source: string | undefined, opts: { overwrite?: boolean; dryRun?: boolean }, command: Command) => {
    await runAction(command, "importing config", async (run) => {
      const { ctx, log } = run;
      if (!source) {
        const sources = await scanSources(ctx.paths);
        printList(run, sources, "No importable configs found.", ["SOURCE", "NAME", "PATH"], s => [
          s.type,
          s.label,
          contractPath(s.path),
        ]);
        return;
      }

      const type = parseImportType(source);
      const found = await readSource(ctx.paths, type);
      if (!found) throw new ConfigError("not_found", `No readable ${type} config found`);
      const converted = convertToOpenCode(type, found.data);

      if (opts.dryRun) {
        printJson(converted);
        return;
      }

      const result = await ctx.store.edit("opencode", doc => applyImport(doc, converted, { overwrite: opts.overwrite }));
      log.info({ scope: "import", op: type, path: found.path, msg: `Imported from ${found.label}`, data: { ...result } });
      if (run.json) {
        printJson(result);
        return;
      }
      if (result.added.length > 0) console.log(`Added providers: ${result.added.join(", ")}`);
      if (result.overwritten.length > 0) console.log(`Replaced providers: ${result.overwritten.join(", ")}`);
      if (result.conflicts.length > 0) {
        console.log(`Skipped existing providers: ${result.conflicts.join(", ")} (use --overwrite to replace)`);
      }
      if (result.permissions.length > 0) console.log(`Permissions: ${result.permissions.join(", ")}`);
      if (result.added.length + result.overwritten.length + result.permissions.length === 0) {
        console.log("Nothing imported.");
      }
    });
  });
