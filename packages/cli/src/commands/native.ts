/**
 * native command - built-in OpenCode providers: credentials, options, env
 *
 * Usage:
 *   ocfg native list
 *   ocfg native show <id>
 *   ocfg native auth list
 *   ocfg native auth set <id> [--key <key> | --from-env]
 *   ocfg native auth remove <id>
 *   ocfg native options <id> [--set KEY=VALUE ...]
 *   ocfg native remove <id>
 *   ocfg native env [--import [ids...]]
 */

import { Command } from "commander";
import { ConfigError, formatStatus, getNativeProvider } from "@ocfg/core";
import type { AuthSummary } from "../core/auth-manager.js";
import { detect, envApiKey, importFromEnv, type EnvDetection } from "../core/env-detector.js";
import { nativeProviderStatuses, type NativeProviderStatus } from "../core/native-status.js";
import { getOptions, removeProvider, setOptions } from "../core/provider-options-manager.js";
import { collectPairs, formatTable, printJson, printList, runAction } from "./command-runner.js";

export function nativeRow(s: NativeProviderStatus): string[] {
  return [s.id, s.name, formatStatus(s.status), s.maskedKey ?? "", s.configuredOptions.join(", ")];
}

export function detectionRow(d: EnvDetection): string[] {
  return [d.providerId, d.hasCredential ? "yes" : "no", d.vars.map(v => `${v.name}=${v.masked}`).join(" ")];
}

const listCommand = new Command("list")
  .description("List native providers and their credential status")
  .action(async (_opts: object, command: Command) => {
    await runAction(command, "listing native providers", async (run) => {
      const doc = await run.ctx.store.load("opencode");
      const auth = await run.ctx.auth.read();
      printList(
        run,
        nativeProviderStatuses(doc, auth),
        "No native providers known.",
        ["ID", "NAME", "STATUS", "KEY", "OPTIONS"],
        nativeRow,
      );
    });
  });

const showCommand = new Command("show")
  .description("Show a native provider's fields and current options")
  .argument("<id>", "Provider id")
  .action(async (id: string, _opts: object, command: Command) => {
    await runAction(command, "reading native provider", async (run) => {
      const template = getNativeProvider(id);
      const doc = await run.ctx.store.load("opencode");
      const options = getOptions(doc, id);
      if (run.json) {
        printJson({ template, options });
        return;
      }
      console.log(`${template.name} (${template.id})`);
      console.log(`  SDK: ${template.npm}`);
      if (template.docsUrl) console.log(`  Docs: ${template.docsUrl}`);
      if (template.authFields.length > 0) {
        console.log("\nAuth:");
        for (const field of template.authFields) {
          console.log(`  ${field.label}: $${field.env}${field.required ? " (required)" : ""}`);
        }
      }
      if (template.optionFields.length > 0) {
        console.log("\nOptions:");
        const rows = template.optionFields.map(f => [f.key, f.type, formatValue(options[f.key]), f.description ?? ""]);
        console.log(formatTable(["KEY", "TYPE", "VALUE", "DESCRIPTION"], rows));
      }
    });
  });

function formatValue(value: unknown): string {
  if (value === undefined) return "";
  return typeof value === "string" ? value : JSON.stringify(value);
}

// --- auth.json ---

const authListCommand = new Command("list")
  .description("List stored credentials (masked)")
  .action(async (_opts: object, command: Command) => {
    await runAction(command, "listing credentials", async (run) => {
      const { error } = await run.ctx.auth.inspect();
      if (error) console.warn(`Warning: ${run.ctx.auth.authFile} could not be parsed: ${error}`);
      const entries = await run.ctx.auth.list();
      printList(run, entries, "No credentials stored.", ["PROVIDER", "TYPE", "KEY"], (e: AuthSummary) => [
        e.providerId,
        e.type,
        e.masked,
      ]);
    });
  });

const authSetCommand = new Command("set")
  .description("Store an API key in auth.json")
  .argument("<id>", "Provider id")
  .option("--key <key>", "API key")
  .option("--from-env", "Take the key from the provider's environment variable")
  .action(async (id: string, opts: { key?: string; fromEnv?: boolean }, command: Command) => {
    await runAction(command, "saving credentials", async ({ ctx, log }) => {
      let key = opts.key;
      if (opts.fromEnv) {
        const template = getNativeProvider(id);
        key = envApiKey(template, process.env);
        if (!key) throw new ConfigError("not_found", `No API key for ${id} in ${template.env.join(", ")}`);
      }
      if (key === undefined) throw new ConfigError("invalid", "Pass --key <key> or --from-env");
      await ctx.auth.setApiKey(id, key);
      log.info({ scope: "auth", op: "set", item: id, path: ctx.auth.authFile, msg: `Stored API key for ${id}` });
      console.log(`API key for "${id}" saved.`);
    });
  });

const authRemoveCommand = new Command("remove")
  .description("Delete stored credentials")
  .argument("<id>", "Provider id")
  .action(async (id: string, _opts: object, command: Command) => {
    await runAction(command, "removing credentials", async ({ ctx, log }) => {
      await ctx.auth.delete(id);
      log.info({ scope: "auth", op: "remove", item: id, msg: `Removed credentials for ${id}` });
      console.log(`Credentials for "${id}" removed.`);
    });
  });

const authCommand = new Command("auth")
  .description("Manage auth.json credentials")
  .addCommand(authListCommand)
  .addCommand(authSetCommand)
  .addCommand(authRemoveCommand);

// --- Options ---

const optionsCommand = new Command("options")
  .description("Show or set provider options; an empty value clears one")
  .argument("<id>", "Provider id")
  .option("--set <KEY=VALUE>", "Option to set (repeatable)", collectPairs)
  .action(async (id: string, opts: { set?: Record<string, string> }, command: Command) => {
    await runAction(command, "saving provider options", async (run) => {
      const values = opts.set;
      if (values) {
        await run.ctx.store.edit("opencode", doc => setOptions(doc, id, values));
        run.log.info({ scope: "native", op: "options", item: id, msg: `Set options ${Object.keys(values).join(", ")}` });
      }
      const doc = await run.ctx.store.load("opencode");
      const options = getOptions(doc, id);
      if (run.json) printJson(options);
      else console.log(formatTable(["KEY", "VALUE"], Object.entries(options).map(([k, v]) => [k, formatValue(v)])));
    });
  });

const removeCommand = new Command("remove")
  .description("Drop a native provider's options from opencode.json")
  .argument("<id>", "Provider id")
  .action(async (id: string, _opts: object, command: Command) => {
    await runAction(command, "removing provider options", async ({ ctx, log }) => {
      await ctx.store.edit("opencode", doc => removeProvider(doc, id));
      log.info({ scope: "native", op: "remove", item: id, msg: `Removed options for ${id}` });
      console.log(`Options for "${id}" removed.`);
    });
  });

// --- Environment ---

const envCommand = new Command("env")
  .description("Detect provider credentials in the environment")
  .option("--import [ids...]", "Copy detected keys into auth.json (existing records are kept)")
  .action(async (opts: { import?: boolean | string[] }, command: Command) => {
    await runAction(command, "detecting environment credentials", async (run) => {
      if (opts.import === undefined) {
        const found = detect().filter(d => d.vars.length > 0);
        printList(run, found, "No provider variables set.", ["PROVIDER", "CREDENTIAL", "VARIABLES"], detectionRow);
        return;
      }
      const ids = Array.isArray(opts.import) ? opts.import : undefined;
      const result = await importFromEnv(run.ctx.auth, process.env, ids);
      run.log.info({ scope: "auth", op: "env-import", msg: `Imported ${result.imported.length} keys`, data: { ...result } });
      if (run.json) {
        printJson(result);
        return;
      }
      console.log(result.imported.length > 0 ? `Imported: ${result.imported.join(", ")}` : "Nothing imported.");
      for (const skip of result.skipped) console.log(`  skipped ${skip.providerId}: ${skip.reason}`);
    });
  });

export const nativeCommand = new Command("native")
  .description("Manage native OpenCode providers")
  .addCommand(listCommand)
  .addCommand(showCommand)
  .addCommand(authCommand)
  .addCommand(optionsCommand)
  .addCommand(removeCommand)
  .addCommand(envCommand);
