/**
 * provider command - custom providers in opencode.json
 *
 * Usage:
 *   ocfg provider list
 *   ocfg provider add <name> [--npm <pkg>] [--base-url <url>] [--api-key <key>]
 *   ocfg provider update <name> [--rename <new>] ...
 *   ocfg provider remove <name>
 */

import { Command } from "commander";
import { addProvider, deleteProvider, listProviders, updateProvider, type ProviderSummary } from "../core/provider-manager.js";
import { parseInteger, printList, runAction } from "./command-runner.js";

interface ProviderOptions {
  npm?: string;
  displayName?: string;
  baseUrl?: string;
  apiKey?: string;
  timeout?: number;
}

function withProviderOptions(command: Command): Command {
  return command
    .option("--npm <package>", "AI SDK package (defaults to the native SDK or @ai-sdk/openai-compatible)")
    .option("--display-name <name>", "Name shown in OpenCode")
    .option("--base-url <url>", "API base URL")
    .option("--api-key <key>", "API key or {env:VAR} reference")
    .option("--timeout <ms>", "Request timeout in milliseconds", parseInteger);
}

export function providerRow(p: ProviderSummary): string[] {
  return [
    p.valid ? p.name : `${p.name} (malformed)`,
    p.npm,
    String(p.modelCount),
    p.baseURL ?? "",
    p.apiKey ?? "",
  ];
}

const listCommand = new Command("list")
  .description("List configured providers")
  .action(async (_opts: object, command: Command) => {
    await runAction(command, "listing providers", async (run) => {
      const doc = await run.ctx.store.load("opencode");
      printList(run, listProviders(doc), "No providers configured.", ["NAME", "SDK", "MODELS", "BASE URL", "KEY"], providerRow);
    });
  });

const addCommand = withProviderOptions(new Command("add"))
  .description("Add a provider")
  .argument("<name>", "Provider id")
  .action(async (name: string, opts: ProviderOptions, command: Command) => {
    await runAction(command, "adding provider", async ({ ctx, log }) => {
      const entry = await ctx.store.edit("opencode", doc =>
        addProvider(doc, name, {
          npm: opts.npm,
          displayName: opts.displayName,
          baseURL: opts.baseUrl,
          apiKey: opts.apiKey,
          timeout: opts.timeout,
        }),
      );
      log.info({ scope: "provider", op: "add", item: name, msg: `Added provider ${name}`, data: { npm: entry.npm } });
      console.log(`Provider "${name}" added.`);
    });
  });

const updateCommand = withProviderOptions(new Command("update"))
  .description("Update a provider")
  .argument("<name>", "Provider id")
  .option("--rename <name>", "New provider id")
  .action(async (name: string, opts: ProviderOptions & { rename?: string }, command: Command) => {
    await runAction(command, "updating provider", async ({ ctx, log }) => {
      await ctx.store.edit("opencode", doc =>
        updateProvider(doc, name, {
          npm: opts.npm,
          displayName: opts.displayName,
          baseURL: opts.baseUrl,
          apiKey: opts.apiKey,
          timeout: opts.timeout,
          rename: opts.rename,
        }),
      );
      const finalName = opts.rename?.trim() || name;
      log.info({ scope: "provider", op: "update", item: finalName, msg: `Updated provider ${name}` });
      console.log(`Provider "${finalName}" updated.`);
    });
  });

const removeCommand = new Command("remove")
  .description("Remove a provider and its models")
  .argument("<name>", "Provider id")
  .action(async (name: string, _opts: object, command: Command) => {
    await runAction(command, "removing provider", async ({ ctx, log }) => {
      await ctx.store.edit("opencode", doc => deleteProvider(doc, name));
      log.info({ scope: "provider", op: "remove", item: name, msg: `Removed provider ${name}` });
      console.log(`Provider "${name}" removed.`);
    });
  });

export const providerCommand = new Command("provider")
  .description("Manage custom providers in opencode.json")
  .addCommand(listCommand)
  .addCommand(addCommand)
  .addCommand(updateCommand)
  .addCommand(removeCommand);
