/**
 * mcp command - MCP servers in opencode.json
 *
 * Usage:
 *   ocfg mcp list
 *   ocfg mcp add <name> --command "npx -y server" [--env KEY=VALUE]
 *   ocfg mcp add <name> --url https://... [--header KEY=VALUE]
 *   ocfg mcp enable|disable <name>
 *   ocfg mcp remove <name>
 */

import { Command } from "commander";
import { splitCommand } from "@ocfg/core";
import {
  addMcp,
  deleteMcp,
  listMcps,
  setMcpEnabled,
  updateMcp,
  type McpInput,
  type McpSummary,
} from "../core/mcp-manager.js";
import { collectPairs, parseInteger, printList, runAction } from "./command-runner.js";

interface McpOptions {
  command?: string;
  url?: string;
  env?: Record<string, string>;
  header?: Record<string, string>;
  timeout?: number;
  disabled?: boolean;
}

function withMcpOptions(command: Command): Command {
  return command
    .option("--command <command>", "Command line of a local server")
    .option("--url <url>", "URL of a remote server")
    .option("--env <KEY=VALUE>", "Environment variable for a local server (repeatable)", collectPairs)
    .option("--header <KEY=VALUE>", "HTTP header for a remote server (repeatable)", collectPairs)
    .option("--timeout <ms>", "Startup timeout in milliseconds", parseInteger);
}

export function toMcpInput(opts: McpOptions): McpInput {
  return {
    command: opts.command !== undefined ? splitCommand(opts.command) : undefined,
    url: opts.url,
    environment: opts.env,
    headers: opts.header,
    timeout: opts.timeout,
    enabled: opts.disabled ? false : undefined,
  };
}

export function mcpRow(m: McpSummary): string[] {
  return [m.valid ? m.name : `${m.name} (malformed)`, m.type, m.enabled ? "yes" : "no", String(m.timeout), m.target];
}

const listCommand = new Command("list")
  .description("List MCP servers")
  .action(async (_opts: object, command: Command) => {
    await runAction(command, "listing MCP servers", async (run) => {
      const doc = await run.ctx.store.load("opencode");
      printList(run, listMcps(doc), "No MCP servers configured.", ["NAME", "TYPE", "ENABLED", "TIMEOUT", "TARGET"], mcpRow);
    });
  });

const addCommand = withMcpOptions(new Command("add"))
  .description("Add a local or remote MCP server")
  .argument("<name>", "Server name")
  .option("--disabled", "Add the server disabled")
  .action(async (name: string, opts: McpOptions, command: Command) => {
    await runAction(command, "adding MCP server", async ({ ctx, log }) => {
      const record = await ctx.store.edit("opencode", doc => addMcp(doc, name, toMcpInput(opts)));
      log.info({ scope: "mcp", op: "add", item: name, msg: `Added MCP server ${name}`, data: { type: record.type } });
      console.log(`MCP server "${name}" added.`);
    });
  });

const updateCommand = withMcpOptions(new Command("update"))
  .description("Update an MCP server; --command switches it to local, --url to remote")
  .argument("<name>", "Server name")
  .action(async (name: string, opts: McpOptions, command: Command) => {
    await runAction(command, "updating MCP server", async ({ ctx, log }) => {
      await ctx.store.edit("opencode", doc => updateMcp(doc, name, toMcpInput(opts)));
      log.info({ scope: "mcp", op: "update", item: name, msg: `Updated MCP server ${name}` });
      console.log(`MCP server "${name}" updated.`);
    });
  });

function toggleCommand(enabled: boolean): Command {
  const verb = enabled ? "enable" : "disable";
  return new Command(verb)
    .description(`${enabled ? "Enable" : "Disable"} an MCP server`)
    .argument("<name>", "Server name")
    .action(async (name: string, _opts: object, command: Command) => {
      await runAction(command, `${enabled ? "enabling" : "disabling"} MCP server`, async ({ ctx, log }) => {
        await ctx.store.edit("opencode", doc => setMcpEnabled(doc, name, enabled));
        log.info({ scope: "mcp", op: verb, item: name, msg: `${verb}d MCP server ${name}` });
        console.log(`MCP server "${name}" ${verb}d.`);
      });
    });
}

const removeCommand = new Command("remove")
  .description("Remove an MCP server")
  .argument("<name>", "Server name")
  .action(async (name: string, _opts: object, command: Command) => {
    await runAction(command, "removing MCP server", async ({ ctx, log }) => {
      await ctx.store.edit("opencode", doc => deleteMcp(doc, name));
      log.info({ scope: "mcp", op: "remove", item: name, msg: `Removed MCP server ${name}` });
      console.log(`MCP server "${name}" removed.`);
    });
  });

export const mcpCommand = new Command("mcp")
  .description("Manage MCP servers in opencode.json")
  .addCommand(listCommand)
  .addCommand(addCommand)
  .addCommand(updateCommand)
  .addCommand(toggleCommand(true))
  .addCommand(toggleCommand(false))
  .addCommand(removeCommand);
