/**
 * agent command - OpenCode agents in opencode.json
 *
 * Usage:
 *   ocfg agent list
 *   ocfg agent add <name> --description "..." [--mode subagent] [--model provider/model]
 *   ocfg agent update <name> ...
 *   ocfg agent preset [name] [--as <name>]
 *   ocfg agent remove <name>
 */

import { Command, InvalidArgumentError } from "commander";
import { PRESET_OPENCODE_AGENTS, agentModeSchema, type AgentMode } from "@ocfg/core";
import {
  addAgent,
  addPresetAgent,
  deleteAgent,
  listAgents,
  listPresetAgents,
  updateAgent,
  type AgentInput,
  type AgentSummary,
} from "../core/agent-manager.js";
import { formatTable, parseInteger, parseNumber, printJson, printList, runAction, warnUnknownModel } from "./command-runner.js";

interface AgentOptions {
  description?: string;
  mode?: AgentMode;
  model?: string;
  temperature?: number;
  maxSteps?: number;
  prompt?: string;
  hidden?: boolean;
  disable?: boolean;
}

function parseMode(value: string): AgentMode {
  const parsed = agentModeSchema.safeParse(value);
  if (!parsed.success) throw new InvalidArgumentError("Use primary, subagent or all.");
  return parsed.data;
}

function withAgentOptions(command: Command): Command {
  return command
    .option("--description <text>", "When OpenCode should use this agent")
    .option("--mode <mode>", "primary, subagent or all", parseMode)
    .option("--model <ref>", "provider/model to run the agent on")
    .option("--temperature <value>", "Sampling temperature", parseNumber)
    .option("--max-steps <n>", "Maximum agentic steps", parseInteger)
    .option("--prompt <text>", "System prompt or {file:./path}")
    .option("--hidden", "Hide from the agent picker")
    .option("--disable", "Disable the agent");
}

function toAgentInput(opts: AgentOptions): Partial<AgentInput> {
  const input: Partial<AgentInput> = {};
  if (opts.description !== undefined) input.description = opts.description;
  if (opts.mode !== undefined) input.mode = opts.mode;
  if (opts.model !== undefined) input.model = opts.model;
  if (opts.temperature !== undefined) input.temperature = opts.temperature;
  if (opts.maxSteps !== undefined) input.maxSteps = opts.maxSteps;
  if (opts.prompt !== undefined) input.prompt = opts.prompt;
  if (opts.hidden !== undefined) input.hidden = opts.hidden;
  if (opts.disable !== undefined) input.disable = opts.disable;
  return input;
}

export function agentRow(a: AgentSummary): string[] {
  return [
    a.valid ? a.name : `${a.name} (malformed)`,
    a.mode,
    a.model ?? "",
    a.disabled ? "yes" : "",
    a.description,
  ];
}

const listCommand = new Command("list")
  .description("List agents")
  .action(async (_opts: object, command: Command) => {
    await runAction(command, "listing agents", async (run) => {
      const doc = await run.ctx.store.load("opencode");
      printList(run, listAgents(doc), "No agents configured.", ["NAME", "MODE", "MODEL", "DISABLED", "DESCRIPTION"], agentRow);
    });
  });

const addCommand = withAgentOptions(new Command("add"))
  .description("Add an agent")
  .argument("<name>", "Agent name")
  .action(async (name: string, opts: AgentOptions, command: Command) => {
    await runAction(command, "adding agent", async (run) => {
      await run.ctx.store.edit("opencode", doc =>
        addAgent(doc, name, { ...toAgentInput(opts), description: opts.description ?? "" }),
      );
      run.log.info({ scope: "agent", op: "add", item: name, msg: `Added agent ${name}` });
      console.log(`Agent "${name}" added.`);
      await warnUnknownModel(run, "agent", opts.model);
    });
  });

const updateCommand = withAgentOptions(new Command("update"))
  .description("Update an agent")
  .argument("<name>", "Agent name")
  .action(async (name: string, opts: AgentOptions, command: Command) => {
    await runAction(command, "updating agent", async (run) => {
      await run.ctx.store.edit("opencode", doc => updateAgent(doc, name, toAgentInput(opts)));
      run.log.info({ scope: "agent", op: "update", item: name, msg: `Updated agent ${name}` });
      console.log(`Agent "${name}" updated.`);
      await warnUnknownModel(run, "agent", opts.model);
    });
  });

const presetCommand = new Command("preset")
  .description("List preset agents, or add one")
  .argument("[name]", "Preset to add")
  .option("--as <name>", "Agent name to add the preset under")
  .action(async (name: string | undefined, opts: { as?: string }, command: Command) => {
    await runAction(command, "adding preset agent", async (run) => {
      if (!name) {
        const presets = listPresetAgents().map(id => ({ id, ...PRESET_OPENCODE_AGENTS[id] }));
        if (run.json) printJson(presets);
        else console.log(formatTable(["PRESET", "MODE", "DESCRIPTION"], presets.map(p => [p.id, p.mode, p.description])));
        return;
      }
      const target = opts.as ?? name;
      await run.ctx.store.edit("opencode", doc => addPresetAgent(doc, name, opts.as));
      run.log.info({ scope: "agent", op: "preset", item: target, msg: `Added preset agent ${name} as ${target}` });
      console.log(`Agent "${target}" added from preset "${name}".`);
    });
  });

const removeCommand = new Command("remove")
  .description("Remove an agent")
  .argument("<name>", "Agent name")
  .action(async (name: string, _opts: object, command: Command) => {
    await runAction(command, "removing agent", async ({ ctx, log }) => {
      await ctx.store.edit("opencode", doc => deleteAgent(doc, name));
      log.info({ scope: "agent", op: "remove", item: name, msg: `Removed agent ${name}` });
      console.log(`Agent "${name}" removed.`);
    });
  });

export const agentCommand = new Command("agent")
  .description("Manage OpenCode agents")
  .addCommand(listCommand)
  .addCommand(addCommand)
  .addCommand(updateCommand)
  .addCommand(presetCommand)
  .addCommand(removeCommand);
