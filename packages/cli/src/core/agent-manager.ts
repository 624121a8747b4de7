/**
 * OpenCode agents in opencode.json → agent
 */
import {
  ConfigError,
  PRESET_OPENCODE_AGENTS,
  agentConfigSchema,
  agentModeSchema,
  ownEntry,
  type AgentConfig,
  type AgentMode,
  type ConfigDocument,
} from "@ocfg/core";
import {
  assertAbsent,
  ensureSection,
  parseEntries,
  readSection,
  requireName,
} from "./config-sections.js";

/** Temperature OpenCode applies when an agent sets none */
export const DEFAULT_AGENT_TEMPERATURE = 0.3;

export interface AgentInput {
  description: string;
  mode?: AgentMode;
  model?: string;
  temperature?: number;
  maxSteps?: number;
  hidden?: boolean;
  disable?: boolean;
  prompt?: string;
  tools?: Record<string, boolean>;
  permission?: AgentConfig["permission"];
}

export interface AgentSummary {
  name: string;
  description: string;
  mode: AgentMode;
  model?: string;
  disabled: boolean;
  valid: boolean;
}

/**
 * Only meaningful values are written, so a record round-trips to the same
 * minimal JSON whatever form the caller filled in.
 */
export function buildAgentRecord(input: AgentInput): Record<string, unknown> {
  const description = input.description.trim();
  if (!description) throw new ConfigError("invalid", "Agent description is required");

  const mode = agentModeSchema.safeParse(input.mode ?? "subagent");
  if (!mode.success) throw new ConfigError("invalid", `Invalid agent mode "${String(input.mode)}"`);

  const record: Record<string, unknown> = { description, mode: mode.data };
  const model = input.model?.trim();
  if (model) record.model = model;

  if (input.temperature !== undefined) {
    if (input.temperature < 0 || input.temperature > 2) {
      throw new ConfigError("invalid", "Temperature must be between 0 and 2");
    }
    if (input.temperature !== DEFAULT_AGENT_TEMPERATURE) record.temperature = input.temperature;
  }
  if (input.maxSteps !== undefined && input.maxSteps > 0) {
    if (!Number.isInteger(input.maxSteps)) throw new ConfigError("invalid", "maxSteps must be an integer");
    record.maxSteps = input.maxSteps;
  }
  if (input.hidden) record.hidden = true;
  if (input.disable) record.disable = true;

  const prompt = input.prompt?.trim();
  if (prompt) record.prompt = prompt;
  if (input.tools && Object.keys(input.tools).length > 0) record.tools = { ...input.tools };
  if (input.permission && Object.keys(input.permission).length > 0) {
    record.permission = structuredClone(input.permission);
  }
  return record;
}

export function listAgents(doc: ConfigDocument): AgentSummary[] {
  return parseEntries(readSection(doc, "agent"), agentConfigSchema).map(({ name, value }) => ({
    name,
    description: value?.description ?? "",
    mode: value?.mode ?? "subagent",
    model: value?.model,
    disabled: value?.disable === true,
    valid: value !== null,
  }));
}

export function getAgent(doc: ConfigDocument, name: string): AgentConfig {
  const section = readSection(doc, "agent");
  if (!Object.hasOwn(section, name)) throw new ConfigError("not_found", `Agent "${name}" not found`);
  const parsed = agentConfigSchema.safeParse(section[name]);
  if (!parsed.success) throw new ConfigError("invalid", `Agent "${name}" is malformed`);
  return parsed.data;
}

export function addAgent(doc: ConfigDocument, name: string, input: AgentInput): Record<string, unknown> {
  const agentName = requireName(name, "Agent");
  const section = ensureSection(doc, "agent");
  assertAbsent(section, agentName, "Agent");
  const record = buildAgentRecord(input);
  section[agentName] = record;
  return record;
}

/**
 * Replaces the modeled fields and keeps keys this editor does not know about.
 */
export function updateAgent(doc: ConfigDocument, name: string, input: Partial<AgentInput>): Record<string, unknown> {
  const section = ensureSection(doc, "agent");
  if (!Object.hasOwn(section, name)) throw new ConfigError("not_found", `Agent "${name}" not found`);
  const parsed = agentConfigSchema.safeParse(section[name]);
  const current: AgentConfig = parsed.success ? parsed.data : {};

  const record = buildAgentRecord({
    description: input.description ?? current.description ?? "",
    mode: input.mode ?? current.mode,
    model: input.model ?? current.model,
    temperature: input.temperature ?? current.temperature,
    maxSteps: input.maxSteps ?? current.maxSteps,
    hidden: input.hidden ?? current.hidden,
    disable: input.disable ?? current.disable,
    prompt: input.prompt ?? current.prompt,
    tools: input.tools ?? current.tools,
    permission: input.permission ?? current.permission,
  });

  const modeled = new Set(Object.keys(agentConfigSchema.shape));
  const extra = Object.fromEntries(Object.entries(current).filter(([key]) => !modeled.has(key)));
  const merged = { ...extra, ...record };
  section[name] = merged;
  return merged;
}

export function deleteAgent(doc: ConfigDocument, name: string): void {
  const section = ensureSection(doc, "agent");
  if (!Object.hasOwn(section, name)) throw new ConfigError("not_found", `Agent "${name}" not found`);
  delete section[name];
}

export function listPresetAgents(): string[] {
  return Object.keys(PRESET_OPENCODE_AGENTS);
}

export function addPresetAgent(doc: ConfigDocument, presetName: string, as?: string): Record<string, unknown> {
  const preset = ownEntry(PRESET_OPENCODE_AGENTS, presetName);
  if (!preset) throw new ConfigError("not_found", `Unknown preset agent "${presetName}"`);
  return addAgent(doc, as ?? presetName, {
    description: preset.description,
    mode: preset.mode,
    tools: preset.tools,
    permission: preset.permission,
  });
}
