/**
 * oh-my-opencode.json: plugin agents (→ agents) and task categories (→ categories)
 */
import {
  ConfigError,
  PRESET_CATEGORIES,
  PRESET_OH_MY_AGENTS,
  ohMyAgentSchema,
  ohMyCategorySchema,
  ownEntry,
  roundTo,
  type ConfigDocument,
} from "@ocfg/core";
import { ensureSection, parseEntries, readSection, requireName, setOrDelete } from "./config-sections.js";

export interface OhMyAgentInput {
  model?: string;
  description?: string;
}

export interface OhMyAgentSummary {
  name: string;
  model: string;
  description: string;
  valid: boolean;
}

export interface CategoryInput {
  model?: string;
  temperature?: number;
  description?: string;
}

export interface CategorySummary {
  name: string;
  model: string;
  temperature?: number;
  description: string;
  valid: boolean;
}

// --- Agents ---

export function listOhMyAgents(doc: ConfigDocument): OhMyAgentSummary[] {
  return parseEntries(readSection(doc, "agents"), ohMyAgentSchema).map(({ name, value }) => ({
    name,
    model: value?.model ?? "",
    description: value?.description ?? "",
    valid: value !== null,
  }));
}

/** Create or replace. Fields other than model and description are kept. */
export function setOhMyAgent(doc: ConfigDocument, name: string, input: OhMyAgentInput): Record<string, unknown> {
  const agentName = requireName(name, "Agent");
  const section = ensureSection(doc, "agents");
  const existing = ohMyAgentSchema.safeParse(section[agentName]);
  const record: Record<string, unknown> = existing.success ? { ...existing.data } : {};
  setOrDelete(record, "model", input.model?.trim());
  setOrDelete(record, "description", input.description?.trim());
  section[agentName] = record;
  return record;
}

export function deleteOhMyAgent(doc: ConfigDocument, name: string): void {
  const section = ensureSection(doc, "agents");
  if (!Object.hasOwn(section, name)) throw new ConfigError("not_found", `Agent "${name}" not found`);
  delete section[name];
}

export function addPresetOhMyAgent(doc: ConfigDocument, presetName: string, model?: string): Record<string, unknown> {
  const description = ownEntry(PRESET_OH_MY_AGENTS, presetName);
  if (description === undefined) throw new ConfigError("not_found", `Unknown preset agent "${presetName}"`);
  return setOhMyAgent(doc, presetName, { model, description });
}

// --- Categories ---

export function listCategories(doc: ConfigDocument): CategorySummary[] {
  return parseEntries(readSection(doc, "categories"), ohMyCategorySchema).map(({ name, value }) => ({
    name,
    model: value?.model ?? "",
    temperature: value?.temperature,
    description: value?.description ?? "",
    valid: value !== null,
  }));
}

export function setCategory(doc: ConfigDocument, name: string, input: CategoryInput): Record<string, unknown> {
  const categoryName = requireName(name, "Category");
  const section = ensureSection(doc, "categories");
  const existing = ohMyCategorySchema.safeParse(section[categoryName]);
  const record: Record<string, unknown> = existing.success ? { ...existing.data } : {};

  setOrDelete(record, "model", input.model?.trim());
  if (input.temperature !== undefined) {
    if (input.temperature < 0 || input.temperature > 2) {
      throw new ConfigError("invalid", "Temperature must be between 0 and 2");
    }
    record.temperature = roundTo(input.temperature, 1);
  }
  setOrDelete(record, "description", input.description?.trim());
  section[categoryName] = record;
  return record;
}

export function deleteCategory(doc: ConfigDocument, name: string): void {
  const section = ensureSection(doc, "categories");
  if (!Object.hasOwn(section, name)) throw new ConfigError("not_found", `Category "${name}" not found`);
  delete section[name];
}

export function addPresetCategory(doc: ConfigDocument, presetName: string, model?: string): Record<string, unknown> {
  const preset = ownEntry(PRESET_CATEGORIES, presetName);
  if (!preset) throw new ConfigError("not_found", `Unknown preset category "${presetName}"`);
  return setCategory(doc, presetName, { model, ...preset });
}
