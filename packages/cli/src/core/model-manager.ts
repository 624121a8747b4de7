/**
 * Models of a provider: opencode.json → provider[name].models
 */
import {
  ConfigError,
  findPresetModel,
  isPlainObject,
  modelConfigSchema,
  type ConfigDocument,
  type ModelConfig,
} from "@ocfg/core";
import {
  assertAbsent,
  ensureChild,
  ensureSection,
  parseEntries,
  readSection,
  requireEntry,
  requireName,
  setOrDelete,
} from "./config-sections.js";

export const DEFAULT_MODEL_LIMIT = { context: 200000, output: 16000 } as const;

export interface ModelInput {
  name?: string;
  attachment?: boolean;
  context?: number;
  output?: number;
  modalities?: { input: string[]; output: string[] };
  options?: Record<string, unknown>;
  variants?: Record<string, Record<string, unknown>>;
}

export interface ModelSummary {
  id: string;
  name: string;
  attachment: boolean;
  context?: number;
  output?: number;
  hasOptions: boolean;
  variants: string[];
  valid: boolean;
}

function validateLimit(value: number | undefined, label: string): void {
  if (value !== undefined && (!Number.isInteger(value) || value <= 0)) {
    throw new ConfigError("invalid", `${label} must be a positive integer`);
  }
}

function validateModelId(id: string): string {
  const trimmed = requireName(id, "Model");
  if (/\s/.test(trimmed)) throw new ConfigError("invalid", `Model id "${trimmed}" must not contain whitespace`);
  return trimmed;
}

/**
 * Build a model record with defaults applied. Empty options and variants are omitted.
 */
export function buildModelRecord(id: string, input: ModelInput): Record<string, unknown> {
  validateLimit(input.context, "Context limit");
  validateLimit(input.output, "Output limit");
  const record: Record<string, unknown> = {
    name: input.name?.trim() || id,
    attachment: input.attachment ?? false,
    limit: {
      context: input.context ?? DEFAULT_MODEL_LIMIT.context,
      output: input.output ?? DEFAULT_MODEL_LIMIT.output,
    },
  };
  if (input.modalities) record.modalities = input.modalities;
  setOrDelete(record, "options", input.options);
  setOrDelete(record, "variants", input.variants);
  return record;
}

function modelsOf(doc: ConfigDocument, provider: string): Record<string, unknown> {
  const entry = requireEntry(ensureSection(doc, "provider"), provider, "Provider");
  return ensureChild(entry, "models");
}

function summarize(id: string, value: ModelConfig | null): ModelSummary {
  return {
    id,
    name: value?.name ?? id,
    attachment: value?.attachment ?? false,
    context: value?.limit?.context,
    output: value?.limit?.output,
    hasOptions: Object.keys(value?.options ?? {}).length > 0,
    variants: Object.keys(value?.variants ?? {}),
    valid: value !== null,
  };
}

export function listModels(doc: ConfigDocument, provider: string): ModelSummary[] {
  const providers = readSection(doc, "provider");
  if (!Object.hasOwn(providers, provider)) throw new ConfigError("not_found", `Provider "${provider}" not found`);
  const entry = providers[provider];
  const models = isPlainObject(entry) && isPlainObject(entry.models) ? entry.models : {};
  return parseEntries(models, modelConfigSchema).map(e => summarize(e.name, e.value));
}

export function addModel(
  doc: ConfigDocument,
  provider: string,
  id: string,
  input: ModelInput,
): Record<string, unknown> {
  const modelId = validateModelId(id);
  const models = modelsOf(doc, provider);
  assertAbsent(models, modelId, "Model");
  const record = buildModelRecord(modelId, input);
  models[modelId] = record;
  return record;
}

/**
 * Add a model from the preset table. `overrides` replace preset fields.
 */
export function addPresetModel(
  doc: ConfigDocument,
  provider: string,
  presetId: string,
  overrides: ModelInput = {},
): Record<string, unknown> {
  const preset = findPresetModel(presetId);
  if (!preset) throw new ConfigError("not_found", `Preset model "${presetId}" not found`);
  const { model } = preset;
  return addModel(doc, provider, presetId, {
    name: model.name,
    attachment: model.attachment,
    context: model.limit.context,
    output: model.limit.output,
    modalities: model.modalities,
    options: structuredClone(model.options),
    variants: structuredClone(model.variants),
    ...overrides,
  });
}

export function updateModel(
  doc: ConfigDocument,
  provider: string,
  id: string,
  input: ModelInput,
): Record<string, unknown> {
  const models = modelsOf(doc, provider);
  const existing = requireEntry(models, id, "Model");
  const parsed = modelConfigSchema.safeParse(existing);
  const current: ModelConfig = parsed.success ? parsed.data : {};

  const record = buildModelRecord(id, {
    name: input.name ?? current.name,
    attachment: input.attachment ?? current.attachment,
    context: input.context ?? current.limit?.context,
    output: input.output ?? current.limit?.output,
    modalities: input.modalities ?? current.modalities,
    options: input.options ?? current.options,
    variants: input.variants ?? current.variants,
  });
  // keep fields this editor does not model
  for (const [key, value] of Object.entries(existing)) {
    if (!["name", "attachment", "limit", "modalities", "options", "variants"].includes(key)) {
      record[key] = value;
    }
  }
  models[id] = record;
  return record;
}

export function deleteModel(doc: ConfigDocument, provider: string, id: string): void {
  const models = modelsOf(doc, provider);
  if (!Object.hasOwn(models, id)) throw new ConfigError("not_found", `Model "${id}" not found in provider "${provider}"`);
  delete models[id];
}
