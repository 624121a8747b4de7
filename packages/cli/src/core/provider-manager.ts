/**
 * Custom provider entries in opencode.json → provider
 */
import {
  ConfigError,
  findNativeProvider,
  isPlainObject,
  providerConfigSchema,
  type ConfigDocument,
  type ProviderConfig,
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
import { maskApiKey } from "./secret-mask.js";

const PROVIDER_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export interface ProviderInput {
  npm?: string;
  displayName?: string;
  baseURL?: string;
  apiKey?: string;
  timeout?: number;
}

export interface ProviderSummary {
  name: string;
  displayName: string;
  npm: string;
  baseURL?: string;
  apiKey?: string;
  modelCount: number;
  native: boolean;
  valid: boolean;
}

function validateProviderName(name: string): string {
  const trimmed = requireName(name, "Provider");
  if (!PROVIDER_NAME.test(trimmed)) {
    throw new ConfigError(
      "invalid",
      `Invalid provider name "${trimmed}": use letters, digits, dots, underscores and hyphens`,
    );
  }
  return trimmed;
}

function summarize(name: string, value: ProviderConfig | null): ProviderSummary {
  const models = value?.models ?? {};
  const apiKey = value?.options?.apiKey;
  return {
    name,
    displayName: value?.name ?? name,
    npm: value?.npm ?? "",
    baseURL: value?.options?.baseURL,
    apiKey: apiKey ? maskApiKey(apiKey) : undefined,
    modelCount: Object.keys(models).length,
    native: findNativeProvider(name) !== undefined,
    valid: value !== null,
  };
}

export function listProviders(doc: ConfigDocument): ProviderSummary[] {
  return parseEntries(readSection(doc, "provider"), providerConfigSchema).map(e => summarize(e.name, e.value));
}

export function getProvider(doc: ConfigDocument, name: string): ProviderConfig {
  const section = readSection(doc, "provider");
  if (!Object.hasOwn(section, name)) throw new ConfigError("not_found", `Provider "${name}" not found`);
  const parsed = providerConfigSchema.safeParse(section[name]);
  if (!parsed.success) {
    throw new ConfigError("invalid", `Provider "${name}" is malformed: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data;
}

function applyOptions(entry: Record<string, unknown>, input: ProviderInput): void {
  const options = ensureChild(entry, "options");
  if (input.baseURL !== undefined) setOrDelete(options, "baseURL", input.baseURL.trim());
  if (input.apiKey !== undefined) setOrDelete(options, "apiKey", input.apiKey.trim());
  if (input.timeout !== undefined) {
    if (!Number.isInteger(input.timeout) || input.timeout <= 0) {
      throw new ConfigError("invalid", "Timeout must be a positive integer (ms)");
    }
    options.timeout = input.timeout;
  }
}

export function addProvider(doc: ConfigDocument, name: string, input: ProviderInput): Record<string, unknown> {
  const providerName = validateProviderName(name);
  const section = ensureSection(doc, "provider");
  assertAbsent(section, providerName, "Provider");

  const entry: Record<string, unknown> = {
    npm: input.npm?.trim() || findNativeProvider(providerName)?.npm || "@ai-sdk/openai-compatible",
    name: input.displayName?.trim() || providerName,
    options: {},
    models: {},
  };
  applyOptions(entry, input);
  section[providerName] = entry;
  return entry;
}

export function updateProvider(
  doc: ConfigDocument,
  name: string,
  input: ProviderInput & { rename?: string },
): Record<string, unknown> {
  const section = ensureSection(doc, "provider");
  const entry = requireEntry(section, name, "Provider");

  if (input.npm !== undefined) setOrDelete(entry, "npm", input.npm.trim());
  if (input.displayName !== undefined) setOrDelete(entry, "name", input.displayName.trim());
  applyOptions(entry, input);
  if (!isPlainObject(entry.models)) entry.models = {};

  if (input.rename !== undefined && input.rename.trim() !== name) {
    const newName = validateProviderName(input.rename);
    assertAbsent(section, newName, "Provider");
    delete section[name];
    section[newName] = entry;
  }
  return entry;
}

export function deleteProvider(doc: ConfigDocument, name: string): void {
  const section = ensureSection(doc, "provider");
  if (!Object.hasOwn(section, name)) throw new ConfigError("not_found", `Provider "${name}" not found`);
  delete section[name];
}
