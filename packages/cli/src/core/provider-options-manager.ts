/**
 * ProviderOptionsManager: option fields of native providers in
 * opencode.json → provider[id].options, checked against the registry template
 */
import {
  ConfigError,
  getNativeProvider,
  isPlainObject,
  type ConfigDocument,
  type NativeProviderTemplate,
  type OptionField,
  type OptionValue,
} from "@ocfg/core";
import { ensureChild, ensureSection, readSection } from "./config-sections.js";

const TRUE_WORDS = new Set(["true", "1", "yes", "on"]);
const FALSE_WORDS = new Set(["false", "0", "no", "off"]);

function templateOf(id: string): NativeProviderTemplate {
  try {
    return getNativeProvider(id);
  } catch (err) {
    throw new ConfigError("not_found", err instanceof Error ? err.message : String(err));
  }
}

/**
 * Converts form input to the field type. Returns undefined for empty input,
 * which clears the stored value.
 */
export function coerceOptionValue(field: OptionField, raw: unknown): OptionValue | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (typeof raw === "string" && raw.trim() === "") return undefined;

  switch (field.type) {
    case "string":
      if (typeof raw !== "string") throw new ConfigError("invalid", `${field.key} must be a string`);
      return raw.trim();
    case "number": {
      const num = typeof raw === "number" ? raw : typeof raw === "string" ? Number(raw.trim()) : NaN;
      if (!Number.isFinite(num)) throw new ConfigError("invalid", `${field.key} must be a number`);
      return num;
    }
    case "boolean": {
      if (typeof raw === "boolean") return raw;
      const word = typeof raw === "string" ? raw.trim().toLowerCase() : "";
      if (TRUE_WORDS.has(word)) return true;
      if (FALSE_WORDS.has(word)) return false;
      throw new ConfigError("invalid", `${field.key} must be true or false`);
    }
  }
}

export function templateDefaults(template: NativeProviderTemplate): Record<string, OptionValue> {
  const defaults: Record<string, OptionValue> = {};
  for (const field of template.optionFields) {
    if (field.default !== undefined) defaults[field.key] = field.default;
  }
  if (template.baseURL && defaults.baseURL === undefined) defaults.baseURL = template.baseURL;
  return defaults;
}

export function getStoredOptions(doc: ConfigDocument, id: string): Record<string, unknown> {
  const entry = readSection(doc, "provider")[id];
  if (!isPlainObject(entry)) return {};
  return isPlainObject(entry.options) ? entry.options : {};
}

/** Template defaults with stored values on top */
export function getOptions(doc: ConfigDocument, id: string): Record<string, unknown> {
  return { ...templateDefaults(templateOf(id)), ...getStoredOptions(doc, id) };
}

/**
 * Creates provider[id] with npm, name and the template base URL when absent.
 * Returns true when an entry was created.
 */
export function applyTemplate(doc: ConfigDocument, id: string): boolean {
  const template = templateOf(id);
  const section = ensureSection(doc, "provider");
  if (isPlainObject(section[id])) return false;
  const options: Record<string, unknown> = {};
  if (template.baseURL) options.baseURL = template.baseURL;
  section[id] = { npm: template.npm, name: template.name, options };
  return true;
}

/**
 * Writes option values; unknown keys are rejected before anything changes.
 */
export function setOptions(doc: ConfigDocument, id: string, values: Record<string, unknown>): Record<string, unknown> {
  const template = templateOf(id);
  const fields = new Map(template.optionFields.map(f => [f.key, f]));
  const unknownKeys = Object.keys(values).filter(key => !fields.has(key));
  if (unknownKeys.length > 0) {
    throw new ConfigError("invalid", `Unknown option(s) for ${id}: ${unknownKeys.join(", ")}`);
  }

  const coerced = new Map<string, OptionValue | undefined>();
  for (const [key, raw] of Object.entries(values)) {
    const field = fields.get(key);
    if (field) coerced.set(key, coerceOptionValue(field, raw));
  }

  applyTemplate(doc, id);
  const entry = ensureSection(doc, "provider")[id];
  const options = isPlainObject(entry) ? ensureChild(entry, "options") : {};
  for (const [key, value] of coerced) {
    if (value === undefined) delete options[key];
    else options[key] = value;
  }
  return options;
}

/** Drops the options; the entry goes too when it holds no models */
export function removeProvider(doc: ConfigDocument, id: string): void {
  const section = ensureSection(doc, "provider");
  const entry = section[id];
  if (!isPlainObject(entry)) throw new ConfigError("not_found", `Provider "${id}" not found`);
  delete entry.options;
  const hasModels = isPlainObject(entry.models) && Object.keys(entry.models).length > 0;
  if (!hasModels) delete section[id];
}
