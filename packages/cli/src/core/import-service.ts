/**
 * ImportService: pull provider and permission settings from other AI tools'
 * config files into opencode.json
 */
import {
  ConfigError,
  isPlainObject,
  permissionLevelSchema,
  type ConfigDocument,
  type ConvertedImport,
  type ImportSource,
  type ImportSourceType,
  type PermissionLevel,
  type ProviderConfig,
} from "@ocfg/core";
import type { ConfigPaths } from "./config-paths.js";
import { ensureSection } from "./config-sections.js";
import { loadJson } from "./config-store.js";
import { readFileIfExists } from "./fs-helpers.js";
import { parseToml } from "./toml-helpers.js";

export const IMPORT_SOURCE_TYPES: readonly ImportSourceType[] = [
  "claude",
  "claude_providers",
  "codex",
  "gemini",
  "ccswitch",
];

const SOURCE_LABELS: Record<ImportSourceType, string> = {
  claude: "Claude Code Settings",
  claude_providers: "Claude Providers",
  codex: "Codex Config",
  gemini: "Gemini Config",
  ccswitch: "CC-Switch Config",
};

export interface ImportApplyResult {
  added: string[];
  overwritten: string[];
  /** Existing providers left untouched */
  conflicts: string[];
  permissions: string[];
}

function sourcePath(paths: ConfigPaths, type: ImportSourceType): string {
  switch (type) {
    case "claude":
      return paths.claudeSettings();
    case "claude_providers":
      return paths.claudeProviders();
    case "codex":
      return paths.codexConfig;
    case "gemini":
      return paths.geminiConfig;
    case "ccswitch":
      return paths.ccSwitchConfig;
  }
}

async function loadToml(filePath: string): Promise<ConfigDocument | null> {
  const content = await readFileIfExists(filePath);
  return content === null ? null : parseToml(content);
}

export async function readSource(paths: ConfigPaths, type: ImportSourceType): Promise<ImportSource | null> {
  const filePath = sourcePath(paths, type);
  const data = type === "codex" ? await loadToml(filePath) : await loadJson(filePath);
  if (!data) return null;
  return { type, label: SOURCE_LABELS[type], path: filePath, data };
}

/** Sources whose files exist and parse */
export async function scanSources(paths: ConfigPaths): Promise<ImportSource[]> {
  const sources: ImportSource[] = [];
  for (const type of IMPORT_SOURCE_TYPES) {
    const source = await readSource(paths, type);
    if (source) sources.push(source);
  }
  return sources;
}

function str(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function providerRecord(npm: string, name: string, baseURL?: string, apiKey?: string): ProviderConfig {
  const options: Record<string, string> = {};
  if (baseURL) options.baseURL = baseURL;
  if (apiKey) options.apiKey = apiKey;
  return { npm, name, options, models: {} };
}

export function sdkForProviderName(name: string): string {
  const lower = name.toLowerCase();
  if (lower.includes("anthropic") || lower.includes("claude")) return "@ai-sdk/anthropic";
  if (lower.includes("google") || lower.includes("gemini")) return "@ai-sdk/google";
  return "@ai-sdk/openai";
}

/**
 * Claude Code keeps permissions either as tool → level or as
 * `{ allow: [...], ask: [...], deny: [...] }` rule lists. Rules scoped with
 * parentheses (e.g. `Bash(git:*)`) have no OpenCode equivalent and are skipped.
 */
function convertClaudePermissions(value: unknown): Record<string, PermissionLevel> {
  const result: Record<string, PermissionLevel> = {};
  if (!isPlainObject(value)) return result;
  for (const [key, entry] of Object.entries(value)) {
    const level = permissionLevelSchema.safeParse(key);
    if (level.success && Array.isArray(entry)) {
      for (const rule of entry) {
        if (typeof rule === "string" && /^[A-Za-z]+$/.test(rule)) result[rule.toLowerCase()] = level.data;
      }
      continue;
    }
    const direct = permissionLevelSchema.safeParse(entry);
    if (direct.success) result[key] = direct.data;
  }
  return result;
}

export function convertToOpenCode(type: ImportSourceType, data: Record<string, unknown>): ConvertedImport {
  const result: ConvertedImport = { provider: {}, permission: {} };

  switch (type) {
    case "claude": {
      const apiKey = str(data.apiKey);
      if (apiKey) result.provider.anthropic = providerRecord("@ai-sdk/anthropic", "Anthropic (Claude)", undefined, apiKey);
      result.permission = convertClaudePermissions(data.permissions);
      break;
    }
    case "claude_providers":
      for (const [name, entry] of Object.entries(data)) {
        if (!isPlainObject(entry)) continue;
        result.provider[name] = providerRecord(
          "@ai-sdk/anthropic",
          str(entry.name) ?? name,
          str(entry.baseUrl),
          str(entry.apiKey),
        );
      }
      break;
    case "codex": {
      const api = data.api;
      if (isPlainObject(api)) {
        result.provider.openai = providerRecord("@ai-sdk/openai", "OpenAI (Codex)", str(api.base_url), str(api.api_key));
      }
      break;
    }
    case "gemini": {
      const apiKey = str(data.apiKey);
      if (apiKey) result.provider.google = providerRecord("@ai-sdk/google", "Google (Gemini)", undefined, apiKey);
      break;
    }
    case "ccswitch": {
      const providers = data.providers;
      if (!isPlainObject(providers)) break;
      for (const [name, entry] of Object.entries(providers)) {
        if (!isPlainObject(entry)) continue;
        result.provider[name] = providerRecord(
          sdkForProviderName(name),
          str(entry.name) ?? name,
          str(entry.baseUrl) ?? str(entry.base_url),
          str(entry.apiKey) ?? str(entry.api_key),
        );
      }
      break;
    }
  }
  return result;
}

export function parseImportType(value: string): ImportSourceType {
  const found = IMPORT_SOURCE_TYPES.find(t => t === value);
  if (!found) {
    throw new ConfigError("invalid", `Unknown import source "${value}": use ${IMPORT_SOURCE_TYPES.join(", ")}`);
  }
  return found;
}

/**
 * Merges converted providers and permissions into the document.
 * Existing providers are reported as conflicts unless `overwrite` is set.
 */
export function applyImport(
  doc: ConfigDocument,
  converted: ConvertedImport,
  options: { overwrite?: boolean } = {},
): ImportApplyResult {
  const result: ImportApplyResult = { added: [], overwritten: [], conflicts: [], permissions: [] };
  const providers = Object.entries(converted.provider);
  if (providers.length > 0) {
    const section = ensureSection(doc, "provider");
    for (const [name, record] of providers) {
      if (Object.hasOwn(section, name)) {
        if (!options.overwrite) {
          result.conflicts.push(name);
          continue;
        }
        result.overwritten.push(name);
      } else {
        result.added.push(name);
      }
      section[name] = structuredClone(record);
    }
  }

  const permissions = Object.entries(converted.permission);
  if (permissions.length > 0) {
    const section = ensureSection(doc, "permission");
    for (const [tool, level] of permissions) {
      section[tool] = level;
      result.permissions.push(tool);
    }
  }
  return result;
}
