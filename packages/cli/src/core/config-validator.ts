/**
 * ConfigValidator: structural checks for opencode.json, oh-my-opencode.json
 * and auth.json, with automatic repair of the issues that have a safe default
 */
import {
  agentModeSchema,
  authEntrySchema,
  findNativeProvider,
  isPlainObject,
  permissionLevelSchema,
  isHttpUrl,
  splitCommand,
  type ConfigDocument,
  type ValidationIssue,
} from "@ocfg/core";
import { DEFAULT_MCP_TIMEOUT } from "./mcp-manager.js";
import { DEFAULT_MODEL_LIMIT } from "./model-manager.js";
import { modelRefStatus } from "./model-registry.js";
import { findPlaintextSecrets } from "./secret-mask.js";

export const OPENCODE_SCHEMA_URL = "https://opencode.ai/config.json";

const OBJECT_SECTIONS = ["provider", "mcp", "agent", "permission"] as const;

interface Finding {
  issue: ValidationIssue;
  fix?: () => void;
}

export interface AutoFixResult {
  config: ConfigDocument;
  fixed: ValidationIssue[];
  remaining: ValidationIssue[];
}

class Collector {
  readonly findings: Finding[] = [];

  error(path: string, message: string, fix?: () => void): void {
    this.findings.push({ issue: { path, severity: "error", message, fixable: fix !== undefined }, fix });
  }

  warn(path: string, message: string, fix?: () => void): void {
    this.findings.push({ issue: { path, severity: "warning", message, fixable: fix !== undefined }, fix });
  }
}

function isPositiveInt(value: unknown): boolean {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

// ============================================================================
// opencode.json
// ============================================================================

function checkProviders(section: Record<string, unknown>, c: Collector): void {
  for (const [name, entry] of Object.entries(section)) {
    const base = `provider.${name}`;
    if (!isPlainObject(entry)) {
      c.error(base, "Provider must be an object");
      continue;
    }
    const defaultNpm = findNativeProvider(name)?.npm ?? "@ai-sdk/openai-compatible";
    if (entry.npm === undefined) {
      c.warn(`${base}.npm`, "Provider has no SDK package (npm)", () => { entry.npm = defaultNpm; });
    } else if (typeof entry.npm !== "string" || !entry.npm.trim()) {
      c.error(`${base}.npm`, "npm must be a non-empty string", () => { entry.npm = defaultNpm; });
    }

    if (entry.options !== undefined && !isPlainObject(entry.options)) {
      c.error(`${base}.options`, "options must be an object", () => { entry.options = {}; });
    }
    const options = entry.options;
    if (isPlainObject(options)) {
      const baseURL = options.baseURL;
      if (baseURL !== undefined && (typeof baseURL !== "string" || !isHttpUrl(baseURL))) {
        c.error(`${base}.options.baseURL`, "baseURL must be an http(s) URL");
      }
      if (options.timeout !== undefined && !isPositiveInt(options.timeout)) {
        c.error(`${base}.options.timeout`, "timeout must be a positive integer (ms)", () => { delete options.timeout; });
      }
    }

    if (entry.models !== undefined && !isPlainObject(entry.models)) {
      c.error(`${base}.models`, "models must be an object", () => { entry.models = {}; });
    }
    const models = entry.models;
    if (isPlainObject(models)) checkModels(base, models, c);
  }
}

function checkModels(base: string, models: Record<string, unknown>, c: Collector): void {
  for (const [id, model] of Object.entries(models)) {
    const path = `${base}.models.${id}`;
    if (!isPlainObject(model)) {
      c.error(path, "Model must be an object", () => { models[id] = { name: id }; });
      continue;
    }
    if (model.limit === undefined) continue;
    const limit = model.limit;
    if (!isPlainObject(limit)) {
      c.error(`${path}.limit`, "limit must be an object", () => { model.limit = { ...DEFAULT_MODEL_LIMIT }; });
      continue;
    }
    for (const key of ["context", "output"] as const) {
      if (limit[key] !== undefined && !isPositiveInt(limit[key])) {
        c.error(`${path}.limit.${key}`, `${key} limit must be a positive integer`, () => {
          limit[key] = DEFAULT_MODEL_LIMIT[key];
        });
      }
    }
  }
}

function inferMcpType(entry: Record<string, unknown>): "local" | "remote" | null {
  if (typeof entry.url === "string") return "remote";
  if (entry.command !== undefined) return "local";
  return null;
}

function checkMcp(section: Record<string, unknown>, c: Collector): void {
  for (const [name, entry] of Object.entries(section)) {
    const base = `mcp.${name}`;
    if (!isPlainObject(entry)) {
      c.error(base, "MCP server must be an object");
      continue;
    }
    let type = entry.type;
    if (type !== "local" && type !== "remote") {
      const inferred = inferMcpType(entry);
      c.error(
        `${base}.type`,
        'type must be "local" or "remote"',
        inferred ? () => { entry.type = inferred; } : undefined,
      );
      type = inferred;
    }

    if (type === "local") {
      const command = entry.command;
      if (typeof command === "string" && command.trim()) {
        c.error(`${base}.command`, "command must be an array of strings", () => {
          entry.command = splitCommand(command);
        });
      } else if (
        !Array.isArray(command) ||
        command.length === 0 ||
        !command.every(part => typeof part === "string")
      ) {
        c.error(`${base}.command`, "Local server needs a non-empty command array");
      }
    } else if (type === "remote") {
      const url = entry.url;
      if (typeof url !== "string" || !url) c.error(`${base}.url`, "Remote server needs a url");
      else if (!isHttpUrl(url)) c.error(`${base}.url`, `Invalid url "${url}"`);
    }

    if (entry.enabled !== undefined && typeof entry.enabled !== "boolean") {
      c.error(`${base}.enabled`, "enabled must be a boolean", () => { entry.enabled = true; });
    }
    if (entry.timeout !== undefined && !isPositiveInt(entry.timeout)) {
      c.error(`${base}.timeout`, "timeout must be a positive integer (ms)", () => {
        entry.timeout = DEFAULT_MCP_TIMEOUT;
      });
    }
  }
}

function checkModelRef(doc: ConfigDocument, path: string, ref: unknown, c: Collector): void {
  if (ref === undefined) return;
  if (typeof ref !== "string") {
    c.error(path, "Model reference must be a string");
    return;
  }
  switch (modelRefStatus(doc, ref)) {
    case "malformed":
      c.error(path, `"${ref}" is not a provider/model reference`);
      break;
    case "unknown-provider":
      c.warn(path, `"${ref}" refers to a provider that is not configured`);
      break;
    case "unknown-model":
      c.warn(path, `"${ref}" refers to a model its provider does not list`);
      break;
    default:
      break;
  }
}

function checkAgents(doc: ConfigDocument, section: Record<string, unknown>, c: Collector): void {
  for (const [name, entry] of Object.entries(section)) {
    const base = `agent.${name}`;
    if (!isPlainObject(entry)) {
      c.error(base, "Agent must be an object");
      continue;
    }
    if (typeof entry.description !== "string" || !entry.description.trim()) {
      c.error(`${base}.description`, "Agent needs a description", () => { entry.description = `${name} agent`; });
    }
    if (entry.mode !== undefined && !agentModeSchema.safeParse(entry.mode).success) {
      c.error(`${base}.mode`, "mode must be primary, subagent or all", () => { entry.mode = "subagent"; });
    }
    const temperature = entry.temperature;
    if (temperature !== undefined && (typeof temperature !== "number" || temperature < 0 || temperature > 2)) {
      c.error(`${base}.temperature`, "temperature must be a number between 0 and 2", () => {
        delete entry.temperature;
      });
    }
    if (entry.maxSteps !== undefined && !isPositiveInt(entry.maxSteps)) {
      c.error(`${base}.maxSteps`, "maxSteps must be a positive integer", () => { delete entry.maxSteps; });
    }
    checkModelRef(doc, `${base}.model`, entry.model, c);
  }
}

function isLevel(value: unknown): boolean {
  return permissionLevelSchema.safeParse(value).success;
}

function checkPermissions(section: Record<string, unknown>, c: Collector): void {
  for (const [tool, value] of Object.entries(section)) {
    const path = `permission.${tool}`;
    if (isLevel(value)) continue;
    if (isPlainObject(value)) {
      for (const [pattern, level] of Object.entries(value)) {
        if (!isLevel(level)) {
          c.error(`${path}.${pattern}`, "Permission must be allow, ask or deny", () => { value[pattern] = "ask"; });
        }
      }
      continue;
    }
    c.error(path, "Permission must be allow, ask or deny", () => { section[tool] = "ask"; });
  }
}

function checkInstructions(doc: ConfigDocument, c: Collector): void {
  const value = doc.instructions;
  if (value === undefined) return;
  if (!Array.isArray(value)) {
    c.error("instructions", "instructions must be an array of paths", () => { doc.instructions = []; });
    return;
  }
  const strings = value.filter((v): v is string => typeof v === "string");
  if (strings.length !== value.length) {
    c.error("instructions", "instructions must only contain strings", () => {
      doc.instructions = [...new Set(strings)];
    });
    return;
  }
  if (new Set(strings).size !== strings.length) {
    c.warn("instructions", "instructions has duplicate entries", () => { doc.instructions = [...new Set(strings)]; });
  }
}

function checkCompaction(doc: ConfigDocument, c: Collector): void {
  const value = doc.compaction;
  if (value === undefined) return;
  if (!isPlainObject(value)) {
    c.error("compaction", "compaction must be an object", () => { doc.compaction = { auto: true, prune: true }; });
    return;
  }
  for (const key of ["auto", "prune"] as const) {
    if (value[key] !== undefined && typeof value[key] !== "boolean") {
      c.error(`compaction.${key}`, `${key} must be a boolean`, () => { value[key] = true; });
    }
  }
}

function collectOpenCode(input: unknown): Finding[] {
  const c = new Collector();
  if (!isPlainObject(input)) {
    c.error("", "Config root must be a JSON object");
    return c.findings;
  }
  const doc = input;

  if (doc.$schema === undefined) {
    c.warn("$schema", "Missing $schema", () => { doc.$schema = OPENCODE_SCHEMA_URL; });
  } else if (typeof doc.$schema !== "string") {
    c.error("$schema", "$schema must be a string", () => { doc.$schema = OPENCODE_SCHEMA_URL; });
  }

  for (const key of OBJECT_SECTIONS) {
    if (doc[key] !== undefined && !isPlainObject(doc[key])) {
      c.error(key, `${key} must be an object`, () => { doc[key] = {}; });
    }
  }

  const provider = doc.provider;
  if (isPlainObject(provider)) checkProviders(provider, c);
  const mcp = doc.mcp;
  if (isPlainObject(mcp)) checkMcp(mcp, c);
  const agent = doc.agent;
  if (isPlainObject(agent)) checkAgents(doc, agent, c);
  const permission = doc.permission;
  if (isPlainObject(permission)) checkPermissions(permission, c);
  checkInstructions(doc, c);
  checkCompaction(doc, c);
  checkModelRef(doc, "model", doc.model, c);
  checkModelRef(doc, "small_model", doc.small_model, c);

  for (const secret of findPlaintextSecrets(doc)) {
    c.warn(secret.path, `Plaintext secret (${secret.masked}); prefer {env:VAR} or auth.json`);
  }
  return c.findings;
}

export function validate(config: unknown): ValidationIssue[] {
  return collectOpenCode(config).map(f => f.issue);
}

/**
 * Repairs a copy of the config. The input is not modified.
 */
export function autoFix(config: ConfigDocument): AutoFixResult {
  const copy = structuredClone(config);
  const findings = collectOpenCode(copy);
  const fixed: ValidationIssue[] = [];
  for (const finding of findings) {
    if (!finding.fix) continue;
    finding.fix();
    fixed.push(finding.issue);
  }
  return { config: copy, fixed, remaining: validate(copy) };
}

// ============================================================================
// oh-my-opencode.json
// ============================================================================

/** `opencode` is used to check model references when given */
export function validateOhMy(doc: unknown, opencode?: ConfigDocument): ValidationIssue[] {
  const c = new Collector();
  if (!isPlainObject(doc)) {
    c.error("", "Config root must be a JSON object");
    return c.findings.map(f => f.issue);
  }
  for (const key of ["agents", "categories"] as const) {
    const section = doc[key];
    if (section === undefined) continue;
    if (!isPlainObject(section)) {
      c.error(key, `${key} must be an object`);
      continue;
    }
    for (const [name, entry] of Object.entries(section)) {
      const base = `${key}.${name}`;
      if (!isPlainObject(entry)) {
        c.error(base, "Entry must be an object");
        continue;
      }
      if (opencode) checkModelRef(opencode, `${base}.model`, entry.model, c);
      const temperature = entry.temperature;
      if (key === "categories" && temperature !== undefined) {
        if (typeof temperature !== "number" || temperature < 0 || temperature > 2) {
          c.error(`${base}.temperature`, "temperature must be a number between 0 and 2");
        }
      }
    }
  }
  return c.findings.map(f => f.issue);
}

// ============================================================================
// auth.json
// ============================================================================

export function validateAuth(data: unknown): ValidationIssue[] {
  const c = new Collector();
  if (!isPlainObject(data)) {
    c.error("", "auth.json root must be a JSON object");
    return c.findings.map(f => f.issue);
  }
  for (const [id, entry] of Object.entries(data)) {
    if (!authEntrySchema.safeParse(entry).success) {
      c.error(id, "Unrecognized auth record (expected api, oauth, wellknown or legacy apiKey)");
      continue;
    }
    if (isPlainObject(entry) && entry.type === "api" && entry.key === "") {
      c.error(`${id}.key`, "API key is empty");
    }
  }
  return c.findings.map(f => f.issue);
}
