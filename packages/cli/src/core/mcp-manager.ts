/**
 * MCP servers in opencode.json → mcp
 */
import {
  ConfigError,
  isPlainObject,
  isHttpUrl,
  mcpServerSchema,
  type ConfigDocument,
  type McpServerConfig,
} from "@ocfg/core";
import {
  assertAbsent,
  ensureSection,
  parseEntries,
  readSection,
  requireEntry,
  requireName,
  setOrDelete,
} from "./config-sections.js";

export const DEFAULT_MCP_TIMEOUT = 5000;

export interface McpInput {
  command?: string[];
  url?: string;
  environment?: Record<string, string>;
  headers?: Record<string, string>;
  enabled?: boolean;
  timeout?: number;
}

export interface McpSummary {
  name: string;
  type: "local" | "remote" | "unknown";
  enabled: boolean;
  target: string;
  timeout: number;
  valid: boolean;
}

/**
 * A URL makes the server remote; otherwise it is local and needs a command.
 */
export function buildMcpRecord(input: McpInput): Record<string, unknown> {
  const timeout = input.timeout ?? DEFAULT_MCP_TIMEOUT;
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new ConfigError("invalid", "Timeout must be a positive integer (ms)");
  }

  const url = input.url?.trim();
  if (url) {
    if (!isHttpUrl(url)) throw new ConfigError("invalid", `Invalid server URL "${url}"`);
    const record: Record<string, unknown> = { type: "remote", url };
    setOrDelete(record, "headers", input.headers);
    record.enabled = input.enabled ?? true;
    record.timeout = timeout;
    return record;
  }

  const command = (input.command ?? []).map(c => c.trim()).filter(Boolean);
  if (command.length === 0) {
    throw new ConfigError("invalid", "A local MCP server needs a command; a remote one needs a URL");
  }
  const record: Record<string, unknown> = { type: "local", command };
  setOrDelete(record, "environment", input.environment);
  record.enabled = input.enabled ?? true;
  record.timeout = timeout;
  return record;
}

function summarize(name: string, raw: unknown, value: McpServerConfig | null): McpSummary {
  if (value) {
    return {
      name,
      type: value.type,
      enabled: value.enabled ?? true,
      target: value.type === "remote" ? value.url : value.command.join(" "),
      timeout: value.timeout ?? DEFAULT_MCP_TIMEOUT,
      valid: true,
    };
  }
  const type = isPlainObject(raw) && (raw.type === "local" || raw.type === "remote") ? raw.type : "unknown";
  return { name, type, enabled: false, target: "", timeout: DEFAULT_MCP_TIMEOUT, valid: false };
}

export function listMcps(doc: ConfigDocument): McpSummary[] {
  return parseEntries(readSection(doc, "mcp"), mcpServerSchema).map(e => summarize(e.name, e.raw, e.value));
}

export function getMcp(doc: ConfigDocument, name: string): McpServerConfig {
  const section = readSection(doc, "mcp");
  if (!Object.hasOwn(section, name)) throw new ConfigError("not_found", `MCP server "${name}" not found`);
  const parsed = mcpServerSchema.safeParse(section[name]);
  if (!parsed.success) throw new ConfigError("invalid", `MCP server "${name}" is malformed`);
  return parsed.data;
}

export function addMcp(doc: ConfigDocument, name: string, input: McpInput): Record<string, unknown> {
  const mcpName = requireName(name, "MCP server");
  const section = ensureSection(doc, "mcp");
  assertAbsent(section, mcpName, "MCP server");
  const record = buildMcpRecord(input);
  section[mcpName] = record;
  return record;
}

export function updateMcp(doc: ConfigDocument, name: string, input: McpInput): Record<string, unknown> {
  const section = ensureSection(doc, "mcp");
  const existing = requireEntry(section, name, "MCP server");
  const parsed = mcpServerSchema.safeParse(existing);
  const current = parsed.success ? parsed.data : null;

  const switchingToLocal = input.command !== undefined && input.url === undefined;
  const url = switchingToLocal ? undefined : input.url ?? (current?.type === "remote" ? current.url : undefined);
  const record = buildMcpRecord({
    url,
    command: input.command ?? (current?.type === "local" ? current.command : undefined),
    environment: input.environment ?? (current?.type === "local" ? current.environment : undefined),
    headers: input.headers ?? (current?.type === "remote" ? current.headers : undefined),
    enabled: input.enabled ?? current?.enabled,
    timeout: input.timeout ?? current?.timeout,
  });
  section[name] = record;
  return record;
}

export function setMcpEnabled(doc: ConfigDocument, name: string, enabled: boolean): void {
  const entry = requireEntry(ensureSection(doc, "mcp"), name, "MCP server");
  entry.enabled = enabled;
}

export function deleteMcp(doc: ConfigDocument, name: string): void {
  const section = ensureSection(doc, "mcp");
  if (!Object.hasOwn(section, name)) throw new ConfigError("not_found", `MCP server "${name}" not found`);
  delete section[name];
}
