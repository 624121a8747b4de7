/**
 * Masks secrets for display and finds plaintext secrets stored in config files.
 */
import { isEnvReference, isPlainObject, type ConfigDocument } from "@ocfg/core";
import { readSection } from "./config-sections.js";

export interface SecretFinding {
  /** Dotted path to the value */
  path: string;
  key: string;
  masked: string;
}

/** Known secret key name patterns (case-insensitive) */
const SECRET_KEY_PATTERNS = /(?:key|secret|token|password|credential|auth)/i;

/** Known secret value prefixes */
const SECRET_VALUE_PREFIXES = [
  "sk-",
  "sk-ant-",
  "pk-",
  "ghp_",
  "gho_",
  "xai-",
  "gsk_",
  "AIza",
  "AKIA",
  "pplx-",
  "glpat-",
];

/**
 * First 4 and last 4 characters for values of 8+ characters.
 */
export function maskApiKey(value: string): string {
  if (!value) return "";
  if (value.length < 8) return "****";
  return `${value.slice(0, 4)}****${value.slice(-4)}`;
}

/**
 * Returns true if the key/value pair looks like a literal secret.
 */
export function isLikelySecret(key: string, value: string): boolean {
  if (isEnvReference(value)) return false;
  if (!value || value.length < 8) return false;
  if (SECRET_KEY_PATTERNS.test(key)) return true;
  return SECRET_VALUE_PREFIXES.some(prefix => value.startsWith(prefix));
}

function scanRecord(record: unknown, basePath: string, findings: SecretFinding[]): void {
  if (!isPlainObject(record)) return;
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === "string" && isLikelySecret(key, value)) {
      findings.push({ path: `${basePath}.${key}`, key, masked: maskApiKey(value) });
    }
  }
}

/**
 * Literal secrets in provider options, MCP environments and MCP headers.
 */
export function findPlaintextSecrets(doc: ConfigDocument): SecretFinding[] {
  const findings: SecretFinding[] = [];
  for (const [name, provider] of Object.entries(readSection(doc, "provider"))) {
    if (isPlainObject(provider)) scanRecord(provider.options, `provider.${name}.options`, findings);
  }
  for (const [name, server] of Object.entries(readSection(doc, "mcp"))) {
    if (!isPlainObject(server)) continue;
    scanRecord(server.environment, `mcp.${name}.environment`, findings);
    scanRecord(server.headers, `mcp.${name}.headers`, findings);
  }
  return findings;
}
