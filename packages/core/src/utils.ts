/**
 * Utility functions for ocfg
 */

import * as os from "node:os";
import * as path from "node:path";

export type EnvMap = Record<string, string | undefined>;

/**
 * Expand ~ to home directory in path
 */
export function expandPath(p: string): string {
  if (p.startsWith("~")) {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

/**
 * Contract home directory to ~ in path
 */
export function contractPath(p: string): string {
  const home = os.homedir();
  if (p.startsWith(home)) {
    return "~" + p.slice(home.length);
  }
  return p;
}

/**
 * Get the ocfg state directory (settings, traces)
 */
export function getAppHome(): string {
  return expandPath("~/.ocfg");
}

/** record[key] for own keys only, so names like "constructor" read as absent */
export function ownEntry<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * True if the value is a pure environment reference rather than a literal secret
 */
export function isEnvReference(value: string): boolean {
  return /^\{env:[A-Za-z_][A-Za-z0-9_]*\}$/.test(value) || /^\$\{[A-Za-z_][A-Za-z0-9_]*\}$/.test(value);
}

/**
 * Round a number to a fixed count of decimals
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Split a command line on whitespace. Single or double quotes group words.
 */
export function splitCommand(line: string): string[] {
  const parts: string[] = [];
  let current = "";
  let started = false;
  let quote: string | null = null;
  for (const ch of line) {
    if (quote) {
      if (ch === quote) quote = null;
      else current += ch;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      started = true;
    } else if (/\s/.test(ch)) {
      if (started) parts.push(current);
      current = "";
      started = false;
    } else {
      current += ch;
      started = true;
    }
  }
  if (started) parts.push(current);
  return parts;
}

/**
 * Format a native provider credential status for display
 */
export function formatStatus(status: "configured" | "env" | "none"): string {
  const statusMap = {
    configured: "\u001b[32m● configured\u001b[0m",
    env: "\u001b[33m● env\u001b[0m",
    none: "\u001b[90m○ none\u001b[0m",
  };
  return statusMap[status];
}

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Check if a path exists
 */
export async function pathExists(p: string): Promise<boolean> {
  const fs = await import("node:fs/promises");
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

