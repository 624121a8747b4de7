/**
 * Minimal TOML reader for Codex-style config.toml files.
 * Handles [section] / [a.b] headers, strings, numbers, booleans and single-line
 * arrays of those. Multi-line strings, inline tables and arrays of tables are
 * not supported; such lines are skipped.
 */

export type TomlScalar = string | number | boolean;
export type TomlValue = TomlScalar | TomlScalar[] | TomlTable;
export interface TomlTable {
  [key: string]: TomlValue;
}

function stripComment(text: string): string {
  let quote: string | null = null;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === "\\" && quote === '"') i++;
      else if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === "#") {
      return text.slice(0, i).trim();
    }
  }
  return text.trim();
}

function unescapeBasic(s: string): string {
  return s.replace(/\\(["\\nt])/g, (_m, c: string) => (c === "n" ? "\n" : c === "t" ? "\t" : c));
}

function splitArrayItems(inner: string): string[] {
  const items: string[] = [];
  let current = "";
  let quote: string | null = null;
  for (const ch of inner) {
    if (quote) {
      if (ch === quote) quote = null;
      current += ch;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
    } else if (ch === ",") {
      items.push(current.trim());
      current = "";
    } else {
      current += ch;
    }
  }
  if (current.trim()) items.push(current.trim());
  return items;
}

function parseScalar(raw: string): TomlScalar | undefined {
  if (raw.startsWith('"') && raw.endsWith('"') && raw.length >= 2) return unescapeBasic(raw.slice(1, -1));
  if (raw.startsWith("'") && raw.endsWith("'") && raw.length >= 2) return raw.slice(1, -1);
  if (raw === "true") return true;
  if (raw === "false") return false;
  const num = Number(raw.replace(/_/g, ""));
  if (raw !== "" && Number.isFinite(num)) return num;
  return undefined;
}

export function parseTomlValue(raw: string): TomlScalar | TomlScalar[] | undefined {
  if (raw.startsWith("[") && raw.endsWith("]")) {
    const items = splitArrayItems(raw.slice(1, -1)).map(parseScalar);
    return items.every((v): v is TomlScalar => v !== undefined) ? items : undefined;
  }
  return parseScalar(raw);
}

function unquoteKey(key: string): string {
  const trimmed = key.trim();
  return /^(["']).*\1$/.test(trimmed) ? trimmed.slice(1, -1) : trimmed;
}

function tableAt(root: TomlTable, pathParts: string[]): TomlTable {
  let table = root;
  for (const part of pathParts) {
    const next = table[part];
    if (typeof next === "object" && next !== null && !Array.isArray(next)) {
      table = next;
    } else {
      const created: TomlTable = {};
      table[part] = created;
      table = created;
    }
  }
  return table;
}

export function parseToml(content: string): TomlTable {
  const root: TomlTable = {};
  let current = root;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = stripComment(rawLine);
    if (!line) continue;

    const header = /^\[([^[\]]+)\]$/.exec(line);
    if (header) {
      current = tableAt(root, header[1].split(".").map(unquoteKey));
      continue;
    }

    const eq = line.indexOf("=");
    if (eq <= 0) continue;
    const key = unquoteKey(line.slice(0, eq));
    const value = parseTomlValue(line.slice(eq + 1).trim());
    if (key && value !== undefined) current[key] = value;
  }
  return root;
}
