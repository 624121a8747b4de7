/**
 * Defensive access to top-level sections of a config document.
 * A section that has the wrong type reads as empty and is replaced on write.
 */
import { z } from "zod";
import { ConfigError, isPlainObject, type ConfigDocument } from "@ocfg/core";

export function readSection(doc: ConfigDocument, key: string): Record<string, unknown> {
  const value = doc[key];
  return isPlainObject(value) ? value : {};
}

export function ensureSection(doc: ConfigDocument, key: string): Record<string, unknown> {
  const value = doc[key];
  if (isPlainObject(value)) return value;
  const section: Record<string, unknown> = {};
  doc[key] = section;
  return section;
}

/** Like ensureSection, one level down: doc[key][child] */
export function ensureChild(parent: Record<string, unknown>, child: string): Record<string, unknown> {
  const value = parent[child];
  if (isPlainObject(value)) return value;
  const created: Record<string, unknown> = {};
  parent[child] = created;
  return created;
}

export interface ParsedEntry<T> {
  name: string;
  /** Null when the raw value does not match the schema */
  value: T | null;
  raw: unknown;
}

export function parseEntries<S extends z.ZodTypeAny>(
  section: Record<string, unknown>,
  schema: S,
): ParsedEntry<z.infer<S>>[] {
  return Object.entries(section).map(([name, raw]) => {
    const parsed = schema.safeParse(raw);
    return { name, value: parsed.success ? parsed.data : null, raw };
  });
}

export function requireName(name: string, kind: string): string {
  const trimmed = name.trim();
  if (!trimmed) throw new ConfigError("invalid", `${kind} name is required`);
  if (trimmed === "__proto__") throw new ConfigError("invalid", `${kind} name "${trimmed}" is reserved`);
  return trimmed;
}

/** Entry as a mutable object, or a not-found error */
export function requireEntry(section: Record<string, unknown>, name: string, kind: string): Record<string, unknown> {
  if (!Object.hasOwn(section, name)) throw new ConfigError("not_found", `${kind} "${name}" not found`);
  const value = section[name];
  if (isPlainObject(value)) return value;
  const replaced: Record<string, unknown> = {};
  section[name] = replaced;
  return replaced;
}

export function assertAbsent(section: Record<string, unknown>, name: string, kind: string): void {
  if (Object.hasOwn(section, name)) throw new ConfigError("duplicate", `${kind} "${name}" already exists`);
}

/** Set `key` when `value` is meaningful, otherwise delete it */
export function setOrDelete(target: Record<string, unknown>, key: string, value: unknown): void {
  const empty =
    value === undefined ||
    value === "" ||
    (isPlainObject(value) && Object.keys(value).length === 0);
  if (empty) delete target[key];
  else target[key] = value;
}
