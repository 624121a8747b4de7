/**
 * Tool permissions in opencode.json → permission.
 * `permission.skill` holds per-skill patterns and is managed separately.
 */
import {
  ConfigError,
  isPlainObject,
  permissionLevelSchema,
  type ConfigDocument,
  type PermissionLevel,
} from "@ocfg/core";
import { ensureChild, ensureSection, readSection, requireName } from "./config-sections.js";

const SKILL_KEY = "skill";

/** Tools offered by the quick-add action */
export const COMMON_TOOLS = ["read", "edit", "write", "bash", "glob", "grep", "webfetch", "task", "todowrite"];

export interface PermissionEntry {
  tool: string;
  /** null when the stored value is not a valid level (or is a pattern map) */
  level: PermissionLevel | null;
}

export interface SkillPermissionEntry {
  pattern: string;
  level: PermissionLevel | null;
}

export function parseLevel(level: string): PermissionLevel {
  const parsed = permissionLevelSchema.safeParse(level);
  if (!parsed.success) {
    throw new ConfigError("invalid", `Invalid permission level "${level}": use allow, ask or deny`);
  }
  return parsed.data;
}

function levelOf(value: unknown): PermissionLevel | null {
  const parsed = permissionLevelSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export function listPermissions(doc: ConfigDocument): PermissionEntry[] {
  return Object.entries(readSection(doc, "permission"))
    .filter(([tool]) => tool !== SKILL_KEY)
    .map(([tool, value]) => ({ tool, level: levelOf(value) }));
}

export function setPermission(doc: ConfigDocument, tool: string, level: string): void {
  const name = requireName(tool, "Tool");
  if (name === SKILL_KEY) throw new ConfigError("invalid", 'Use skill permissions to edit "skill"');
  ensureSection(doc, "permission")[name] = parseLevel(level);
}

export function deletePermission(doc: ConfigDocument, tool: string): void {
  const section = ensureSection(doc, "permission");
  if (tool === SKILL_KEY || !Object.hasOwn(section, tool)) {
    throw new ConfigError("not_found", `Permission "${tool}" not found`);
  }
  delete section[tool];
}

/** Adds `allow` for common tools not configured yet; returns the tools added */
export function quickAddPermissions(doc: ConfigDocument, tools: string[] = COMMON_TOOLS): string[] {
  const section = ensureSection(doc, "permission");
  const added = tools.filter(tool => tool !== SKILL_KEY && !Object.hasOwn(section, tool));
  for (const tool of added) section[tool] = "allow";
  return added;
}

// --- Skill patterns ---

/** A plain string under permission.skill applies to every skill */
export function listSkillPermissions(doc: ConfigDocument): SkillPermissionEntry[] {
  const value = readSection(doc, "permission")[SKILL_KEY];
  if (typeof value === "string") return [{ pattern: "*", level: levelOf(value) }];
  if (!isPlainObject(value)) return [];
  return Object.entries(value).map(([pattern, level]) => ({ pattern, level: levelOf(level) }));
}

export function setSkillPermission(doc: ConfigDocument, pattern: string, level: string): void {
  const key = requireName(pattern, "Skill pattern");
  const parsedLevel = parseLevel(level);
  const section = ensureSection(doc, "permission");
  const current = section[SKILL_KEY];
  if (typeof current === "string") {
    const wildcard = levelOf(current);
    section[SKILL_KEY] = wildcard ? { "*": wildcard } : {};
  }
  ensureChild(section, SKILL_KEY)[key] = parsedLevel;
}

export function deleteSkillPermission(doc: ConfigDocument, pattern: string): void {
  const section = ensureSection(doc, "permission");
  const current = section[SKILL_KEY];
  if (typeof current === "string" && pattern === "*") {
    delete section[SKILL_KEY];
    return;
  }
  if (!isPlainObject(current) || !Object.hasOwn(current, pattern)) {
    throw new ConfigError("not_found", `Skill permission "${pattern}" not found`);
  }
  delete current[pattern];
  if (Object.keys(current).length === 0) delete section[SKILL_KEY];
}
