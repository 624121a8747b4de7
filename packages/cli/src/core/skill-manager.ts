/**
 * Skill discovery and creation.
 * A skill is a folder holding SKILL.md; the folder name is the skill name.
 */
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ConfigError, pathExists, type ConfigLocation, type SkillInfo } from "@ocfg/core";
import type { ConfigPaths } from "./config-paths.js";
import { readFileIfExists, writeFileEnsured } from "./fs-helpers.js";
import { MAX_SKILL_NAME_LENGTH, isValidSkillName, parseSkillMd, renderSkillMd } from "./skill-parser.js";

export const SKILL_FILE = "SKILL.md";

export const DEFAULT_SKILL_BODY = "## What I do\n- ...\n\n## Instructions\n- ...";

export interface CreateSkillInput {
  name: string;
  description: string;
  body?: string;
  license?: string;
  compatibility?: string;
  location: ConfigLocation;
}

export function assertSkillName(name: string): void {
  if (!isValidSkillName(name)) {
    throw new ConfigError(
      "invalid",
      `Invalid skill name "${name}": lowercase letters, digits and single hyphens, at most ${MAX_SKILL_NAME_LENGTH} characters`,
    );
  }
}

async function listSkillDirs(root: string): Promise<string[]> {
  if (!(await pathExists(root))) return [];
  const entries = await fs.readdir(root, { withFileTypes: true });
  return entries.filter(e => e.isDirectory() || e.isSymbolicLink()).map(e => e.name).sort();
}

/**
 * Every skill in every search location. When the same name exists in more
 * than one place, each copy is reported with its own source.
 */
export async function discoverSkills(paths: ConfigPaths): Promise<SkillInfo[]> {
  const skills: SkillInfo[] = [];
  for (const { source, dir } of paths.skillSearchPaths()) {
    for (const folder of await listSkillDirs(dir)) {
      const skillDir = path.join(dir, folder);
      const content = await readFileIfExists(path.join(skillDir, SKILL_FILE));
      if (content === null) continue;
      const meta = parseSkillMd(content);
      skills.push({ name: meta.name || folder, description: meta.description, source, path: skillDir });
    }
  }
  return skills;
}

export async function readSkill(paths: ConfigPaths, name: string, location: ConfigLocation) {
  assertSkillName(name);
  const filePath = path.join(paths.skillRoot(location), name, SKILL_FILE);
  const content = await readFileIfExists(filePath);
  if (content === null) throw new ConfigError("not_found", `Skill "${name}" not found (${location})`);
  return { path: filePath, content, ...parseSkillMd(content) };
}

export async function createSkill(paths: ConfigPaths, input: CreateSkillInput): Promise<string> {
  const name = input.name.trim();
  assertSkillName(name);
  const description = input.description.trim();
  if (!description) throw new ConfigError("invalid", "Skill description is required");

  const skillDir = path.join(paths.skillRoot(input.location), name);
  if (await pathExists(skillDir)) {
    throw new ConfigError("duplicate", `Skill "${name}" already exists at ${skillDir}`);
  }

  const filePath = path.join(skillDir, SKILL_FILE);
  await writeFileEnsured(
    filePath,
    renderSkillMd({
      name,
      description,
      license: input.license?.trim() || undefined,
      compatibility: input.compatibility?.trim() || undefined,
      body: input.body?.trim() || DEFAULT_SKILL_BODY,
    }),
  );
  return filePath;
}

/** Overwrite SKILL.md of an existing skill */
export async function saveSkill(
  paths: ConfigPaths,
  name: string,
  location: ConfigLocation,
  content: string,
): Promise<string> {
  assertSkillName(name);
  const existing = await readSkill(paths, name, location);
  const meta = parseSkillMd(content);
  if (meta.name !== name) {
    throw new ConfigError("invalid", `Frontmatter name "${meta.name}" must match the folder name "${name}"`);
  }
  await writeFileEnsured(existing.path, content);
  return existing.path;
}
