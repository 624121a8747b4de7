/**
 * SKILL.md Parser
 * Parses the SKILL.md format (frontmatter + body)
 */
import { SKILL_NAME_PATTERN } from "@ocfg/core";

export const MAX_SKILL_NAME_LENGTH = 64;

export interface SkillMdMetadata {
  name: string;
  description: string;
  license?: string;
  compatibility?: string;
  allowedTools: string[];
  body: string;
}

function unquote(value: string): string {
  const quoted = /^(["'])(.*)\1$/.exec(value);
  return quoted ? quoted[2] : value;
}

function splitList(value: string): string[] {
  const inner = value.replace(/^\[(.*)\]$/, "$1");
  return inner.split(",").map(t => unquote(t.trim())).filter(Boolean);
}

/**
 * Parse SKILL.md content into structured metadata
 */
export function parseSkillMd(content: string): SkillMdMetadata {
  const normalized = content.replace(/\r\n/g, "\n");
  const result: SkillMdMetadata = {
    name: "",
    description: "",
    allowedTools: [],
    body: normalized,
  };

  const frontmatterMatch = normalized.match(/^---\n([\s\S]*?)\n---\n?([\s\S]*)$/);
  if (!frontmatterMatch) return result;

  const [, frontmatter, body] = frontmatterMatch;
  result.body = body.trim();

  for (const line of frontmatter.split("\n")) {
    const colonIdx = line.indexOf(":");
    if (colonIdx === -1) continue;

    const key = line.slice(0, colonIdx).trim();
    const value = unquote(line.slice(colonIdx + 1).trim());

    switch (key) {
      case "name":
        result.name = value;
        break;
      case "description":
        result.description = value;
        break;
      case "license":
        result.license = value || undefined;
        break;
      case "compatibility":
        result.compatibility = value || undefined;
        break;
      case "allowed-tools":
      case "allowed_tools":
      case "tools":
        result.allowedTools = value ? splitList(value) : [];
        break;
    }
  }

  return result;
}

export function isValidSkillName(name: string): boolean {
  return name.length > 0 && name.length <= MAX_SKILL_NAME_LENGTH && SKILL_NAME_PATTERN.test(name);
}

/** Render frontmatter + body */
export function renderSkillMd(meta: Omit<SkillMdMetadata, "allowedTools"> & { allowedTools?: string[] }): string {
  const lines = ["---", `name: ${meta.name}`, `description: ${meta.description}`];
  if (meta.license) lines.push(`license: ${meta.license}`);
  if (meta.compatibility) lines.push(`compatibility: ${meta.compatibility}`);
  if (meta.allowedTools && meta.allowedTools.length > 0) {
    lines.push(`allowed-tools: ${meta.allowedTools.join(", ")}`);
  }
  lines.push("---", "", meta.body.trim(), "");
  return lines.join("\n");
}
