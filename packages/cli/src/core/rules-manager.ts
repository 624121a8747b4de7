/**
 * Instructions, AGENTS.md rule files and compaction settings
 */
import * as fs from "node:fs/promises";
import {
  ConfigError,
  compactionSchema,
  isPlainObject,
  type CompactionConfig,
  type ConfigDocument,
  type ConfigLocation,
} from "@ocfg/core";
import type { ConfigPaths } from "./config-paths.js";
import { ensureSection } from "./config-sections.js";
import { readFileIfExists, writeFileEnsured } from "./fs-helpers.js";

// --- Instructions ---

export function listInstructions(doc: ConfigDocument): string[] {
  const value = doc.instructions;
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === "string");
}

/** Returns false when the instruction was already listed */
export function addInstruction(doc: ConfigDocument, instruction: string): boolean {
  const entry = instruction.trim();
  if (!entry) throw new ConfigError("invalid", "Instruction path is required");
  const current = listInstructions(doc);
  if (current.includes(entry)) {
    doc.instructions = current;
    return false;
  }
  doc.instructions = [...current, entry];
  return true;
}

export function removeInstruction(doc: ConfigDocument, instruction: string): void {
  const current = listInstructions(doc);
  if (!current.includes(instruction)) {
    throw new ConfigError("not_found", `Instruction "${instruction}" not found`);
  }
  const remaining = current.filter(i => i !== instruction);
  if (remaining.length > 0) doc.instructions = remaining;
  else delete doc.instructions;
}

// --- AGENTS.md ---

export const AGENTS_MD_TEMPLATE = `# Project Rules

## Code Style
- Follow the existing conventions of the codebase
- Keep functions small and focused

## Testing
- Add tests for new behavior
- Run the test suite before committing

## Notes
- Describe anything an agent must know about this project here
`;

export interface AgentsMdFile {
  location: ConfigLocation;
  path: string;
  exists: boolean;
  content: string;
}

export async function readAgentsMd(paths: ConfigPaths, location: ConfigLocation): Promise<AgentsMdFile> {
  const filePath = paths.agentsMd(location);
  const content = await readFileIfExists(filePath);
  return { location, path: filePath, exists: content !== null, content: content ?? "" };
}

export async function writeAgentsMd(paths: ConfigPaths, location: ConfigLocation, content: string): Promise<string> {
  const filePath = paths.agentsMd(location);
  await writeFileEnsured(filePath, content.endsWith("\n") ? content : `${content}\n`);
  return filePath;
}

export async function deleteAgentsMd(paths: ConfigPaths, location: ConfigLocation): Promise<void> {
  const filePath = paths.agentsMd(location);
  if ((await readFileIfExists(filePath)) === null) {
    throw new ConfigError("not_found", `No AGENTS.md at ${filePath}`);
  }
  await fs.unlink(filePath);
}

// --- Compaction ---

export function getCompaction(doc: ConfigDocument): Required<Pick<CompactionConfig, "auto" | "prune">> {
  const raw = doc.compaction;
  const parsed = compactionSchema.safeParse(isPlainObject(raw) ? raw : {});
  const value: CompactionConfig = parsed.success ? parsed.data : {};
  return { auto: value.auto ?? true, prune: value.prune ?? true };
}

export function setCompaction(doc: ConfigDocument, partial: Partial<Record<"auto" | "prune", boolean>>): void {
  const section = ensureSection(doc, "compaction");
  const current = getCompaction(doc);
  section.auto = partial.auto ?? current.auto;
  section.prune = partial.prune ?? current.prune;
}
