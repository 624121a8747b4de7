/**
 * Config file locations, honoring settings overrides.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import {
  KNOWN_PATHS,
  expandPath,
  resolvePath,
  type AppSettings,
  type ConfigKind,
  type ConfigLocation,
  type SkillSource,
} from "@ocfg/core";

export interface SkillSearchPath {
  source: SkillSource;
  dir: string;
}

export interface ConfigPaths {
  opencodeDir: string;
  backupDir: string;
  authFile: string;
  projectDir: string;
  codexConfig: string;
  geminiConfig: string;
  ccSwitchConfig: string;
  /** Resolved at call time so a newly created .jsonc is picked up */
  configFile(kind: ConfigKind): string;
  claudeSettings(): string;
  claudeProviders(): string;
  skillRoot(location: ConfigLocation): string;
  agentsMd(location: ConfigLocation): string;
  skillSearchPaths(): SkillSearchPath[];
}

/**
 * `<base>.jsonc` wins when it exists, then `<base>.json`.
 * When neither exists the `.json` path is returned for creation.
 */
export function resolveConfigFile(dir: string, baseName: string): string {
  const jsoncPath = path.join(dir, `${baseName}.jsonc`);
  const jsonPath = path.join(dir, `${baseName}.json`);
  if (fs.existsSync(jsoncPath)) return jsoncPath;
  return jsonPath;
}

function requirePath(resolved: string | null, label: string): string {
  if (resolved === null) throw new Error(`No path known for ${label}`);
  return resolved;
}

export function createConfigPaths(settings: AppSettings, projectDir: string = process.cwd()): ConfigPaths {
  const opencodeDir = expandPath(settings.opencodeDir ?? KNOWN_PATHS.opencodeDir);
  const claudeDir = expandPath(KNOWN_PATHS.claudeDir);
  const backupDir = settings.backupDir ? expandPath(settings.backupDir) : path.join(opencodeDir, "backups");
  const authFile = settings.authPath
    ? expandPath(settings.authPath)
    : requirePath(resolvePath(KNOWN_PATHS.auth), "auth.json");

  return {
    opencodeDir,
    backupDir,
    authFile,
    projectDir,
    codexConfig: expandPath(KNOWN_PATHS.codexConfig),
    geminiConfig: expandPath(KNOWN_PATHS.geminiConfig),
    ccSwitchConfig: expandPath(KNOWN_PATHS.ccSwitchConfig),
    configFile: (kind) => resolveConfigFile(opencodeDir, kind),
    claudeSettings: () => resolveConfigFile(claudeDir, "settings"),
    claudeProviders: () => resolveConfigFile(claudeDir, "providers"),
    skillRoot: (location) =>
      location === "global"
        ? path.join(opencodeDir, "skill")
        : path.join(projectDir, ".opencode", "skill"),
    agentsMd: (location) =>
      location === "global" ? path.join(opencodeDir, "AGENTS.md") : path.join(projectDir, "AGENTS.md"),
    skillSearchPaths: () => [
      { source: "opencode-global", dir: path.join(opencodeDir, "skill") },
      { source: "opencode-project", dir: path.join(projectDir, ".opencode", "skill") },
      { source: "claude-global", dir: expandPath(KNOWN_PATHS.claudeSkills) },
      { source: "claude-project", dir: path.join(projectDir, ".claude", "skills") },
    ],
  };
}
