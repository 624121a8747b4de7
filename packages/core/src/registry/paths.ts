import { expandPath } from "../utils.js";

export interface PlatformPaths {
  darwin: string;
  linux: string;
  win32: string;
}

export type PathSpec = string | PlatformPaths | null;

function isPlatform(p: string): p is keyof PlatformPaths {
  return p === "darwin" || p === "linux" || p === "win32";
}

export function resolvePath(pathSpec: PathSpec, platform: string = process.platform): string | null {
  if (pathSpec === null) return null;
  if (typeof pathSpec === "string") return expandPath(pathSpec);
  const p = isPlatform(platform) ? pathSpec[platform] : pathSpec.linux;
  return expandPath(p);
}

/** Known locations of files this editor reads or writes */
export const KNOWN_PATHS = {
  opencodeDir: "~/.config/opencode",
  auth: {
    darwin: "~/.local/share/opencode/auth.json",
    linux: "~/.local/share/opencode/auth.json",
    win32: "~/AppData/Local/opencode/auth.json",
  },
  claudeDir: "~/.claude",
  claudeSkills: "~/.claude/skills",
  codexConfig: "~/.codex/config.toml",
  geminiConfig: "~/.config/gemini/config.json",
  ccSwitchConfig: "~/.cc-switch/config.json",
} satisfies Record<string, PathSpec>;
