/**
 * SkillInstaller: install skills from a local folder or from GitHub
 */
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ConfigError, expandPath, pathExists, type ConfigLocation } from "@ocfg/core";
import type { ConfigPaths } from "./config-paths.js";
import { copyDirRecursive, writeFileEnsured } from "./fs-helpers.js";
import { parseSkillMd } from "./skill-parser.js";
import { SKILL_FILE, assertSkillName } from "./skill-manager.js";

export const TIMEOUT_GITHUB_RAW = 15_000;

const GITHUB_NAME_RE = /^[A-Za-z0-9_.-]+$/;

export interface GitHubSkillSource {
  owner: string;
  repo: string;
  /** Folder inside the repo that holds SKILL.md ("" for the root) */
  path: string;
  /** Branch, tag or commit. Unset tries main, then master. */
  ref?: string;
}

export interface InstallOptions {
  location: ConfigLocation;
  force?: boolean;
}

export interface InstallResult {
  name: string;
  path: string;
  source: "local" | "github";
  files: string[];
  replaced: boolean;
}

function trimSkillFile(p: string): string {
  const parts = p.split("/").filter(Boolean);
  if (parts[parts.length - 1] === SKILL_FILE) parts.pop();
  return parts.join("/");
}

/**
 * Accepts `owner/repo[/path][@ref]` or a github.com URL
 * (`/owner/repo`, `/owner/repo/tree/<ref>/<path>`, `/owner/repo/blob/<ref>/<path>/SKILL.md`).
 */
export function parseGitHubSource(source: string): GitHubSkillSource | null {
  const trimmed = source.trim();
  const url = /^https?:\/\/github\.com\/([^/]+)\/([^/#?]+)(?:\/(?:tree|blob)\/([^/]+)(?:\/([^#?]*))?)?/.exec(trimmed);
  if (url) {
    const [, owner, rawRepo, ref, rest] = url;
    const repo = rawRepo.replace(/\.git$/, "");
    if (!GITHUB_NAME_RE.test(owner) || !GITHUB_NAME_RE.test(repo)) return null;
    return { owner, repo, path: trimSkillFile(rest ?? ""), ref };
  }

  const short = /^([^/@\s]+)\/([^/@\s]+)((?:\/[^@\s]+)*)(?:@(\S+))?$/.exec(trimmed);
  if (!short) return null;
  const [, owner, repo, rest, ref] = short;
  if (!GITHUB_NAME_RE.test(owner) || !GITHUB_NAME_RE.test(repo)) return null;
  return { owner, repo, path: trimSkillFile(rest), ref };
}

export function rawSkillUrl(src: GitHubSkillSource, ref: string): string {
  const filePath = src.path ? `${src.path}/${SKILL_FILE}` : SKILL_FILE;
  return `https://raw.githubusercontent.com/${src.owner}/${src.repo}/${ref}/${filePath}`;
}

export async function fetchSkillMd(src: GitHubSkillSource): Promise<string> {
  const refs = src.ref ? [src.ref] : ["main", "master"];
  let lastStatus = 0;
  for (const ref of refs) {
    const url = rawSkillUrl(src, ref);
    const res = await fetch(url, { signal: AbortSignal.timeout(TIMEOUT_GITHUB_RAW) });
    if (res.ok) return res.text();
    lastStatus = res.status;
    if (res.status !== 404) break;
  }
  throw new Error(
    `Could not download ${SKILL_FILE} from ${src.owner}/${src.repo}${src.path ? `/${src.path}` : ""} (HTTP ${lastStatus})`,
  );
}

function skillNameFrom(content: string, origin: string): string {
  const meta = parseSkillMd(content);
  if (!meta.name) throw new ConfigError("invalid", `${SKILL_FILE} from ${origin} has no name in its frontmatter`);
  assertSkillName(meta.name);
  return meta.name;
}

async function prepareTarget(paths: ConfigPaths, name: string, options: InstallOptions): Promise<{ dir: string; replaced: boolean }> {
  const dir = path.join(paths.skillRoot(options.location), name);
  const exists = await pathExists(dir);
  if (exists && !options.force) {
    throw new ConfigError("duplicate", `Skill "${name}" is already installed; use force to replace it`);
  }
  if (exists) await fs.rm(dir, { recursive: true, force: true });
  return { dir, replaced: exists };
}

async function realpathOrResolve(p: string): Promise<string> {
  return (await pathExists(p)) ? fs.realpath(p) : path.resolve(p);
}

function isSameOrNested(a: string, b: string): boolean {
  const rel = path.relative(a, b);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

async function installFromLocal(paths: ConfigPaths, folder: string, options: InstallOptions): Promise<InstallResult> {
  const content = await fs.readFile(path.join(folder, SKILL_FILE), "utf-8");
  const name = skillNameFrom(content, folder);
  // replacing the target must never delete the folder being copied
  const source = await fs.realpath(folder);
  const target = await realpathOrResolve(path.join(paths.skillRoot(options.location), name));
  if (isSameOrNested(source, target) || isSameOrNested(target, source)) {
    throw new ConfigError("invalid", `Cannot install ${folder} over itself: it overlaps ${target}`);
  }
  const { dir, replaced } = await prepareTarget(paths, name, options);
  const files = await copyDirRecursive(folder, dir);
  return { name, path: dir, source: "local", files: files.sort(), replaced };
}

async function installFromGitHub(paths: ConfigPaths, src: GitHubSkillSource, options: InstallOptions): Promise<InstallResult> {
  const content = await fetchSkillMd(src);
  const name = skillNameFrom(content, `${src.owner}/${src.repo}`);
  const { dir, replaced } = await prepareTarget(paths, name, options);
  await writeFileEnsured(path.join(dir, SKILL_FILE), content);
  return { name, path: dir, source: "github", files: [SKILL_FILE], replaced };
}

/**
 * A source that is an existing folder with SKILL.md installs locally;
 * anything else is read as a GitHub reference.
 */
export async function installSkill(paths: ConfigPaths, source: string, options: InstallOptions): Promise<InstallResult> {
  const local = path.resolve(paths.projectDir, expandPath(source.trim()));
  if (await pathExists(path.join(local, SKILL_FILE))) {
    return installFromLocal(paths, local, options);
  }
  if (await pathExists(local)) {
    throw new ConfigError("invalid", `${local} has no ${SKILL_FILE}`);
  }
  const github = parseGitHubSource(source);
  if (!github) {
    throw new ConfigError("invalid", `"${source}" is neither a skill folder nor a GitHub reference (owner/repo[/path][@ref])`);
  }
  return installFromGitHub(paths, github, options);
}

export async function uninstallSkill(paths: ConfigPaths, name: string, location: ConfigLocation): Promise<string> {
  assertSkillName(name);
  const dir = path.join(paths.skillRoot(location), name);
  if (!(await pathExists(dir))) throw new ConfigError("not_found", `Skill "${name}" not found (${location})`);
  await fs.rm(dir, { recursive: true, force: true });
  return dir;
}
