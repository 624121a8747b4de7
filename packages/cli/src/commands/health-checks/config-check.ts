/**
 * Config file checks for the doctor command.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { contractPath, isConfigError, pathExists, type ConfigDocument, type ConfigKind, type ValidationIssue } from "@ocfg/core";
import { validate, validateAuth, validateOhMy } from "../../core/config-validator.js";
import type { AppContext } from "../../core/context.js";
import { isValidSkillName } from "../../core/skill-parser.js";
import { discoverSkills } from "../../core/skill-manager.js";
import { checkForUpdate, APP_VERSION } from "../../core/version-checker.js";
import type { DiagnosticResult } from "./types.js";

const CONFIG_LABELS: Record<ConfigKind, string> = {
  opencode: "OpenCode Config",
  "oh-my-opencode": "Oh My OpenCode Config",
};

/**
 * Turn validator findings into one result: any error fails, warnings warn.
 */
export function issuesResult(name: string, file: string, issues: ValidationIssue[]): DiagnosticResult {
  const errors = issues.filter(i => i.severity === "error");
  const warnings = issues.length - errors.length;
  const shown = contractPath(file);
  if (issues.length === 0) {
    return { name, status: "pass", message: `${shown} is valid` };
  }
  const fixable = issues.filter(i => i.fixable).length;
  return {
    name,
    status: errors.length > 0 ? "fail" : "warn",
    message: `${shown}: ${errors.length} error(s), ${warnings} warning(s)`,
    fix: fixable > 0 ? `Run: ocfg doctor --fix (${fixable} fixable)` : undefined,
    issues,
  };
}

export function checkSettings(ctx: Pick<AppContext, "settingsPath" | "settingsError">): DiagnosticResult {
  if (ctx.settingsError) {
    return {
      name: "Settings",
      status: "warn",
      message: `${contractPath(ctx.settingsPath)} ignored: ${ctx.settingsError}`,
      fix: `Edit ${contractPath(ctx.settingsPath)}`,
    };
  }
  return { name: "Settings", status: "pass", message: "Settings loaded" };
}

/**
 * Loads and validates one config file. The parsed document is returned so
 * later checks can resolve model references against it.
 */
export async function checkConfigFile(
  ctx: Pick<AppContext, "store">,
  kind: ConfigKind,
  opencode?: ConfigDocument,
): Promise<{ result: DiagnosticResult; doc: ConfigDocument }> {
  const name = CONFIG_LABELS[kind];
  const file = ctx.store.pathOf(kind);
  if (!(await pathExists(file))) {
    return {
      result: { name, status: "warn", message: `${contractPath(file)} not found; it is created on the first edit` },
      doc: {},
    };
  }
  let doc: ConfigDocument;
  try {
    doc = await ctx.store.load(kind);
  } catch (error) {
    if (!isConfigError(error)) throw error;
    return {
      result: { name, status: "fail", message: error.message, fix: "Fix the syntax error or run: ocfg backup restore <file>" },
      doc: {},
    };
  }
  const issues = kind === "opencode" ? validate(doc) : validateOhMy(doc, opencode);
  return { result: issuesResult(name, file, issues), doc };
}

export async function checkAuthFile(ctx: Pick<AppContext, "auth">): Promise<DiagnosticResult[]> {
  const file = ctx.auth.authFile;
  if (!(await pathExists(file))) {
    return [{ name: "Credentials", status: "pass", message: `${contractPath(file)} not present` }];
  }
  const { data, error } = await ctx.auth.inspect();
  if (error) {
    return [{ name: "Credentials", status: "fail", message: `${contractPath(file)}: ${error}`, fix: "Fix or restore auth.json" }];
  }

  const results = [issuesResult("Credentials", file, validateAuth(data))];
  if (process.platform !== "win32") {
    const { mode } = await fs.stat(file);
    if ((mode & 0o077) !== 0) {
      results.push({
        name: "Credentials Permissions",
        status: "warn",
        message: `${contractPath(file)} is readable by other users (mode ${(mode & 0o777).toString(8)})`,
        fix: `Run: chmod 600 ${file}`,
      });
    }
  }
  return results;
}

export async function checkSkills(ctx: Pick<AppContext, "paths">): Promise<DiagnosticResult> {
  const skills = await discoverSkills(ctx.paths);
  const broken = skills.filter(s => !s.description || !isValidSkillName(s.name) || s.name !== path.basename(s.path));
  if (broken.length === 0) {
    return { name: "Skills", status: "pass", message: `${skills.length} skill(s) found` };
  }
  return {
    name: "Skills",
    status: "warn",
    message: `Malformed SKILL.md in: ${broken.map(s => contractPath(s.path)).join(", ")}`,
    fix: "Each SKILL.md needs a valid name matching its folder and a description",
  };
}

/** null when update checks are off or no repository is configured */
export async function checkVersion(ctx: Pick<AppContext, "settings">): Promise<DiagnosticResult | null> {
  const { enabled, repo } = ctx.settings.updateCheck;
  if (!enabled || !repo) return null;
  const info = await checkForUpdate(repo, APP_VERSION);
  if (info.updateAvailable && info.latest) {
    return {
      name: "Version",
      status: "warn",
      message: `ocfg ${info.latest} is available (running ${info.current})`,
      fix: info.releaseUrl ? `See ${info.releaseUrl}` : undefined,
    };
  }
  return {
    name: "Version",
    status: "pass",
    message: info.reason ? `Update check skipped: ${info.reason}` : `ocfg ${info.current} is up to date`,
  };
}
