/**
 * Everything a command or request handler needs, wired from settings
 */
import * as path from "node:path";
import { ConfigError, type AppSettings, type BackupInfo, type ConfigKind } from "@ocfg/core";
import { AuthManager } from "./auth-manager.js";
import { BackupManager } from "./backup-manager.js";
import { createConfigPaths, type ConfigPaths } from "./config-paths.js";
import { ConfigStore } from "./config-store.js";
import { loadSettings } from "./settings.js";

export interface AppContext {
  settings: AppSettings;
  settingsPath: string;
  /** Set when settings.yaml could not be used */
  settingsError?: string;
  paths: ConfigPaths;
  store: ConfigStore;
  backups: BackupManager;
  auth: AuthManager;
}

export interface ContextOptions {
  projectDir?: string;
  settingsPath?: string;
}

export function buildContext(settings: AppSettings, projectDir: string = process.cwd()): Omit<AppContext, "settingsPath"> {
  const paths = createConfigPaths(settings, path.resolve(projectDir));
  const backups = new BackupManager(paths.backupDir, settings.maxBackups);
  return {
    settings,
    paths,
    backups,
    store: new ConfigStore(paths, backups),
    auth: new AuthManager(paths.authFile, backups),
  };
}

export async function createContext(options: ContextOptions = {}): Promise<AppContext> {
  const loaded = await loadSettings(options.settingsPath);
  return {
    ...buildContext(loaded.settings, options.projectDir),
    settingsPath: loaded.path,
    settingsError: loaded.error,
  };
}

const CONFIG_KINDS: readonly ConfigKind[] = ["opencode", "oh-my-opencode"];

/** The live file a backup belongs to */
export function resolveBackupTarget(ctx: Pick<AppContext, "paths" | "store">, backup: BackupInfo): string {
  if (backup.name === "auth") return ctx.paths.authFile;
  const kind = CONFIG_KINDS.find(k => k === backup.name);
  if (!kind) throw new ConfigError("invalid", `No known config file for backup "${backup.file}"`);
  return ctx.store.pathOf(kind);
}
