/**
 * Backups: timestamped copies of config files: {stem}.{YYYYMMDD_HHMMSS}.{tag}.bak
 * A second backup within the same second gets a counter: {YYYYMMDD_HHMMSS}_1.
 */
import { constants as fsConstants } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";

import { ConfigError, type BackupInfo } from "@ocfg/core";
import { mkdirp } from "./fs-helpers.js";

export const DEFAULT_MAX_BACKUPS = 10;

const VALID_TAG = /^[A-Za-z0-9_-]+$/;

// ============================================================================
// Helpers
// ============================================================================

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** Local time as YYYYMMDD_HHMMSS */
export function formatBackupTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function alreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

/** Newest first; numeric so that "_10" sorts after "_9" */
function compareNewestFirst(a: BackupInfo, b: BackupInfo): number {
  return (
    b.timestamp.localeCompare(a.timestamp, undefined, { numeric: true }) ||
    b.file.localeCompare(a.file)
  );
}

/** Config stem of a file: "opencode.jsonc" -> "opencode" */
export function configStem(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

/**
 * Parse a backup file name. Returns null for names that do not have at least
 * the stem, timestamp and tag parts.
 */
export function parseBackupName(file: string, dir: string): BackupInfo | null {
  if (!file.endsWith(".bak")) return null;
  const parts = file.slice(0, -".bak".length).split(".");
  if (parts.length < 3) return null;
  const tag = parts[parts.length - 1];
  const timestamp = parts[parts.length - 2];
  const name = parts.slice(0, -2).join(".");
  return {
    file,
    path: path.join(dir, file),
    name,
    timestamp,
    tag,
    display: `${name} - ${timestamp} (${tag})`,
  };
}

// ============================================================================
// Public API
// ============================================================================

export class BackupManager {
  constructor(
    readonly backupDir: string,
    private readonly maxBackups: number = DEFAULT_MAX_BACKUPS,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Copy `filePath` into the backup directory. Returns null when the source does not exist.
   */
  async createBackup(filePath: string, tag = "auto"): Promise<BackupInfo | null> {
    if (!VALID_TAG.test(tag)) {
      throw new ConfigError(
        "invalid",
        `Invalid backup tag "${tag}": only letters, digits, underscores and hyphens are allowed`,
      );
    }

    try {
      await fs.access(filePath);
    } catch {
      return null;
    }

    await mkdirp(this.backupDir);
    const stamp = formatBackupTimestamp(this.now());
    let file = "";
    for (let n = 0; ; n++) {
      file = `${configStem(filePath)}.${n === 0 ? stamp : `${stamp}_${n}`}.${tag}.bak`;
      try {
        await fs.copyFile(filePath, path.join(this.backupDir, file), fsConstants.COPYFILE_EXCL);
        break;
      } catch (error) {
        if (!alreadyExists(error)) throw error;
      }
    }

    const info = parseBackupName(file, this.backupDir);
    if (!info) throw new Error(`Generated an unparseable backup name: ${file}`);
    await this.prune(info.name);
    return info;
  }

  /**
   * Backups newest first, optionally only those of one config stem.
   */
  async listBackups(configName?: string): Promise<BackupInfo[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.backupDir);
    } catch {
      // backup dir doesn't exist yet
      return [];
    }

    const results: BackupInfo[] = [];
    for (const entry of entries) {
      const info = parseBackupName(entry, this.backupDir);
      if (!info) continue;
      if (configName !== undefined && info.name !== configName) continue;
      results.push(info);
    }

    return results.sort(compareNewestFirst);
  }

  async findBackup(file: string): Promise<BackupInfo> {
    const info = parseBackupName(path.basename(file), this.backupDir);
    if (!info) throw new ConfigError("invalid", `Not a backup file name: ${file}`);
    try {
      await fs.access(info.path);
    } catch {
      throw new ConfigError("not_found", `Backup "${info.file}" not found`);
    }
    return info;
  }

  /**
   * Restore a backup over `targetPath`. The current target is first backed up
   * with tag "before_restore"; that backup is returned (null if there was no target).
   * The target takes the backup's permission bits, so a restored auth.json stays 0600.
   */
  async restoreBackup(file: string, targetPath: string): Promise<BackupInfo | null> {
    const backup = await this.findBackup(file);
    // read first: the safety backup may prune the one being restored
    const content = await fs.readFile(backup.path);
    const mode = (await fs.stat(backup.path)).mode & 0o777;
    const safety = await this.createBackup(targetPath, "before_restore");
    await mkdirp(path.dirname(targetPath));
    await fs.writeFile(targetPath, content, { mode });
    if (process.platform !== "win32") await fs.chmod(targetPath, mode);
    return safety;
  }

  async deleteBackup(file: string): Promise<void> {
    const backup = await this.findBackup(file);
    await fs.rm(backup.path);
  }

  private async prune(configName: string): Promise<void> {
    const backups = await this.listBackups(configName);
    for (const old of backups.slice(this.maxBackups)) {
      await fs.rm(old.path, { force: true });
    }
  }
}
