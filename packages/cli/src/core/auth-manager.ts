/**
 * AuthManager: credential records in auth.json, one per provider id
 */
import * as fs from "node:fs/promises";
import {
  ConfigError,
  apiAuthSchema,
  authEntrySchema,
  legacyAuthSchema,
  oauthAuthSchema,
  wellKnownAuthSchema,
  ownEntry,
  pathExists,
  type AuthData,
  type AuthEntry,
} from "@ocfg/core";
import type { BackupManager } from "./backup-manager.js";
import { parseJsonc, saveJson } from "./config-store.js";
import { readFileIfExists } from "./fs-helpers.js";
import { maskApiKey } from "./secret-mask.js";

export const AUTH_FILE_MODE = 0o600;

export interface AuthReadResult {
  data: AuthData;
  /** Set when the file exists but could not be used */
  error?: string;
}

export interface AuthSummary {
  providerId: string;
  type: "api" | "oauth" | "wellknown" | "legacy" | "unknown";
  masked: string;
}

/** The usable secret of a record: key, legacy apiKey, or the oauth access token */
export function getApiKey(entry: unknown): string | undefined {
  const api = apiAuthSchema.safeParse(entry);
  if (api.success) return api.data.key;
  const wellKnown = wellKnownAuthSchema.safeParse(entry);
  if (wellKnown.success) return wellKnown.data.key;
  const oauth = oauthAuthSchema.safeParse(entry);
  if (oauth.success) return oauth.data.access;
  const legacy = legacyAuthSchema.safeParse(entry);
  return legacy.success ? legacy.data.apiKey : undefined;
}

export function authEntryType(entry: unknown): AuthSummary["type"] {
  if (apiAuthSchema.safeParse(entry).success) return "api";
  if (wellKnownAuthSchema.safeParse(entry).success) return "wellknown";
  if (oauthAuthSchema.safeParse(entry).success) return "oauth";
  if (legacyAuthSchema.safeParse(entry).success) return "legacy";
  return "unknown";
}

export class AuthManager {
  constructor(
    readonly authFile: string,
    private readonly backups: BackupManager,
  ) {}

  async inspect(): Promise<AuthReadResult> {
    const content = await readFileIfExists(this.authFile);
    if (content === null) return { data: {} };
    const { data, errors } = parseJsonc(content);
    if (!data) return { data: {}, error: errors.join("; ") };
    return { data };
  }

  /** Whole file; a missing or malformed file reads as {} */
  async read(): Promise<AuthData> {
    return (await this.inspect()).data;
  }

  /** Backs up the current file, then writes with owner-only permissions */
  async write(data: AuthData): Promise<void> {
    if (await pathExists(this.authFile)) {
      await this.backups.createBackup(this.authFile, "auth");
    }
    await saveJson(this.authFile, data, AUTH_FILE_MODE);
    // mode only applies when the file is created
    if (process.platform !== "win32") await fs.chmod(this.authFile, AUTH_FILE_MODE);
  }

  async get(providerId: string): Promise<AuthEntry | undefined> {
    const data = await this.read();
    const parsed = authEntrySchema.safeParse(ownEntry(data, providerId));
    return parsed.success ? parsed.data : undefined;
  }

  async has(providerId: string): Promise<boolean> {
    return Object.hasOwn(await this.read(), providerId);
  }

  async set(providerId: string, entry: AuthEntry): Promise<void> {
    const id = providerId.trim();
    if (!id) throw new ConfigError("invalid", "Provider id is required");
    const parsed = authEntrySchema.safeParse(entry);
    if (!parsed.success) throw new ConfigError("invalid", `Invalid auth record for "${id}"`);
    const data = await this.read();
    data[id] = parsed.data;
    await this.write(data);
  }

  async setApiKey(providerId: string, key: string): Promise<void> {
    const trimmed = key.trim();
    if (!trimmed) throw new ConfigError("invalid", "API key is required");
    await this.set(providerId, { type: "api", key: trimmed });
  }

  async delete(providerId: string): Promise<void> {
    const data = await this.read();
    if (!Object.hasOwn(data, providerId)) throw new ConfigError("not_found", `No credentials stored for "${providerId}"`);
    delete data[providerId];
    await this.write(data);
  }

  async list(): Promise<AuthSummary[]> {
    const data = await this.read();
    return Object.entries(data).map(([providerId, entry]) => ({
      providerId,
      type: authEntryType(entry),
      masked: maskApiKey(getApiKey(entry) ?? ""),
    }));
  }
}

