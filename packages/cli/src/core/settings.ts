/**
 * Application settings stored in ~/.ocfg/settings.yaml
 */
import * as path from "node:path";
import * as yaml from "yaml";
import { appSettingsSchema, getAppHome, type AppSettings } from "@ocfg/core";
import { readFileIfExists, writeFileEnsured } from "./fs-helpers.js";

export interface SettingsLoadResult {
  settings: AppSettings;
  path: string;
  /** Present when the file exists but could not be used; defaults were applied */
  error?: string;
}

export function getSettingsPath(): string {
  return path.join(getAppHome(), "settings.yaml");
}

export function defaultSettings(): AppSettings {
  return appSettingsSchema.parse({});
}

export async function loadSettings(settingsPath = getSettingsPath()): Promise<SettingsLoadResult> {
  const content = await readFileIfExists(settingsPath);
  if (content === null) {
    return { settings: defaultSettings(), path: settingsPath };
  }

  let raw: unknown;
  try {
    raw = yaml.parse(content) ?? {};
  } catch (error) {
    return {
      settings: defaultSettings(),
      path: settingsPath,
      error: `Invalid YAML syntax: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const parsed = appSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(i => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    return { settings: defaultSettings(), path: settingsPath, error: detail };
  }
  return { settings: parsed.data, path: settingsPath };
}

