/**
 * EnvVarDetector: provider credentials present in the environment
 */
import { NATIVE_PROVIDERS, type EnvMap, type NativeProviderTemplate } from "@ocfg/core";
import type { AuthManager } from "./auth-manager.js";
import { maskApiKey } from "./secret-mask.js";

export interface DetectedVar {
  name: string;
  masked: string;
}

export interface EnvDetection {
  providerId: string;
  vars: DetectedVar[];
  /** Every required auth field is set, and at least one auth field */
  hasCredential: boolean;
}

export interface EnvImportResult {
  imported: string[];
  skipped: { providerId: string; reason: string }[];
}

function envValue(env: EnvMap, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function hasEnvCredential(template: NativeProviderTemplate, env: EnvMap): boolean {
  if (template.authType === "none") return true;
  const fields = template.authFields;
  if (fields.length === 0) return false;
  const requiredSet = fields.filter(f => f.required).every(f => envValue(env, f.env) !== undefined);
  const anySet = fields.some(f => envValue(env, f.env) !== undefined);
  return requiredSet && anySet;
}

export function detect(env: EnvMap = process.env): EnvDetection[] {
  return NATIVE_PROVIDERS.map(template => ({
    providerId: template.id,
    vars: template.env.flatMap(name => {
      const value = envValue(env, name);
      return value === undefined ? [] : [{ name, masked: maskApiKey(value) }];
    }),
    hasCredential: template.authType !== "none" && hasEnvCredential(template, env),
  }));
}

export function detectedProviderIds(env: EnvMap = process.env): string[] {
  return detect(env).filter(d => d.vars.length > 0).map(d => d.providerId);
}

/** Value of the first secret auth field that is set */
export function envApiKey(template: NativeProviderTemplate, env: EnvMap): string | undefined {
  for (const field of template.authFields) {
    if (!field.secret) continue;
    const value = envValue(env, field.env);
    if (value !== undefined) return value;
  }
  return undefined;
}

/**
 * Copies API keys from the environment into auth.json for providers that
 * have no record yet. Existing records are never overwritten.
 */
export async function importFromEnv(
  auth: AuthManager,
  env: EnvMap = process.env,
  ids?: string[],
): Promise<EnvImportResult> {
  const result: EnvImportResult = { imported: [], skipped: [] };
  const existing = await auth.read();
  const wanted = ids ? new Set(ids) : null;
  const next = { ...existing };

  for (const template of NATIVE_PROVIDERS) {
    if (wanted && !wanted.has(template.id)) continue;
    if (template.authType === "none") continue;
    const key = envApiKey(template, env);
    if (key === undefined) {
      if (wanted) result.skipped.push({ providerId: template.id, reason: "no API key in environment" });
      continue;
    }
    if (Object.hasOwn(existing, template.id)) {
      result.skipped.push({ providerId: template.id, reason: "already in auth.json" });
      continue;
    }
    next[template.id] = { type: "api", key };
    result.imported.push(template.id);
  }

  if (wanted) {
    const known = new Set(NATIVE_PROVIDERS.map(p => p.id));
    for (const id of wanted) {
      if (!known.has(id)) result.skipped.push({ providerId: id, reason: "unknown provider" });
    }
  }

  if (result.imported.length > 0) await auth.write(next);
  return result;
}
