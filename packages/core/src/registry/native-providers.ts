import * as fs from "node:fs";
import { ConfigError } from "../errors.js";
import { nativeProviderFileSchema } from "../schema.js";
import type { NativeProviderTemplate } from "../types.js";

function loadNativeProviders(): NativeProviderTemplate[] {
  const raw = fs.readFileSync(new URL("../../data/native-providers.json", import.meta.url), "utf-8");
  const providers = nativeProviderFileSchema.parse(JSON.parse(raw)).providers;
  const errors = validateRegistry(providers);
  if (errors.length > 0) throw new ConfigError("invalid", `Native provider table: ${errors.join("; ")}`);
  return providers;
}

export const NATIVE_PROVIDERS: readonly NativeProviderTemplate[] = loadNativeProviders();

export const NATIVE_PROVIDER_REGISTRY: ReadonlyMap<string, NativeProviderTemplate> = new Map(
  NATIVE_PROVIDERS.map(p => [p.id, p]),
);

export function listNativeProviders(): NativeProviderTemplate[] {
  return [...NATIVE_PROVIDERS];
}

export function findNativeProvider(id: string): NativeProviderTemplate | undefined {
  return NATIVE_PROVIDER_REGISTRY.get(id);
}

export function getNativeProvider(id: string): NativeProviderTemplate {
  const desc = NATIVE_PROVIDER_REGISTRY.get(id);
  if (!desc) throw new ConfigError("not_found", `Unknown native provider: ${id}`);
  return desc;
}

/** Consistency problems in a provider table; checked when the table loads */
export function validateRegistry(providers: readonly NativeProviderTemplate[]): string[] {
  const errors: string[] = [];
  const seen = new Set<string>();
  for (const p of providers) {
    if (seen.has(p.id)) errors.push(`Duplicate provider id: ${p.id}`);
    seen.add(p.id);
    for (const field of p.authFields) {
      if (!p.env.includes(field.env)) {
        errors.push(`${p.id}: auth field ${field.label} uses undeclared env var ${field.env}`);
      }
    }
    const optionKeys = p.optionFields.map(f => f.key);
    if (new Set(optionKeys).size !== optionKeys.length) {
      errors.push(`${p.id}: duplicate option field keys`);
    }
  }
  return errors;
}
