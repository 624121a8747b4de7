/**
 * provider/modelId references used by agents, categories and the default model.
 */
import { findNativeProvider, isPlainObject, ownEntry, type ConfigDocument } from "@ocfg/core";
import { readSection } from "./config-sections.js";

export type ModelRefStatus = "ok" | "builtin" | "unknown-provider" | "unknown-model" | "malformed";

export function parseModelRef(ref: string): { provider: string; model: string } | null {
  const slash = ref.indexOf("/");
  if (slash <= 0 || slash === ref.length - 1) return null;
  return { provider: ref.slice(0, slash), model: ref.slice(slash + 1) };
}

/** Every provider/modelId pair the config defines, for model pickers */
export function listModelRefs(doc: ConfigDocument): string[] {
  const refs: string[] = [];
  for (const [provider, entry] of Object.entries(readSection(doc, "provider"))) {
    if (!isPlainObject(entry) || !isPlainObject(entry.models)) continue;
    for (const model of Object.keys(entry.models)) refs.push(`${provider}/${model}`);
  }
  return refs;
}

/**
 * A ref to a provider that is not in the config but is a native provider is
 * "builtin": its model list lives outside the config and cannot be checked here.
 */
export function modelRefStatus(doc: ConfigDocument, ref: string): ModelRefStatus {
  const parsed = parseModelRef(ref);
  if (!parsed) return "malformed";
  const entry = ownEntry(readSection(doc, "provider"), parsed.provider);
  if (entry === undefined) {
    return findNativeProvider(parsed.provider) ? "builtin" : "unknown-provider";
  }
  const models = isPlainObject(entry) && isPlainObject(entry.models) ? entry.models : {};
  if (Object.hasOwn(models, parsed.model)) return "ok";
  // native providers may reference models the config does not list
  return findNativeProvider(parsed.provider) ? "builtin" : "unknown-model";
}

/** True when the ref resolves to a configured or native provider */
export function hasModelRef(doc: ConfigDocument, ref: string): boolean {
  const status = modelRefStatus(doc, ref);
  return status === "ok" || status === "builtin";
}
