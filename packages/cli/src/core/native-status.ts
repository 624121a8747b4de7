/**
 * Native provider status: registry + auth.json + environment + stored options
 */
import {
  findNativeProvider,
  listNativeProviders,
  type AuthData,
  type ConfigDocument,
  type EnvMap,
  type NativeStatus,
} from "@ocfg/core";
import { getApiKey } from "./auth-manager.js";
import { hasEnvCredential } from "./env-detector.js";
import { getStoredOptions } from "./provider-options-manager.js";
import { maskApiKey } from "./secret-mask.js";

export interface NativeProviderStatus {
  id: string;
  name: string;
  npm: string;
  status: NativeStatus;
  /** Masked key from auth.json */
  maskedKey?: string;
  envVars: string[];
  configuredOptions: string[];
  docsUrl?: string;
}

export function nativeStatusOf(
  id: string,
  auth: AuthData,
  env: EnvMap,
): NativeStatus {
  const template = findNativeProvider(id);
  if (!template) return "none";
  if (Object.hasOwn(auth, id)) return "configured";
  if (template.authType !== "none" && hasEnvCredential(template, env)) return "env";
  return "none";
}

export function nativeProviderStatuses(
  doc: ConfigDocument,
  auth: AuthData,
  env: EnvMap = process.env,
): NativeProviderStatus[] {
  return listNativeProviders().map(template => {
    const key = getApiKey(auth[template.id]);
    return {
      id: template.id,
      name: template.name,
      npm: template.npm,
      status: nativeStatusOf(template.id, auth, env),
      maskedKey: key ? maskApiKey(key) : undefined,
      envVars: template.env.filter(name => Boolean(env[name]?.trim())),
      configuredOptions: Object.keys(getStoredOptions(doc, template.id)),
      docsUrl: template.docsUrl,
    };
  });
}
