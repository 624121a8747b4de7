/**
 * Counts for the home screen and `ocfg status`
 */
import type { ConfigDocument, ConfigStats } from "@ocfg/core";
import { isPlainObject } from "@ocfg/core";
import { readSection } from "./config-sections.js";

export function computeStats(opencode: ConfigDocument, ohMy: ConfigDocument): ConfigStats {
  const providers = readSection(opencode, "provider");
  const models = Object.values(providers).reduce<number>(
    (sum, entry) => sum + (isPlainObject(entry) && isPlainObject(entry.models) ? Object.keys(entry.models).length : 0),
    0,
  );
  return {
    providers: Object.keys(providers).length,
    models,
    mcps: Object.keys(readSection(opencode, "mcp")).length,
    agents: Object.keys(readSection(opencode, "agent")).length,
    ohMyAgents: Object.keys(readSection(ohMy, "agents")).length,
    categories: Object.keys(readSection(ohMy, "categories")).length,
  };
}
