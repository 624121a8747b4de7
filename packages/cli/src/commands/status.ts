/**
 * Status Command for ocfg
 *
 * Shows an overview of the managed files:
 * - Where each config file lives and whether it exists
 * - Counts of providers, models, MCP servers, agents and categories
 * - Default and small models
 * - Native providers with credentials
 * - Providers whose variables are set in the environment
 */

import { Command } from "commander";
import { contractPath, formatStatus, pathExists, type ConfigStats, type ConfigKind } from "@ocfg/core";
import type { AppContext } from "../core/context.js";
import { detectedProviderIds } from "../core/env-detector.js";
import { nativeProviderStatuses, type NativeProviderStatus } from "../core/native-status.js";
import { computeStats } from "../core/stats.js";
import { runAction } from "./command-runner.js";

// ============================================================================
// Types
// ============================================================================

export interface FileStatus {
  label: string;
  path: string;
  exists: boolean;
}

export interface StatusReport {
  files: FileStatus[];
  stats: ConfigStats;
  model?: string;
  smallModel?: string;
  native: NativeProviderStatus[];
  envProviders: string[];
}

// ============================================================================
// Core Functions
// ============================================================================

async function fileStatus(label: string, filePath: string): Promise<FileStatus> {
  return { label, path: filePath, exists: await pathExists(filePath) };
}

export async function collectStatus(ctx: AppContext, env = process.env): Promise<StatusReport> {
  const kinds: [ConfigKind, string][] = [
    ["opencode", "OpenCode config"],
    ["oh-my-opencode", "Oh My OpenCode"],
  ];
  const files = [
    ...(await Promise.all(kinds.map(([kind, label]) => fileStatus(label, ctx.store.pathOf(kind))))),
    await fileStatus("Credentials", ctx.auth.authFile),
    await fileStatus("Backups", ctx.backups.backupDir),
  ];

  const opencode = await ctx.store.load("opencode");
  const ohMy = await ctx.store.load("oh-my-opencode");
  const auth = await ctx.auth.read();
  return {
    files,
    stats: computeStats(opencode, ohMy),
    model: typeof opencode.model === "string" ? opencode.model : undefined,
    smallModel: typeof opencode.small_model === "string" ? opencode.small_model : undefined,
    native: nativeProviderStatuses(opencode, auth, env).filter(s => s.status !== "none"),
    envProviders: detectedProviderIds(env),
  };
}

// ============================================================================
// Output Formatting
// ============================================================================

/**
 * Format status output for terminal display
 */
export function formatStatusOutput(report: StatusReport): string {
  const lines: string[] = [];

  lines.push("ocfg status");
  lines.push("===========");
  lines.push("");

  lines.push("Files:");
  for (const file of report.files) {
    const suffix = file.exists ? "" : " (not found)";
    lines.push(`  ${file.label.padEnd(16)}${contractPath(file.path)}${suffix}`);
  }

  const { stats } = report;
  lines.push("");
  lines.push("Config:");
  lines.push(`  Providers: ${stats.providers}   Models: ${stats.models}   MCP servers: ${stats.mcps}   Agents: ${stats.agents}`);
  lines.push(`  Oh-my agents: ${stats.ohMyAgents}   Categories: ${stats.categories}`);
  lines.push(`  Model: ${report.model ?? "(not set)"}`);
  lines.push(`  Small model: ${report.smallModel ?? "(not set)"}`);

  lines.push("");
  lines.push("Native providers:");
  if (report.native.length === 0) {
    lines.push("  none configured (see: ocfg native list)");
  }
  for (const provider of report.native) {
    lines.push(`  ${provider.name.padEnd(22)}${formatStatus(provider.status)}`);
  }
  if (report.envProviders.length > 0) {
    lines.push(`  Variables set for: ${report.envProviders.join(", ")}`);
  }

  return lines.join("\n");
}

// ============================================================================
// Commander.js Command
// ============================================================================

export const statusCommand = new Command("status")
  .description("Show config files, counts and credential status")
  .action(async (_opts: object, command: Command) => {
    await runAction(command, "reading status", async ({ ctx, json }) => {
      const report = await collectStatus(ctx);
      console.log(json ? JSON.stringify(report, null, 2) : formatStatusOutput(report));
    });
  });
