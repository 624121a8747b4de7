/**
 * Core types for ocfg
 */

import type { z } from "zod";
import type {
  permissionLevelSchema,
  modelConfigSchema,
  modelLimitSchema,
  providerConfigSchema,
  providerOptionsSchema,
  mcpLocalSchema,
  mcpRemoteSchema,
  mcpServerSchema,
  agentModeSchema,
  agentConfigSchema,
  compactionSchema,
  ohMyAgentSchema,
  ohMyCategorySchema,
  authEntrySchema,
  nativeProviderSchema,
  authFieldSchema,
  optionFieldSchema,
  presetModelSchema,
  appSettingsSchema,
} from "./schema.js";

// ============================================================================
// Config Documents
// ============================================================================

/** A parsed opencode.json / oh-my-opencode.json document. Sections are read defensively. */
export type ConfigDocument = Record<string, unknown>;

export type PermissionLevel = z.infer<typeof permissionLevelSchema>;
export type ModelLimit = z.infer<typeof modelLimitSchema>;
export type ModelConfig = z.infer<typeof modelConfigSchema>;
export type ProviderOptions = z.infer<typeof providerOptionsSchema>;
export type ProviderConfig = z.infer<typeof providerConfigSchema>;
export type McpLocalConfig = z.infer<typeof mcpLocalSchema>;
export type McpRemoteConfig = z.infer<typeof mcpRemoteSchema>;
export type McpServerConfig = z.infer<typeof mcpServerSchema>;
export type AgentMode = z.infer<typeof agentModeSchema>;
export type AgentConfig = z.infer<typeof agentConfigSchema>;
export type CompactionConfig = z.infer<typeof compactionSchema>;
export type OhMyAgentConfig = z.infer<typeof ohMyAgentSchema>;
export type OhMyCategoryConfig = z.infer<typeof ohMyCategorySchema>;

/** Which file a config document lives in */
export type ConfigKind = "opencode" | "oh-my-opencode";

/** Where a skill or rules file lives */
export type ConfigLocation = "global" | "project";

// ============================================================================
// Auth
// ============================================================================

export type AuthEntry = z.infer<typeof authEntrySchema>;

/** Whole auth.json contents; entries that match no known shape stay raw */
export type AuthData = Record<string, unknown>;

export type NativeStatus = "configured" | "env" | "none";

// ============================================================================
// Registry Data
// ============================================================================

export type NativeProviderTemplate = z.infer<typeof nativeProviderSchema>;
export type AuthField = z.infer<typeof authFieldSchema>;
export type OptionField = z.infer<typeof optionFieldSchema>;
export type OptionValue = string | number | boolean;
export type PresetModel = z.infer<typeof presetModelSchema>;

export interface PresetSeries {
  id: string;
  name: string;
  npm: string;
  models: Record<string, PresetModel>;
}

export interface PresetOpenCodeAgent {
  mode: AgentMode;
  description: string;
  tools?: Record<string, boolean>;
  permission?: AgentConfig["permission"];
}

export interface PresetCategory {
  temperature: number;
  description: string;
}

// ============================================================================
// Settings
// ============================================================================

export type AppSettings = z.infer<typeof appSettingsSchema>;

// ============================================================================
// Backups
// ============================================================================

export interface BackupInfo {
  /** File name inside the backup directory */
  file: string;
  path: string;
  /** Config stem, e.g. "opencode", "oh-my-opencode", "auth" */
  name: string;
  /** YYYYMMDD_HHMMSS */
  timestamp: string;
  tag: string;
  display: string;
}

// ============================================================================
// Skills
// ============================================================================

export type SkillSource =
  | "opencode-global"
  | "opencode-project"
  | "claude-global"
  | "claude-project";

export interface SkillInfo {
  name: string;
  description: string;
  source: SkillSource;
  /** Path to the skill directory */
  path: string;
}

// ============================================================================
// Validation
// ============================================================================

export type IssueSeverity = "error" | "warning";

export interface ValidationIssue {
  /** Dotted path into the document, e.g. "provider.anthropic.npm" */
  path: string;
  severity: IssueSeverity;
  message: string;
  fixable: boolean;
}

// ============================================================================
// Import
// ============================================================================

export type ImportSourceType = "claude" | "claude_providers" | "codex" | "gemini" | "ccswitch";

export interface ImportSource {
  type: ImportSourceType;
  label: string;
  path: string;
  data: Record<string, unknown>;
}

export interface ConvertedImport {
  provider: Record<string, ProviderConfig>;
  permission: Record<string, PermissionLevel>;
}

// ============================================================================
// Stats
// ============================================================================

export interface ConfigStats {
  providers: number;
  models: number;
  mcps: number;
  agents: number;
  ohMyAgents: number;
  categories: number;
}
