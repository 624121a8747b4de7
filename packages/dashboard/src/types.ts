/** Response shapes of the ocfg local API, as consumed by the dashboard */

import type {
  AgentMode,
  BackupInfo,
  ConfigStats,
  ImportSourceType,
  NativeProviderTemplate,
  NativeStatus,
  PermissionLevel,
  PresetModel,
  SkillInfo,
  ValidationIssue,
} from "@ocfg/core";

export type { AgentMode, BackupInfo, ImportSourceType, NativeProviderTemplate, PermissionLevel, SkillInfo, ValidationIssue };

export type TabId =
  | "home"
  | "providers"
  | "mcp"
  | "agents"
  | "ohmy"
  | "permissions"
  | "skills"
  | "rules"
  | "native"
  | "backups"
  | "import"
  | "validate";

export type ConfigLocation = "global" | "project";

export interface ProviderSummary {
  name: string;
  displayName: string;
  npm: string;
  baseURL?: string;
  apiKey?: string;
  modelCount: number;
  native: boolean;
  valid: boolean;
}

export interface ProviderForm {
  name: string;
  npm?: string;
  displayName?: string;
  baseURL?: string;
  apiKey?: string;
  timeout?: number;
}

export interface ModelSummary {
  id: string;
  name: string;
  attachment: boolean;
  context?: number;
  output?: number;
  hasOptions: boolean;
  variants: string[];
  valid: boolean;
}

export interface ModelForm {
  id: string;
  preset?: boolean;
  name?: string;
  attachment?: boolean;
  context?: number;
  output?: number;
}

export interface PresetModelRef {
  series: string;
  id: string;
  model: PresetModel;
}

export interface McpSummary {
  name: string;
  type: "local" | "remote" | "unknown";
  enabled: boolean;
  target: string;
  timeout: number;
  valid: boolean;
}

export interface McpForm {
  name: string;
  command?: string[];
  url?: string;
  environment?: Record<string, string>;
  headers?: Record<string, string>;
  enabled?: boolean;
  timeout?: number;
}

export interface AgentSummary {
  name: string;
  description: string;
  mode: AgentMode;
  model?: string;
  disabled: boolean;
  valid: boolean;
}

export interface AgentForm {
  name: string;
  description: string;
  mode?: AgentMode;
  model?: string;
  temperature?: number;
  prompt?: string;
}

export interface OhMyAgentSummary {
  name: string;
  model: string;
  description: string;
  valid: boolean;
}

export interface CategorySummary {
  name: string;
  model: string;
  temperature?: number;
  description: string;
  valid: boolean;
}

export interface OhMyPresets {
  agents: Record<string, string>;
  categories: Record<string, { temperature: number; description: string }>;
}

export interface PermissionEntry {
  tool: string;
  level: PermissionLevel | null;
}

export interface SkillPermissionEntry {
  pattern: string;
  level: PermissionLevel | null;
}

export interface PermissionsState {
  tools: PermissionEntry[];
  skills: SkillPermissionEntry[];
}

export interface SkillDocument {
  name: string;
  path: string;
  content: string;
}

export interface AgentsMdFile {
  location: ConfigLocation;
  path: string;
  exists: boolean;
  content: string;
}

export interface CompactionState {
  auto: boolean;
  prune: boolean;
}

export interface NativeProviderStatus {
  id: string;
  name: string;
  npm: string;
  status: NativeStatus;
  maskedKey?: string;
  envVars: string[];
  configuredOptions: string[];
  docsUrl?: string;
}

export interface AuthSummary {
  providerId: string;
  type: "api" | "oauth" | "wellknown" | "legacy" | "unknown";
  masked: string;
}

export interface EnvDetection {
  providerId: string;
  vars: { name: string; masked: string }[];
  hasCredential: boolean;
}

export interface EnvImportResult {
  imported: string[];
  skipped: { providerId: string; reason: string }[];
}

export interface ImportSourceSummary {
  type: ImportSourceType;
  label: string;
  path: string;
}

export interface ImportApplyResult {
  added: string[];
  overwritten: string[];
  conflicts: string[];
  permissions: string[];
}

export interface RestoreResult {
  restored: string;
  target: string;
  safety: string | null;
}

export interface DiagnosticResult {
  name: string;
  status: "pass" | "fail" | "warn";
  message: string;
  fix?: string;
  issues?: ValidationIssue[];
}

export interface DoctorResult {
  success: boolean;
  checks: DiagnosticResult[];
  summary: { passed: number; failed: number; warnings: number };
}

export interface FixOutcome {
  fixed: ValidationIssue[];
  remaining: ValidationIssue[];
}

export interface DashboardState {
  files: { label: string; path: string; exists: boolean }[];
  stats: ConfigStats;
  model?: string;
  smallModel?: string;
  native: NativeProviderStatus[];
  projectDir: string;
  settingsPath: string;
  settingsError?: string;
}

export interface VersionInfo {
  current: string;
  latest?: string | null;
  updateAvailable?: boolean;
  releaseUrl?: string;
  reason?: string;
}

/** Indicator colour used across cards and tables */
export type Status = "ok" | "warn" | "error" | "idle";
