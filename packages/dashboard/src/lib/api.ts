import type {
  AgentForm,
  AgentSummary,
  AgentsMdFile,
  AuthSummary,
  BackupInfo,
  CategorySummary,
  CompactionState,
  ConfigLocation,
  DashboardState,
  DoctorResult,
  EnvDetection,
  EnvImportResult,
  FixOutcome,
  ImportApplyResult,
  ImportSourceSummary,
  ImportSourceType,
  McpForm,
  McpSummary,
  ModelForm,
  ModelSummary,
  NativeProviderStatus,
  NativeProviderTemplate,
  OhMyAgentSummary,
  OhMyPresets,
  PermissionLevel,
  PermissionsState,
  PresetModelRef,
  ProviderForm,
  ProviderSummary,
  RestoreResult,
  SkillDocument,
  SkillInfo,
  VersionInfo,
} from "@/types";

const API_BASE = "/api";

export class ApiError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = "ApiError";
  }
}

function errorText(body: unknown): string | undefined {
  if (typeof body === "object" && body !== null && "error" in body && typeof body.error === "string") {
    return body.error;
  }
  return undefined;
}

async function request<T>(method: string, path: string, body?: unknown): Promise<T> {
  const res = await fetch(`${API_BASE}${path}`, {
    method,
    headers: body === undefined ? undefined : { "Content-Type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  if (!res.ok) {
    const data: unknown = await res.json().catch(() => null);
    throw new ApiError(res.status, errorText(data) ?? `${method} ${path} failed (${res.status})`);
  }
  return res.json();
}

const seg = encodeURIComponent;

// --- Overview ---

export const fetchDashboardState = () => request<DashboardState>("GET", "/state");
export const fetchVersion = (check = false) => request<VersionInfo>("GET", `/version${check ? "?check=true" : ""}`);

// --- Providers & models ---

export const fetchProviders = () => request<ProviderSummary[]>("GET", "/providers");
export const fetchSdks = () => request<string[]>("GET", "/providers/sdks");
export const addProvider = (input: ProviderForm) => request<unknown>("POST", "/providers", input);
export const updateProvider = (name: string, input: Omit<ProviderForm, "name"> & { rename?: string }) =>
  request<unknown>("PUT", `/providers/${seg(name)}`, input);
export const removeProvider = (name: string) => request<{ removed: string }>("DELETE", `/providers/${seg(name)}`);

export const fetchModelRefs = () => request<string[]>("GET", "/models/refs");
export const fetchModels = (provider: string) => request<ModelSummary[]>("GET", `/models/${seg(provider)}`);
export const fetchPresetModels = (provider?: string) =>
  request<PresetModelRef[]>("GET", `/models/presets${provider ? `?provider=${seg(provider)}` : ""}`);
export const addModel = (provider: string, input: ModelForm) => request<unknown>("POST", `/models/${seg(provider)}`, input);
export const removeModel = (provider: string, id: string) =>
  request<{ removed: string }>("DELETE", `/models/${seg(provider)}/${seg(id)}`);

// --- MCP ---

export const fetchMcps = () => request<McpSummary[]>("GET", "/mcp");
export const addMcp = (input: McpForm) => request<unknown>("POST", "/mcp", input);
export const toggleMcp = (name: string, enabled: boolean) =>
  request<{ name: string; enabled: boolean }>("POST", `/mcp/${seg(name)}/toggle`, { enabled });
export const removeMcp = (name: string) => request<{ removed: string }>("DELETE", `/mcp/${seg(name)}`);

// --- Agents ---

export const fetchAgents = () => request<AgentSummary[]>("GET", "/agents");
export const fetchPresetAgents = () => request<string[]>("GET", "/agents/presets");
export const addAgent = (input: AgentForm) => request<unknown>("POST", "/agents", input);
export const addPresetAgent = (preset: string, as?: string) =>
  request<unknown>("POST", `/agents/presets/${seg(preset)}`, { as });
export const removeAgent = (name: string) => request<{ removed: string }>("DELETE", `/agents/${seg(name)}`);

// --- Oh My OpenCode ---

export const fetchOhMyPresets = () => request<OhMyPresets>("GET", "/ohmy/presets");
export const fetchOhMyAgents = () => request<OhMyAgentSummary[]>("GET", "/ohmy/agents");
export const fetchCategories = () => request<CategorySummary[]>("GET", "/ohmy/categories");
export const setOhMyAgent = (name: string, model: string) =>
  request<unknown>("PUT", `/ohmy/agents/${seg(name)}`, { model });
export const addOhMyPresetAgent = (preset: string, model?: string) =>
  request<unknown>("POST", `/ohmy/agents/presets/${seg(preset)}`, { model });
export const removeOhMyAgent = (name: string) => request<{ removed: string }>("DELETE", `/ohmy/agents/${seg(name)}`);
export const setCategory = (name: string, input: { model?: string; temperature?: number }) =>
  request<unknown>("PUT", `/ohmy/categories/${seg(name)}`, input);
export const addPresetCategory = (preset: string, model?: string) =>
  request<unknown>("POST", `/ohmy/categories/presets/${seg(preset)}`, { model });
export const removeCategory = (name: string) => request<{ removed: string }>("DELETE", `/ohmy/categories/${seg(name)}`);

// --- Permissions ---

export const fetchPermissions = () => request<PermissionsState>("GET", "/permissions");
export const quickAddPermissions = () => request<{ added: string[] }>("POST", "/permissions/quick-add", {});
export const setPermission = (tool: string, level: PermissionLevel) =>
  request<unknown>("PUT", `/permissions/${seg(tool)}`, { level });
export const removePermission = (tool: string) => request<{ removed: string }>("DELETE", `/permissions/${seg(tool)}`);
export const setSkillPermission = (pattern: string, level: PermissionLevel) =>
  request<unknown>("PUT", `/permissions/skills/${seg(pattern)}`, { level });
export const removeSkillPermission = (pattern: string) =>
  request<{ removed: string }>("DELETE", `/permissions/skills/${seg(pattern)}`);

// --- Skills ---

export const fetchSkills = () => request<SkillInfo[]>("GET", "/skills");
export const createSkill = (input: { name: string; description: string; location: ConfigLocation }) =>
  request<{ path: string }>("POST", "/skills", input);
export const installSkill = (source: string, location: ConfigLocation, force = false) =>
  request<unknown>("POST", "/skills/install", { source, location, force });
export const fetchSkill = (location: ConfigLocation, name: string) =>
  request<SkillDocument>("GET", `/skills/${location}/${seg(name)}`);
export const saveSkill = (location: ConfigLocation, name: string, content: string) =>
  request<{ path: string }>("PUT", `/skills/${location}/${seg(name)}`, { content });
export const removeSkill = (location: ConfigLocation, name: string) =>
  request<unknown>("DELETE", `/skills/${location}/${seg(name)}`);

// --- Rules & compaction ---

export const fetchInstructions = () => request<string[]>("GET", "/rules/instructions");
export const addInstruction = (instruction: string) =>
  request<{ instruction: string; added: boolean }>("POST", "/rules/instructions", { instruction });
export const removeInstruction = (instruction: string) =>
  request<{ removed: string }>("DELETE", "/rules/instructions", { instruction });
export const fetchAgentsMd = (location: ConfigLocation) => request<AgentsMdFile>("GET", `/rules/agents-md/${location}`);
export const saveAgentsMd = (location: ConfigLocation, content: string) =>
  request<{ path: string }>("PUT", `/rules/agents-md/${location}`, { content });
export const fetchCompaction = () => request<CompactionState>("GET", "/compaction");
export const saveCompaction = (input: Partial<CompactionState>) => request<CompactionState>("PUT", "/compaction", input);

// --- Native providers ---

export const fetchNativeProviders = () => request<NativeProviderStatus[]>("GET", "/native");
export const fetchAuth = () => request<{ entries: AuthSummary[]; error?: string }>("GET", "/native/auth");
export const setApiKey = (id: string, key: string) => request<unknown>("PUT", `/native/auth/${seg(id)}`, { key });
export const removeApiKey = (id: string) => request<{ removed: string }>("DELETE", `/native/auth/${seg(id)}`);
export const fetchEnvDetections = () => request<EnvDetection[]>("GET", "/native/env");
export const importEnvKeys = (ids?: string[]) => request<EnvImportResult>("POST", "/native/env/import", { ids });
export const fetchNativeProvider = (id: string) =>
  request<{ template: NativeProviderTemplate; options: Record<string, unknown> }>("GET", `/native/${seg(id)}`);
export const saveNativeOptions = (id: string, values: Record<string, string>) =>
  request<unknown>("PUT", `/native/${seg(id)}/options`, { values });

// --- Backups ---

export const fetchBackups = (config?: string) =>
  request<BackupInfo[]>("GET", `/backups${config ? `?config=${seg(config)}` : ""}`);
export const createBackup = (config: string) => request<BackupInfo>("POST", "/backups", { config });
export const restoreBackup = (file: string) => request<RestoreResult>("POST", `/backups/${seg(file)}/restore`);
export const deleteBackup = (file: string) => request<{ removed: string }>("DELETE", `/backups/${seg(file)}`);

// --- Import & validation ---

export const fetchImportSources = () => request<ImportSourceSummary[]>("GET", "/import");
export const applyImport = (type: ImportSourceType, overwrite = false) =>
  request<ImportApplyResult>("POST", `/import/${type}`, { overwrite });
export const runValidation = () => request<DoctorResult>("GET", "/validate");
export const fixValidation = () => request<FixOutcome>("POST", "/validate/fix");
