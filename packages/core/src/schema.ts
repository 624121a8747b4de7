/**
 * Zod schemas for OpenCode configuration records
 *
 * Object schemas pass unknown keys through so that fields this editor does not
 * model survive a read-modify-write cycle.
 */

import { z } from "zod";

// ============================================================================
// Shared
// ============================================================================

export const permissionLevelSchema = z.enum(["allow", "ask", "deny"]);

export const SKILL_NAME_PATTERN = /^[a-z0-9]+(-[a-z0-9]+)*$/;

// ============================================================================
// Provider / Model Schemas
// ============================================================================

export const modelLimitSchema = z.object({
  context: z.number().int().positive(),
  output: z.number().int().positive(),
});

export const modelModalitiesSchema = z.object({
  input: z.array(z.string()),
  output: z.array(z.string()),
});

export const modelConfigSchema = z
  .object({
    name: z.string().optional(),
    attachment: z.boolean().optional(),
    limit: modelLimitSchema.partial().optional(),
    modalities: modelModalitiesSchema.optional(),
    options: z.record(z.string(), z.unknown()).optional(),
    variants: z.record(z.string(), z.record(z.string(), z.unknown())).optional(),
  })
  .passthrough();

export const providerOptionsSchema = z
  .object({
    baseURL: z.string().optional(),
    apiKey: z.string().optional(),
    timeout: z.number().optional(),
  })
  .passthrough();

export const providerConfigSchema = z
  .object({
    npm: z.string().optional(),
    name: z.string().optional(),
    options: providerOptionsSchema.optional(),
    models: z.record(z.string(), modelConfigSchema).optional(),
  })
  .passthrough();

// ============================================================================
// MCP Schemas
// ============================================================================

const mcpCommonShape = {
  enabled: z.boolean().optional(),
  timeout: z.number().int().positive().optional(),
};

export const mcpLocalSchema = z
  .object({
    type: z.literal("local"),
    command: z.array(z.string()).min(1),
    environment: z.record(z.string(), z.string()).optional(),
    ...mcpCommonShape,
  })
  .passthrough();

export const mcpRemoteSchema = z
  .object({
    type: z.literal("remote"),
    url: z.string().url(),
    headers: z.record(z.string(), z.string()).optional(),
    ...mcpCommonShape,
  })
  .passthrough();

export const mcpServerSchema = z.discriminatedUnion("type", [mcpLocalSchema, mcpRemoteSchema]);

// ============================================================================
// Agent Schemas
// ============================================================================

export const agentModeSchema = z.enum(["primary", "subagent", "all"]);

export const agentPermissionSchema = z.record(
  z.string(),
  z.union([permissionLevelSchema, z.record(z.string(), permissionLevelSchema)]),
);

export const agentConfigSchema = z
  .object({
    description: z.string().optional(),
    mode: agentModeSchema.optional(),
    model: z.string().optional(),
    temperature: z.number().min(0).max(2).optional(),
    maxSteps: z.number().int().positive().optional(),
    hidden: z.boolean().optional(),
    disable: z.boolean().optional(),
    prompt: z.string().optional(),
    tools: z.record(z.string(), z.boolean()).optional(),
    permission: agentPermissionSchema.optional(),
  })
  .passthrough();

export const compactionSchema = z
  .object({
    auto: z.boolean().optional(),
    prune: z.boolean().optional(),
  })
  .passthrough();

// ============================================================================
// Oh My OpenCode Schemas
// ============================================================================

export const ohMyAgentSchema = z
  .object({
    model: z.string().optional(),
    description: z.string().optional(),
  })
  .passthrough();

export const ohMyCategorySchema = z
  .object({
    model: z.string().optional(),
    temperature: z.number().min(0).max(2).optional(),
    description: z.string().optional(),
  })
  .passthrough();

// ============================================================================
// auth.json Schemas
// ============================================================================

export const apiAuthSchema = z.object({ type: z.literal("api"), key: z.string() }).passthrough();

export const oauthAuthSchema = z
  .object({
    type: z.literal("oauth"),
    refresh: z.string(),
    access: z.string().optional(),
    expires: z.number().optional(),
  })
  .passthrough();

export const wellKnownAuthSchema = z
  .object({ type: z.literal("wellknown"), key: z.string(), token: z.string() })
  .passthrough();

export const legacyAuthSchema = z.object({ apiKey: z.string() }).passthrough();

export const authEntrySchema = z.union([
  apiAuthSchema,
  oauthAuthSchema,
  wellKnownAuthSchema,
  legacyAuthSchema,
]);

// ============================================================================
// Registry Data Schemas
// ============================================================================

export const authFieldSchema = z.object({
  key: z.string(),
  label: z.string(),
  env: z.string(),
  secret: z.boolean(),
  required: z.boolean(),
});

export const optionFieldSchema = z.object({
  key: z.string(),
  label: z.string(),
  type: z.enum(["string", "number", "boolean"]),
  default: z.union([z.string(), z.number(), z.boolean()]).optional(),
  description: z.string().optional(),
});

export const nativeProviderSchema = z.object({
  id: z.string(),
  name: z.string(),
  npm: z.string(),
  baseURL: z.string().optional(),
  authType: z.enum(["api", "none"]),
  env: z.array(z.string()),
  authFields: z.array(authFieldSchema),
  optionFields: z.array(optionFieldSchema),
  docsUrl: z.string().optional(),
});

export const nativeProviderFileSchema = z.object({
  providers: z.array(nativeProviderSchema),
});

export const presetModelSchema = z.object({
  name: z.string(),
  attachment: z.boolean(),
  limit: modelLimitSchema,
  modalities: modelModalitiesSchema,
  options: z.record(z.string(), z.unknown()),
  variants: z.record(z.string(), z.record(z.string(), z.unknown())),
  description: z.string(),
});

export const presetModelFileSchema = z.object({
  sdks: z.array(z.object({ npm: z.string(), series: z.array(z.string()) })),
  series: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      npm: z.string(),
      models: z.record(z.string(), presetModelSchema),
    }),
  ),
});

export const presetFileSchema = z.object({
  opencodeAgents: z.record(
    z.string(),
    z.object({
      mode: agentModeSchema,
      description: z.string(),
      tools: z.record(z.string(), z.boolean()).optional(),
      permission: agentPermissionSchema.optional(),
    }),
  ),
  ohMyAgents: z.record(z.string(), z.string()),
  categories: z.record(z.string(), z.object({ temperature: z.number(), description: z.string() })),
});

// ============================================================================
// Application Settings Schema
// ============================================================================

export const appSettingsSchema = z.object({
  maxBackups: z.number().int().min(1).default(10),
  backupDir: z.string().optional(),
  opencodeDir: z.string().optional(),
  authPath: z.string().optional(),
  port: z.number().int().min(1).max(65535).default(3417),
  updateCheck: z
    .object({
      enabled: z.boolean().default(true),
      repo: z.string().regex(/^[\w.-]+\/[\w.-]+$/).optional(),
    })
    .default({}),
});
