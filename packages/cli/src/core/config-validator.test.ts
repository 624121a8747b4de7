import { describe, it, expect } from "vitest";
import type { ConfigDocument } from "@ocfg/core";
import { OPENCODE_SCHEMA_URL, autoFix, validate, validateAuth, validateOhMy } from "./config-validator.js";

function paths(doc: unknown): string[] {
  return validate(doc).map(i => i.path);
}

describe("validate", () => {
  it("accepts a clean config", () => {
    const doc: ConfigDocument = {
      $schema: OPENCODE_SCHEMA_URL,
      model: "proxy/m1",
      provider: { proxy: { npm: "@ai-sdk/openai-compatible", options: { baseURL: "https://p.example.com" }, models: { m1: {} } } },
      mcp: { fs: { type: "local", command: ["mcp-fs"], enabled: true } },
      agent: { reviewer: { description: "Reviews", mode: "subagent", model: "proxy/m1" } },
      permission: { edit: "ask", bash: { "git *": "allow" } },
      instructions: ["AGENTS.md"],
      compaction: { auto: true, prune: false },
    };
    expect(validate(doc)).toEqual([]);
  });

  it("rejects a non-object root", () => {
    expect(validate([])).toEqual([{ path: "", severity: "error", message: "Config root must be a JSON object", fixable: false }]);
  });

  it("warns about a missing $schema", () => {
    expect(validate({})).toEqual([
      { path: "$schema", severity: "warning", message: "Missing $schema", fixable: true },
    ]);
  });

  it("flags section types", () => {
    expect(paths({ $schema: OPENCODE_SCHEMA_URL, provider: [], mcp: "x", agent: 1, permission: null })).toEqual([
      "provider",
      "mcp",
      "agent",
      "permission",
    ]);
  });

  it("flags provider fields", () => {
    const issues = validate({
      $schema: OPENCODE_SCHEMA_URL,
      provider: {
        a: { options: { baseURL: "not a url", timeout: -1 }, models: [] },
        b: "string",
        c: { npm: "x", models: { m: { limit: { context: 0, output: 100 } } } },
      },
    });
    expect(issues.map(i => [i.path, i.severity, i.fixable])).toEqual([
      ["provider.a.npm", "warning", true],
      ["provider.a.options.baseURL", "error", false],
      ["provider.a.options.timeout", "error", true],
      ["provider.a.models", "error", true],
      ["provider.b", "error", false],
      ["provider.c.models.m.limit.context", "error", true],
    ]);
  });

  it("flags MCP servers", () => {
    expect(
      paths({
        $schema: OPENCODE_SCHEMA_URL,
        mcp: {
          a: { command: "npx server" },
          b: { type: "remote" },
          c: { type: "local", command: [], enabled: "yes", timeout: "slow" },
        },
      }),
    ).toEqual(["mcp.a.type", "mcp.a.command", "mcp.b.url", "mcp.c.command", "mcp.c.enabled", "mcp.c.timeout"]);
  });

  it("flags agents, permissions, instructions and compaction", () => {
    expect(
      paths({
        $schema: OPENCODE_SCHEMA_URL,
        agent: { x: { mode: "boss", temperature: 5 } },
        permission: { edit: "yes", bash: { "rm *": "never" } },
        instructions: ["a.md", "a.md"],
        compaction: { auto: "on" },
      }),
    ).toEqual([
      "agent.x.description",
      "agent.x.mode",
      "agent.x.temperature",
      "permission.edit",
      "permission.bash.rm *",
      "instructions",
      "compaction.auto",
    ]);
  });

  it("checks model references", () => {
    const issues = validate({
      $schema: OPENCODE_SCHEMA_URL,
      model: "ghost/m",
      small_model: "no-slash",
      provider: { proxy: { npm: "x", models: {} } },
      agent: { a: { description: "d", model: "proxy/missing" } },
    });
    expect(issues.map(i => [i.path, i.severity])).toEqual([
      ["agent.a.model", "warning"],
      ["model", "warning"],
      ["small_model", "error"],
    ]);
  });

  it("warns about plaintext secrets", () => {
    const issues = validate({
      $schema: OPENCODE_SCHEMA_URL,
      provider: { p: { npm: "x", options: { apiKey: "sk-test-1234567890" } } },
    });
    expect(issues).toEqual([
      {
        path: "provider.p.options.apiKey",
        severity: "warning",
        message: "Plaintext secret (sk-t****7890); prefer {env:VAR} or auth.json",
        fixable: false,
      },
    ]);
  });
});

describe("autoFix", () => {
  it("repairs fixable issues on a copy", () => {
    const original: ConfigDocument = {
      provider: { anthropic: { options: { timeout: "x" }, models: { m: "bad" } } },
      mcp: { remote: { url: "https://mcp.example.com", timeout: 0 }, local: { command: "node server.js" } },
      agent: { a: { mode: "boss" } },
      permission: { bash: "sometimes" },
      instructions: ["x.md", 3, "x.md"],
      compaction: "yes",
    };
    const before = structuredClone(original);
    const { config, fixed, remaining } = autoFix(original);

    expect(original).toEqual(before);
    expect(fixed.length).toBeGreaterThan(0);
    expect(remaining).toEqual([]);
    expect(config).toEqual({
      $schema: OPENCODE_SCHEMA_URL,
      provider: { anthropic: { npm: "@ai-sdk/anthropic", options: {}, models: { m: { name: "m" } } } },
      mcp: {
        remote: { url: "https://mcp.example.com", timeout: 5000, type: "remote" },
        local: { command: ["node", "server.js"], type: "local" },
      },
      agent: { a: { mode: "subagent", description: "a agent" } },
      permission: { bash: "ask" },
      instructions: ["x.md"],
      compaction: { auto: true, prune: true },
    });
  });

  it("leaves unfixable issues in place", () => {
    const { remaining } = autoFix({ $schema: OPENCODE_SCHEMA_URL, mcp: { r: { type: "remote" } } });
    expect(remaining.map(i => i.path)).toEqual(["mcp.r.url"]);
  });
});

describe("validateOhMy", () => {
  it("checks sections, temperatures and model refs", () => {
    const opencode = { provider: { proxy: { models: { m: {} } } } };
    const issues = validateOhMy(
      { agents: { oracle: { model: "ghost/x" } }, categories: { visual: { model: "proxy/m", temperature: 4 } } },
      opencode,
    );
    expect(issues.map(i => i.path)).toEqual(["agents.oracle.model", "categories.visual.temperature"]);
    expect(validateOhMy({ agents: [] }).map(i => i.path)).toEqual(["agents"]);
  });
});

describe("validateAuth", () => {
  it("flags unrecognized records and empty keys", () => {
    expect(
      validateAuth({ a: { type: "api", key: "" }, b: { type: "mystery" }, c: { apiKey: "legacy" } }).map(i => i.path),
    ).toEqual(["a.key", "b"]);
    expect(validateAuth("x")).toHaveLength(1);
  });
});
