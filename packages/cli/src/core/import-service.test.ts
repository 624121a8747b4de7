import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ConfigDocument } from "@ocfg/core";
import { createTestContext, writeJson, type TestContext } from "../__tests__/test-context.js";

const homeDir = vi.hoisted(() => ({ value: "" }));

vi.mock("node:os", async () => {
  const actual = await vi.importActual<typeof import("node:os")>("node:os");
  return { ...actual, default: { ...actual, homedir: () => homeDir.value }, homedir: () => homeDir.value };
});

const { applyImport, convertToOpenCode, parseImportType, scanSources, sdkForProviderName } = await import(
  "./import-service.js"
);

describe("convertToOpenCode", () => {
  it("maps Claude Code settings", () => {
    expect(
      convertToOpenCode("claude", {
        apiKey: "test-claude",
        permissions: { allow: ["Read", "Bash(git:*)"], deny: ["WebFetch"], edit: "ask", other: "nope" },
      }),
    ).toEqual({
      provider: {
        anthropic: {
          npm: "@ai-sdk/anthropic",
          name: "Anthropic (Claude)",
          options: { apiKey: "test-claude" },
          models: {},
        },
      },
      permission: { read: "allow", webfetch: "deny", edit: "ask" },
    });
  });

  it("maps Claude providers", () => {
    expect(
      convertToOpenCode("claude_providers", {
        relay: { name: "Relay", baseUrl: "https://relay.example.com", apiKey: "test-relay" },
        junk: "x",
      }).provider,
    ).toEqual({
      relay: {
        npm: "@ai-sdk/anthropic",
        name: "Relay",
        options: { baseURL: "https://relay.example.com", apiKey: "test-relay" },
        models: {},
      },
    });
  });

  it("maps Codex and Gemini", () => {
    expect(convertToOpenCode("codex", { api: { base_url: "https://api.example.com", api_key: "test-codex" } }).provider).toEqual({
      openai: {
        npm: "@ai-sdk/openai",
        name: "OpenAI (Codex)",
        options: { baseURL: "https://api.example.com", apiKey: "test-codex" },
        models: {},
      },
    });
    expect(convertToOpenCode("gemini", { apiKey: "test-gemini" }).provider).toEqual({
      google: { npm: "@ai-sdk/google", name: "Google (Gemini)", options: { apiKey: "test-gemini" }, models: {} },
    });
    expect(convertToOpenCode("gemini", {})).toEqual({ provider: {}, permission: {} });
  });

  it("picks the cc-switch SDK by name and accepts both key spellings", () => {
    const { provider } = convertToOpenCode("ccswitch", {
      providers: {
        "My Claude": { base_url: "https://c.example.com", api_key: "test-1" },
        gemini: { apiKey: "test-2" },
        other: { baseUrl: "https://o.example.com" },
      },
    });
    expect(provider["My Claude"]).toMatchObject({ npm: "@ai-sdk/anthropic", options: { baseURL: "https://c.example.com", apiKey: "test-1" } });
    expect(provider.gemini).toMatchObject({ npm: "@ai-sdk/google", options: { apiKey: "test-2" } });
    expect(provider.other).toMatchObject({ npm: "@ai-sdk/openai", name: "other", options: { baseURL: "https://o.example.com" } });
    expect(sdkForProviderName("Anthropic-Relay")).toBe("@ai-sdk/anthropic");
  });
});

describe("applyImport", () => {
  it("reports conflicts unless overwriting", () => {
    const doc: ConfigDocument = { provider: { openai: { npm: "@ai-sdk/openai", name: "Mine" } } };
    const converted = convertToOpenCode("codex", { api: { api_key: "test-codex" } });

    expect(applyImport(doc, converted)).toEqual({ added: [], overwritten: [], conflicts: ["openai"], permissions: [] });
    expect(doc.provider).toEqual({ openai: { npm: "@ai-sdk/openai", name: "Mine" } });

    expect(applyImport(doc, converted, { overwrite: true }).overwritten).toEqual(["openai"]);
    expect(doc.provider).toEqual({
      openai: { npm: "@ai-sdk/openai", name: "OpenAI (Codex)", options: { apiKey: "test-codex" }, models: {} },
    });
  });

  it("adds a provider whose name is an Object.prototype key", () => {
    const doc: ConfigDocument = {};
    const result = applyImport(doc, { provider: { constructor: { npm: "@ai-sdk/openai" } }, permission: {} });
    expect(result).toEqual({ added: ["constructor"], overwritten: [], conflicts: [], permissions: [] });
    expect(doc.provider).toEqual({ constructor: { npm: "@ai-sdk/openai" } });
  });

  it("merges permissions", () => {
    const doc: ConfigDocument = { permission: { bash: "deny" } };
    const result = applyImport(doc, { provider: {}, permission: { edit: "ask" } });
    expect(result.permissions).toEqual(["edit"]);
    expect(doc.permission).toEqual({ bash: "deny", edit: "ask" });
  });
});

describe("scanSources", () => {
  let ctx: TestContext;
  let home: string;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), "ocfg-home-"));
    homeDir.value = home;
    ctx = createTestContext();
  });

  afterEach(() => {
    ctx.cleanup();
    fs.rmSync(home, { recursive: true, force: true });
  });

  it("returns sources that exist and parse", async () => {
    writeJson(path.join(home, ".claude", "settings.json"), { apiKey: "test-claude" });
    fs.mkdirSync(path.join(home, ".codex"), { recursive: true });
    fs.writeFileSync(path.join(home, ".codex", "config.toml"), '[api]\napi_key = "test-codex"\n');
    fs.mkdirSync(path.join(home, ".cc-switch"), { recursive: true });
    fs.writeFileSync(path.join(home, ".cc-switch", "config.json"), "{ broken");

    const sources = await scanSources(ctx.paths);
    expect(sources.map(s => s.type)).toEqual(["claude", "codex"]);
    expect(sources[1]).toMatchObject({ label: "Codex Config", data: { api: { api_key: "test-codex" } } });
  });

  it("parses import type names", () => {
    expect(parseImportType("ccswitch")).toBe("ccswitch");
    expect(() => parseImportType("vim")).toThrow(/Unknown import source "vim"/);
  });
});
