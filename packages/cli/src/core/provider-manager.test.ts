import { describe, it, expect } from "vitest";
import type { ConfigDocument } from "@ocfg/core";
import { addProvider, deleteProvider, getProvider, listProviders, updateProvider } from "./provider-manager.js";

describe("provider-manager", () => {
  it("adds a custom provider with the openai-compatible SDK by default", () => {
    const doc: ConfigDocument = {};
    addProvider(doc, "my-proxy", { baseURL: "https://proxy.example.com/v1", apiKey: "test-secret-value" });
    expect(doc.provider).toEqual({
      "my-proxy": {
        npm: "@ai-sdk/openai-compatible",
        name: "my-proxy",
        options: { baseURL: "https://proxy.example.com/v1", apiKey: "test-secret-value" },
        models: {},
      },
    });
  });

  it("uses the native SDK package for known provider ids", () => {
    const doc: ConfigDocument = {};
    addProvider(doc, "anthropic", { displayName: "Claude" });
    expect(getProvider(doc, "anthropic")).toMatchObject({ npm: "@ai-sdk/anthropic", name: "Claude" });
  });

  it("rejects duplicates, empty names and bad characters", () => {
    const doc: ConfigDocument = { provider: { a: {} } };
    expect(() => addProvider(doc, "a", {})).toThrow('Provider "a" already exists');
    expect(() => addProvider(doc, "  ", {})).toThrow("Provider name is required");
    expect(() => addProvider(doc, "has space", {})).toThrow(/Invalid provider name/);
  });

  it("lists providers with masked keys and model counts", () => {
    const doc: ConfigDocument = {
      provider: {
        deepseek: { npm: "@ai-sdk/openai-compatible", options: { apiKey: "abcd1234efgh" }, models: { chat: {}, coder: {} } },
        broken: "not an object",
      },
    };
    const list = listProviders(doc);
    expect(list[0]).toEqual({
      name: "deepseek",
      displayName: "deepseek",
      npm: "@ai-sdk/openai-compatible",
      baseURL: undefined,
      apiKey: "abcd****efgh",
      modelCount: 2,
      native: true,
      valid: true,
    });
    expect(list[1]).toMatchObject({ name: "broken", valid: false, modelCount: 0 });
  });

  it("updates fields, clears empty values and renames", () => {
    const doc: ConfigDocument = {};
    addProvider(doc, "p1", { baseURL: "https://a.example.com", apiKey: "test-secret" });
    updateProvider(doc, "p1", { apiKey: "", timeout: 60000, rename: "p2" });
    expect(doc.provider).toEqual({
      p2: {
        npm: "@ai-sdk/openai-compatible",
        name: "p1",
        options: { baseURL: "https://a.example.com", timeout: 60000 },
        models: {},
      },
    });
  });

  it("refuses a rename onto an existing provider", () => {
    const doc: ConfigDocument = { provider: { a: {}, b: {} } };
    expect(() => updateProvider(doc, "a", { rename: "b" })).toThrow('Provider "b" already exists');
  });

  it("rejects a non-positive timeout", () => {
    const doc: ConfigDocument = {};
    expect(() => addProvider(doc, "p", { timeout: 0 })).toThrow("Timeout must be a positive integer (ms)");
  });

  it("reports unknown providers as not found", () => {
    const doc: ConfigDocument = {};
    expect(() => updateProvider(doc, "ghost", {})).toThrow(expect.objectContaining({ code: "not_found" }));
    expect(() => deleteProvider(doc, "ghost")).toThrow('Provider "ghost" not found');
  });

  it("deletes a provider", () => {
    const doc: ConfigDocument = { provider: { a: {}, b: {} } };
    deleteProvider(doc, "a");
    expect(doc.provider).toEqual({ b: {} });
  });

  it("treats names like constructor as ordinary keys", () => {
    const doc: ConfigDocument = {};
    addProvider(doc, "constructor", {});
    expect(listProviders(doc).map((p) => [p.name, p.npm])).toEqual([["constructor", "@ai-sdk/openai-compatible"]]);
    expect(() => getProvider({ provider: {} }, "toString")).toThrow('Provider "toString" not found');
    expect(() => updateProvider({ provider: {} }, "valueOf", { displayName: "X" })).toThrow('Provider "valueOf" not found');
    expect(() => deleteProvider({ provider: {} }, "hasOwnProperty")).toThrow('Provider "hasOwnProperty" not found');
  });

  it("rejects __proto__ as a name", () => {
    expect(() => addProvider({}, "__proto__", {})).toThrow('Provider name "__proto__" is reserved');
  });
});
