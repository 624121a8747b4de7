import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { getNativeProvider } from "@ocfg/core";
import { createTestContext, type TestContext } from "../__tests__/test-context.js";
import { detect, detectedProviderIds, envApiKey, hasEnvCredential, importFromEnv } from "./env-detector.js";

describe("env-detector", () => {
  it("reports set variables with masked values", () => {
    const found = detect({ ANTHROPIC_API_KEY: "test-anthropic-key", OPENAI_API_KEY: "  " });
    const anthropic = found.find(d => d.providerId === "anthropic");
    expect(anthropic).toEqual({
      providerId: "anthropic",
      vars: [{ name: "ANTHROPIC_API_KEY", masked: "test****-key" }],
      hasCredential: true,
    });
    expect(found.find(d => d.providerId === "openai")?.vars).toEqual([]);
  });

  it("requires every required field", () => {
    const azure = getNativeProvider("azure");
    expect(hasEnvCredential(azure, { AZURE_API_KEY: "test-secret" })).toBe(false);
    expect(hasEnvCredential(azure, { AZURE_API_KEY: "test-secret", AZURE_RESOURCE_NAME: "res" })).toBe(true);
    const bedrock = getNativeProvider("amazon-bedrock");
    expect(hasEnvCredential(bedrock, {})).toBe(false);
    expect(hasEnvCredential(bedrock, { AWS_PROFILE: "dev" })).toBe(true);
  });

  it("lists providers with any variable set", () => {
    expect(detectedProviderIds({ GROQ_API_KEY: "test-secret", AWS_REGION: "us-east-1" })).toEqual([
      "amazon-bedrock",
      "groq",
    ]);
  });

  it("picks the first secret field that is set", () => {
    const google = getNativeProvider("google");
    expect(envApiKey(google, { GEMINI_API_KEY: "test-gemini" })).toBe("test-gemini");
  });
});

describe("importFromEnv", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => ctx.cleanup());

  it("copies keys for providers without a record", async () => {
    await ctx.auth.setApiKey("openai", "test-existing");
    const result = await importFromEnv(ctx.auth, {
      OPENAI_API_KEY: "test-env-openai",
      DEEPSEEK_API_KEY: "test-env-deepseek",
    });
    expect(result.imported).toEqual(["deepseek"]);
    expect(result.skipped).toEqual([{ providerId: "openai", reason: "already in auth.json" }]);
    expect(await ctx.auth.read()).toEqual({
      openai: { type: "api", key: "test-existing" },
      deepseek: { type: "api", key: "test-env-deepseek" },
    });
  });

  it("reports why selected providers were skipped", async () => {
    const result = await importFromEnv(ctx.auth, {}, ["groq", "nowhere"]);
    expect(result.imported).toEqual([]);
    expect(result.skipped).toEqual([
      { providerId: "groq", reason: "no API key in environment" },
      { providerId: "nowhere", reason: "unknown provider" },
    ]);
  });
});
