import { describe, it, expect } from "vitest";
import { nativeProviderStatuses, nativeStatusOf } from "./native-status.js";

describe("native-status", () => {
  it("prefers auth.json over the environment", () => {
    const auth = { anthropic: { type: "api", key: "test-secret-key" } };
    expect(nativeStatusOf("anthropic", auth, { ANTHROPIC_API_KEY: "x" })).toBe("configured");
    expect(nativeStatusOf("openai", auth, { OPENAI_API_KEY: "test-secret" })).toBe("env");
    expect(nativeStatusOf("groq", auth, {})).toBe("none");
    expect(nativeStatusOf("ollama", auth, {})).toBe("none");
    expect(nativeStatusOf("unknown", auth, {})).toBe("none");
  });

  it("combines registry, auth, env and options", () => {
    const doc = { provider: { openai: { options: { organization: "org-1" } } } };
    const auth = { openai: { type: "api", key: "sk-test-abcdef" } };
    const statuses = nativeProviderStatuses(doc, auth, { OPENAI_API_KEY: "test-secret" });
    const openai = statuses.find(s => s.id === "openai");
    expect(openai).toMatchObject({
      id: "openai",
      npm: "@ai-sdk/openai",
      status: "configured",
      maskedKey: "sk-t****cdef",
      envVars: ["OPENAI_API_KEY"],
      configuredOptions: ["organization"],
    });
    expect(statuses).toHaveLength(20);
  });
});
