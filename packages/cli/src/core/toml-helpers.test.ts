import { describe, it, expect } from "vitest";
import { parseToml, parseTomlValue } from "./toml-helpers.js";

describe("parseToml", () => {
  it("reads sections, strings, numbers and booleans", () => {
    const content = [
      "# Codex config",
      'model = "gpt-5"',
      "",
      "[api]",
      'base_url = "https://api.example.com/v1"  # trailing comment',
      "api_key = 'test-secret'",
      "timeout = 30_000",
      "stream = true",
      "",
      "[mcp_servers.docs]",
      'command = "npx"',
      'args = ["-y", "docs-server"]',
    ].join("\n");

    expect(parseToml(content)).toEqual({
      model: "gpt-5",
      api: {
        base_url: "https://api.example.com/v1",
        api_key: "test-secret",
        timeout: 30000,
        stream: true,
      },
      mcp_servers: { docs: { command: "npx", args: ["-y", "docs-server"] } },
    });
  });

  it("keeps # inside quoted strings and unescapes basic strings", () => {
    expect(parseToml('note = "a # b"\npath = "C:\\\\tools"\nquote = "say \\"hi\\""')).toEqual({
      note: "a # b",
      path: "C:\\tools",
      quote: 'say "hi"',
    });
  });

  it("skips lines it does not understand", () => {
    expect(parseToml("[[tables]]\ninline = { a = 1 }\nbare\nok = 1")).toEqual({ ok: 1 });
  });

  it("handles CRLF input and quoted keys", () => {
    expect(parseToml('[section]\r\n"quoted key" = false\r\n')).toEqual({ section: { "quoted key": false } });
  });
});

describe("parseTomlValue", () => {
  it("parses scalars and flat arrays", () => {
    expect(parseTomlValue("1.5")).toBe(1.5);
    expect(parseTomlValue("[1, 2]")).toEqual([1, 2]);
    expect(parseTomlValue("[a, 2]")).toBeUndefined();
    expect(parseTomlValue("bare")).toBeUndefined();
  });
});
