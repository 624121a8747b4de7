import { describe, it, expect } from "vitest";
import type { ConfigDocument } from "@ocfg/core";
import { addMcp, buildMcpRecord, deleteMcp, getMcp, listMcps, setMcpEnabled, updateMcp } from "./mcp-manager.js";

describe("mcp-manager", () => {
  it("builds a local server with defaults", () => {
    expect(buildMcpRecord({ command: ["npx", " -y ", "", "@modelcontextprotocol/server-filesystem"] })).toEqual({
      type: "local",
      command: ["npx", "-y", "@modelcontextprotocol/server-filesystem"],
      enabled: true,
      timeout: 5000,
    });
  });

  it("a URL makes the server remote", () => {
    expect(buildMcpRecord({ url: "https://mcp.example.com/sse", headers: { Authorization: "{env:MCP_TOKEN}" }, enabled: false })).toEqual({
      type: "remote",
      url: "https://mcp.example.com/sse",
      headers: { Authorization: "{env:MCP_TOKEN}" },
      enabled: false,
      timeout: 5000,
    });
  });

  it("rejects missing commands, bad URLs and bad timeouts", () => {
    expect(() => buildMcpRecord({})).toThrow(/needs a command/);
    expect(() => buildMcpRecord({ url: "ftp://x" })).toThrow('Invalid server URL "ftp://x"');
    expect(() => buildMcpRecord({ command: ["x"], timeout: 1.5 })).toThrow("Timeout must be a positive integer (ms)");
  });

  it("adds, lists and toggles servers", () => {
    const doc: ConfigDocument = {};
    addMcp(doc, "fs", { command: ["mcp-fs", "/tmp"], environment: { ROOT: "/tmp" } });
    addMcp(doc, "remote", { url: "https://mcp.example.com" });
    setMcpEnabled(doc, "fs", false);

    expect(listMcps(doc)).toEqual([
      { name: "fs", type: "local", enabled: false, target: "mcp-fs /tmp", timeout: 5000, valid: true },
      { name: "remote", type: "remote", enabled: true, target: "https://mcp.example.com", timeout: 5000, valid: true },
    ]);
    expect(() => addMcp(doc, "fs", { command: ["x"] })).toThrow('MCP server "fs" already exists');
  });

  it("marks malformed entries invalid", () => {
    const doc: ConfigDocument = { mcp: { bad: { type: "local" }, worse: 42 } };
    expect(listMcps(doc)).toEqual([
      { name: "bad", type: "local", enabled: false, target: "", timeout: 5000, valid: false },
      { name: "worse", type: "unknown", enabled: false, target: "", timeout: 5000, valid: false },
    ]);
    expect(() => getMcp(doc, "bad")).toThrow('MCP server "bad" is malformed');
  });

  it("updates in place and can switch type", () => {
    const doc: ConfigDocument = {};
    addMcp(doc, "srv", { command: ["a"], timeout: 9000 });
    updateMcp(doc, "srv", { environment: { DEBUG: "1" } });
    expect(getMcp(doc, "srv")).toEqual({
      type: "local",
      command: ["a"],
      environment: { DEBUG: "1" },
      enabled: true,
      timeout: 9000,
    });

    updateMcp(doc, "srv", { url: "http://localhost:8080/mcp" });
    expect(getMcp(doc, "srv")).toEqual({ type: "remote", url: "http://localhost:8080/mcp", enabled: true, timeout: 9000 });

    updateMcp(doc, "srv", { command: ["b", "c"] });
    expect(getMcp(doc, "srv")).toEqual({ type: "local", command: ["b", "c"], enabled: true, timeout: 9000 });
  });

  it("deletes servers", () => {
    const doc: ConfigDocument = { mcp: { a: {} } };
    deleteMcp(doc, "a");
    expect(doc.mcp).toEqual({});
    expect(() => deleteMcp(doc, "a")).toThrow('MCP server "a" not found');
  });

  it("treats names like toString as ordinary keys", () => {
    const doc: ConfigDocument = {};
    addMcp(doc, "toString", { url: "https://mcp.example.test" });
    expect(listMcps(doc).map((m) => m.name)).toEqual(["toString"]);
    expect(() => updateMcp({ mcp: {} }, "valueOf", { url: "https://mcp.example.test" })).toThrow(
      'MCP server "valueOf" not found',
    );
    expect(() => deleteMcp({ mcp: {} }, "constructor")).toThrow('MCP server "constructor" not found');
  });
});
