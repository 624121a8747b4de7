import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { TraceStore } from "./trace-store.js";
import { createLogEntry } from "@ocfg/core";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";

describe("TraceStore", () => {
  let store: TraceStore;
  let tmpDir: string;
  let dbPath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "ocfg-trace-"));
    dbPath = path.join(tmpDir, "trace.db");
    store = new TraceStore(dbPath);
  });

  afterEach(() => {
    store.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("inserts and queries a log entry", () => {
    store.insert(createLogEntry({
      traceId: "mcp-001",
      level: "info",
      cmd: "mcp",
      scope: "mcp",
      op: "add",
      msg: "Added MCP server",
      item: "postgres",
      itemType: "mcp",
      data: { type: "local" },
    }));
    const results = store.query({ item: "postgres" });
    expect(results).toHaveLength(1);
    expect(results[0].msg).toBe("Added MCP server");
    expect(results[0].itemType).toBe("mcp");
    expect(results[0].data).toEqual({ type: "local" });
    expect(results[0].error).toBeUndefined();
  });

  it("filters by multiple dimensions", () => {
    store.insert(createLogEntry({ traceId: "t1", level: "info", cmd: "provider", scope: "provider", op: "add", msg: "a", item: "openai" }));
    store.insert(createLogEntry({ traceId: "t1", level: "error", cmd: "provider", scope: "provider", op: "add", msg: "b", item: "openai" }));
    store.insert(createLogEntry({ traceId: "t1", level: "info", cmd: "provider", scope: "model", op: "add", msg: "c", item: "gpt-5" }));

    const errors = store.query({ item: "openai", level: "error" });
    expect(errors).toHaveLength(1);
    expect(errors[0].msg).toBe("b");

    expect(store.query({ scope: "provider" })).toHaveLength(2);
  });

  it("filters by traceId", () => {
    store.insert(createLogEntry({ traceId: "t1", level: "info", cmd: "mcp", scope: "mcp", op: "add", msg: "a" }));
    store.insert(createLogEntry({ traceId: "t2", level: "info", cmd: "skill", scope: "skill", op: "create", msg: "b" }));
    const results = store.query({ traceId: "t1" });
    expect(results).toHaveLength(1);
    expect(results[0].msg).toBe("a");
  });

  it("filters by time range (since)", () => {
    const now = Date.now();
    store.insert(createLogEntry({ traceId: "t1", level: "info", cmd: "status", scope: "config", op: "read", msg: "old", ts: now - 7200_000 }));
    store.insert(createLogEntry({ traceId: "t2", level: "info", cmd: "status", scope: "config", op: "read", msg: "recent", ts: now }));
    const results = store.query({ since: now - 3600_000 });
    expect(results).toHaveLength(1);
    expect(results[0].msg).toBe("recent");
  });

  it("limits results and returns newest first", () => {
    for (let i = 0; i < 100; i++) {
      store.insert(createLogEntry({ traceId: "t1", level: "info", cmd: "mcp", scope: "mcp", op: "add", msg: `entry-${i}`, ts: 1000 + i }));
    }
    const results = store.query({ limit: 10 });
    expect(results).toHaveLength(10);
    expect(results[0].msg).toBe("entry-99");
  });

  it("exports to JSONL string", () => {
    store.insert(createLogEntry({ traceId: "t1", level: "error", cmd: "auth", scope: "auth", op: "write", msg: "fail", item: "anthropic" }));
    const lines = store.exportJsonl({ item: "anthropic" }).trim().split("\n");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0]).item).toBe("anthropic");
  });

  it("prunes the oldest rows beyond maxRows", () => {
    const small = new TraceStore(path.join(tmpDir, "small.db"), { maxRows: 100 });
    for (let i = 0; i < 150; i++) {
      small.insert(createLogEntry({ traceId: "t1", level: "info", cmd: "mcp", scope: "mcp", op: "add", msg: `e-${i}`, ts: 1000 + i }));
    }
    small.vacuum();
    expect(small.count()).toBe(100);
    const oldest = small.query({ limit: 1000 }).at(-1);
    expect(oldest?.msg).toBe("e-50");
    small.close();
  });

  it("filters by project", () => {
    store.insert(createLogEntry({ traceId: "t1", level: "info", cmd: "rules", scope: "rules", op: "write", msg: "a", project: "/work/app" }));
    store.insert(createLogEntry({ traceId: "t2", level: "info", cmd: "rules", scope: "rules", op: "write", msg: "b", project: "/work/other" }));
    expect(store.query({ project: "/work/app" })).toHaveLength(1);
  });
});
