import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { createTestContext, readJson, type TestContext } from "../__tests__/test-context.js";
import { loadJson, parseJsonc, serializeJson } from "./config-store.js";

describe("parseJsonc", () => {
  it("accepts comments and trailing commas", () => {
    expect(parseJsonc('{\n  // comment\n  "a": 1,\n}').data).toEqual({ a: 1 });
  });

  it("reports syntax errors with a position", () => {
    const result = parseJsonc('{\n  "a": 1\n  "b": 2\n}');
    expect(result.data).toBeNull();
    expect(result.errors[0]).toMatch(/^CommaExpected at 3:/);
  });

  it("rejects a non-object root", () => {
    expect(parseJsonc("[1]")).toEqual({ data: null, errors: ["Root value is not an object"] });
  });

  it("serializes with two-space indent and a newline", () => {
    expect(serializeJson({ a: [1] })).toBe('{\n  "a": [\n    1\n  ]\n}\n');
  });
});

describe("ConfigStore", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => ctx.cleanup());

  it("loadJson returns null for missing or broken files", async () => {
    const file = path.join(ctx.root, "other.json");
    expect(await loadJson(file)).toBeNull();
    fs.writeFileSync(file, "{ nope");
    expect(await loadJson(file)).toBeNull();
    fs.writeFileSync(file, '{ "a": 1, }');
    expect(await loadJson(file)).toEqual({ a: 1 });
  });

  it("loads a missing file as an empty document", async () => {
    expect(await ctx.store.load("opencode")).toEqual({});
  });

  it("prefers the .jsonc file when it exists", async () => {
    fs.mkdirSync(ctx.paths.opencodeDir, { recursive: true });
    fs.writeFileSync(path.join(ctx.paths.opencodeDir, "opencode.jsonc"), '{ /* c */ "model": "a/b" }');
    expect(ctx.store.pathOf("opencode")).toBe(path.join(ctx.paths.opencodeDir, "opencode.jsonc"));
    expect(await ctx.store.load("opencode")).toEqual({ model: "a/b" });
  });

  it("refuses to load a file that does not parse", async () => {
    fs.mkdirSync(ctx.paths.opencodeDir, { recursive: true });
    fs.writeFileSync(path.join(ctx.paths.opencodeDir, "oh-my-opencode.json"), "{ nope");
    await expect(ctx.store.load("oh-my-opencode")).rejects.toThrow(/Fix the file or restore a backup/);
  });

  it("edits with a backup of the previous content", async () => {
    await ctx.store.save("opencode", { model: "a/b" });
    expect(await ctx.backups.listBackups()).toEqual([]);

    const result = await ctx.store.edit("opencode", doc => {
      doc.small_model = "a/c";
      return "done";
    });
    expect(result).toBe("done");
    expect(readJson(ctx.store.pathOf("opencode"))).toEqual({ model: "a/b", small_model: "a/c" });
    const backups = await ctx.backups.listBackups("opencode");
    expect(backups).toHaveLength(1);
    expect(readJson(backups[0].path)).toEqual({ model: "a/b" });
  });
});
