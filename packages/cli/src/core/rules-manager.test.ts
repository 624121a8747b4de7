import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import type { ConfigDocument } from "@ocfg/core";
import { createTestContext, type TestContext } from "../__tests__/test-context.js";
import {
  AGENTS_MD_TEMPLATE,
  addInstruction,
  deleteAgentsMd,
  getCompaction,
  listInstructions,
  readAgentsMd,
  removeInstruction,
  setCompaction,
  writeAgentsMd,
} from "./rules-manager.js";

describe("instructions", () => {
  it("adds without duplicates and ignores non-string entries", () => {
    const doc: ConfigDocument = { instructions: ["CONTRIBUTING.md", 7] };
    expect(listInstructions(doc)).toEqual(["CONTRIBUTING.md"]);
    expect(addInstruction(doc, " docs/*.md ")).toBe(true);
    expect(addInstruction(doc, "docs/*.md")).toBe(false);
    expect(doc.instructions).toEqual(["CONTRIBUTING.md", "docs/*.md"]);
    expect(() => addInstruction(doc, "")).toThrow("Instruction path is required");
  });

  it("removes entries and the empty list", () => {
    const doc: ConfigDocument = { instructions: ["a.md"] };
    removeInstruction(doc, "a.md");
    expect(doc).toEqual({});
    expect(() => removeInstruction(doc, "a.md")).toThrow('Instruction "a.md" not found');
  });
});

describe("compaction", () => {
  it("defaults both flags to true", () => {
    expect(getCompaction({})).toEqual({ auto: true, prune: true });
    expect(getCompaction({ compaction: "nope" })).toEqual({ auto: true, prune: true });
  });

  it("writes a partial update over current values", () => {
    const doc: ConfigDocument = { compaction: { auto: false } };
    setCompaction(doc, { prune: false });
    expect(doc.compaction).toEqual({ auto: false, prune: false });
  });
});

describe("AGENTS.md", () => {
  let ctx: TestContext;

  afterEach(() => ctx.cleanup());

  it("reads a missing file as empty", async () => {
    ctx = createTestContext();
    const file = await readAgentsMd(ctx.paths, "project");
    expect(file).toEqual({ location: "project", path: ctx.paths.agentsMd("project"), exists: false, content: "" });
  });

  it("writes with a trailing newline and deletes", async () => {
    ctx = createTestContext();
    const written = await writeAgentsMd(ctx.paths, "global", "# Rules");
    expect(fs.readFileSync(written, "utf-8")).toBe("# Rules\n");
    expect((await readAgentsMd(ctx.paths, "global")).exists).toBe(true);
    await deleteAgentsMd(ctx.paths, "global");
    expect(fs.existsSync(written)).toBe(false);
    await expect(deleteAgentsMd(ctx.paths, "global")).rejects.toThrow(/No AGENTS.md/);
  });

  it("the template is a markdown document", () => {
    expect(AGENTS_MD_TEMPLATE.startsWith("# Project Rules\n")).toBe(true);
  });
});
