import { describe, it, expect } from "vitest";
import type { ConfigDocument } from "@ocfg/core";
import {
  COMMON_TOOLS,
  deletePermission,
  deleteSkillPermission,
  listPermissions,
  listSkillPermissions,
  quickAddPermissions,
  setPermission,
  setSkillPermission,
} from "./permission-manager.js";

describe("permission-manager", () => {
  it("lists tool permissions without the skill key", () => {
    const doc: ConfigDocument = { permission: { edit: "ask", bash: { "git *": "allow" }, skill: { "*": "allow" }, webfetch: "maybe" } };
    expect(listPermissions(doc)).toEqual([
      { tool: "edit", level: "ask" },
      { tool: "bash", level: null },
      { tool: "webfetch", level: null },
    ]);
  });

  it("sets and deletes permissions", () => {
    const doc: ConfigDocument = {};
    setPermission(doc, "bash", "deny");
    expect(doc.permission).toEqual({ bash: "deny" });
    expect(() => setPermission(doc, "bash", "sometimes")).toThrow('Invalid permission level "sometimes"');
    expect(() => setPermission(doc, "skill", "allow")).toThrow(/skill permissions/);
    deletePermission(doc, "bash");
    expect(doc.permission).toEqual({});
    expect(() => deletePermission(doc, "bash")).toThrow('Permission "bash" not found');
  });

  it("quick-add only fills tools that are not configured", () => {
    const doc: ConfigDocument = { permission: { bash: "deny" } };
    const added = quickAddPermissions(doc);
    expect(added).toEqual(COMMON_TOOLS.filter(t => t !== "bash"));
    expect(doc.permission).toMatchObject({ bash: "deny", read: "allow", edit: "allow" });
  });

  it("shows a plain skill permission as the * pattern", () => {
    expect(listSkillPermissions({ permission: { skill: "ask" } })).toEqual([{ pattern: "*", level: "ask" }]);
    expect(listSkillPermissions({})).toEqual([]);
  });

  it("converts a plain skill permission into patterns when adding one", () => {
    const doc: ConfigDocument = { permission: { skill: "ask" } };
    setSkillPermission(doc, "git-*", "allow");
    expect(doc.permission).toEqual({ skill: { "*": "ask", "git-*": "allow" } });
  });

  it("replaces a malformed skill entry", () => {
    const doc: ConfigDocument = { permission: { skill: 42 } };
    setSkillPermission(doc, "internal-*", "deny");
    expect(doc.permission).toEqual({ skill: { "internal-*": "deny" } });
  });

  it("deletes skill patterns and drops the empty map", () => {
    const doc: ConfigDocument = { permission: { skill: { "a-*": "allow", "b-*": "deny" } } };
    deleteSkillPermission(doc, "a-*");
    expect(doc.permission).toEqual({ skill: { "b-*": "deny" } });
    deleteSkillPermission(doc, "b-*");
    expect(doc.permission).toEqual({});
    expect(() => deleteSkillPermission(doc, "b-*")).toThrow('Skill permission "b-*" not found');
  });
});
