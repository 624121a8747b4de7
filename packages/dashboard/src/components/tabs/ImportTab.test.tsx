import { describe, expect, it } from "vitest";
import { summarizeImport } from "./ImportTab";

describe("summarizeImport", () => {
  it("lists what changed", () => {
    expect(
      summarizeImport({ added: ["acme"], overwritten: [], conflicts: ["openai"], permissions: ["bash", "edit"] }),
    ).toBe("added acme; kept existing openai; 2 permission(s)");
  });

  it("says when nothing changed", () => {
    expect(summarizeImport({ added: [], overwritten: [], conflicts: [], permissions: [] })).toBe("nothing new");
  });
});
