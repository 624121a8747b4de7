import { beforeEach, describe, expect, it } from "vitest";
import { fireEvent, render, screen, waitFor } from "@testing-library/react";
import { mockApi, requestBody, resetStore, SAMPLE_STATE, wasRequested } from "@/test/mock-api";
import { RulesTab } from "./RulesTab";

function rulesRoutes(extra: Record<string, unknown> = {}) {
  return {
    "GET /api/rules/instructions": ["CONTRIBUTING.md"],
    "GET /api/rules/agents-md/global": { location: "global", path: "/home/test/.config/opencode/AGENTS.md", exists: true, content: "# Global rules" },
    "GET /api/rules/agents-md/project": { location: "project", path: "/work/project/AGENTS.md", exists: false, content: "" },
    "GET /api/compaction": { auto: true, prune: true },
    "GET /api/state": SAMPLE_STATE,
    ...extra,
  };
}

describe("RulesTab", () => {
  beforeEach(() => {
    resetStore();
  });

  it("loads instructions and the global AGENTS.md", async () => {
    mockApi(rulesRoutes());
    render(<RulesTab />);
    expect(await screen.findByText("CONTRIBUTING.md")).toBeInTheDocument();
    await waitFor(() => expect(screen.getByRole("textbox", { name: "AGENTS.md content" })).toHaveValue("# Global rules"));
  });

  it("switches to the project AGENTS.md", async () => {
    mockApi(rulesRoutes());
    render(<RulesTab />);
    fireEvent.click(await screen.findByRole("button", { name: "project" }));
    expect(await screen.findByText("/work/project/AGENTS.md (not created yet)")).toBeInTheDocument();
  });

  it("adds an instruction and clears the input", async () => {
    const fetchMock = mockApi(rulesRoutes({ "POST /api/rules/instructions": { instruction: "docs/*.md", added: true } }));
    render(<RulesTab />);
    const input = await screen.findByRole("textbox", { name: "New instruction" });
    fireEvent.change(input, { target: { value: "docs/*.md" } });
    fireEvent.click(screen.getByRole("button", { name: "Add" }));
    await waitFor(() => expect(wasRequested(fetchMock, "POST /api/rules/instructions")).toBe(true));
    expect(requestBody(fetchMock, "POST /api/rules/instructions")).toEqual({ instruction: "docs/*.md" });
    await waitFor(() => expect(input).toHaveValue(""));
  });

  it("turns off auto compaction", async () => {
    const fetchMock = mockApi(rulesRoutes({ "PUT /api/compaction": { auto: false, prune: true } }));
    render(<RulesTab />);
    fireEvent.click(await screen.findByRole("checkbox", { name: "auto" }));
    await waitFor(() => expect(wasRequested(fetchMock, "PUT /api/compaction")).toBe(true));
    expect(requestBody(fetchMock, "PUT /api/compaction")).toEqual({ auto: false });
  });
});
