import { beforeEach, describe, expect, it } from "vitest";
import { fireEvent, render, screen, waitFor } from "@testing-library/react";
import { mockApi, requestBody, resetStore, SAMPLE_STATE, wasRequested } from "@/test/mock-api";
import { PermissionsTab } from "./PermissionsTab";

describe("PermissionsTab", () => {
  beforeEach(() => {
    resetStore();
  });

  it("lists tool and skill permissions", async () => {
    mockApi({
      "GET /api/permissions": {
        tools: [{ tool: "bash", level: "ask" }, { tool: "edit", level: null }],
        skills: [{ pattern: "internal-*", level: "deny" }],
      },
    });
    render(<PermissionsTab />);
    expect(await screen.findByText("bash")).toBeInTheDocument();
    expect(screen.getByRole("combobox", { name: "Level for bash" })).toHaveValue("ask");
    expect(screen.getByRole("combobox", { name: "Level for edit" })).toHaveDisplayValue("(custom)");
    expect(screen.getByRole("combobox", { name: "Level for internal-*" })).toHaveValue("deny");
  });

  it("changes a tool level", async () => {
    const fetchMock = mockApi({
      "GET /api/permissions": { tools: [{ tool: "bash", level: "ask" }], skills: [] },
      "PUT /api/permissions/bash": { tool: "bash", level: "allow" },
      "GET /api/state": SAMPLE_STATE,
    });
    render(<PermissionsTab />);
    fireEvent.change(await screen.findByRole("combobox", { name: "Level for bash" }), { target: { value: "allow" } });
    await waitFor(() => expect(wasRequested(fetchMock, "PUT /api/permissions/bash")).toBe(true));
    expect(requestBody(fetchMock, "PUT /api/permissions/bash")).toEqual({ level: "allow" });
  });

  it("quick-adds the common tools", async () => {
    const fetchMock = mockApi({
      "GET /api/permissions": { tools: [], skills: [] },
      "POST /api/permissions/quick-add": { added: ["read", "edit"] },
      "GET /api/state": SAMPLE_STATE,
    });
    render(<PermissionsTab />);
    fireEvent.click(await screen.findByRole("button", { name: /quick add/i }));
    await waitFor(() => expect(wasRequested(fetchMock, "POST /api/permissions/quick-add")).toBe(true));
  });
});
