import { beforeEach, describe, expect, it } from "vitest";
import { fireEvent, render, screen, waitFor } from "@testing-library/react";
import { mockApi, requestBody, resetStore, SAMPLE_STATE, wasRequested } from "@/test/mock-api";
import { McpTab, mcpFormFromValues, parsePairs } from "./McpTab";

describe("parsePairs", () => {
  it("splits KEY=VALUE lines and skips blanks", () => {
    expect(parsePairs("API_KEY=test-secret\n\n  REGION = eu  \nFLAG")).toEqual({
      API_KEY: "test-secret",
      REGION: "eu",
      FLAG: "",
    });
  });

  it("returns undefined for empty text", () => {
    expect(parsePairs("  \n")).toBeUndefined();
  });
});

describe("mcpFormFromValues", () => {
  it("builds a local server from the command line", () => {
    expect(
      mcpFormFromValues({ name: " files ", type: "local", command: "npx -y files-mcp", environment: "ROOT=/tmp", url: "ignored", headers: "", timeout: "" }),
    ).toEqual({
      name: "files",
      command: ["npx", "-y", "files-mcp"],
      url: undefined,
      environment: { ROOT: "/tmp" },
      headers: undefined,
      timeout: undefined,
    });
  });

  it("builds a remote server with headers", () => {
    expect(
      mcpFormFromValues({ name: "docs", type: "remote", command: "", environment: "", url: "https://mcp.example.test", headers: "Authorization=Bearer test-token", timeout: "8000" }),
    ).toEqual({
      name: "docs",
      command: undefined,
      url: "https://mcp.example.test",
      environment: undefined,
      headers: { Authorization: "Bearer test-token" },
      timeout: 8000,
    });
  });
});

describe("McpTab", () => {
  beforeEach(() => {
    resetStore();
  });

  it("toggles a server off", async () => {
    const fetchMock = mockApi({
      "GET /api/mcp": [{ name: "files", type: "local", enabled: true, target: "npx files-mcp", timeout: 5000, valid: true }],
      "POST /api/mcp/files/toggle": { name: "files", enabled: false },
      "GET /api/state": SAMPLE_STATE,
    });
    render(<McpTab />);
    fireEvent.click(await screen.findByRole("button", { name: "Disable files" }));
    await waitFor(() => expect(wasRequested(fetchMock, "POST /api/mcp/files/toggle")).toBe(true));
    expect(requestBody(fetchMock, "POST /api/mcp/files/toggle")).toEqual({ enabled: false });
  });
});
