import { beforeEach, describe, expect, it } from "vitest";
import { fireEvent, render, screen, waitFor } from "@testing-library/react";
import { useDashboardStore } from "@/stores/dashboard-store";
import { mockApi, reply, requestBody, resetStore, SAMPLE_STATE, wasRequested } from "@/test/mock-api";
import { ProvidersTab } from "./ProvidersTab";

const ACME = {
  name: "acme",
  displayName: "Acme AI",
  npm: "@ai-sdk/openai-compatible",
  baseURL: "https://api.acme.test/v1",
  apiKey: "test****cret",
  modelCount: 1,
  native: false,
  valid: true,
};

describe("ProvidersTab", () => {
  beforeEach(() => {
    resetStore();
  });

  it("lists providers with masked keys", async () => {
    mockApi({ "GET /api/providers": [ACME], "GET /api/providers/sdks": [] });
    render(<ProvidersTab />);
    expect(await screen.findByText("Acme AI")).toBeInTheDocument();
    expect(screen.getByText("test****cret")).toBeInTheDocument();
    expect(screen.getByText("https://api.acme.test/v1")).toBeInTheDocument();
  });

  it("adds a provider from the dialog", async () => {
    const fetchMock = mockApi({
      "GET /api/providers": [],
      "GET /api/providers/sdks": ["@ai-sdk/openai-compatible", "@ai-sdk/anthropic"],
      "POST /api/providers": reply(201, { npm: "@ai-sdk/openai-compatible" }),
      "GET /api/state": SAMPLE_STATE,
    });
    render(<ProvidersTab />);
    await screen.findByText("No custom providers configured.");

    fireEvent.click(screen.getByRole("button", { name: /add provider/i }));
    fireEvent.change(screen.getByRole("textbox", { name: "Name" }), { target: { value: " acme " } });
    fireEvent.change(screen.getByRole("textbox", { name: "Base URL" }), { target: { value: "https://api.acme.test/v1" } });
    fireEvent.click(screen.getByRole("button", { name: "Add" }));

    await waitFor(() => expect(wasRequested(fetchMock, "POST /api/providers")).toBe(true));
    expect(requestBody(fetchMock, "POST /api/providers")).toEqual({ name: "acme", baseURL: "https://api.acme.test/v1" });
    await waitFor(() =>
      expect(useDashboardStore.getState().banner).toEqual({ type: "success", message: 'Provider "acme" added' }),
    );
  });

  it("shows the models of the selected provider", async () => {
    mockApi({
      "GET /api/providers": [ACME],
      "GET /api/providers/sdks": [],
      "GET /api/models/acme": [
        { id: "m1", name: "Model One", attachment: false, context: 128000, output: 8192, hasOptions: false, variants: ["fast"], valid: true },
      ],
      "GET /api/models/presets?provider=acme": [],
    });
    render(<ProvidersTab />);
    fireEvent.click(await screen.findByText("Acme AI"));
    expect(await screen.findByText("Models of acme")).toBeInTheDocument();
    expect(await screen.findByText("Model One")).toBeInTheDocument();
    expect(screen.getByText("128000")).toBeInTheDocument();
    expect(screen.getByText("fast")).toBeInTheDocument();
  });

  it("shows the API error when removal fails", async () => {
    mockApi({
      "GET /api/providers": [ACME],
      "GET /api/providers/sdks": [],
      "DELETE /api/providers/acme": reply(404, { error: 'Provider "acme" not found' }),
    });
    render(<ProvidersTab />);
    fireEvent.click(await screen.findByRole("button", { name: "Remove acme" }));
    fireEvent.click(screen.getByRole("button", { name: "Remove" }));
    await waitFor(() =>
      expect(useDashboardStore.getState().banner).toEqual({ type: "error", message: 'Provider "acme" not found' }),
    );
  });
});
