import { beforeEach, describe, expect, it } from "vitest";
import { fireEvent, render, screen, waitFor } from "@testing-library/react";
import { mockApi, requestBody, resetStore, SAMPLE_STATE } from "@/test/mock-api";
import { useDashboardStore } from "@/stores/dashboard-store";
import { AgentsTab } from "./AgentsTab";

describe("AgentsTab", () => {
  beforeEach(() => {
    resetStore();
  });

  it("offers configured models when adding an agent", async () => {
    const fetchMock = mockApi({
      "GET /api/agents": [],
      "GET /api/agents/presets": ["build", "plan"],
      "GET /api/models/refs": ["acme/m1", "acme/m2"],
      "POST /api/agents": { description: "Reviews diffs", mode: "subagent" },
      "GET /api/state": SAMPLE_STATE,
    });
    render(<AgentsTab />);
    expect(await screen.findByText("No agents configured.")).toBeInTheDocument();
    await screen.findByRole("button", { name: /build/ });

    fireEvent.click(screen.getByRole("button", { name: /add agent/i }));
    const model = await screen.findByLabelText("Model (provider/model)");
    await waitFor(() => expect(document.querySelectorAll("#model-suggestions option")).toHaveLength(2));
    expect(model).toHaveAttribute("list", "model-suggestions");

    fireEvent.change(screen.getByLabelText("Name"), { target: { value: " reviewer " } });
    fireEvent.change(screen.getByLabelText("Description"), { target: { value: "Reviews diffs" } });
    fireEvent.change(model, { target: { value: "acme/m2" } });
    fireEvent.click(screen.getByRole("button", { name: "Add" }));

    await waitFor(() =>
      expect(useDashboardStore.getState().banner).toEqual({ type: "success", message: 'Agent "reviewer" added' }),
    );
    expect(requestBody(fetchMock, "POST /api/agents")).toEqual({
      name: "reviewer",
      description: "Reviews diffs",
      mode: "primary",
      model: "acme/m2",
    });
  });
});
