import { beforeEach, describe, expect, it } from "vitest";
import { fireEvent, render, screen, waitFor } from "@testing-library/react";
import { mockApi, requestBody, resetStore, SAMPLE_STATE, wasRequested } from "@/test/mock-api";
import { BackupsTab } from "./BackupsTab";

const BACKUP = {
  file: "opencode_20260601_120000_manual.json",
  path: "/home/test/.config/opencode/backups/opencode_20260601_120000_manual.json",
  name: "opencode",
  timestamp: "20260601_120000",
  tag: "manual",
  display: "2026-06-01 12:00:00",
};

describe("BackupsTab", () => {
  beforeEach(() => {
    resetStore();
  });

  it("restores a backup after confirmation", async () => {
    const fetchMock = mockApi({
      "GET /api/backups": [BACKUP],
      [`POST /api/backups/${BACKUP.file}/restore`]: { restored: BACKUP.file, target: "/x/opencode.json", safety: null },
      "GET /api/state": SAMPLE_STATE,
    });
    render(<BackupsTab />);
    fireEvent.click(await screen.findByRole("button", { name: `Restore ${BACKUP.file}` }));
    expect(screen.getByText("The current opencode file is backed up, then replaced with this copy.")).toBeInTheDocument();
    fireEvent.click(screen.getByRole("button", { name: "Restore" }));
    await waitFor(() => expect(wasRequested(fetchMock, `POST /api/backups/${BACKUP.file}/restore`)).toBe(true));
  });

  it("creates a backup of auth.json", async () => {
    const fetchMock = mockApi({
      "GET /api/backups": [],
      "POST /api/backups": { ...BACKUP, name: "auth" },
      "GET /api/state": SAMPLE_STATE,
    });
    render(<BackupsTab />);
    await screen.findByText("No backups yet.");
    fireEvent.click(screen.getByRole("button", { name: "auth" }));
    await waitFor(() => expect(wasRequested(fetchMock, "POST /api/backups")).toBe(true));
    expect(requestBody(fetchMock, "POST /api/backups")).toEqual({ config: "auth" });
  });

  it("filters the list by config", async () => {
    const fetchMock = mockApi({ "GET /api/backups": [BACKUP], "GET /api/backups?config=auth": [] });
    render(<BackupsTab />);
    fireEvent.change(await screen.findByRole("combobox", { name: "Filter backups" }), { target: { value: "auth" } });
    await waitFor(() => expect(wasRequested(fetchMock, "GET /api/backups?config=auth")).toBe(true));
  });
});
