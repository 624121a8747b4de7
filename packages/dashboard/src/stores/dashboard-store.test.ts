import { beforeEach, describe, expect, it, vi } from "vitest";
import { useDashboardStore } from "./dashboard-store";
import { mockApi, resetStore, SAMPLE_STATE } from "@/test/mock-api";

describe("dashboard store", () => {
  beforeEach(() => {
    resetStore();
  });

  it("marks the API connected when /api/state answers", async () => {
    mockApi({ "GET /api/state": SAMPLE_STATE });
    await useDashboardStore.getState().checkApiStatus();
    expect(useDashboardStore.getState().apiStatus).toBe("connected");
  });

  it("marks the API disconnected when fetch fails", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => {
      throw new TypeError("Failed to fetch");
    }));
    await useDashboardStore.getState().checkApiStatus();
    expect(useDashboardStore.getState().apiStatus).toBe("disconnected");
  });

  it("stores the overview from fetchState", async () => {
    mockApi({ "GET /api/state": SAMPLE_STATE });
    await useDashboardStore.getState().fetchState();
    const { state, loading, error } = useDashboardStore.getState();
    expect(state?.stats.models).toBe(5);
    expect(loading).toBe(false);
    expect(error).toBeNull();
  });

  it("mutate bumps the revision and shows the success message", async () => {
    mockApi({ "GET /api/state": SAMPLE_STATE });
    const fn = vi.fn(async () => "done");
    const ok = await useDashboardStore.getState().mutate("Saved", fn);
    expect(ok).toBe(true);
    expect(fn).toHaveBeenCalledOnce();
    expect(useDashboardStore.getState().revision).toBe(1);
    expect(useDashboardStore.getState().banner).toEqual({ type: "success", message: "Saved" });
  });

  it("mutate reports the error and leaves the revision alone", async () => {
    mockApi({});
    const ok = await useDashboardStore.getState().mutate("Saved", async () => {
      throw new Error('Provider "ghost" not found');
    });
    expect(ok).toBe(false);
    expect(useDashboardStore.getState().revision).toBe(0);
    expect(useDashboardStore.getState().banner).toEqual({ type: "error", message: 'Provider "ghost" not found' });
  });
});
