import { create } from "zustand";
import { fetchDashboardState } from "@/lib/api";
import type { DashboardState, TabId } from "@/types";

type ApiStatus = "checking" | "connected" | "disconnected";

export interface Banner {
  type: "success" | "error";
  message: string;
}

interface DashboardStore {
  state: DashboardState | null;
  loading: boolean;
  error: string | null;
  activeTab: TabId;
  apiStatus: ApiStatus;
  banner: Banner | null;
  /** Bumped after every successful mutation so tabs can refetch */
  revision: number;

  checkApiStatus: () => Promise<void>;
  fetchState: () => Promise<void>;
  setActiveTab: (tab: TabId) => void;
  notify: (banner: Banner) => void;
  clearBanner: () => void;
  /**
   * Run a mutation: on success show `success` and refresh the overview,
   * on failure show the API's error message. Resolves to false on failure.
   */
  mutate: (success: string, fn: () => Promise<unknown>) => Promise<boolean>;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const BANNER_TIMEOUT_MS = 4000;

export const useDashboardStore = create<DashboardStore>((set, get) => ({
  state: null,
  loading: true,
  error: null,
  activeTab: "home",
  apiStatus: "checking",
  banner: null,
  revision: 0,

  checkApiStatus: async () => {
    try {
      await fetchDashboardState();
      set({ apiStatus: "connected" });
    } catch {
      set({ apiStatus: "disconnected" });
    }
  },

  fetchState: async () => {
    set({ loading: true });
    try {
      const state = await fetchDashboardState();
      set({ state, error: null, apiStatus: "connected" });
    } catch (err) {
      set({ error: messageOf(err) });
    } finally {
      set({ loading: false });
    }
  },

  setActiveTab: (tab) => set({ activeTab: tab }),

  notify: (banner) => {
    set({ banner });
    setTimeout(() => {
      if (get().banner === banner) set({ banner: null });
    }, BANNER_TIMEOUT_MS);
  },

  clearBanner: () => set({ banner: null }),

  mutate: async (success, fn) => {
    try {
      await fn();
    } catch (err) {
      get().notify({ type: "error", message: messageOf(err) });
      return false;
    }
    set((s) => ({ revision: s.revision + 1 }));
    get().notify({ type: "success", message: success });
    await get().fetchState();
    return true;
  },
}));
