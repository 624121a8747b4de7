import { vi } from "vitest";
import { useDashboardStore } from "@/stores/dashboard-store";
import type { DashboardState } from "@/types";

export class MockReply {
  constructor(readonly status: number, readonly body: unknown) {}
}

export function reply(status: number, body: unknown): MockReply {
  return new MockReply(status, body);
}

/**
 * Stub global fetch with canned replies keyed by "METHOD /api/path".
 * Unknown routes answer 404 like the real server.
 */
export function mockApi(routes: Record<string, unknown>) {
  const fetchMock = vi.fn(async (input: string, init?: RequestInit) => {
    const key = `${init?.method ?? "GET"} ${input}`;
    const found = routes[key];
    const { status, body } =
      found instanceof MockReply
        ? found
        : found === undefined
          ? { status: 404, body: { error: `No route for ${key}` } }
          : { status: 200, body: found };
    return { ok: status < 400, status, json: async () => body };
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

/** Parsed JSON body of the first call to `key` */
export function requestBody(fetchMock: ReturnType<typeof mockApi>, key: string): unknown {
  const call = fetchMock.mock.calls.find(([url, init]) => `${init?.method ?? "GET"} ${url}` === key);
  if (!call) throw new Error(`${key} was not requested`);
  const body = call[1]?.body;
  return typeof body === "string" ? JSON.parse(body) : undefined;
}

export function wasRequested(fetchMock: ReturnType<typeof mockApi>, key: string): boolean {
  return fetchMock.mock.calls.some(([url, init]) => `${init?.method ?? "GET"} ${url}` === key);
}

const initialStore = useDashboardStore.getState();

export function resetStore(): void {
  useDashboardStore.setState(initialStore, true);
}

export const SAMPLE_STATE: DashboardState = {
  files: [
    { label: "OpenCode config", path: "/home/test/.config/opencode/opencode.json", exists: true },
    { label: "Oh My OpenCode", path: "/home/test/.config/opencode/oh-my-opencode.json", exists: false },
  ],
  stats: { providers: 2, models: 5, mcps: 1, agents: 0, ohMyAgents: 0, categories: 0 },
  model: "acme/m1",
  native: [],
  projectDir: "/work/project",
  settingsPath: "/home/test/.ocfg/settings.yaml",
};
