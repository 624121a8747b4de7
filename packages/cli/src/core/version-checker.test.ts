import { describe, it, expect, vi, afterEach } from "vitest";
import { checkForUpdate, compareVersions, extractVersion } from "./version-checker.js";

describe("version helpers", () => {
  it("extracts versions from tags", () => {
    expect(extractVersion("v1.2.3-beta")).toBe("1.2.3");
    expect(extractVersion("release")).toBeNull();
  });

  it("compares numerically", () => {
    expect(compareVersions("1.10.0", "1.9.9")).toBeGreaterThan(0);
    expect(compareVersions("1.0", "1.0.0")).toBe(0);
    expect(compareVersions("0.1.0", "0.2.0")).toBeLessThan(0);
  });
});

describe("checkForUpdate", () => {
  afterEach(() => vi.unstubAllGlobals());

  it("skips the check without a repository", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    expect(await checkForUpdate(undefined, "1.0.0")).toEqual({
      current: "1.0.0",
      latest: null,
      updateAvailable: false,
      reason: "no repository configured",
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("reports a newer release", async () => {
    const fetchMock = vi.fn(
      async () =>
        new Response(JSON.stringify({ tag_name: "v1.1.0", html_url: "https://github.com/acme/tool/releases/v1.1.0" })),
    );
    vi.stubGlobal("fetch", fetchMock);
    expect(await checkForUpdate("acme/tool", "1.0.0")).toEqual({
      current: "1.0.0",
      latest: "1.1.0",
      updateAvailable: true,
      releaseUrl: "https://github.com/acme/tool/releases/v1.1.0",
    });
    expect(fetchMock).toHaveBeenCalledWith(
      "https://api.github.com/repos/acme/tool/releases/latest",
      expect.objectContaining({ headers: { Accept: "application/vnd.github+json" } }),
    );
  });

  it("turns HTTP and network failures into reasons", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("", { status: 404 })));
    expect((await checkForUpdate("acme/tool", "1.0.0")).reason).toBe("GitHub API 404");

    vi.stubGlobal("fetch", vi.fn(async () => Promise.reject(new Error("offline"))));
    expect(await checkForUpdate("acme/tool", "1.0.0")).toMatchObject({ updateAvailable: false, reason: "offline" });
  });
});
