import { describe, expect, it } from "vitest";
import { ApiError, addProvider, fetchProviders, removeModel, saveCompaction } from "./api";
import { mockApi, reply, requestBody, wasRequested } from "@/test/mock-api";

describe("api client", () => {
  it("returns parsed JSON from GET routes", async () => {
    mockApi({ "GET /api/providers": [{ name: "acme" }] });
    await expect(fetchProviders()).resolves.toEqual([{ name: "acme" }]);
  });

  it("sends JSON bodies with the method", async () => {
    const fetchMock = mockApi({ "PUT /api/compaction": { auto: false, prune: true } });
    await saveCompaction({ auto: false });
    expect(requestBody(fetchMock, "PUT /api/compaction")).toEqual({ auto: false });
    const init = fetchMock.mock.calls[0][1];
    expect(init?.headers).toEqual({ "Content-Type": "application/json" });
  });

  it("encodes path segments", async () => {
    const fetchMock = mockApi({ "DELETE /api/models/acme/org%2Fmodel": { removed: "acme/org/model" } });
    await removeModel("acme", "org/model");
    expect(wasRequested(fetchMock, "DELETE /api/models/acme/org%2Fmodel")).toBe(true);
  });

  it("throws the server's error message with its status", async () => {
    mockApi({ "POST /api/providers": reply(409, { error: 'Provider "acme" already exists' }) });
    const err = await addProvider({ name: "acme" }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({ status: 409, message: 'Provider "acme" already exists' });
  });

  it("falls back to a generic message when the body has no error", async () => {
    mockApi({ "GET /api/providers": reply(500, "oops") });
    await expect(fetchProviders()).rejects.toThrow("GET /providers failed (500)");
  });
});
