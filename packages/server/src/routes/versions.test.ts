import { describe, it, expect, vi } from "vitest";
import type { IndexLifecycle } from "@managed-rag/core/lifecycle";
import { versionsRoutes } from "./versions.js";

describe("versionsRoutes", () => {
  function createApp() {
    const lifecycle = {
      getVersions: vi.fn<IndexLifecycle["getVersions"]>(),
      getActiveVersion: vi.fn<IndexLifecycle["getActiveVersion"]>(),
      updateActiveVersion: vi.fn<IndexLifecycle["updateActiveVersion"]>(),
    };
    return { app: versionsRoutes({ lifecycle }), lifecycle };
  }

  it("GET / returns the listing", async () => {
    const { app, lifecycle } = createApp();
    lifecycle.getVersions.mockResolvedValueOnce({
      versions: [
        {
          versionId: "v1",
          status: "READY",
          createdAt: "2026-03-01T00:00:00.000Z",
          sourcePrefix: "docs/",
          isActive: false,
        },
      ],
      activeVersionId: null,
      skipped: 1,
    });

    const res = await app.request("/");

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.skipped).toBe(1);
    expect(body.versions[0].versionId).toBe("v1");
  });

  it("GET /active returns the pointer", async () => {
    const { app, lifecycle } = createApp();
    lifecycle.getActiveVersion.mockReturnValueOnce({ activeVersionId: "v2" });

    const res = await app.request("/active");

    expect(await res.json()).toEqual({ activeVersionId: "v2" });
  });

  it("PUT /active without a body selects the latest READY version", async () => {
    const { app, lifecycle } = createApp();
    lifecycle.updateActiveVersion.mockResolvedValueOnce({
      appliedVersionId: "v3",
      previousVersionId: "v2",
      changed: true,
    });

    const res = await app.request("/active", { method: "PUT" });

    expect(res.status).toBe(200);
    expect(lifecycle.updateActiveVersion).toHaveBeenCalledWith(undefined);
    expect(await res.json()).toEqual({
      appliedVersionId: "v3",
      previousVersionId: "v2",
      changed: true,
    });
  });

  it("PUT /active forwards an explicit version", async () => {
    const { app, lifecycle } = createApp();
    lifecycle.updateActiveVersion.mockResolvedValueOnce({
      appliedVersionId: "v1",
      previousVersionId: "v3",
      changed: true,
    });

    await app.request("/active", {
      method: "PUT",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ versionId: "v1" }),
    });

    expect(lifecycle.updateActiveVersion).toHaveBeenCalledWith("v1");
  });

  it("PUT /active rejects malformed JSON", async () => {
    const { app, lifecycle } = createApp();

    const res = await app.request("/active", {
      method: "PUT",
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });

    expect(res.status).toBe(400);
    const body = await res.json();
    expect(body.error.errorCode).toBe("INVALID_BODY");
    expect(lifecycle.updateActiveVersion).not.toHaveBeenCalled();
  });

  it("PUT /active rejects a non-string versionId", async () => {
    const { app } = createApp();

    const res = await app.request("/active", {
      method: "PUT",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ versionId: 7 }),
    });

    expect(res.status).toBe(400);
    const body = await res.json();
    expect(body.error.errorCode).toBe("VALIDATION_ERROR");
    expect(body.error.details.issues[0].path).toBe("versionId");
  });
});
