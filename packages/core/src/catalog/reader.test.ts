import { describe, it, expect, beforeEach } from "vitest";
import { pino } from "pino";
import { CatalogUnavailableError } from "../errors/catalog.js";
import {
  createMemoryBlobStore,
  type MemoryBlobStore,
} from "../test-utils/catalog.js";
import { catalogPrefixFor, createCatalogReader } from "./reader.js";

const logger = pino({ level: "silent" });
const PREFIX = "ArtifactsManagedRAG/rag-1/";

function metadata(body: Record<string, unknown>): string {
  return JSON.stringify(body);
}

describe("catalogPrefixFor", () => {
  it("joins the catalog prefix and rag id with a trailing slash", () => {
    expect(catalogPrefixFor("ArtifactsManagedRAG", "rag-1")).toBe(PREFIX);
    expect(catalogPrefixFor("/ArtifactsManagedRAG/", "rag-1")).toBe(PREFIX);
    expect(catalogPrefixFor("catalog", "")).toBe("catalog/");
  });
});

describe("CatalogReader", () => {
  let store: MemoryBlobStore;

  beforeEach(() => {
    store = createMemoryBlobStore();
  });

  function reader() {
    return createCatalogReader({
      blobStore: store,
      catalogPrefix: "ArtifactsManagedRAG",
      ragId: "rag-1",
      logger,
    });
  }

  it("returns an empty listing for an empty catalog", async () => {
    await expect(reader().listVersions()).resolves.toEqual({
      versions: [],
      skipped: 0,
    });
  });

  it("parses version.json and sorts by createdAt", async () => {
    store.put(
      `${PREFIX}v3/version.json`,
      metadata({ status: "READY", createdAt: "2026-03-03T00:00:00Z" }),
    );
    store.put(
      `${PREFIX}v1/version.json`,
      metadata({
        status: "READY",
        createdAt: "2026-03-01T00:00:00Z",
        sourcePrefix: "docs/",
      }),
    );
    store.put(
      `${PREFIX}v2/version.json`,
      metadata({ status: "FAILED", createdAt: "2026-03-02T00:00:00Z" }),
    );

    const { versions, skipped } = await reader().listVersions();

    expect(skipped).toBe(0);
    expect(versions).toEqual([
      {
        versionId: "v1",
        status: "READY",
        createdAt: new Date("2026-03-01T00:00:00Z"),
        sourcePrefix: "docs/",
      },
      {
        versionId: "v2",
        status: "FAILED",
        createdAt: new Date("2026-03-02T00:00:00Z"),
        sourcePrefix: null,
      },
      {
        versionId: "v3",
        status: "READY",
        createdAt: new Date("2026-03-03T00:00:00Z"),
        sourcePrefix: null,
      },
    ]);
  });

  it("orders equal timestamps by version id", async () => {
    for (const id of ["b", "a"]) {
      store.put(
        `${PREFIX}${id}/version.json`,
        metadata({ status: "RUNNING", createdAt: "2026-03-01T00:00:00Z" }),
      );
    }

    const { versions } = await reader().listVersions();
    expect(versions.map((v) => v.versionId)).toEqual(["a", "b"]);
  });

  it("skips and counts malformed entries but returns the rest", async () => {
    store.put(
      `${PREFIX}good/version.json`,
      metadata({ status: "READY", createdAt: "2026-03-01T00:00:00Z" }),
    );
    store.put(`${PREFIX}broken-json/version.json`, "{ not json");
    store.put(
      `${PREFIX}bad-status/version.json`,
      metadata({ status: "DONE", createdAt: "2026-03-01T00:00:00Z" }),
    );
    store.put(
      `${PREFIX}renamed/version.json`,
      metadata({
        versionId: "other",
        status: "READY",
        createdAt: "2026-03-01T00:00:00Z",
      }),
    );

    const { versions, skipped } = await reader().listVersions();

    expect(versions.map((v) => v.versionId)).toEqual(["good"]);
    expect(skipped).toBe(3);
  });

  it("infers READY for artifact-only directories from their newest object", async () => {
    store.put(`${PREFIX}legacy/index.bin`, "x", new Date("2026-02-01T00:00:00Z"));
    store.put(`${PREFIX}legacy/chunks.bin`, "y", new Date("2026-02-05T00:00:00Z"));

    const { versions } = await reader().listVersions();

    expect(versions).toEqual([
      {
        versionId: "legacy",
        status: "READY",
        createdAt: new Date("2026-02-05T00:00:00Z"),
        sourcePrefix: null,
      },
    ]);
  });

  it("ignores objects outside version directories and other rags", async () => {
    store.put(`${PREFIX}README.txt`, "notes");
    store.put(
      "ArtifactsManagedRAG/rag-2/v9/version.json",
      metadata({ status: "READY", createdAt: "2026-03-01T00:00:00Z" }),
    );

    await expect(reader().listVersions()).resolves.toEqual({
      versions: [],
      skipped: 0,
    });
  });

  it("throws CatalogUnavailableError when listing fails", async () => {
    store.failNextList(new Error("SignatureDoesNotMatch"));

    const err = await reader()
      .listVersions()
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CatalogUnavailableError);
    expect((err as CatalogUnavailableError).details).toEqual({
      prefix: PREFIX,
      cause: "SignatureDoesNotMatch",
    });
  });
});
