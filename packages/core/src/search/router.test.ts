import { describe, it, expect, vi } from "vitest";
import { pino } from "pino";
import {
  InvalidQueryError,
  NoActiveVersionError,
  UpstreamError,
} from "../errors/catalog.js";
import { ActiveVersionPointer } from "../versions/pointer.js";
import type { SearchBackend, RetrieveParams } from "./client.js";
import type { Reranker } from "./reranker.js";
import { clamp, createQueryRouter } from "./router.js";
import type { SearchResult } from "./types.js";

const logger = pino({ level: "silent" });
const LIMITS = {
  defaultTopK: 5,
  maxTopK: 50,
  defaultRerankTopK: 20,
  maxCandidates: 100,
};

/** Corpus of 60 chunks in relevance order; retrieve returns the first topK. */
const CORPUS: SearchResult[] = Array.from({ length: 60 }, (_, i) => ({
  id: `chunk-${i}`,
  content: `chunk ${i}`,
  score: 1 - i / 100,
  sourceReference: `doc-${i}.md`,
  metadata: {},
}));

function fakeBackend() {
  const retrieve = vi.fn(async ({ topK }: RetrieveParams) =>
    CORPUS.slice(0, topK),
  );
  const backend: SearchBackend = { retrieve };
  return { backend, retrieve };
}

/** Reverses the candidate window. */
function reversingReranker() {
  return {
    rerank: vi.fn(async (_query: string, candidates: SearchResult[]) =>
      [...candidates].reverse(),
    ),
  };
}

function failingReranker(): Reranker {
  return {
    rerank: vi.fn(async () => {
      throw new UpstreamError("rerank", "Rerank failed: 503 Service Unavailable");
    }),
  };
}

function router(
  pointer: ActiveVersionPointer,
  backend: SearchBackend,
  reranker: Reranker = reversingReranker(),
) {
  return createQueryRouter({ pointer, backend, reranker, limits: LIMITS, logger });
}

describe("clamp", () => {
  it("floors, bounds and falls back", () => {
    expect(clamp(7.9, 1, 50, 5)).toBe(7);
    expect(clamp(0, 1, 50, 5)).toBe(1);
    expect(clamp(500, 1, 50, 5)).toBe(50);
    expect(clamp(undefined, 1, 50, 5)).toBe(5);
    expect(clamp(Number.NaN, 1, 50, 5)).toBe(5);
  });
});

describe("QueryRouter.search", () => {
  it("fails with NoActiveVersionError before any version is applied", async () => {
    const { backend, retrieve } = fakeBackend();
    await expect(
      router(new ActiveVersionPointer(), backend).search("refunds"),
    ).rejects.toThrow(NoActiveVersionError);
    expect(retrieve).not.toHaveBeenCalled();
  });

  it("rejects blank queries", async () => {
    const { backend } = fakeBackend();
    await expect(
      router(new ActiveVersionPointer("v3"), backend).search("   "),
    ).rejects.toThrow(InvalidQueryError);
  });

  it("queries the active version with the trimmed query", async () => {
    const { backend, retrieve } = fakeBackend();
    const response = await router(new ActiveVersionPointer("v3"), backend).search(
      "  refunds  ",
      3,
    );

    expect(retrieve).toHaveBeenCalledWith({
      query: "refunds",
      versionId: "v3",
      topK: 3,
    });
    expect(response).toEqual({
      query: "refunds",
      versionId: "v3",
      reranked: false,
      results: CORPUS.slice(0, 3),
    });
  });

  it("clamps topK instead of rejecting it", async () => {
    const { backend, retrieve } = fakeBackend();
    const r = router(new ActiveVersionPointer("v3"), backend);

    await r.search("q", 0);
    await r.search("q", 500);
    await r.search("q");

    expect(retrieve.mock.calls.map(([p]) => p.topK)).toEqual([1, 50, 5]);
  });

  it("reads the pointer on every call", async () => {
    const { backend } = fakeBackend();
    const pointer = new ActiveVersionPointer("v1");
    const r = router(pointer, backend);

    expect((await r.search("q")).versionId).toBe("v1");
    pointer.set("v2");
    expect((await r.search("q")).versionId).toBe("v2");
  });

  it("propagates retrieval failures", async () => {
    const backend: SearchBackend = {
      retrieve: async () => {
        throw new UpstreamError("retrieve", "Retrieve failed: 500");
      },
    };
    await expect(
      router(new ActiveVersionPointer("v3"), backend).search("q"),
    ).rejects.toThrow(UpstreamError);
  });
});

describe("QueryRouter.searchAdvanced", () => {
  it("retrieves the rerank window and truncates the reranked output", async () => {
    const { backend, retrieve } = fakeBackend();
    const reranker = reversingReranker();
    const response = await router(
      new ActiveVersionPointer("v3"),
      backend,
      reranker,
    ).searchAdvanced("refunds", 5, 20);

    expect(retrieve).toHaveBeenCalledWith({
      query: "refunds",
      versionId: "v3",
      topK: 20,
    });
    expect(reranker.rerank).toHaveBeenCalledWith(
      "refunds",
      CORPUS.slice(0, 20),
      5,
    );
    expect(response.reranked).toBe(true);
    expect(response.results.map((r) => r.id)).toEqual([
      "chunk-19",
      "chunk-18",
      "chunk-17",
      "chunk-16",
      "chunk-15",
    ]);
  });

  it("widens a window smaller than topK", async () => {
    const { backend, retrieve } = fakeBackend();
    await router(new ActiveVersionPointer("v3"), backend).searchAdvanced(
      "q",
      10,
      3,
    );
    expect(retrieve.mock.calls[0][0].topK).toBe(10);
  });

  it("caps the window at maxCandidates and defaults it to 20", async () => {
    const { backend, retrieve } = fakeBackend();
    const r = router(new ActiveVersionPointer("v3"), backend);

    await r.searchAdvanced("q", 5, 1000);
    await r.searchAdvanced("q");

    expect(retrieve.mock.calls.map(([p]) => p.topK)).toEqual([100, 20]);
  });

  it("falls back to the plain search result when reranking fails", async () => {
    const pointer = new ActiveVersionPointer("v3");
    const { backend } = fakeBackend();
    const r = router(pointer, backend, failingReranker());

    const advanced = await r.searchAdvanced("refunds", 5, 20);
    const plain = await r.search("refunds", 5);

    expect(advanced).toEqual(plain);
    expect(advanced.reranked).toBe(false);
    expect(advanced.results).toHaveLength(5);
  });

  it("shares the NoActiveVersion precondition", async () => {
    const { backend } = fakeBackend();
    await expect(
      router(new ActiveVersionPointer(), backend).searchAdvanced("q"),
    ).rejects.toThrow(NoActiveVersionError);
  });
});
