import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { pino } from "pino";
import type { TokenProvider } from "../auth/iam-token.js";
import { UpstreamError } from "../errors/catalog.js";
import { createSearchBackend } from "./client.js";

const PUBLIC_URL = "https://kb.example.com";
const logger = pino({ level: "silent" });

const queryTokens: TokenProvider<"query"> = {
  scope: "query",
  getToken: async () => "query-token",
};

describe("SearchBackend", () => {
  const originalFetch = globalThis.fetch;

  beforeEach(() => {
    globalThis.fetch = vi.fn();
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  function fetchMock() {
    return globalThis.fetch as ReturnType<typeof vi.fn>;
  }

  function mockFetch(status: number, body?: unknown) {
    fetchMock().mockResolvedValueOnce({
      ok: status >= 200 && status < 300,
      status,
      statusText: status === 200 ? "OK" : "Bad Gateway",
      json: async () => body,
      text: async () => JSON.stringify(body ?? null),
    } as unknown as Response);
  }

  function backend(publicUrl = `${PUBLIC_URL}/`) {
    return createSearchBackend({
      publicUrl,
      retrievalType: "HYBRID",
      tokens: queryTokens,
      logger,
    });
  }

  it("posts the query against the requested version", async () => {
    mockFetch(200, { results: [] });

    await backend().retrieve({ query: "refund policy", versionId: "v3", topK: 7 });

    const [url, init] = fetchMock().mock.calls[0];
    expect(url).toBe(`${PUBLIC_URL}/api/v2/retrieve`);
    expect(init.headers.Authorization).toBe("Bearer query-token");
    expect(JSON.parse(init.body)).toEqual({
      knowledge_base_version: "v3",
      query: "refund policy",
      retrieval_configuration: {
        number_of_results: 7,
        retrieval_type: "HYBRID",
      },
    });
  });

  it("maps results and derives the source reference", async () => {
    mockFetch(200, {
      results: [
        {
          id: "chunk-1",
          content: "Refunds are issued within 14 days.",
          score: 0.91,
          metadata: { file_name: "docs/refunds.md", page: 2 },
        },
        { id: 17, content: "Shipping is free.", score: 0.5 },
        { content: null },
      ],
    });

    const results = await backend().retrieve({
      query: "refund",
      versionId: "v3",
      topK: 3,
    });

    expect(results).toEqual([
      {
        id: "chunk-1",
        content: "Refunds are issued within 14 days.",
        score: 0.91,
        sourceReference: "docs/refunds.md",
        metadata: { file_name: "docs/refunds.md", page: 2 },
      },
      {
        id: "17",
        content: "Shipping is free.",
        score: 0.5,
        sourceReference: "17",
        metadata: {},
      },
      {
        id: null,
        content: "",
        score: 0,
        sourceReference: null,
        metadata: {},
      },
    ]);
  });

  it("throws UpstreamError on a non-2xx response", async () => {
    mockFetch(502, { message: "upstream down" });

    const err = await backend()
      .retrieve({ query: "q", versionId: "v3", topK: 5 })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UpstreamError);
    expect((err as UpstreamError).details).toEqual({
      stage: "retrieve",
      versionId: "v3",
      status: 502,
      response: '{"message":"upstream down"}',
    });
  });

  it("throws on a malformed body", async () => {
    mockFetch(200, { results: "nope" });

    await expect(
      backend().retrieve({ query: "q", versionId: "v3", topK: 5 }),
    ).rejects.toThrow("Malformed retrieve response");
  });

  it("throws an UpstreamError when the body is not JSON", async () => {
    fetchMock().mockResolvedValueOnce(
      new Response("<html>gateway</html>", { status: 200 }),
    );

    const err = await backend()
      .retrieve({ query: "q", versionId: "v3", topK: 5 })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UpstreamError);
    expect((err as UpstreamError).details).toEqual({
      stage: "retrieve",
      versionId: "v3",
    });
  });

  it("throws when the knowledge base URL is not configured", async () => {
    await expect(
      backend("").retrieve({ query: "q", versionId: "v3", topK: 5 }),
    ).rejects.toThrow("Knowledge base URL is not configured");
    expect(fetchMock()).not.toHaveBeenCalled();
  });
});
