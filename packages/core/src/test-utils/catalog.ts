/**
 * In-process stand-ins for the catalog's blob store, shared by the package
 * tests. Objects are kept in a map keyed by bucket-relative key.
 */

import type { BlobObject, BlobStore } from "../storage/adapters/interface.js";
import type { IndexVersion, IndexVersionStatus } from "../versions/types.js";

export interface MemoryBlobStore extends BlobStore {
  put(key: string, body: string | Uint8Array, lastModified?: Date): void;
  /** Make the next list() call reject with the given error. */
  failNextList(err: Error): void;
}

export function createMemoryBlobStore(): MemoryBlobStore {
  const objects = new Map<string, { body: Uint8Array; lastModified: Date }>();
  let listFailure: Error | null = null;

  return {
    put(key, body, lastModified = new Date("2026-01-01T00:00:00Z")) {
      const bytes =
        typeof body === "string" ? new TextEncoder().encode(body) : body;
      objects.set(key, { body: bytes, lastModified });
    },

    failNextList(err) {
      listFailure = err;
    },

    async list(prefix) {
      if (listFailure) {
        const err = listFailure;
        listFailure = null;
        throw err;
      }
      const result: BlobObject[] = [];
      for (const [key, entry] of [...objects.entries()].sort(([a], [b]) =>
        a < b ? -1 : a > b ? 1 : 0,
      )) {
        if (!key.startsWith(prefix)) continue;
        result.push({
          key,
          size: entry.body.byteLength,
          lastModified: entry.lastModified,
        });
      }
      return result;
    },

    async get(key) {
      const entry = objects.get(key);
      if (!entry) {
        throw new Error(`NoSuchKey: ${key}`);
      }
      return entry.body;
    },
  };
}

/** Build an IndexVersion whose createdAt is `t` seconds after the epoch. */
export function createTestVersion(
  versionId: string,
  status: IndexVersionStatus,
  t: number,
  sourcePrefix: string | null = null,
): IndexVersion {
  return { versionId, status, createdAt: new Date(t * 1000), sourcePrefix };
}
