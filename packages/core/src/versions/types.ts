import type { IndexVersionStatus } from "../schemas/version-metadata.js";

export type { IndexVersionStatus } from "../schemas/version-metadata.js";

/** One build of the semantic index, as read from the catalog. */
export interface IndexVersion {
  versionId: string;
  status: IndexVersionStatus;
  createdAt: Date;
  /** Location of the documents the version was built from, when known. */
  sourcePrefix: string | null;
}

/** Listing order: ascending createdAt, then versionId. */
export function compareVersions(a: IndexVersion, b: IndexVersion): number {
  const byTime = a.createdAt.getTime() - b.createdAt.getTime();
  if (byTime !== 0) return byTime;
  return a.versionId < b.versionId ? -1 : a.versionId > b.versionId ? 1 : 0;
}
