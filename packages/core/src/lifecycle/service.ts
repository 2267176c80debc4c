/**
 * Index lifecycle service: the operations the MCP tools and HTTP routes
 * expose, built on the catalog reader, indexing submitter, version selector
 * and query router.
 *
 * Startup policy: the active version is not persisted. `initialize()` lists
 * the catalog and applies the configured initial version if it is READY,
 * otherwise the latest READY version. If neither is available the pointer
 * stays unset and searches fail with NO_ACTIVE_VERSION until an update.
 */

import type { Logger } from "pino";
import type { CatalogReader, CatalogSnapshot } from "../catalog/reader.js";
import {
  InvalidVersionIdError,
  VersionNotFoundError,
  VersionNotReadyError,
  describeError,
} from "../errors/catalog.js";
import type {
  IndexingSubmitter,
  StartIndexingParams,
} from "../indexing/submitter.js";
import type { QueryRouter } from "../search/router.js";
import type { SearchResponse } from "../search/types.js";
import type { ActiveVersionPointer } from "../versions/pointer.js";
import type { VersionSelector } from "../versions/selector.js";
import type { IndexVersionStatus } from "../versions/types.js";

export interface VersionSummary {
  versionId: string;
  status: IndexVersionStatus;
  createdAt: string;
  sourcePrefix: string | null;
  isActive: boolean;
}

export interface VersionsListing {
  versions: VersionSummary[];
  activeVersionId: string | null;
  skipped: number;
}

export interface StartIndexingResult {
  jobId: string;
  sourcePrefix: string;
  extensions: string[];
  submittedAt: string;
}

export type UpdateActiveVersionResult =
  | {
      appliedVersionId: string;
      previousVersionId: string | null;
      changed: boolean;
    }
  | {
      appliedVersionId: null;
      previousVersionId: string | null;
      changed: false;
      reason: "no_ready_version";
    };

export interface IndexLifecycle {
  initialize(): Promise<string | null>;
  startIndexing(
    sourcePrefix: string,
    options?: Omit<StartIndexingParams, "sourcePrefix">,
  ): Promise<StartIndexingResult>;
  getVersions(): Promise<VersionsListing>;
  getActiveVersion(): { activeVersionId: string | null };
  updateActiveVersion(versionId?: string): Promise<UpdateActiveVersionResult>;
  search(query: string, topK?: number): Promise<SearchResponse>;
  searchAdvanced(
    query: string,
    topK?: number,
    rerankTopK?: number,
  ): Promise<SearchResponse>;
}

export interface IndexLifecycleDeps {
  catalog: CatalogReader;
  submitter: IndexingSubmitter;
  selector: VersionSelector;
  pointer: ActiveVersionPointer;
  router: QueryRouter;
  logger: Logger;
  initialVersionId?: string | null;
}

export function createIndexLifecycle(deps: IndexLifecycleDeps): IndexLifecycle {
  const { catalog, submitter, selector, pointer, router, logger } = deps;

  return {
    async initialize() {
      let snapshot: CatalogSnapshot;
      try {
        snapshot = await catalog.listVersions();
      } catch (err) {
        logger.warn(
          { err: describeError(err) },
          "Catalog unavailable at startup; no active version",
        );
        return null;
      }

      // An explicit switch may land while the catalog is being listed.
      const applied = pointer.get();
      if (applied !== null) {
        logger.info(
          { versionId: applied },
          "Active version set during startup; keeping it",
        );
        return applied;
      }

      const pinned = deps.initialVersionId
        ? snapshot.versions.find((v) => v.versionId === deps.initialVersionId)
        : undefined;
      if (deps.initialVersionId && pinned?.status !== "READY") {
        logger.warn(
          { versionId: deps.initialVersionId, status: pinned?.status ?? null },
          "Configured initial version is not READY; selecting latest",
        );
      }

      const chosen =
        pinned?.status === "READY"
          ? pinned
          : selector.selectLatestReady(snapshot.versions);
      if (!chosen) {
        logger.info("No READY index version yet");
        return null;
      }
      selector.apply(chosen.versionId);
      return chosen.versionId;
    },

    async startIndexing(sourcePrefix, options) {
      const job = await submitter.startIndexing({ sourcePrefix, ...options });
      return {
        jobId: job.jobId,
        sourcePrefix: job.sourcePrefix,
        extensions: job.extensions,
        submittedAt: job.submittedAt.toISOString(),
      };
    },

    async getVersions() {
      const { versions, skipped } = await catalog.listVersions();
      const activeVersionId = pointer.get();
      return {
        versions: versions.map((v) => ({
          versionId: v.versionId,
          status: v.status,
          createdAt: v.createdAt.toISOString(),
          sourcePrefix: v.sourcePrefix,
          isActive: v.versionId === activeVersionId,
        })),
        activeVersionId,
        skipped,
      };
    },

    getActiveVersion() {
      return { activeVersionId: pointer.get() };
    },

    async updateActiveVersion(versionId) {
      const requested = versionId?.trim();
      if (versionId !== undefined && !requested) {
        throw new InvalidVersionIdError();
      }

      const { versions } = await catalog.listVersions();

      if (requested) {
        const version = versions.find((v) => v.versionId === requested);
        if (!version) {
          throw new VersionNotFoundError(requested);
        }
        if (version.status !== "READY") {
          throw new VersionNotReadyError(requested, version.status);
        }
        return selector.apply(requested);
      }

      const latest = selector.selectLatestReady(versions);
      if (!latest) {
        return {
          appliedVersionId: null,
          previousVersionId: pointer.get(),
          changed: false,
          reason: "no_ready_version",
        };
      }
      return selector.apply(latest.versionId);
    },

    search(query, topK) {
      return router.search(query, topK);
    },

    searchAdvanced(query, topK, rerankTopK) {
      return router.searchAdvanced(query, topK, rerankTopK);
    },
  };
}
