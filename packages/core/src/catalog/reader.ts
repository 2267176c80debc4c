/**
 * Catalog reader: lists the index versions the backend has written to the
 * artifact bucket.
 *
 * Layout under `<catalogPrefix>/<ragId>/`:
 *   <versionId>/version.json   metadata (status, createdAt, sourcePrefix)
 *   <versionId>/...            index artifacts
 *
 * Directories without version.json are artifact-only builds: READY once
 * they hold objects, createdAt taken from the newest object.
 */

import type { Logger } from "pino";
import { CatalogUnavailableError, describeError } from "../errors/catalog.js";
import { VersionMetadataSchema } from "../schemas/version-metadata.js";
import type { BlobObject, BlobStore } from "../storage/adapters/interface.js";
import { compareVersions, type IndexVersion } from "../versions/types.js";

export const METADATA_FILE = "version.json";

export interface CatalogSnapshot {
  /** Ascending by createdAt, then versionId. */
  versions: IndexVersion[];
  /** Entries whose metadata could not be read or parsed. */
  skipped: number;
}

export interface CatalogReader {
  /** Bucket-relative prefix the versions live under, with trailing slash. */
  readonly prefix: string;
  listVersions(): Promise<CatalogSnapshot>;
}

export interface CatalogReaderOptions {
  blobStore: BlobStore;
  catalogPrefix: string;
  ragId: string;
  logger: Logger;
}

export function catalogPrefixFor(catalogPrefix: string, ragId: string): string {
  const base = catalogPrefix.replace(/^\/+|\/+$/g, "");
  return ragId ? `${base}/${ragId}/` : `${base}/`;
}

function groupByVersion(
  prefix: string,
  objects: BlobObject[],
): Map<string, BlobObject[]> {
  const groups = new Map<string, BlobObject[]>();
  for (const object of objects) {
    const rest = object.key.slice(prefix.length);
    const slash = rest.indexOf("/");
    // Objects directly under the prefix are not versions.
    if (slash <= 0) continue;
    const versionId = rest.slice(0, slash);
    const group = groups.get(versionId);
    if (group) {
      group.push(object);
    } else {
      groups.set(versionId, [object]);
    }
  }
  return groups;
}

function inferFromArtifacts(
  versionId: string,
  objects: BlobObject[],
): IndexVersion {
  const newest = Math.max(...objects.map((o) => o.lastModified.getTime()));
  return {
    versionId,
    status: "READY",
    createdAt: new Date(newest),
    sourcePrefix: null,
  };
}

export function createCatalogReader(
  options: CatalogReaderOptions,
): CatalogReader {
  const { blobStore, logger } = options;
  const prefix = catalogPrefixFor(options.catalogPrefix, options.ragId);

  async function readMetadata(
    versionId: string,
    key: string,
  ): Promise<IndexVersion | null> {
    let raw: unknown;
    try {
      const bytes = await blobStore.get(key);
      raw = JSON.parse(new TextDecoder().decode(bytes));
    } catch (err) {
      logger.warn({ versionId, key, err: describeError(err) }, "Unreadable version metadata");
      return null;
    }

    const result = VersionMetadataSchema.safeParse(raw);
    if (!result.success) {
      logger.warn(
        { versionId, key, issues: result.error.issues.length },
        "Invalid version metadata",
      );
      return null;
    }
    const metadata = result.data;
    if (metadata.versionId !== undefined && metadata.versionId !== versionId) {
      logger.warn(
        { versionId, declared: metadata.versionId },
        "Version metadata names a different version",
      );
      return null;
    }

    return {
      versionId,
      status: metadata.status,
      createdAt: new Date(metadata.createdAt),
      sourcePrefix: metadata.sourcePrefix ?? null,
    };
  }

  return {
    prefix,

    async listVersions() {
      let objects: BlobObject[];
      try {
        objects = await blobStore.list(prefix);
      } catch (err) {
        throw new CatalogUnavailableError({
          prefix,
          cause: describeError(err),
        });
      }

      const groups = groupByVersion(prefix, objects);
      const entries = await Promise.all(
        [...groups.entries()].map(([versionId, group]) => {
          const metadata = group.find(
            (o) => o.key === `${prefix}${versionId}/${METADATA_FILE}`,
          );
          return metadata
            ? readMetadata(versionId, metadata.key)
            : Promise.resolve(inferFromArtifacts(versionId, group));
        }),
      );

      const versions = entries
        .filter((entry): entry is IndexVersion => entry !== null)
        .sort(compareVersions);
      const skipped = entries.length - versions.length;

      logger.debug(
        { prefix, versions: versions.length, skipped },
        "Catalog listed",
      );
      return { versions, skipped };
    },
  };
}
