import type { Logger } from "pino";
import type { ActiveVersionPointer } from "./pointer.js";
import type { IndexVersion } from "./types.js";

/**
 * Latest READY version: max createdAt, ties to the greatest versionId.
 * Returns null when no version is READY; that is an expected outcome while
 * the first build runs, not a failure.
 */
export function selectLatestReady(
  versions: readonly IndexVersion[],
): IndexVersion | null {
  let best: IndexVersion | null = null;
  for (const version of versions) {
    if (version.status !== "READY") continue;
    if (
      best === null ||
      version.createdAt.getTime() > best.createdAt.getTime() ||
      (version.createdAt.getTime() === best.createdAt.getTime() &&
        version.versionId > best.versionId)
    ) {
      best = version;
    }
  }
  return best;
}

export interface ApplyResult {
  previousVersionId: string | null;
  appliedVersionId: string;
  changed: boolean;
}

export interface VersionSelector {
  selectLatestReady(versions: readonly IndexVersion[]): IndexVersion | null;
  /**
   * Move the pointer. The caller must have just seen `versionId` as READY;
   * nothing is re-checked here.
   */
  apply(versionId: string): ApplyResult;
}

export function createVersionSelector(deps: {
  pointer: ActiveVersionPointer;
  logger: Logger;
}): VersionSelector {
  const { pointer, logger } = deps;

  return {
    selectLatestReady,

    apply(versionId) {
      const previousVersionId = pointer.get();
      pointer.set(versionId);
      const changed = previousVersionId !== versionId;
      if (changed) {
        logger.info(
          { from: previousVersionId, to: versionId },
          "Active index version switched",
        );
      }
      return { previousVersionId, appliedVersionId: versionId, changed };
    },
  };
}
