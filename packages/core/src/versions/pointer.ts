/**
 * Active-version pointer: the version id every search is served from.
 *
 * One instance per running service, injected into the selector and the query
 * router. Not persisted; on restart the service re-derives it from the
 * catalog. Writes are a single assignment, so a reader on the event loop
 * sees either the old or the new id.
 */

import {
  InvalidVersionIdError,
  NoActiveVersionError,
} from "../errors/catalog.js";

export class ActiveVersionPointer {
  private current: string | null;

  constructor(initial: string | null = null) {
    this.current = initial;
  }

  get(): string | null {
    return this.current;
  }

  /** Current version id, or NoActiveVersionError when none is set. */
  require(): string {
    if (this.current === null) {
      throw new NoActiveVersionError();
    }
    return this.current;
  }

  /** Point at a version. Last write wins. */
  set(versionId: string): void {
    if (versionId.trim() === "") {
      throw new InvalidVersionIdError();
    }
    this.current = versionId;
  }
}
