/**
 * Read side of the object store that holds the backend's version artifacts.
 * Keys are bucket-relative paths ("ArtifactsManagedRAG/<ragId>/<version>/...").
 */
export interface BlobObject {
  key: string;
  size: number;
  lastModified: Date;
}

export interface BlobStore {
  /**
   * List every object whose key starts with the prefix.
   * Implementations follow pagination to the end.
   * @throws on network or auth failure
   */
  list(prefix: string): Promise<BlobObject[]>;

  /**
   * Read an object's bytes.
   * @throws if the object does not exist
   */
  get(key: string): Promise<Uint8Array>;
}
