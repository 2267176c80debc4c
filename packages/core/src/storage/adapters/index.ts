export type { BlobObject, BlobStore } from "./interface.js";
export {
  createS3BlobStore,
  createS3Client,
  type S3BlobStoreOptions,
} from "./s3.js";
