export {
  createMemoryBlobStore,
  createTestVersion,
  type MemoryBlobStore,
} from "./catalog.js";
