export {
  ServerConfigSchema,
  RetrievalType,
  DEFAULTS,
  type ServerConfig,
  type LoggingConfig,
  type StorageConfig,
  type RagConfig,
  type SearchLimits,
} from "./server-config.js";
export {
  IndexVersionStatus,
  VersionMetadataSchema,
  type VersionMetadata,
} from "./version-metadata.js";
