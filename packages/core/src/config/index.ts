export {
  DEFAULT_ROOT_PATH,
  ROOT_PATH_ENV,
} from "./defaults.js";
export {
  loadConfig,
  applyEnvOverrides,
  type LoadConfigOptions,
} from "./loader.js";
export { expandHomePath, resolveRootPath, resolveConfigPath } from "./paths.js";
export {
  loadScopedCredentials,
  loadStorageCredentials,
  type CredentialScope,
  type ScopedCredentials,
  type QueryCredentials,
  type IndexingCredentials,
  type StorageCredentials,
} from "./credentials.js";
