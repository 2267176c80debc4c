export { compareVersions, type IndexVersion, type IndexVersionStatus } from "./types.js";
export { ActiveVersionPointer } from "./pointer.js";
export {
  selectLatestReady,
  createVersionSelector,
  type ApplyResult,
  type VersionSelector,
} from "./selector.js";
