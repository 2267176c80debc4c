export {
  createIndexLifecycle,
  type IndexLifecycle,
  type IndexLifecycleDeps,
  type StartIndexingResult,
  type UpdateActiveVersionResult,
  type VersionSummary,
  type VersionsListing,
} from "./service.js";
export {
  buildIndexLifecycle,
  type BuildLifecycleOptions,
  type LifecycleContext,
} from "./wiring.js";
