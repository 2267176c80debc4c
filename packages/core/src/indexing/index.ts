export {
  createIndexingSubmitter,
  normalizeSourcePrefix,
  type IndexingJob,
  type IndexingSubmitter,
  type IndexingSubmitterOptions,
  type StartIndexingParams,
} from "./submitter.js";
export {
  SUPPORTED_EXTENSIONS,
  buildExtractors,
  type DocumentExtension,
  type ExtractorSpec,
} from "./extractors.js";
