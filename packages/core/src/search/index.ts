export type { SearchResult, SearchResponse } from "./types.js";
export {
  createSearchBackend,
  type SearchBackend,
  type SearchBackendOptions,
  type RetrieveParams,
} from "./client.js";
export {
  createReranker,
  type Reranker,
  type RerankerOptions,
} from "./reranker.js";
export {
  createQueryRouter,
  clamp,
  type QueryRouter,
  type QueryRouterOptions,
} from "./router.js";
