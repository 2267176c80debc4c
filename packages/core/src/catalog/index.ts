export {
  createCatalogReader,
  catalogPrefixFor,
  METADATA_FILE,
  type CatalogReader,
  type CatalogReaderOptions,
  type CatalogSnapshot,
} from "./reader.js";
