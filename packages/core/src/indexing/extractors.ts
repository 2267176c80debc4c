/**
 * Document extractors the backend runs per file type during an indexing run.
 */

export const EXTRACTOR_IMAGE =
  "evo-inference-container-images.pkg.sbercloud.tech/products/evo-ai-assistant/backend/ragaas-etl-extractor/prod:v1.0.9";

export const SUPPORTED_EXTENSIONS = ["txt", "md", "pdf"] as const;
export type DocumentExtension = (typeof SUPPORTED_EXTENSIONS)[number];

const RECURSIVE_SPLITTER = {
  SPLITTER: "RagSplitter_RecursiveCharacterTextSplitter",
  CHUNK_SIZE: "1500",
  CHUNK_OVERLAP: "500",
  SEPARATORS: '["\\n\\n","\\n"," "]',
  IS_SEPARATOR_REGEX: "false",
  KEEP_SEPARATOR: "KeepSeparator_None",
};

const EXTRACTOR_ENVS: Record<DocumentExtension, Record<string, string>> = {
  txt: { PARSER_TYPE: "simpleFile", ...RECURSIVE_SPLITTER },
  md: {
    PARSER_TYPE: "markdown",
    SPLITTER: "RagSplitter_MarkdownSplitter",
    CHUNK_SIZE: "1500",
    CHUNK_OVERLAP: "500",
  },
  pdf: { PARSER_TYPE: "simplePdf", ...RECURSIVE_SPLITTER },
};

export interface ExtractorSpec {
  cpu_requested: number;
  ram_requested: number;
  replicas: number;
  image: string;
  extensions_supported: DocumentExtension[];
  extra_envs: Record<string, string>;
}

export function isDocumentExtension(value: string): value is DocumentExtension {
  return SUPPORTED_EXTENSIONS.some((ext) => ext === value);
}

export function buildExtractors(
  extensions: readonly DocumentExtension[],
): ExtractorSpec[] {
  return extensions.map((ext) => ({
    cpu_requested: 1000,
    ram_requested: 1024,
    replicas: 1,
    image: EXTRACTOR_IMAGE,
    extensions_supported: [ext],
    extra_envs: { ...EXTRACTOR_ENVS[ext] },
  }));
}
