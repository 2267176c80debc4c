import { join } from "node:path";
import { homedir } from "node:os";

export const ROOT_PATH_ENV = "MANAGED_RAG_ROOT_PATH";
export const DEFAULT_ROOT_PATH = join(homedir(), "managed-rag-server");
