import type { IndexLifecycle } from "@managed-rag/core/lifecycle";
import type { Logger } from "pino";

export interface McpContext {
  lifecycle: IndexLifecycle;
  logger: Logger;
}
