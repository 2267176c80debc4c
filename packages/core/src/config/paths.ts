import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { DEFAULT_ROOT_PATH, ROOT_PATH_ENV } from "./defaults.js";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolves the root path to an absolute path. An explicit input wins over
 * the MANAGED_RAG_ROOT_PATH variable, which wins over the default.
 */
export function resolveRootPath(
  input?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const raw = input ?? env[ROOT_PATH_ENV] ?? DEFAULT_ROOT_PATH;
  return resolve(expandHomePath(raw));
}

export function resolveConfigPath(
  rootPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return join(resolveRootPath(rootPath, env), "config.json");
}
