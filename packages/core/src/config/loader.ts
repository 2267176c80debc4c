import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import {
  ServerConfigSchema,
  type ServerConfig,
} from "../schemas/server-config.js";
import { resolveConfigPath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  rootPath?: string;
  /** Source of PORT and LOG_LEVEL overrides. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug"] as const;

function isLogLevel(
  value: string,
): value is ServerConfig["logging"]["level"] {
  return LOG_LEVELS.some((level) => level === value);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<ServerConfig> {
  const env = options?.env ?? process.env;
  const configPath =
    options?.configPath ?? resolveConfigPath(options?.rootPath, env);

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (!isMissingFile(err)) {
      throw err;
    }
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  const config = ServerConfigSchema.parse(parsed);

  // Write back so that defaults are visible and editable in config.json
  const serialized = JSON.stringify(config, null, 2) + "\n";
  if (serialized !== raw) {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, serialized);
  }

  return applyEnvOverrides(config, env);
}

/**
 * Deployment overrides that are never written back to config.json.
 */
export function applyEnvOverrides(
  config: ServerConfig,
  env: NodeJS.ProcessEnv,
): ServerConfig {
  const port = env.PORT !== undefined ? Number(env.PORT) : undefined;
  const level = env.LOG_LEVEL?.trim().toLowerCase();

  return {
    ...config,
    server:
      port !== undefined && Number.isInteger(port) && port > 0 && port <= 65535
        ? { ...config.server, port }
        : config.server,
    logging:
      level !== undefined && isLogLevel(level)
        ? { ...config.logging, level }
        : config.logging,
  };
}
