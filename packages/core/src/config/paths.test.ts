import { describe, expect, it } from "vitest";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { DEFAULT_ROOT_PATH } from "./defaults.js";
import {
  expandHomePath,
  resolveConfigPath,
  resolveRootPath,
} from "./paths.js";

describe("expandHomePath", () => {
  it('expands "~" to the current home directory', () => {
    expect(expandHomePath("~")).toBe(homedir());
  });

  it('expands "~/" prefixes to the current home directory', () => {
    expect(expandHomePath("~/rag/server")).toBe(
      resolve(homedir(), "rag/server"),
    );
  });

  it("leaves non-home paths unchanged", () => {
    expect(expandHomePath("/tmp/sandbox")).toBe("/tmp/sandbox");
  });
});

describe("resolveRootPath", () => {
  it("returns default root path when nothing is provided", () => {
    expect(resolveRootPath(undefined, {})).toBe(resolve(DEFAULT_ROOT_PATH));
  });

  it("uses MANAGED_RAG_ROOT_PATH when no explicit path is given", () => {
    expect(
      resolveRootPath(undefined, { MANAGED_RAG_ROOT_PATH: "/srv/rag" }),
    ).toBe("/srv/rag");
  });

  it("prefers the explicit path over the environment", () => {
    expect(
      resolveRootPath("/tmp/explicit", { MANAGED_RAG_ROOT_PATH: "/srv/rag" }),
    ).toBe("/tmp/explicit");
  });

  it("resolves relative paths to absolute", () => {
    expect(resolveRootPath("relative/rag", {})).toBe(resolve("relative/rag"));
  });
});

describe("resolveConfigPath", () => {
  it("places config.json in the root path", () => {
    expect(resolveConfigPath("/srv/rag", {})).toBe(join("/srv/rag", "config.json"));
  });
});
