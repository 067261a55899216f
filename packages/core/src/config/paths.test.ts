import { describe, expect, it } from "vitest";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { DEFAULT_ROOT_PATH } from "./defaults.js";
import { expandHomePath, resolveConfigPath, resolveRootPath } from "./paths.js";

describe("expandHomePath", () => {
  it('expands "~" to the current home directory', () => {
    expect(expandHomePath("~")).toBe(homedir());
  });

  it('expands "~/" prefixes to the current home directory', () => {
    expect(expandHomePath("~/sockets/api.sock")).toBe(
      resolve(homedir(), "sockets/api.sock"),
    );
  });

  it("leaves non-home paths unchanged", () => {
    expect(expandHomePath("/tmp/sandbox")).toBe("/tmp/sandbox");
  });
});

describe("resolveRootPath", () => {
  it("returns default root path when no input is provided", () => {
    expect(resolveRootPath()).toBe(resolve(DEFAULT_ROOT_PATH));
  });

  it("passes through absolute paths", () => {
    expect(resolveRootPath("/tmp/request-authority")).toBe(
      resolve("/tmp/request-authority"),
    );
  });

  it("resolves relative paths to absolute", () => {
    expect(resolveRootPath("relative/request-authority")).toBe(
      resolve("relative/request-authority"),
    );
  });
});

describe("resolveConfigPath", () => {
  it("places config.json in the root path", () => {
    expect(resolveConfigPath("/srv/app")).toBe("/srv/app/config.json");
  });

  it("defaults to the default root", () => {
    expect(resolveConfigPath()).toBe(join(resolve(DEFAULT_ROOT_PATH), "config.json"));
  });
});
