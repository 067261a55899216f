import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { DEFAULT_ROOT_PATH } from "./defaults.js";

/**
 * Expands a leading "~" to the current user's home directory. Used for
 * the root path and for listener paths (socket files, certificates).
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  return input.startsWith("~/") ? resolve(homedir(), input.slice(2)) : input;
}

/** Absolute root directory, `~/.request-authority` unless given. */
export function resolveRootPath(input?: string): string {
  return resolve(expandHomePath(input ?? DEFAULT_ROOT_PATH));
}

/** config.json inside the (resolved) root directory. */
export function resolveConfigPath(rootPath?: string): string {
  return join(resolveRootPath(rootPath), "config.json");
}
