import { homedir } from "node:os";
import { resolve } from "node:path";
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
 * Resolves the root path to an absolute path. An explicit argument wins
 * over MY_APP_ROOT_PATH, which wins over the default.
 */
export function resolveRootPath(input?: string): string {
  const fromEnv = process.env[ROOT_PATH_ENV];
  const chosen = input ?? (fromEnv ? fromEnv : DEFAULT_ROOT_PATH);
  return resolve(expandHomePath(chosen));
}

/** Resolves a file name from the config against the root path. */
export function resolveDataPath(rootPath: string, filename: string): string {
  if (filename === ":memory:") return filename;
  return resolve(rootPath, expandHomePath(filename));
}
