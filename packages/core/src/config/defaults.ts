import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), "my-app");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_ROOT_PATH, "config.json");

/** Overrides the root path when set. */
export const ROOT_PATH_ENV = "MY_APP_ROOT_PATH";
