import { homedir } from "node:os";
import { resolve } from "node:path";
import { DEFAULT_PARAM_DIR } from "./defaults.js";

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
 * Resolves the configured parameter directory (or default) to an absolute path.
 */
export function resolveParamDir(input?: string): string {
  return resolve(expandHomePath(input ?? DEFAULT_PARAM_DIR));
}
