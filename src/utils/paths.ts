/**
 * Filesystem path helpers.
 */

import { existsSync, mkdirSync } from "fs";
import { homedir } from "os";
import { join } from "path";

/**
 * Expand a leading "~" to the user's home directory.
 */
export function expandUser(path: string): string {
  if (path === "~") {
    return homedir();
  }
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

/**
 * Create a directory (and parents) if missing, returning the path.
 */
export function ensureDir(path: string): string {
  if (!existsSync(path)) {
    mkdirSync(path, { recursive: true });
  }
  return path;
}
