/**
 * Configuration for locating boards on disk.
 */

import { resolve } from "node:path";
import type { BoardStore } from "./core/ports/BoardStore.js";

export interface BoardStoreConfig {
  /** Directory created in the project root */
  dirName: string;
  /** Board document inside that directory */
  fileName: string;
}

export const DEFAULT_STORE_CONFIG: BoardStoreConfig = {
  dirName: ".clicky",
  fileName: "board.json",
};

/** Environment variable naming the default board directory. */
export const PATH_ENV_VAR = "CLICKY_PATH";

export interface BasePathOptions {
  /** Explicit directory, e.g. from --path */
  path?: string;
  cwd: string;
  env?: Record<string, string | undefined>;
}

/**
 * Decide which directory holds the board.
 *
 * An explicit path wins, then CLICKY_PATH, then the nearest ancestor of
 * the working directory that already has a board, then the working
 * directory itself.
 */
export function resolveBasePath(options: BasePathOptions, store: BoardStore): string {
  const { path, cwd, env = {} } = options;

  if (path) return resolve(cwd, path);

  const fromEnv = env[PATH_ENV_VAR];
  if (fromEnv) return resolve(cwd, fromEnv);

  return store.findRoot(cwd) ?? resolve(cwd);
}
