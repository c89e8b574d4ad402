import { mkdirSync } from "node:fs";
import { join } from "node:path";

/**
 * Cache directory name in project root.
 */
const CACHE_DIR = ".resource-graph";

/**
 * Get the cache directory for resource-graph.
 *
 * @param projectRoot - The project root directory
 * @returns Absolute path to the cache directory
 */
export const getCacheDir = (projectRoot: string): string => {
  const cacheDir = join(projectRoot, CACHE_DIR);
  mkdirSync(cacheDir, { recursive: true });
  return cacheDir;
};

/**
 * Get the SQLite directory path.
 *
 * @param cacheDir - The cache directory
 * @returns Absolute path to .resource-graph/sqlite/
 */
export const getSqliteDir = (cacheDir: string): string => {
  const sqliteDir = join(cacheDir, "sqlite");
  mkdirSync(sqliteDir, { recursive: true });
  return sqliteDir;
};

/**
 * Get the default catalog database path for a project.
 *
 * @param projectRoot - The project root directory
 * @returns Absolute path to .resource-graph/sqlite/catalog.db
 */
export const getDefaultDbPath = (projectRoot: string): string => {
  const cacheDir = getCacheDir(projectRoot);
  return join(getSqliteDir(cacheDir), "catalog.db");
};
