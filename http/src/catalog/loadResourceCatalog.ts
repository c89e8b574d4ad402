import { resolve } from "node:path";
import type { ResourceEntry } from "@resource-graph/shared";
import type { CatalogConfig } from "../config/Config.schemas.js";
import { getDefaultDbPath } from "../config/getCacheDir.js";
import { createSqliteCatalogReader } from "../db/sqlite/createSqliteCatalogReader.js";
import {
  closeDatabase,
  openDatabase,
} from "../db/sqlite/sqliteConnection.utils.js";
import { CyclicDependencyError } from "../graph/errors.js";
import { validateCatalog } from "../graph/validateCatalog.js";
import type { ResourceGraphLogger } from "../logging/ResourceGraphLogger.js";
import { loadCatalogFile } from "./loadCatalogFile.js";
import { createResourceCatalog, type ResourceCatalog } from "./ResourceCatalog.js";

/**
 * Resolve the SQLite path a catalog config points at.
 */
export const resolveSqlitePath = (
  config: Extract<CatalogConfig, { type: "sqlite" }>,
  projectRoot: string,
): string =>
  config.path ? resolve(projectRoot, config.path) : getDefaultDbPath(projectRoot);

const readEntries = (
  config: CatalogConfig,
  projectRoot: string,
): { entries: ResourceEntry[]; source: string } => {
  if (config.type === "json") {
    const catalogPath = resolve(projectRoot, config.path);
    return { entries: loadCatalogFile(catalogPath), source: catalogPath };
  }

  const dbPath = resolveSqlitePath(config, projectRoot);
  const db = openDatabase({ path: dbPath });
  try {
    return { entries: createSqliteCatalogReader(db).readAll(), source: dbPath };
  } finally {
    closeDatabase(db);
  }
};

/**
 * Read the configured catalog source and snapshot it.
 * Dangling requirements and cycles are logged as warnings; queries that
 * reach them still fail with the matching error.
 */
export const loadResourceCatalog = (
  config: CatalogConfig,
  projectRoot: string,
  logger: ResourceGraphLogger,
): ResourceCatalog => {
  const { entries, source } = readEntries(config, projectRoot);
  const catalog = createResourceCatalog(entries);
  logger.success(`Loaded ${catalog.size} resources from ${source}`);

  const report = validateCatalog(catalog);
  for (const { resource, missing } of report.dangling) {
    logger.warn(`'${resource}' requires unknown resource '${missing}'`);
  }
  for (const cycle of report.cycles) {
    logger.warn(new CyclicDependencyError(cycle).message);
  }

  return catalog;
};
