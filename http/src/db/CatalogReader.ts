import type { ResourceEntry } from "@resource-graph/shared";

/**
 * Read side of a stored catalog.
 *
 * @example
 * const reader = createSqliteCatalogReader(db);
 * const catalog = createResourceCatalog(reader.readAll());
 */
export interface CatalogReader {
  /**
   * All entries, in catalog order, each with its requirements in declared order.
   */
  readAll(): ResourceEntry[];

  /** Number of stored resources */
  count(): number;
}
