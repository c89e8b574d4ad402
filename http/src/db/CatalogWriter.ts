import type { ResourceEntry } from "@resource-graph/shared";

/**
 * Write side of a stored catalog.
 * Used by: `resource-graph import`
 */
export interface CatalogWriter {
  /**
   * Replace the stored catalog with `entries`, in one transaction.
   * Catalog order and declared requirement order are preserved.
   *
   * @throws Error on duplicate identifiers (nothing is written)
   */
  replaceAll(entries: readonly ResourceEntry[]): Promise<void>;

  /**
   * Remove every resource and requirement.
   *
   * WARNING: Destructive operation.
   */
  clearAll(): Promise<void>;
}
