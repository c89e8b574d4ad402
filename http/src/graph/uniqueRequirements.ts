import type { ResourceId } from "@resource-graph/shared";
import type { ResourceCatalog } from "../catalog/ResourceCatalog.js";

/**
 * Direct requirements of a resource with repeated identifiers dropped.
 * Declared order is kept (first occurrence wins).
 */
export const uniqueRequirements = (
  catalog: ResourceCatalog,
  id: ResourceId,
): ResourceId[] => [...new Set(catalog.directRequirements(id))];
