import type { ResourceEntry } from "@resource-graph/shared";
import type Database from "better-sqlite3";
import type { CatalogReader } from "../CatalogReader.js";

/**
 * Raw resource row from SQLite.
 */
interface ResourceRow {
  id: string;
  name: string;
  sdesc: string;
  ldesc: string;
  category: string;
}

/**
 * Raw requirement row from SQLite.
 */
interface RequirementRow {
  resource: string;
  requires: string;
}

/**
 * Create a CatalogReader implementation backed by SQLite.
 *
 * @param db - better-sqlite3 database instance
 * @returns CatalogReader implementation
 */
export const createSqliteCatalogReader = (
  db: Database.Database,
): CatalogReader => {
  const selectResourcesStmt = db.prepare<[], ResourceRow>(
    "SELECT id, name, sdesc, ldesc, category FROM resources ORDER BY position",
  );
  const selectRequirementsStmt = db.prepare<[], RequirementRow>(
    "SELECT resource, requires FROM requirements ORDER BY resource, position",
  );
  const countStmt = db.prepare<[], { count: number }>(
    "SELECT COUNT(*) as count FROM resources",
  );

  return {
    readAll(): ResourceEntry[] {
      const requiresByResource = new Map<string, string[]>();
      for (const row of selectRequirementsStmt.all()) {
        const list = requiresByResource.get(row.resource);
        if (list) {
          list.push(row.requires);
        } else {
          requiresByResource.set(row.resource, [row.requires]);
        }
      }

      return selectResourcesStmt.all().map((row) => ({
        resource: row.id,
        name: row.name,
        sdesc: row.sdesc,
        ldesc: row.ldesc,
        category: row.category,
        requires: requiresByResource.get(row.id) ?? [],
      }));
    },

    count(): number {
      return countStmt.get()?.count ?? 0;
    },
  };
};
