import type { ResourceEntry } from "@resource-graph/shared";
import type Database from "better-sqlite3";
import type { CatalogWriter } from "../CatalogWriter.js";

/**
 * Create a CatalogWriter implementation backed by SQLite.
 *
 * @param db - better-sqlite3 database instance
 * @returns CatalogWriter implementation
 */
export const createSqliteCatalogWriter = (
  db: Database.Database,
): CatalogWriter => {
  const insertResourceStmt = db.prepare<{
    id: string;
    position: number;
    name: string;
    sdesc: string;
    ldesc: string;
    category: string;
  }>(`
    INSERT INTO resources (id, position, name, sdesc, ldesc, category)
    VALUES (@id, @position, @name, @sdesc, @ldesc, @category)
  `);

  const insertRequirementStmt = db.prepare<{
    resource: string;
    position: number;
    requires: string;
  }>(`
    INSERT INTO requirements (resource, position, requires)
    VALUES (@resource, @position, @requires)
  `);

  const deleteRequirementsStmt = db.prepare("DELETE FROM requirements");
  const deleteResourcesStmt = db.prepare("DELETE FROM resources");

  const clearAllTx = db.transaction(() => {
    deleteRequirementsStmt.run();
    deleteResourcesStmt.run();
  });

  const replaceAllTx = db.transaction((entries: readonly ResourceEntry[]) => {
    clearAllTx();

    entries.forEach((entry, position) => {
      insertResourceStmt.run({
        id: entry.resource,
        position,
        name: entry.name,
        sdesc: entry.sdesc,
        ldesc: entry.ldesc,
        category: entry.category,
      });
      entry.requires.forEach((requires, requirementPosition) => {
        insertRequirementStmt.run({
          resource: entry.resource,
          position: requirementPosition,
          requires,
        });
      });
    });
  });

  return {
    async replaceAll(entries: readonly ResourceEntry[]): Promise<void> {
      replaceAllTx(entries);
    },

    async clearAll(): Promise<void> {
      clearAllTx();
    },
  };
};
