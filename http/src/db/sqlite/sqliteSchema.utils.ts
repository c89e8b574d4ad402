import type Database from "better-sqlite3";
import {
  DB_SCHEMA_VERSION,
  getDbSchemaVersion,
  setDbSchemaVersion,
} from "../versions.js";

/**
 * SQLite schema for the resource catalog.
 *
 * Tables:
 * - resources: one row per resource, `position` keeps catalog order
 * - requirements: one row per declared requirement, `position` keeps declared order
 *
 * Requirements are not foreign keys: a catalog may name resources it does
 * not define, and the graph engine reports those at query time.
 */

const RESOURCES_TABLE = `
CREATE TABLE IF NOT EXISTS resources (
  id TEXT PRIMARY KEY,
  position INTEGER NOT NULL,
  name TEXT NOT NULL,
  sdesc TEXT NOT NULL DEFAULT '',
  ldesc TEXT NOT NULL DEFAULT '',
  category TEXT NOT NULL DEFAULT ''
)`;

const REQUIREMENTS_TABLE = `
CREATE TABLE IF NOT EXISTS requirements (
  resource TEXT NOT NULL,
  position INTEGER NOT NULL,
  requires TEXT NOT NULL,
  PRIMARY KEY (resource, position)
)`;

const INDEXES = [
  "CREATE INDEX IF NOT EXISTS idx_resources_position ON resources(position)",
];

/**
 * Initialize the schema on a database connection.
 * Creates tables and indexes if they don't exist.
 * A database written by an older schema version is wiped first.
 *
 * @param db - better-sqlite3 database instance
 */
export const initializeSchema = (db: Database.Database): void => {
  if (getDbSchemaVersion(db) < DB_SCHEMA_VERSION) {
    dropAllTables(db);
  }
  setDbSchemaVersion(db);

  db.exec(RESOURCES_TABLE);
  db.exec(REQUIREMENTS_TABLE);

  for (const indexSql of INDEXES) {
    db.exec(indexSql);
  }
};

/**
 * Drop all tables. initializeSchema calls this when the stored schema
 * version is older than DB_SCHEMA_VERSION.
 *
 * @param db - better-sqlite3 database instance
 */
export const dropAllTables = (db: Database.Database): void => {
  db.exec("DROP TABLE IF EXISTS requirements");
  db.exec("DROP TABLE IF EXISTS resources");
};
