import type Database from "better-sqlite3";

/**
 * HTTP API version, reported by GET /health.
 * Bump when routes or response bodies change in incompatible ways.
 */
export const HTTP_API_VERSION = 1;

/**
 * DB schema version - bump when database schema changes.
 */
export const DB_SCHEMA_VERSION = 1;

/**
 * Set the DB schema version in the SQLite user_version pragma.
 * Called by initializeSchema() before creating tables.
 */
export const setDbSchemaVersion = (db: Database.Database): void => {
  db.pragma(`user_version = ${DB_SCHEMA_VERSION}`);
};

/**
 * Read the DB schema version from the SQLite user_version pragma.
 */
export const getDbSchemaVersion = (db: Database.Database): number => {
  const version = db.pragma("user_version", { simple: true });
  return typeof version === "number" ? version : 0;
};
