import { existsSync, readFileSync } from "node:fs";
import type { ResourceEntry } from "@resource-graph/shared";
import type { ZodIssue } from "zod";
import { CatalogFileSchema } from "./Catalog.schemas.js";

/**
 * Default catalog file name, auto-detected when no config file exists.
 */
export const CATALOG_FILE_NAME = "resources.json" as const;

const formatIssue = (issue: ZodIssue): string => {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `  - ${path}: ${issue.message}`;
};

/**
 * Parse and validate catalog content.
 * Pure function - unit tested.
 *
 * @param content - Raw JSON string
 * @returns Entries in file order, with optional fields defaulted
 * @throws Error if JSON is invalid or an entry is malformed
 *
 * @example
 * parseCatalog('[{ "resource": "a", "name": "A" }]')
 * // [{ resource: "a", name: "A", sdesc: "", ldesc: "", category: "", requires: [] }]
 */
export const parseCatalog = (content: string): ResourceEntry[] => {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new Error("Invalid JSON");
  }

  const result = CatalogFileSchema.safeParse(raw);
  if (!result.success) {
    const lines = ["Invalid catalog:", ...result.error.issues.map(formatIssue)];
    throw new Error(lines.join("\n"));
  }

  return result.data.resources;
};

/**
 * Load and validate a JSON catalog file.
 * Thin I/O wrapper around parseCatalog.
 */
export const loadCatalogFile = (catalogPath: string): ResourceEntry[] => {
  if (!existsSync(catalogPath)) {
    throw new Error(`Catalog file not found: ${catalogPath}`);
  }

  const content = readFileSync(catalogPath, "utf-8");
  try {
    return parseCatalog(content);
  } catch (e) {
    if (e instanceof Error) {
      throw new Error(`${catalogPath}: ${e.message}`);
    }
    throw e;
  }
};
