import { z } from "zod";

// --- Schemas ---

export const JsonCatalogSchema = z.object({
  type: z.literal("json"),
  /** Path to the catalog file (relative to project root) */
  path: z.string().min(1),
});

export const SqliteCatalogSchema = z.object({
  type: z.literal("sqlite"),
  /** Path to database file (default: '.resource-graph/sqlite/catalog.db') */
  path: z.string().optional(),
});

export const CatalogConfigSchema = z.discriminatedUnion("type", [
  JsonCatalogSchema,
  SqliteCatalogSchema,
]);

export const TraversalConfigSchema = z.object({
  /** Maximum resources on one chain (default: catalog size; never above it) */
  maxDepth: z.number().int().positive().optional(),
  /** Maximum paths one chain listing may produce (default: 10000) */
  maxPaths: z.number().int().positive().optional(),
});

export const ServerConfigSchema = z.object({
  /** HTTP server port (default: 4317) */
  port: z.number().int().positive().optional(),
  /** Bind address (default: '127.0.0.1' for security) */
  host: z.string().optional(),
});

/** Project configuration schema */
export const ProjectConfigSchema = z.object({
  /** Where resource definitions are read from */
  catalog: CatalogConfigSchema,
  /** Traversal bounds */
  traversal: TraversalConfigSchema.optional(),
  /** HTTP server configuration */
  server: ServerConfigSchema.optional(),
});

// --- Inferred Types ---

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type CatalogConfig = z.infer<typeof CatalogConfigSchema>;
export type TraversalConfig = z.infer<typeof TraversalConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
