import { z } from "zod";

// --- Schemas ---

export const ResourceEntrySchema = z.object({
  /** Unique identifier */
  resource: z.string().min(1),
  /** Display name */
  name: z.string().min(1),
  /** Short description (default: "") */
  sdesc: z.string().default(""),
  /** Long description (default: "") */
  ldesc: z.string().default(""),
  /** Category label (default: "") */
  category: z.string().default(""),
  /** Direct requirements, in declared order (default: []) */
  requires: z.array(z.string().min(1)).default([]),
});

/** Catalog file: either `{ "resources": [...] }` or a bare array */
export const CatalogFileSchema = z.preprocess(
  (value) => (Array.isArray(value) ? { resources: value } : value),
  z.object({ resources: z.array(ResourceEntrySchema) }),
);

// --- Inferred Types ---

export type CatalogFile = z.infer<typeof CatalogFileSchema>;
