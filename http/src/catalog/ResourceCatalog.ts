import type { ResourceEntry, ResourceId } from "@resource-graph/shared";
import { DuplicateResourceError, UnknownResourceError } from "../graph/errors.js";
import { formatResourceEntry } from "./formatResourceEntry.js";
import { closestMatches } from "./levenshteinDistance.js";

/**
 * A resource entry as held by the catalog. Frozen on creation.
 */
export type CatalogEntry = Readonly<Omit<ResourceEntry, "requires">> & {
  readonly requires: readonly ResourceId[];
};

/**
 * Read-only mapping from resource identifier to its metadata and direct
 * requirements. Populated once, then shared by every query.
 *
 * @example
 * const catalog = createResourceCatalog([
 *   { resource: "a", name: "A", sdesc: "", ldesc: "", category: "", requires: [] },
 *   { resource: "b", name: "B", sdesc: "", ldesc: "", category: "", requires: ["a"] },
 * ]);
 * catalog.directRequirements("b"); // ["a"]
 * catalog.requiredBy("a"); // ["b"]
 */
export interface ResourceCatalog {
  /** Number of resources */
  readonly size: number;

  has(id: ResourceId): boolean;

  /**
   * Metadata lookup.
   * @returns The entry, or undefined when the catalog has no such resource
   */
  get(id: ResourceId): CatalogEntry | undefined;

  /**
   * Declared requires list, verbatim. Empty for a leaf.
   * @throws UnknownResourceError if `id` is absent
   */
  directRequirements(id: ResourceId): readonly ResourceId[];

  /**
   * Six `Label: value` lines describing the resource.
   * @throws UnknownResourceError if `id` is absent
   */
  describe(id: ResourceId): string[];

  /**
   * Resources whose requires list names `id`, in catalog order.
   * @throws UnknownResourceError if `id` is absent
   */
  requiredBy(id: ResourceId): ResourceId[];

  /** All identifiers, in the order they were added */
  ids(): ResourceId[];

  /** All entries, in the order they were added */
  entries(): readonly CatalogEntry[];

  /** Known identifiers closest to `id` (for "did you mean" hints) */
  suggest(id: ResourceId): ResourceId[];
}

const freezeEntry = (entry: ResourceEntry): CatalogEntry =>
  Object.freeze({
    resource: entry.resource,
    name: entry.name,
    sdesc: entry.sdesc,
    ldesc: entry.ldesc,
    category: entry.category,
    requires: Object.freeze([...entry.requires]),
  });

/**
 * Snapshot a list of entries into a catalog.
 * The input array is copied; later changes to it are not seen.
 *
 * @throws DuplicateResourceError if an identifier appears twice
 */
export const createResourceCatalog = (
  entries: readonly ResourceEntry[],
): ResourceCatalog => {
  const byId = new Map<ResourceId, CatalogEntry>();
  for (const entry of entries) {
    if (byId.has(entry.resource)) {
      throw new DuplicateResourceError(entry.resource);
    }
    byId.set(entry.resource, freezeEntry(entry));
  }

  // Reverse index: requirement → dependents (catalog order, no duplicates)
  const dependents = new Map<ResourceId, ResourceId[]>();
  for (const entry of byId.values()) {
    for (const requirement of new Set(entry.requires)) {
      const list = dependents.get(requirement);
      if (list) {
        list.push(entry.resource);
      } else {
        dependents.set(requirement, [entry.resource]);
      }
    }
  }

  const ordered = Object.freeze([...byId.values()]);

  const suggest = (id: ResourceId): ResourceId[] =>
    closestMatches(id, byId.keys());

  const entryOrThrow = (id: ResourceId): CatalogEntry => {
    const entry = byId.get(id);
    if (!entry) {
      throw new UnknownResourceError(id, { suggestions: suggest(id) });
    }
    return entry;
  };

  return {
    size: byId.size,

    has: (id) => byId.has(id),

    get: (id) => byId.get(id),

    directRequirements: (id) => entryOrThrow(id).requires,

    describe: (id) => formatResourceEntry(entryOrThrow(id)),

    requiredBy: (id) => {
      entryOrThrow(id);
      return [...(dependents.get(id) ?? [])];
    },

    ids: () => [...byId.keys()],

    entries: () => ordered,

    suggest,
  };
};
