import type { ResourceId } from "@resource-graph/shared";
import type { ResourceCatalog } from "../catalog/ResourceCatalog.js";
import { uniqueRequirements } from "./uniqueRequirements.js";

export interface DanglingRequirement {
  /** Resource declaring the requirement */
  resource: ResourceId;
  /** Required identifier that is not in the catalog */
  missing: ResourceId;
}

export interface CatalogReport {
  dangling: DanglingRequirement[];
  /** Each cycle in path order, starting from the resource first entered */
  cycles: ResourceId[][];
}

interface Frame {
  id: ResourceId;
  requirements: ResourceId[];
  next: number;
}

/**
 * Sweep the whole catalog for requirements that point nowhere and for cycles.
 *
 * Roots are taken in catalog order and resources already explored are
 * skipped, so each cycle is reported once, from the first resource on it
 * that the sweep entered.
 *
 * @example
 * // a requires b, b requires a and zlib (absent)
 * validateCatalog(catalog)
 * // { dangling: [{ resource: "b", missing: "zlib" }], cycles: [["a", "b"]] }
 */
export const validateCatalog = (catalog: ResourceCatalog): CatalogReport => {
  const dangling: DanglingRequirement[] = [];
  for (const entry of catalog.entries()) {
    for (const requirement of new Set(entry.requires)) {
      if (!catalog.has(requirement)) {
        dangling.push({ resource: entry.resource, missing: requirement });
      }
    }
  }

  const cycles: ResourceId[][] = [];
  const done = new Set<ResourceId>();

  for (const root of catalog.ids()) {
    if (done.has(root)) {
      continue;
    }

    const onStack = new Set<ResourceId>([root]);
    const frames: Frame[] = [
      { id: root, requirements: uniqueRequirements(catalog, root), next: 0 },
    ];

    for (let frame = frames.at(-1); frame; frame = frames.at(-1)) {
      const child = frame.requirements[frame.next];
      if (child === undefined) {
        frames.pop();
        onStack.delete(frame.id);
        done.add(frame.id);
        continue;
      }
      frame.next++;

      if (done.has(child) || !catalog.has(child)) {
        continue;
      }
      if (onStack.has(child)) {
        const stack = frames.map((f) => f.id);
        cycles.push(stack.slice(stack.indexOf(child)));
        continue;
      }

      onStack.add(child);
      frames.push({
        id: child,
        requirements: uniqueRequirements(catalog, child),
        next: 0,
      });
    }
  }

  return { dangling, cycles };
};
