import type { ResourceId } from "@resource-graph/shared";
import type { ResourceCatalog } from "../catalog/ResourceCatalog.js";
import { UnknownResourceError } from "./errors.js";
import { uniqueRequirements } from "./uniqueRequirements.js";

/**
 * Outcome of a depth-first exploration of the requires-subgraph.
 *
 * - `discovered`: pre-order (a resource before its requirements)
 * - `finished`: post-order (every requirement before its dependents, root last)
 * - `cycle`: participants of the first back edge found, in path order
 */
export type DepthFirstResult =
  | { success: true; discovered: ResourceId[]; finished: ResourceId[] }
  | { success: false; cycle: ResourceId[] };

interface Frame {
  id: ResourceId;
  requirements: ResourceId[];
  next: number;
}

/**
 * Explore everything reachable from `root`, following requirements left to
 * right in declared order. Each resource is entered once even when several
 * paths converge on it.
 *
 * @throws UnknownResourceError if `root` or a reachable requirement is missing
 *
 * @example
 * // d requires b and c; b and c both require a
 * depthFirstSearch(catalog, "d")
 * // { success: true, discovered: ["d", "b", "a", "c"], finished: ["a", "b", "c", "d"] }
 */
export const depthFirstSearch = (
  catalog: ResourceCatalog,
  root: ResourceId,
): DepthFirstResult => {
  const discovered: ResourceId[] = [root];
  const finished: ResourceId[] = [];
  const visited = new Set<ResourceId>();
  const visiting = new Set<ResourceId>([root]);
  const frames: Frame[] = [
    { id: root, requirements: uniqueRequirements(catalog, root), next: 0 },
  ];

  for (let frame = frames.at(-1); frame; frame = frames.at(-1)) {
    const child = frame.requirements[frame.next];
    if (child === undefined) {
      frames.pop();
      visiting.delete(frame.id);
      visited.add(frame.id);
      finished.push(frame.id);
      continue;
    }
    frame.next++;

    if (visited.has(child)) {
      continue;
    }
    if (visiting.has(child)) {
      const stack = frames.map((f) => f.id);
      return { success: false, cycle: stack.slice(stack.indexOf(child)) };
    }
    if (!catalog.has(child)) {
      throw new UnknownResourceError(child, {
        requiredBy: frame.id,
        suggestions: catalog.suggest(child),
      });
    }

    discovered.push(child);
    visiting.add(child);
    frames.push({
      id: child,
      requirements: uniqueRequirements(catalog, child),
      next: 0,
    });
  }

  return { success: true, discovered, finished };
};
