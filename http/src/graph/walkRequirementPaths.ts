import type { ResourceId } from "@resource-graph/shared";
import type { ResourceCatalog } from "../catalog/ResourceCatalog.js";
import {
  CyclicDependencyError,
  TraversalDepthExceededError,
  TraversalLimitExceededError,
  UnknownResourceError,
} from "./errors.js";
import { uniqueRequirements } from "./uniqueRequirements.js";

export interface PathLimits {
  /** Maximum number of resources on a single path */
  maxDepth: number;
  /** Maximum number of paths visited in one walk */
  maxPaths: number;
}

/**
 * Visitor called once per path, root first.
 * `isLeaf` is true when the last resource on the path has no requirements.
 */
export type PathVisitor = (path: readonly ResourceId[], isLeaf: boolean) => void;

interface Frame {
  requirements: ResourceId[];
  next: number;
}

/**
 * Depth-first walk over every requires-path starting at `root`.
 *
 * Each node with several requirements opens one branch per requirement,
 * explored in declared order. The visitor sees each path prefix exactly once,
 * in pre-order: for a chain a → b → c it is called with [a], [a, b], [a, b, c].
 *
 * @throws UnknownResourceError if `root` or a reached requirement is missing
 * @throws CyclicDependencyError if a requirement is already on the current path
 * @throws TraversalDepthExceededError if a path would exceed `limits.maxDepth`
 * @throws TraversalLimitExceededError if more than `limits.maxPaths` paths are visited
 */
export const walkRequirementPaths = (
  catalog: ResourceCatalog,
  root: ResourceId,
  limits: PathLimits,
  visit: PathVisitor,
): void => {
  const rootRequirements = uniqueRequirements(catalog, root);

  const path: ResourceId[] = [root];
  const onPath = new Set<ResourceId>([root]);
  const frames: Frame[] = [{ requirements: rootRequirements, next: 0 }];
  let visitedPaths = 0;

  const emit = (isLeaf: boolean): void => {
    visitedPaths++;
    if (visitedPaths > limits.maxPaths) {
      throw new TraversalLimitExceededError(root, limits.maxPaths);
    }
    visit(path, isLeaf);
  };

  emit(rootRequirements.length === 0);

  for (let frame = frames.at(-1); frame; frame = frames.at(-1)) {
    const child = frame.requirements[frame.next];
    if (child === undefined) {
      frames.pop();
      const left = path.pop();
      if (left !== undefined) {
        onPath.delete(left);
      }
      continue;
    }
    frame.next++;

    const parent = path.at(-1);
    if (onPath.has(child)) {
      throw new CyclicDependencyError(path.slice(path.indexOf(child)));
    }
    if (!catalog.has(child)) {
      throw new UnknownResourceError(child, {
        requiredBy: parent,
        suggestions: catalog.suggest(child),
      });
    }
    if (path.length >= limits.maxDepth) {
      throw new TraversalDepthExceededError(root, limits.maxDepth);
    }

    const requirements = uniqueRequirements(catalog, child);
    path.push(child);
    onPath.add(child);
    frames.push({ requirements, next: 0 });
    emit(requirements.length === 0);
  }
};
