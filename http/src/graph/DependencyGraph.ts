import type { ResourceId } from "@resource-graph/shared";
import type { ResourceCatalog } from "../catalog/ResourceCatalog.js";
import { CHAIN_SEPARATOR, DEFAULT_MAX_PATHS, TREE_SEPARATOR } from "./constants.js";
import { depthFirstSearch } from "./depthFirstSearch.js";
import { CyclicDependencyError } from "./errors.js";
import { walkRequirementPaths, type PathLimits } from "./walkRequirementPaths.js";

/**
 * Bounds for the branching walks. Both default from the catalog.
 */
export interface TraversalOptions {
  /** Maximum resources on one path (default and upper bound: catalog size) */
  maxDepth?: number;
  /** Maximum paths one walk may visit (default: 10 000) */
  maxPaths?: number;
}

/**
 * Traversal queries over a catalog's requires-relation.
 * Every method is a pure function of (catalog, root) and returns its whole
 * result or throws; nothing is produced on failure.
 */
export interface DependencyGraph {
  /**
   * Progressive chains: the cumulative path at every step, root first.
   *
   * @example
   * // c requires b, b requires a
   * graph.directDependencyChains("c") // ["c", "c -> b", "c -> b -> a"]
   */
  directDependencyChains(root: ResourceId): string[];

  /**
   * Collapsed chains: one line per root-to-leaf path.
   *
   * @example
   * graph.collapsedChains("c") // ["c <- b <- a"]
   */
  collapsedChains(root: ResourceId): string[];

  /**
   * Install order: every reachable resource once, requirements first, root last.
   *
   * @throws CyclicDependencyError if the reachable subgraph has a cycle
   *
   * @example
   * graph.topologicalOrder("c") // ["a", "b", "c"]
   */
  topologicalOrder(root: ResourceId): ResourceId[];

  /** Reachable resources in discovery order, root first */
  reachable(root: ResourceId): ResourceId[];

  /** First cycle reachable from `root`, or null for an acyclic subgraph */
  findCycle(root: ResourceId): ResourceId[] | null;

  /**
   * Resources that transitively require `root`, nearest first.
   *
   * @example
   * graph.dependents("a") // ["b", "c"]
   */
  dependents(root: ResourceId): ResourceId[];
}

/**
 * Build a graph view over a catalog. The catalog is only read.
 */
export const createDependencyGraph = (
  catalog: ResourceCatalog,
  options: TraversalOptions = {},
): DependencyGraph => {
  const limits: PathLimits = {
    maxDepth: Math.min(options.maxDepth ?? catalog.size, catalog.size),
    maxPaths: options.maxPaths ?? DEFAULT_MAX_PATHS,
  };

  const directDependencyChains = (root: ResourceId): string[] => {
    const lines: string[] = [];
    walkRequirementPaths(catalog, root, limits, (path) => {
      lines.push(path.join(CHAIN_SEPARATOR));
    });
    return lines;
  };

  const collapsedChains = (root: ResourceId): string[] => {
    const lines: string[] = [];
    walkRequirementPaths(catalog, root, limits, (path, isLeaf) => {
      if (isLeaf) {
        lines.push(path.join(TREE_SEPARATOR));
      }
    });
    return lines;
  };

  const topologicalOrder = (root: ResourceId): ResourceId[] => {
    const result = depthFirstSearch(catalog, root);
    if (!result.success) {
      throw new CyclicDependencyError(result.cycle);
    }
    return result.finished;
  };

  const reachable = (root: ResourceId): ResourceId[] => {
    const result = depthFirstSearch(catalog, root);
    if (!result.success) {
      throw new CyclicDependencyError(result.cycle);
    }
    return result.discovered;
  };

  const findCycle = (root: ResourceId): ResourceId[] | null => {
    const result = depthFirstSearch(catalog, root);
    return result.success ? null : result.cycle;
  };

  const dependents = (root: ResourceId): ResourceId[] => {
    const seen = new Set<ResourceId>([root]);
    const order: ResourceId[] = [];
    const queue: ResourceId[] = catalog.requiredBy(root);

    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      if (seen.has(next)) {
        continue;
      }
      seen.add(next);
      order.push(next);
      queue.push(...catalog.requiredBy(next));
    }

    return order;
  };

  return {
    directDependencyChains,
    collapsedChains,
    topologicalOrder,
    reachable,
    findCycle,
    dependents,
  };
};
