import type { ResourceId } from "@resource-graph/shared";
import type { ResourceCatalog } from "../catalog/ResourceCatalog.js";
import {
  createDependencyGraph,
  type DependencyGraph,
  type TraversalOptions,
} from "../graph/DependencyGraph.js";
import type { ResourceGraphLogger } from "../logging/ResourceGraphLogger.js";
import { silentLogger } from "../logging/SilentResourceGraphLogger.js";
import { type OutputSink, writeLines } from "../output/OutputSink.js";

export interface ResourceResolverOptions {
  catalog: ResourceCatalog;
  /** Where query results are written */
  sink: OutputSink;
  /** Status output (default: silentLogger) */
  logger?: ResourceGraphLogger;
  traversal?: TraversalOptions;
}

/**
 * Printing front end over a catalog and its dependency graph.
 *
 * Each query computes its full result first, then writes one
 * newline-terminated line per entry to the sink. A failing query
 * throws and writes nothing.
 */
export interface ResourceResolver {
  readonly catalog: ResourceCatalog;
  readonly graph: DependencyGraph;

  /** `Resource:`, `Name:`, … `Requirements: [...]` */
  showResourceEntry(id: ResourceId): void;

  /** `c`, `c -> b`, `c -> b -> a` */
  listDirectDependencies(id: ResourceId): void;

  /** `c <- b <- a` */
  listDependencyTree(id: ResourceId): void;

  /** Install order, one identifier per line, `id` last */
  listDependencyTreeTopDown(id: ResourceId): void;

  /** Transitive dependents, nearest first */
  listDependents(id: ResourceId): void;
}

export const createResourceResolver = (
  options: ResourceResolverOptions,
): ResourceResolver => {
  const { catalog, sink } = options;
  const logger = options.logger ?? silentLogger;
  const graph = createDependencyGraph(catalog, options.traversal);

  const emit = (query: string, id: ResourceId, lines: string[]): void => {
    writeLines(sink, lines);
    logger.info(`${query} ${id}: ${lines.length} lines`);
  };

  return {
    catalog,
    graph,

    showResourceEntry(id) {
      emit("show", id, catalog.describe(id));
    },

    listDirectDependencies(id) {
      emit("chains", id, graph.directDependencyChains(id));
    },

    listDependencyTree(id) {
      emit("tree", id, graph.collapsedChains(id));
    },

    listDependencyTreeTopDown(id) {
      emit("order", id, graph.topologicalOrder(id));
    },

    listDependents(id) {
      emit("dependents", id, graph.dependents(id));
    },
  };
};
