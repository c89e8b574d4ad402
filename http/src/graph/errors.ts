import type {
  ResourceGraphErrorKind,
  ResourceId,
} from "@resource-graph/shared";

/**
 * Base class for every structured failure raised by the catalog and the
 * graph engine. `kind` is the discriminant callers switch on.
 */
export abstract class ResourceGraphError extends Error {
  abstract readonly kind: ResourceGraphErrorKind;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A query root, or a requirement reached during traversal, is not in the catalog.
 *
 * @example
 * new UnknownResourceError("libfo", { suggestions: ["libfoo"] }).message
 * // "Resource 'libfo' not found. Did you mean: libfoo?"
 */
export class UnknownResourceError extends ResourceGraphError {
  readonly kind = "UnknownResource";
  readonly resource: ResourceId;
  readonly requiredBy: ResourceId | undefined;
  readonly suggestions: ResourceId[];

  constructor(
    resource: ResourceId,
    options: { requiredBy?: ResourceId; suggestions?: ResourceId[] } = {},
  ) {
    const suggestions = options.suggestions ?? [];
    const base = options.requiredBy
      ? `Resource '${resource}' (required by '${options.requiredBy}') not found.`
      : `Resource '${resource}' not found.`;
    const hint =
      suggestions.length > 0 ? ` Did you mean: ${suggestions.join(", ")}?` : "";
    super(`${base}${hint}`);
    this.resource = resource;
    this.requiredBy = options.requiredBy;
    this.suggestions = suggestions;
  }
}

/**
 * The reachable requires-subgraph contains a cycle.
 * `cycle` lists the participants in path order, without repeating the first.
 *
 * @example
 * new CyclicDependencyError(["a", "b"]).message
 * // "Cyclic dependency: a -> b -> a"
 */
export class CyclicDependencyError extends ResourceGraphError {
  readonly kind = "CyclicDependency";
  readonly cycle: ResourceId[];

  constructor(cycle: ResourceId[]) {
    const closed = [...cycle, ...cycle.slice(0, 1)];
    super(`Cyclic dependency: ${closed.join(" -> ")}`);
    this.cycle = cycle;
  }
}

/**
 * A single-edge walk went deeper than its safety bound.
 */
export class TraversalDepthExceededError extends ResourceGraphError {
  readonly kind = "TraversalDepthExceeded";
  readonly resource: ResourceId;
  readonly maxDepth: number;

  constructor(resource: ResourceId, maxDepth: number) {
    super(
      `Traversal from '${resource}' exceeded the maximum depth of ${maxDepth}.`,
    );
    this.resource = resource;
    this.maxDepth = maxDepth;
  }
}

/**
 * A branching walk produced more paths than allowed.
 */
export class TraversalLimitExceededError extends ResourceGraphError {
  readonly kind = "TraversalLimitExceeded";
  readonly resource: ResourceId;
  readonly maxPaths: number;

  constructor(resource: ResourceId, maxPaths: number) {
    super(
      `Traversal from '${resource}' produced more than ${maxPaths} paths. Use the install order listing for densely branching graphs.`,
    );
    this.resource = resource;
    this.maxPaths = maxPaths;
  }
}

/**
 * The same identifier was declared twice when populating a catalog.
 */
export class DuplicateResourceError extends ResourceGraphError {
  readonly kind = "DuplicateResource";
  readonly resource: ResourceId;

  constructor(resource: ResourceId) {
    super(`Resource '${resource}' is declared more than once.`);
    this.resource = resource;
  }
}

export const isResourceGraphError = (
  value: unknown,
): value is ResourceGraphError => value instanceof ResourceGraphError;
