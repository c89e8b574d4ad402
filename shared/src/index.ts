/** Type alias for resource identifiers (e.g., "libfoo", "python3-devel"). */
export type ResourceId = string;

// Resource Entry
export interface ResourceEntry {
  /** Unique identifier, used as the graph key */
  resource: ResourceId;

  /** Display name */
  name: string;

  /** Short description (one line) */
  sdesc: string;

  /** Long description */
  ldesc: string;

  /** Category label (e.g., "Devel", "Libs") */
  category: string;

  /** Direct requirements, in declared order */
  requires: ResourceId[];
}

// Error kinds reported by the graph engine and the catalog
export type ResourceGraphErrorKind =
  | "UnknownResource"
  | "CyclicDependency"
  | "TraversalDepthExceeded"
  | "TraversalLimitExceeded"
  | "DuplicateResource";

// API Response Types
export interface HealthResponse {
  status: "ok" | "error";
  /** Bumped when routes or bodies change incompatibly */
  apiVersion: number;
  resources: number;
}

export interface LinesResponse {
  lines: string[];
}

export interface DescribeResponse extends LinesResponse {
  entry: ResourceEntry;
}

export interface ErrorResponse {
  error: ResourceGraphErrorKind;
  message: string;
  resource?: ResourceId;
  cycle?: ResourceId[];
  suggestions?: ResourceId[];
}

// Query kinds exposed by the resolver, the HTTP API and the CLI
export type QueryKind = "show" | "chains" | "tree" | "order" | "dependents";
