/** Separator between steps of a progressive dependency chain */
export const CHAIN_SEPARATOR = " -> ";

/** Separator between steps of a collapsed dependency tree line */
export const TREE_SEPARATOR = " <- ";

/** Default cap on the number of paths a branching walk may emit */
export const DEFAULT_MAX_PATHS = 10_000;
