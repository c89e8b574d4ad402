import type { ResourceEntry } from "@resource-graph/shared";

/**
 * Minimal entry: metadata derived from the identifier.
 */
export const entry = (
  resource: string,
  requires: string[] = [],
): ResourceEntry => ({
  resource,
  name: resource.toUpperCase(),
  sdesc: `Resource ${resource.toUpperCase()}`,
  ldesc: `Long description of ${resource}`,
  category: "example",
  requires,
});

/**
 * "a" … "z", each letter requiring the one before it ("a" is the leaf).
 */
export const alphabetChain = (): ResourceEntry[] => {
  const letters = "abcdefghijklmnopqrstuvwxyz".split("");
  return letters.map((letter, i) => {
    const previous = letters[i - 1];
    return entry(letter, previous ? [previous] : []);
  });
};
