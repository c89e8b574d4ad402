import type { CatalogEntry } from "./ResourceCatalog.js";

/**
 * Render a resource entry as `Label: value` lines.
 * Field order and spacing are a stable output format.
 *
 * @example
 * formatResourceEntry(entry)
 * // [
 * //   "Resource: b",
 * //   "Name: B",
 * //   "Short Description: Resource B",
 * //   "Long Description: Needs A",
 * //   "Category: example",
 * //   "Requirements: [a]",
 * // ]
 */
export const formatResourceEntry = (entry: CatalogEntry): string[] => [
  `Resource: ${entry.resource}`,
  `Name: ${entry.name}`,
  `Short Description: ${entry.sdesc}`,
  `Long Description: ${entry.ldesc}`,
  `Category: ${entry.category}`,
  `Requirements: [${entry.requires.join(", ")}]`,
];
