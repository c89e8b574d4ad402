import { describe, expect, it } from "vitest";
import { createResourceCatalog } from "../catalog/ResourceCatalog.js";
import { entry } from "../test-utils/catalogFixtures.js";
import { walkRequirementPaths } from "./walkRequirementPaths.js";

const limits = { maxDepth: 100, maxPaths: 100 };

describe(walkRequirementPaths.name, () => {
  it("visits every path prefix in pre-order with its leaf flag", () => {
    const catalog = createResourceCatalog([
      entry("a"),
      entry("b", ["a"]),
      entry("c"),
      entry("d", ["b", "c"]),
    ]);
    const visits: Array<[string, boolean]> = [];

    walkRequirementPaths(catalog, "d", limits, (path, isLeaf) => {
      visits.push([path.join("/"), isLeaf]);
    });

    expect(visits).toEqual([
      ["d", false],
      ["d/b", false],
      ["d/b/a", true],
      ["d/c", true],
    ]);
  });

  it("revisits a shared requirement on each path that reaches it", () => {
    const catalog = createResourceCatalog([
      entry("a"),
      entry("b", ["a"]),
      entry("c", ["a"]),
      entry("d", ["b", "c"]),
    ]);
    const leaves: string[] = [];

    walkRequirementPaths(catalog, "d", limits, (path, isLeaf) => {
      if (isLeaf) {
        leaves.push(path.join("/"));
      }
    });

    expect(leaves).toEqual(["d/b/a", "d/c/a"]);
  });

  it("passes a path the visitor cannot grow", () => {
    const catalog = createResourceCatalog([entry("a"), entry("b", ["a"])]);
    const lengths: number[] = [];

    walkRequirementPaths(catalog, "b", limits, (path) => {
      lengths.push(path.length);
    });

    expect(lengths).toEqual([1, 2]);
  });

  it("visits nothing when the root is unknown", () => {
    const catalog = createResourceCatalog([entry("a")]);
    const visits: string[] = [];

    expect(() =>
      walkRequirementPaths(catalog, "zz", limits, (path) => {
        visits.push(path.join("/"));
      }),
    ).toThrow("Resource 'zz' not found.");
    expect(visits).toEqual([]);
  });
});
