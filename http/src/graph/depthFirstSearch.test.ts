import { describe, expect, it } from "vitest";
import { createResourceCatalog } from "../catalog/ResourceCatalog.js";
import { entry } from "../test-utils/catalogFixtures.js";
import { depthFirstSearch } from "./depthFirstSearch.js";

describe(depthFirstSearch.name, () => {
  it("returns discovery and finishing order for a diamond", () => {
    const catalog = createResourceCatalog([
      entry("a"),
      entry("b", ["a"]),
      entry("c", ["a"]),
      entry("d", ["b", "c"]),
    ]);

    expect(depthFirstSearch(catalog, "d")).toEqual({
      success: true,
      discovered: ["d", "b", "a", "c"],
      finished: ["a", "b", "c", "d"],
    });
  });

  it("handles a single leaf", () => {
    const catalog = createResourceCatalog([entry("a")]);

    expect(depthFirstSearch(catalog, "a")).toEqual({
      success: true,
      discovered: ["a"],
      finished: ["a"],
    });
  });

  it("reports the first back edge as a cycle", () => {
    const catalog = createResourceCatalog([
      entry("root", ["a"]),
      entry("a", ["b"]),
      entry("b", ["c"]),
      entry("c", ["a"]),
    ]);

    expect(depthFirstSearch(catalog, "root")).toEqual({
      success: false,
      cycle: ["a", "b", "c"],
    });
  });

  it("does not mistake a converging path for a cycle", () => {
    const catalog = createResourceCatalog([
      entry("a"),
      entry("b", ["a"]),
      entry("c", ["b", "a"]),
    ]);

    const result = depthFirstSearch(catalog, "c");

    expect(result.success).toBe(true);
  });

  it("throws for a requirement missing from the catalog", () => {
    const catalog = createResourceCatalog([entry("b", ["a"])]);

    expect(() => depthFirstSearch(catalog, "b")).toThrow(
      "Resource 'a' (required by 'b') not found.",
    );
  });
});
