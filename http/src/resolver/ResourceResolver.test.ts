import { describe, expect, it, vi } from "vitest";
import { createResourceCatalog } from "../catalog/ResourceCatalog.js";
import type { ResourceGraphLogger } from "../logging/ResourceGraphLogger.js";
import { silentLogger } from "../logging/SilentResourceGraphLogger.js";
import { createBufferSink } from "../output/OutputSink.js";
import { alphabetChain, entry } from "../test-utils/catalogFixtures.js";
import { createResourceResolver } from "./ResourceResolver.js";

const LETTERS = "abcdefghijklmnopqrstuvwxyz".split("");

const setup = (entries = alphabetChain()) => {
  const sink = createBufferSink();
  const logger = {
    success: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies ResourceGraphLogger;
  const resolver = createResourceResolver({
    catalog: createResourceCatalog(entries),
    sink,
    logger,
  });
  return { sink, logger, resolver };
};

describe(createResourceResolver.name, () => {
  describe("alphabet chain", () => {
    it("shows the leaf entry", () => {
      const { sink, resolver } = setup();

      resolver.showResourceEntry("a");

      expect(sink.toString()).toBe(
        [
          "Resource: a",
          "Name: A",
          "Short Description: Resource A",
          "Long Description: Long description of a",
          "Category: example",
          "Requirements: []",
          "",
        ].join("\n"),
      );
    });

    it("shows an entry with one requirement", () => {
      const { sink, resolver } = setup();

      resolver.showResourceEntry("m");

      expect(sink.toString().split("\n").at(-2)).toBe("Requirements: [l]");
    });

    it("lists every progressive chain from z", () => {
      const { sink, resolver } = setup();
      const descending = [...LETTERS].reverse();
      const expected = descending.map(
        (_, i) => `${descending.slice(0, i + 1).join(" -> ")}\n`,
      );

      resolver.listDirectDependencies("z");

      expect(sink.toString()).toBe(expected.join(""));
      expect(expected[0]).toBe("z\n");
      expect(expected[2]).toBe("z -> y -> x\n");
    });

    it("lists the collapsed chain from z", () => {
      const { sink, resolver } = setup();

      resolver.listDependencyTree("z");

      expect(sink.toString()).toBe(
        "z <- y <- x <- w <- v <- u <- t <- s <- r <- q <- p <- o <- n <- m <- l <- k <- j <- i <- h <- g <- f <- e <- d <- c <- b <- a\n",
      );
    });

    it("lists the install order from z", () => {
      const { sink, resolver } = setup();

      resolver.listDependencyTreeTopDown("z");

      expect(sink.toString()).toBe(LETTERS.map((letter) => `${letter}\n`).join(""));
    });

    it("lists everything above a as its dependents", () => {
      const { sink, resolver } = setup();

      resolver.listDependents("a");

      expect(sink.toString()).toBe(
        LETTERS.slice(1)
          .map((letter) => `${letter}\n`)
          .join(""),
      );
    });
  });

  describe("three resources", () => {
    const entries = [entry("a"), entry("b", ["a"]), entry("c", ["b"])];

    it("prints chains, tree and order for c", () => {
      const { sink, resolver } = setup(entries);

      resolver.listDirectDependencies("c");
      resolver.listDependencyTree("c");
      resolver.listDependencyTreeTopDown("c");

      expect(sink.toString()).toBe(
        "c\nc -> b\nc -> b -> a\nc <- b <- a\na\nb\nc\n",
      );
    });

    it("prints a single line for a leaf", () => {
      const { sink, resolver } = setup(entries);

      resolver.listDirectDependencies("a");
      resolver.listDependencyTree("a");
      resolver.listDependencyTreeTopDown("a");

      expect(sink.toString()).toBe("a\na\na\n");
    });
  });

  it("logs the number of lines per query", () => {
    const { logger, resolver } = setup();

    resolver.listDependencyTreeTopDown("c");

    expect(logger.info).toHaveBeenCalledWith("order c: 3 lines");
  });

  it.each([
    "showResourceEntry",
    "listDirectDependencies",
    "listDependencyTree",
    "listDependencyTreeTopDown",
    "listDependents",
  ] as const)("%s writes nothing for an unknown resource", (method) => {
    const { sink, logger, resolver } = setup();

    expect(() => resolver[method]("libfoo")).toThrow(
      "Resource 'libfoo' not found.",
    );
    expect(sink.toString()).toBe("");
    expect(logger.info).not.toHaveBeenCalled();
  });

  it("writes nothing when a cycle is reached", () => {
    const { sink, resolver } = setup([entry("a", ["b"]), entry("b", ["a"])]);

    expect(() => resolver.listDirectDependencies("a")).toThrow(
      "Cyclic dependency: a -> b -> a",
    );
    expect(() => resolver.listDependencyTree("b")).toThrow(
      "Cyclic dependency: b -> a -> b",
    );
    expect(() => resolver.listDependencyTreeTopDown("a")).toThrow(
      "Cyclic dependency: a -> b -> a",
    );
    expect(sink.toString()).toBe("");
  });

  it("applies traversal bounds", () => {
    const sink = createBufferSink();
    const resolver = createResourceResolver({
      catalog: createResourceCatalog(alphabetChain()),
      sink,
      logger: silentLogger,
      traversal: { maxDepth: 3 },
    });

    expect(() => resolver.listDependencyTree("z")).toThrow(
      "Traversal from 'z' exceeded the maximum depth of 3.",
    );
    resolver.listDependencyTree("c");

    expect(sink.toString()).toBe("c <- b <- a\n");
  });
});
