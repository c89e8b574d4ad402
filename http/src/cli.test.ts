import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runCli } from "./cli.js";
import type { ResourceGraphLogger } from "./logging/ResourceGraphLogger.js";
import { createBufferSink } from "./output/OutputSink.js";

const CATALOG = {
  resources: [
    { resource: "zlib", name: "zlib", sdesc: "Compression library" },
    { resource: "openssl", name: "OpenSSL", requires: ["zlib"] },
    { resource: "libcurl", name: "libcurl", requires: ["openssl", "zlib"] },
  ],
};

describe(runCli.name, () => {
  let projectRoot: string;

  const run = async (args: string[]) => {
    const sink = createBufferSink();
    const logger = {
      success: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    } satisfies ResourceGraphLogger;
    const exitCode = await runCli(args, { projectRoot, sink, logger });
    return { exitCode, output: sink.toString(), logger };
  };

  const writeJson = (name: string, content: unknown): void => {
    writeFileSync(join(projectRoot, name), JSON.stringify(content));
  };

  beforeEach(() => {
    projectRoot = mkdtempSync(join(tmpdir(), "resource-graph-cli-"));
  });

  afterEach(() => {
    rmSync(projectRoot, { recursive: true, force: true });
  });

  describe("with a detected resources.json", () => {
    beforeEach(() => {
      writeJson("resources.json", CATALOG);
    });

    it("show prints the entry", async () => {
      const { exitCode, output } = await run(["show", "zlib"]);

      expect(exitCode).toBe(0);
      expect(output).toBe(
        [
          "Resource: zlib",
          "Name: zlib",
          "Short Description: Compression library",
          "Long Description: ",
          "Category: ",
          "Requirements: []",
          "",
        ].join("\n"),
      );
    });

    it("chains prints one line per branch prefix", async () => {
      const { output } = await run(["chains", "libcurl"]);

      expect(output).toBe(
        "libcurl\nlibcurl -> openssl\nlibcurl -> openssl -> zlib\nlibcurl -> zlib\n",
      );
    });

    it("tree prints one line per root-to-leaf path", async () => {
      const { output } = await run(["tree", "libcurl"]);

      expect(output).toBe("libcurl <- openssl <- zlib\nlibcurl <- zlib\n");
    });

    it("order prints requirements first", async () => {
      const { output } = await run(["order", "libcurl"]);

      expect(output).toBe("zlib\nopenssl\nlibcurl\n");
    });

    it("dependents prints nearest first", async () => {
      const { output } = await run(["dependents", "zlib"]);

      expect(output).toBe("openssl\nlibcurl\n");
    });

    it("reports an unknown resource and exits with 1", async () => {
      const { exitCode, output, logger } = await run(["order", "nope"]);

      expect(exitCode).toBe(1);
      expect(output).toBe("");
      expect(logger.error).toHaveBeenCalledWith("Resource 'nope' not found.");
    });

    it("validate succeeds on a consistent catalog", async () => {
      const { exitCode, logger } = await run(["validate"]);

      expect(exitCode).toBe(0);
      expect(logger.success).toHaveBeenCalledWith("Catalog is consistent");
    });
  });

  it("reads the file named by --catalog", async () => {
    writeJson("other.json", [{ resource: "a", name: "A" }]);

    const { exitCode, output } = await run(["--catalog", "other.json", "tree", "a"]);

    expect(exitCode).toBe(0);
    expect(output).toBe("a\n");
  });

  it("keeps configured traversal bounds when --catalog is given", async () => {
    writeJson("resource-graph.config.json", {
      catalog: { type: "sqlite" },
      traversal: { maxDepth: 2 },
    });
    writeJson("other.json", [
      { resource: "a", name: "A" },
      { resource: "b", name: "B", requires: ["a"] },
      { resource: "c", name: "C", requires: ["b"] },
    ]);

    const shallow = await run(["--catalog", "other.json", "tree", "b"]);
    const deep = await run(["--catalog", "other.json", "tree", "c"]);

    expect(shallow.output).toBe("b <- a\n");
    expect(deep.exitCode).toBe(1);
    expect(deep.logger.error).toHaveBeenCalledWith(
      "Traversal from 'c' exceeded the maximum depth of 2.",
    );
  });

  it.each(["abc", "0", "1.5", "70000"])(
    "serve rejects --port %s before starting",
    async (port) => {
      writeJson("resources.json", CATALOG);

      const { exitCode, logger } = await run(["serve", "--port", port]);

      expect(exitCode).toBe(1);
      expect(logger.error).toHaveBeenCalledWith(
        `error: option '-p, --port <port>' argument '${port}' is invalid. Port must be an integer from 1 to 65535.`,
      );
      expect(logger.success).not.toHaveBeenCalled();
    },
  );

  it("fails when no catalog can be found", async () => {
    const { exitCode, logger } = await run(["order", "a"]);

    expect(exitCode).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      "No resource-graph.config.json or resources.json found. Pass --catalog <file>.",
    );
  });

  it("validate lists every problem and exits with 1", async () => {
    writeJson("resources.json", [
      { resource: "a", name: "A", requires: ["b"] },
      { resource: "b", name: "B", requires: ["a", "zlib"] },
    ]);

    const { exitCode, output, logger } = await run(["validate"]);

    expect(exitCode).toBe(1);
    expect(output).toBe(
      "b: missing requirement zlib\nCyclic dependency: a -> b -> a\n",
    );
    expect(logger.error).toHaveBeenCalledWith("Catalog has 2 problems");
  });

  it("import copies a JSON catalog into the configured SQLite store", async () => {
    writeJson("source.json", CATALOG);
    writeJson("resource-graph.config.json", {
      catalog: { type: "sqlite", path: "store/catalog.db" },
    });

    const imported = await run(["import", "source.json"]);
    const queried = await run(["order", "libcurl"]);

    expect(imported.exitCode).toBe(0);
    expect(imported.logger.success).toHaveBeenCalledWith(
      `Imported 3 resources into ${join(projectRoot, "store/catalog.db")}`,
    );
    expect(queried.output).toBe("zlib\nopenssl\nlibcurl\n");
  });

  it("prints help to the output sink", async () => {
    const { exitCode, output } = await run(["--help"]);

    expect(exitCode).toBe(0);
    expect(output).toContain("Usage: resource-graph");
  });

  it("rejects an unknown command", async () => {
    const { exitCode, logger } = await run(["frobnicate"]);

    expect(exitCode).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      "error: unknown command 'frobnicate'",
    );
  });
});
