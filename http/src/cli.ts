import { resolve } from "node:path";
import type { QueryKind } from "@resource-graph/shared";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { loadCatalogFile } from "./catalog/loadCatalogFile.js";
import {
  loadResourceCatalog,
  resolveSqlitePath,
} from "./catalog/loadResourceCatalog.js";
import type { ResourceCatalog } from "./catalog/ResourceCatalog.js";
import type { CatalogConfig, ProjectConfig } from "./config/Config.schemas.js";
import { loadConfigOrDetect } from "./config/configLoader.utils.js";
import { createSqliteCatalogReader } from "./db/sqlite/createSqliteCatalogReader.js";
import { createSqliteCatalogWriter } from "./db/sqlite/createSqliteCatalogWriter.js";
import {
  closeDatabase,
  openDatabase,
} from "./db/sqlite/sqliteConnection.utils.js";
import { CyclicDependencyError } from "./graph/errors.js";
import { validateCatalog } from "./graph/validateCatalog.js";
import { consoleLogger } from "./logging/ConsoleResourceGraphLogger.js";
import type { ResourceGraphLogger } from "./logging/ResourceGraphLogger.js";
import { createStdoutSink, type OutputSink, writeLines } from "./output/OutputSink.js";
import {
  createResourceResolver,
  type ResourceResolver,
} from "./resolver/ResourceResolver.js";
import { startHttpServer } from "./server.js";

export interface CliOptions {
  /** Directory holding the config or resources.json (default: process.cwd()) */
  projectRoot?: string;
  /** Query output (default: stdout) */
  sink?: OutputSink;
  /** Status output (default: consoleLogger) */
  logger?: ResourceGraphLogger;
}

interface GlobalFlags {
  catalog?: string;
}

type QueryMethod = keyof Pick<
  ResourceResolver,
  | "showResourceEntry"
  | "listDirectDependencies"
  | "listDependencyTree"
  | "listDependencyTreeTopDown"
  | "listDependents"
>;

const QUERY_COMMANDS: Array<{
  name: QueryKind;
  description: string;
  method: QueryMethod;
}> = [
  { name: "show", description: "Describe a resource", method: "showResourceEntry" },
  {
    name: "chains",
    description: "List progressive dependency chains",
    method: "listDirectDependencies",
  },
  {
    name: "tree",
    description: "List collapsed dependency chains",
    method: "listDependencyTree",
  },
  {
    name: "order",
    description: "List install order (requirements first)",
    method: "listDependencyTreeTopDown",
  },
  {
    name: "dependents",
    description: "List resources that depend on a resource",
    method: "listDependents",
  },
];

const parsePort = (value: string): number => {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65_535) {
    throw new InvalidArgumentError("Port must be an integer from 1 to 65535.");
  }
  return port;
};

/**
 * Build the command tree. Actions throw on failure; runCli maps that to an exit code.
 */
export const createProgram = (options: CliOptions = {}): Command => {
  const projectRoot = options.projectRoot ?? process.cwd();
  const sink = options.sink ?? createStdoutSink();
  const logger = options.logger ?? consoleLogger;

  const resolveConfig = (flags: GlobalFlags): ProjectConfig => {
    const configResult = loadConfigOrDetect(projectRoot);
    if (flags.catalog) {
      const catalog: CatalogConfig = { type: "json", path: flags.catalog };
      return configResult ? { ...configResult.config, catalog } : { catalog };
    }
    if (!configResult) {
      throw new Error(
        "No resource-graph.config.json or resources.json found. Pass --catalog <file>.",
      );
    }
    return configResult.config;
  };

  const loadCatalog = (
    flags: GlobalFlags,
  ): { catalog: ResourceCatalog; config: ProjectConfig } => {
    const config = resolveConfig(flags);
    return {
      catalog: loadResourceCatalog(config.catalog, projectRoot, logger),
      config,
    };
  };

  const program = new Command("resource-graph")
    .description("Inspect dependency relationships between resources")
    .option("-c, --catalog <file>", "read resources from a JSON catalog file")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => sink.write(str),
      writeErr: (str) => logger.error(str.trimEnd()),
    });

  for (const query of QUERY_COMMANDS) {
    program
      .command(`${query.name} <resource>`)
      .description(query.description)
      .action((resource: string) => {
        const { catalog, config } = loadCatalog(program.opts<GlobalFlags>());
        const resolver = createResourceResolver({
          catalog,
          sink,
          logger,
          traversal: config.traversal,
        });
        resolver[query.method](resource);
      });
  }

  program
    .command("validate")
    .description("Report missing requirements and cycles")
    .action(() => {
      const { catalog } = loadCatalog(program.opts<GlobalFlags>());
      const report = validateCatalog(catalog);
      const lines = [
        ...report.dangling.map(
          ({ resource, missing }) => `${resource}: missing requirement ${missing}`,
        ),
        ...report.cycles.map((cycle) => new CyclicDependencyError(cycle).message),
      ];
      writeLines(sink, lines);
      if (lines.length > 0) {
        throw new Error(`Catalog has ${lines.length} problems`);
      }
      logger.success("Catalog is consistent");
    });

  program
    .command("import <file>")
    .description("Copy a JSON catalog into the SQLite store")
    .option("--db <path>", "database path (default: from config)")
    .action(async (file: string, flags: { db?: string }) => {
      const entries = loadCatalogFile(resolve(projectRoot, file));
      const dbPath = resolveImportTarget(flags.db, projectRoot);
      const db = openDatabase({ path: dbPath });
      try {
        await createSqliteCatalogWriter(db).replaceAll(entries);
        const count = createSqliteCatalogReader(db).count();
        logger.success(`Imported ${count} resources into ${dbPath}`);
      } finally {
        closeDatabase(db);
      }
    });

  program
    .command("serve")
    .description("Serve queries over HTTP")
    .option("-p, --port <port>", "port to listen on", parsePort)
    .action(async (flags: { port?: number }) => {
      await startHttpServer({ projectRoot, logger, port: flags.port });
    });

  return program;
};

/**
 * Where `import` writes: --db, else the configured sqlite path, else the default.
 */
const resolveImportTarget = (
  dbFlag: string | undefined,
  projectRoot: string,
): string => {
  if (dbFlag) {
    return resolve(projectRoot, dbFlag);
  }
  const configured = loadConfigOrDetect(projectRoot)?.config.catalog;
  const sqliteConfig: Extract<CatalogConfig, { type: "sqlite" }> =
    configured?.type === "sqlite" ? configured : { type: "sqlite" };
  return resolveSqlitePath(sqliteConfig, projectRoot);
};

/**
 * Run the CLI with user arguments (no node/script prefix).
 *
 * @returns Process exit code
 *
 * @example
 * await runCli(["order", "libcurl"]) // prints install order, returns 0
 */
export const runCli = async (
  args: string[],
  options: CliOptions = {},
): Promise<number> => {
  const logger = options.logger ?? consoleLogger;
  const program = createProgram(options);

  try {
    await program.parseAsync(args, { from: "user" });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof Error) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }
};
