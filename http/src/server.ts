import { createServer } from "node:http";
import type {
  DescribeResponse,
  ErrorResponse,
  HealthResponse,
  LinesResponse,
} from "@resource-graph/shared";
import express, {
  type ErrorRequestHandler,
  type Express,
  type Request,
  type Response,
} from "express";
import { loadResourceCatalog } from "./catalog/loadResourceCatalog.js";
import type { ResourceCatalog } from "./catalog/ResourceCatalog.js";
import { loadConfigOrDetect } from "./config/configLoader.utils.js";
import {
  createDependencyGraph,
  type TraversalOptions,
} from "./graph/DependencyGraph.js";
import {
  CyclicDependencyError,
  isResourceGraphError,
  type ResourceGraphError,
  UnknownResourceError,
} from "./graph/errors.js";
import { HTTP_API_VERSION } from "./db/versions.js";
import { consoleLogger } from "./logging/ConsoleResourceGraphLogger.js";
import type { ResourceGraphLogger } from "./logging/ResourceGraphLogger.js";

/** Default HTTP port when the config names none */
export const DEFAULT_PORT = 4317;

/** Default bind address */
export const DEFAULT_HOST = "127.0.0.1";

/**
 * HTTP status for each structured failure.
 */
export const statusForError = (error: ResourceGraphError): number => {
  switch (error.kind) {
    case "UnknownResource":
      return 404;
    case "CyclicDependency":
    case "TraversalDepthExceeded":
    case "TraversalLimitExceeded":
      return 409;
    case "DuplicateResource":
      return 500;
  }
};

/**
 * JSON body describing a structured failure.
 */
export const toErrorResponse = (error: ResourceGraphError): ErrorResponse => {
  const body: ErrorResponse = { error: error.kind, message: error.message };
  if (error instanceof UnknownResourceError) {
    body.resource = error.resource;
    body.suggestions = error.suggestions;
  } else if (error instanceof CyclicDependencyError) {
    body.cycle = error.cycle;
  } else if ("resource" in error && typeof error.resource === "string") {
    body.resource = error.resource;
  }
  return body;
};

/**
 * Build the express app serving queries over a loaded catalog.
 *
 * Routes:
 * - GET /health
 * - GET /api/resources
 * - GET /api/resources/:id               (entry + describe lines)
 * - GET /api/resources/:id/chains        (progressive chains)
 * - GET /api/resources/:id/tree          (collapsed chains)
 * - GET /api/resources/:id/install-order (topological order)
 * - GET /api/resources/:id/dependents    (transitive dependents)
 */
export const createApp = (
  catalog: ResourceCatalog,
  traversal: TraversalOptions = {},
  logger: ResourceGraphLogger = consoleLogger,
): Express => {
  const graph = createDependencyGraph(catalog, traversal);
  const app = express();

  const sendLines = (res: Response, lines: string[]): void => {
    const body: LinesResponse = { lines };
    res.json(body);
  };

  app.get("/health", (_req, res) => {
    const body: HealthResponse = {
      status: "ok",
      apiVersion: HTTP_API_VERSION,
      resources: catalog.size,
    };
    res.json(body);
  });

  app.get("/api/resources", (_req, res) => {
    res.json(catalog.entries());
  });

  app.get("/api/resources/:id", (req: Request<{ id: string }>, res) => {
    const { id } = req.params;
    const entry = catalog.get(id);
    if (!entry) {
      throw new UnknownResourceError(id, { suggestions: catalog.suggest(id) });
    }
    const body: DescribeResponse = {
      entry: { ...entry, requires: [...entry.requires] },
      lines: catalog.describe(id),
    };
    res.json(body);
  });

  app.get("/api/resources/:id/chains", (req: Request<{ id: string }>, res) => {
    sendLines(res, graph.directDependencyChains(req.params.id));
  });

  app.get("/api/resources/:id/tree", (req: Request<{ id: string }>, res) => {
    sendLines(res, graph.collapsedChains(req.params.id));
  });

  app.get(
    "/api/resources/:id/install-order",
    (req: Request<{ id: string }>, res) => {
      sendLines(res, graph.topologicalOrder(req.params.id));
    },
  );

  app.get(
    "/api/resources/:id/dependents",
    (req: Request<{ id: string }>, res) => {
      sendLines(res, graph.dependents(req.params.id));
    },
  );

  const handleError: ErrorRequestHandler = (err, _req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (isResourceGraphError(err)) {
      res.status(statusForError(err)).json(toErrorResponse(err));
      return;
    }
    logger.error(err instanceof Error ? err.message : String(err));
    res.status(500).json({ error: "Internal", message: "Internal server error" });
  };
  app.use(handleError);

  return app;
};

/**
 * Handle returned by startHttpServer for testing and graceful shutdown.
 */
export interface ServerHandle {
  /** Close the server and release resources */
  close(): Promise<void>;
  /** The port the server is listening on */
  port: number;
}

/**
 * Options for startHttpServer.
 */
export interface ServerOptions {
  /** Directory holding the config or resources.json (default: process.cwd()) */
  projectRoot?: string;
  /** Logger for server output (default: consoleLogger) */
  logger?: ResourceGraphLogger;
  /** Port override (0 picks a free port) */
  port?: number;
}

/**
 * Load the configured catalog and serve it over HTTP.
 *
 * @example
 * ```bash
 * resource-graph serve
 * ```
 */
export const startHttpServer = async (
  options: ServerOptions = {},
): Promise<ServerHandle> => {
  const logger = options.logger ?? consoleLogger;
  const projectRoot = options.projectRoot ?? process.cwd();

  const configResult = loadConfigOrDetect(projectRoot);
  if (!configResult) {
    throw new Error(
      "No resource-graph.config.json or resources.json found. Nothing to serve.",
    );
  }
  const { config } = configResult;

  const catalog = loadResourceCatalog(config.catalog, projectRoot, logger);
  const app = createApp(catalog, config.traversal, logger);

  const host = config.server?.host ?? DEFAULT_HOST;
  const requestedPort = options.port ?? config.server?.port ?? DEFAULT_PORT;

  const server = createServer(app);
  await new Promise<void>((resolvePromise, reject) => {
    server.once("error", reject);
    server.listen(requestedPort, host, () => {
      server.off("error", reject);
      resolvePromise();
    });
  });

  const address = server.address();
  const port =
    typeof address === "object" && address !== null ? address.port : requestedPort;
  logger.success(`Serving ${catalog.size} resources on http://${host}:${port}`);

  return {
    port,
    close: () =>
      new Promise<void>((resolvePromise, reject) => {
        server.close((error) => (error ? reject(error) : resolvePromise()));
      }),
  };
};
