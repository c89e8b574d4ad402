import { type ProjectConfig, ProjectConfigSchema } from "./Config.schemas.js";

/**
 * Type-safe config helper for resource-graph.config.json files.
 * Validates config at runtime using Zod.
 *
 * @example
 * defineConfig({
 *   catalog: { type: "json", path: "./resources.json" },
 *   traversal: { maxPaths: 500 },
 * })
 */
export const defineConfig = (config: ProjectConfig): ProjectConfig => {
  return ProjectConfigSchema.parse(config);
};
