import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { CATALOG_FILE_NAME } from "../catalog/loadCatalogFile.js";
import { type ProjectConfig, ProjectConfigSchema } from "./Config.schemas.js";

/**
 * Supported config file name.
 *
 * JSON-only, so the compiled CLI can read it without a TypeScript loader.
 */
export const CONFIG_FILE_NAME = "resource-graph.config.json" as const;

/**
 * Detect a catalog file in the given directory.
 *
 * @param directory - Directory to check
 * @returns Relative path to the catalog file or null if not found
 */
export const detectCatalogFile = (directory: string): string | null => {
  const catalogPath = join(directory, CATALOG_FILE_NAME);
  return existsSync(catalogPath) ? `./${CATALOG_FILE_NAME}` : null;
};

/**
 * Create a default ProjectConfig reading a JSON catalog.
 *
 * @param catalogPath - Relative path to the catalog file
 * @returns Default ProjectConfig
 */
export const createDefaultConfig = (catalogPath: string): ProjectConfig => ({
  catalog: { type: "json", path: catalogPath },
});

/**
 * Find a config file in the given directory.
 *
 * @param directory - Directory to search in
 * @returns Path to config file, or null if not found
 */
export const findConfigFile = (directory: string): string | null => {
  const configPath = join(directory, CONFIG_FILE_NAME);
  return existsSync(configPath) ? configPath : null;
};

/**
 * Parse and validate config content.
 * Pure function - unit tested.
 *
 * @param content - Raw JSON string from config file
 * @returns Validated project config
 * @throws Error if JSON is invalid or config structure is invalid
 */
export const parseConfig = (content: string): ProjectConfig => {
  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new Error("Invalid JSON");
  }

  return ProjectConfigSchema.parse(rawConfig);
};

/**
 * Load and validate a JSON config file.
 * Thin I/O wrapper around parseConfig.
 */
export const loadConfig = (configPath: string): ProjectConfig => {
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    return parseConfig(content);
  } catch (e) {
    if (e instanceof Error && e.message === "Invalid JSON") {
      throw new Error(`Failed to parse JSON config: ${configPath}`);
    }
    throw e;
  }
};

/**
 * Result type for loadConfigOrDetect indicating how config was obtained.
 */
export type ConfigResult = {
  config: ProjectConfig;
  source: "explicit" | "auto-detected";
  configPath?: string;
};

/**
 * Load config from explicit file or auto-detect a resources.json catalog.
 *
 * Priority:
 * 1. Explicit config file (resource-graph.config.json)
 * 2. Auto-detect resources.json and generate default config
 * 3. Return null if neither found
 *
 * @param directory - Directory to search for config
 * @returns Config with source info, or null if no config possible
 */
export const loadConfigOrDetect = (directory: string): ConfigResult | null => {
  const configPath = findConfigFile(directory);
  if (configPath) {
    const config = loadConfig(configPath);
    return { config, source: "explicit", configPath };
  }

  const catalogPath = detectCatalogFile(directory);
  if (catalogPath) {
    return { config: createDefaultConfig(catalogPath), source: "auto-detected" };
  }

  return null;
};
