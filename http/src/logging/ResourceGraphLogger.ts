/**
 * Logging interface for resource-graph status output.
 *
 * Status lines go to stderr so query results on stdout stay parseable.
 *
 * @example
 * ```typescript
 * logger.success("Loaded 26 resources from resources.json");
 * logger.warn("libfoo requires missing resource 'zlib'");
 * ```
 */
export interface ResourceGraphLogger {
  /**
   * Log a success message (green ✓).
   */
  success(message: string): void;

  /**
   * Log an info message (neutral).
   */
  info(message: string): void;

  /**
   * Log a warning message (yellow ⚠).
   */
  warn(message: string): void;

  /**
   * Log an error message (red ✗).
   */
  error(message: string): void;
}
