import type { ResourceGraphLogger } from "./ResourceGraphLogger.js";

/**
 * Silent logger that discards all output.
 * Used in tests to suppress console noise.
 */
export const silentLogger: ResourceGraphLogger = {
  success(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
};
