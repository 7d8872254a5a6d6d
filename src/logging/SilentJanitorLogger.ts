import type { JanitorLogger } from "./JanitorLogger.js";

/**
 * Silent logger that discards all output.
 * Used in tests to suppress console noise.
 */
export const silentLogger: JanitorLogger = {
  startProgress(): void {},
  updateProgress(): void {},
  completeProgress(): void {},
  debug(): void {},
  success(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
};
