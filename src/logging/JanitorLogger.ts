/**
 * Logging interface for graph-janitor.
 *
 * Handles both progress updates (in-place terminal updates) and simple logs.
 * All output goes to stderr; reports meant for the user (listings, summaries,
 * the outcome line) are written to stdout by the actions, not by the logger.
 *
 * @example
 * ```typescript
 * logger.startProgress(40, "Deleting isolated nodes");
 * logger.updateProgress(12);
 * logger.completeProgress("Deleted 40 nodes");
 *
 * logger.warn("Node record without uuid dropped");
 * logger.debug("GET /graph/list-all -> 200");
 * ```
 */
export interface JanitorLogger {
  /**
   * Start progress tracking for a batch.
   * Displays: [graph-janitor] → {label}... 0/{total}
   */
  startProgress(total: number, label: string): void;

  /**
   * Update progress count (in-place terminal update).
   * Displays: [graph-janitor] → {label}... {current}/{total}
   */
  updateProgress(current: number): void;

  /**
   * Complete the current progress.
   * Prints a permanent line and clears progress state.
   */
  completeProgress(message: string): void;

  /**
   * Diagnostic detail, shown only in verbose mode.
   */
  debug(message: string): void;

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
