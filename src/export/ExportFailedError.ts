import { describeError } from "../api/GraphApiError.js";

/**
 * Export aborted by a failed read. Carries how much had been collected, and
 * where the partial document went when one was requested and written.
 */
export class ExportFailedError extends Error {
  readonly graphId: string;
  readonly nodeCount: number;
  readonly edgeCount: number;
  readonly partialPath: string | undefined;

  constructor(
    graphId: string,
    counts: { nodeCount: number; edgeCount: number; partialPath?: string },
    cause: unknown,
  ) {
    super(
      `Export of graph "${graphId}" failed after collecting ${counts.nodeCount} nodes and ${counts.edgeCount} edges: ${describeError(cause)}`,
      { cause },
    );
    this.name = "ExportFailedError";
    this.graphId = graphId;
    this.nodeCount = counts.nodeCount;
    this.edgeCount = counts.edgeCount;
    this.partialPath = counts.partialPath;
  }
}
