import { describeError } from "../api/GraphApiError.js";
import type { GraphEdge, GraphNode } from "../graph/Types.js";

/**
 * A snapshot read that failed midway. An incomplete snapshot cannot drive
 * classification, so the read is fatal; the records collected so far are
 * kept for reporting and optional partial exports.
 */
export class SnapshotFetchError extends Error {
  readonly graphId: string;
  readonly nodes: readonly GraphNode[];
  readonly edges: readonly GraphEdge[];

  constructor(
    graphId: string,
    nodes: readonly GraphNode[],
    edges: readonly GraphEdge[],
    cause: unknown,
  ) {
    super(
      `Failed to read graph "${graphId}" after collecting ${nodes.length} nodes and ${edges.length} edges: ${describeError(cause)}`,
      { cause },
    );
    this.name = "SnapshotFetchError";
    this.graphId = graphId;
    this.nodes = nodes;
    this.edges = edges;
  }
}
