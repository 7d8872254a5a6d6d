/**
 * A named entity of the remote graph. Owned by the remote service; this tool
 * only observes or deletes it.
 */
export interface GraphNode {
  /** Unique identifier */
  uuid: string;
  name: string;
  labels: string[];
  attributes: Record<string, unknown>;
}

/**
 * A directed relation between two node identifiers. The endpoints may or may
 * not resolve to live nodes at observation time.
 */
export interface GraphEdge {
  /** Unique identifier */
  uuid: string;
  sourceUuid: string;
  targetUuid: string;
  /** Human-readable statement carried by the edge */
  fact: string;
  attributes: Record<string, unknown>;
}

/**
 * Immutable point-in-time read of a graph.
 * Built by a full paginated read and never updated in place: any deletion
 * makes it stale.
 */
export interface GraphSnapshot {
  readonly graphId: string;
  readonly nodes: readonly GraphNode[];
  readonly edges: readonly GraphEdge[];
  readonly fetchedAt: Date;
}

/** Which side of the graph an operation targets. */
export type GraphItemKind = "node" | "edge";
