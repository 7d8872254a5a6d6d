import type { GraphEdge, GraphNode, GraphSnapshot } from "../graph/Types.js";
import type { RetryPolicy } from "./withRetry.js";

/**
 * Settings threaded into the adapter. Nothing is read from process state.
 */
export interface GraphClientConfig {
  /** Graph used when an operation names none */
  defaultGraphId?: string;
  /** Records requested per page */
  pageSize: number;
  retry: RetryPolicy;
}

/**
 * Result of a single deletion.
 *
 * The remote answer "not found" (HTTP 404) is an idempotent success:
 * `alreadyGone` tells it apart from an actual removal.
 */
export type DeleteOutcome =
  | {
      status: "success";
      uuid: string;
      alreadyGone: boolean;
      /** Edges removed first because the API refused direct node deletion */
      edgesRemoved?: number;
    }
  | {
      status: "failed";
      uuid: string;
      reason: string;
      /** Edges already removed by the fallback when the node itself could not be */
      edgesRemoved?: number;
    };

/**
 * Paginated reads and guarded deletions against the remote graph.
 * Reads throw on failure; deletions report failures as outcomes, except
 * authentication failures, which are thrown.
 */
export interface GraphClient {
  /** Restartable lazy read of all nodes; every iteration starts from page one */
  listNodes(graphId?: string): AsyncIterable<GraphNode>;

  /** Restartable lazy read of all edges */
  listEdges(graphId?: string): AsyncIterable<GraphEdge>;

  /**
   * Read every node, then every edge.
   * @throws SnapshotFetchError with the records collected before the failure
   */
  fetchSnapshot(graphId?: string): Promise<GraphSnapshot>;

  /**
   * Delete a node, falling back to deleting its edges first when the API
   * refuses direct node deletion. The fallback lists edges of `graphId`
   * (default: the configured graph).
   */
  deleteNode(uuid: string, graphId?: string): Promise<DeleteOutcome>;

  deleteEdge(uuid: string): Promise<DeleteOutcome>;

  /** Never throws; failures are logged */
  healthCheck(): Promise<boolean>;
}
