/**
 * One page of raw records returned by a list call.
 * Records are left untyped: their shape varies across API versions and is
 * resolved by the normalizer.
 */
export interface GraphPage {
  items: unknown[];
  /** Cursor for the next page; absent when the remote signals the end */
  nextCursor?: string;
}

export interface PageRequest {
  /** Cursor returned with the previous page; absent for the first page */
  cursor?: string;
  limit: number;
}

/**
 * Remote graph API surface consumed by this tool.
 * Implementations throw GraphApiError for every failure.
 *
 * @example
 * const api = createHttpGraphApi({ baseUrl, apiKey, requestTimeoutMs: 30_000 });
 * const page = await api.listNodes("support-kb", { limit: 100 });
 */
export interface GraphApi {
  listNodes(graphId: string, request: PageRequest): Promise<GraphPage>;

  listEdges(graphId: string, request: PageRequest): Promise<GraphPage>;

  /**
   * Delete a node.
   * @throws GraphApiError with kind `not-found` when the node does not exist,
   * `unsupported` when the API refuses direct node deletion
   */
  deleteNode(uuid: string): Promise<void>;

  /**
   * Delete an edge.
   * @throws GraphApiError with kind `not-found` when the edge does not exist
   */
  deleteEdge(uuid: string): Promise<void>;

  /** Lightweight check; resolves when the service answers and accepts the credentials */
  healthCheck(): Promise<void>;
}
