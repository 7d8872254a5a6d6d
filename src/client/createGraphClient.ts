import type { GraphApi, GraphPage, PageRequest } from "../api/GraphApi.js";
import { describeError, isGraphApiError } from "../api/GraphApiError.js";
import { toGraphEdge, toGraphNode } from "../graph/toGraphRecords.js";
import type { GraphEdge, GraphNode, GraphSnapshot } from "../graph/Types.js";
import type { JanitorLogger } from "../logging/JanitorLogger.js";
import type { DeleteOutcome, GraphClient, GraphClientConfig } from "./ClientTypes.js";
import { SnapshotFetchError } from "./SnapshotFetchError.js";
import { defaultSleep, type Sleep, withRetry } from "./withRetry.js";

export interface GraphClientOptions {
  api: GraphApi;
  config: GraphClientConfig;
  logger: JanitorLogger;
  /** Backoff wait (default: setTimeout) */
  sleep?: Sleep;
  /** Clock for snapshot timestamps (default: current time) */
  now?: () => Date;
}

/**
 * Create the graph client adapter.
 *
 * @example
 * const client = createGraphClient({
 *   api: createHttpGraphApi({ baseUrl, apiKey, requestTimeoutMs: 30_000 }),
 *   config: { defaultGraphId: "support-kb", pageSize: 100, retry },
 *   logger: consoleLogger,
 * });
 * const snapshot = await client.fetchSnapshot();
 */
export const createGraphClient = (options: GraphClientOptions): GraphClient => {
  const { api, config, logger } = options;
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? (() => new Date());

  const retrying = <T>(what: string, operation: () => Promise<T>): Promise<T> =>
    withRetry(operation, {
      policy: config.retry,
      sleep,
      onRetry: (attempt, delayMs, error) => {
        logger.warn(
          `${what} failed (attempt ${attempt}/${config.retry.maxAttempts}): ${describeError(error)}. Retrying in ${delayMs}ms`,
        );
      },
    });

  const resolveGraphId = (graphId: string | undefined): string => {
    const resolved = graphId ?? config.defaultGraphId;
    if (resolved === undefined || resolved === "") {
      throw new Error("No graph id given and no default graph id configured");
    }
    return resolved;
  };

  const reportAnomaly = (message: string): void => {
    logger.warn(`Unexpected API response: ${message}`);
  };

  const paginate = <T>(
    what: string,
    fetchPage: (request: PageRequest) => Promise<GraphPage>,
    convert: (raw: unknown) => T | null,
  ): AsyncIterable<T> => ({
    async *[Symbol.asyncIterator]() {
      let cursor: string | undefined;
      for (let pageNumber = 1; ; pageNumber++) {
        const request: PageRequest = { cursor, limit: config.pageSize };
        const page = await retrying(`${what} (page ${pageNumber})`, () =>
          fetchPage(request),
        );
        logger.debug(`${what}: page ${pageNumber} returned ${page.items.length} records`);
        for (const raw of page.items) {
          const record = convert(raw);
          if (record !== null) {
            yield record;
          }
        }
        if (
          page.items.length === 0 ||
          page.items.length < config.pageSize ||
          page.nextCursor === undefined
        ) {
          return;
        }
        if (page.nextCursor === cursor) {
          throw new Error(`${what}: page cursor did not advance past ${cursor}`);
        }
        cursor = page.nextCursor;
      }
    },
  });

  const listNodes = (graphId?: string): AsyncIterable<GraphNode> => {
    const id = resolveGraphId(graphId);
    return paginate(
      `Listing nodes of "${id}"`,
      (request) => api.listNodes(id, request),
      (raw) => toGraphNode(raw, reportAnomaly),
    );
  };

  const listEdges = (graphId?: string): AsyncIterable<GraphEdge> => {
    const id = resolveGraphId(graphId);
    return paginate(
      `Listing edges of "${id}"`,
      (request) => api.listEdges(id, request),
      (raw) => toGraphEdge(raw, reportAnomaly),
    );
  };

  /**
   * Turn a deletion failure into an outcome.
   * Authentication failures are rethrown: they abort the whole operation.
   */
  const settleFailure = (
    uuid: string,
    error: unknown,
    edgesRemoved?: number,
  ): DeleteOutcome => {
    if (isGraphApiError(error, "auth")) {
      throw error;
    }
    if (isGraphApiError(error, "not-found")) {
      logger.debug(`${uuid} was already gone`);
      return { status: "success", uuid, alreadyGone: true, edgesRemoved };
    }
    return { status: "failed", uuid, reason: describeError(error), edgesRemoved };
  };

  const deleteEdge = async (uuid: string): Promise<DeleteOutcome> => {
    try {
      await retrying(`Deleting edge ${uuid}`, () => api.deleteEdge(uuid));
      return { status: "success", uuid, alreadyGone: false };
    } catch (error) {
      return settleFailure(uuid, error);
    }
  };

  /**
   * Compensating sequence for APIs that refuse direct node deletion:
   * remove every edge touching the node, then retry the node once more.
   * Each step stands alone; the edges removed are reported whatever happens
   * to the node.
   */
  const deleteNodeAfterEdges = async (
    uuid: string,
    graphId: string | undefined,
  ): Promise<DeleteOutcome> => {
    const id = graphId ?? config.defaultGraphId;
    if (id === undefined || id === "") {
      return {
        status: "failed",
        uuid,
        reason: "node deletion is not supported and no graph id is known to find its edges",
        edgesRemoved: 0,
      };
    }
    logger.info(`Direct deletion of node ${uuid} is not supported; removing its edges first`);

    const connected: GraphEdge[] = [];
    try {
      for await (const edge of listEdges(id)) {
        if (edge.sourceUuid === uuid || edge.targetUuid === uuid) {
          connected.push(edge);
        }
      }
    } catch (error) {
      if (isGraphApiError(error, "auth")) {
        throw error;
      }
      return {
        status: "failed",
        uuid,
        reason: `node deletion is not supported and listing its edges failed: ${describeError(error)}`,
        edgesRemoved: 0,
      };
    }

    let edgesRemoved = 0;
    for (const edge of connected) {
      const outcome = await deleteEdge(edge.uuid);
      if (outcome.status === "success") {
        edgesRemoved++;
      } else {
        logger.warn(`Could not remove edge ${edge.uuid} of node ${uuid}: ${outcome.reason}`);
      }
    }

    try {
      await retrying(`Deleting node ${uuid}`, () => api.deleteNode(uuid));
      return { status: "success", uuid, alreadyGone: false, edgesRemoved };
    } catch (error) {
      const outcome = settleFailure(uuid, error, edgesRemoved);
      return outcome.status === "failed"
        ? {
            ...outcome,
            reason: `node deletion failed after removing ${edgesRemoved} of ${connected.length} connected edges: ${outcome.reason}`,
          }
        : outcome;
    }
  };

  return {
    listNodes,

    listEdges,

    async fetchSnapshot(graphId) {
      const id = resolveGraphId(graphId);
      const nodes: GraphNode[] = [];
      const edges: GraphEdge[] = [];
      try {
        for await (const node of listNodes(id)) {
          nodes.push(node);
        }
        for await (const edge of listEdges(id)) {
          edges.push(edge);
        }
      } catch (error) {
        throw new SnapshotFetchError(id, nodes, edges, error);
      }
      logger.debug(`Read ${nodes.length} nodes and ${edges.length} edges from "${id}"`);
      const snapshot: GraphSnapshot = {
        graphId: id,
        nodes: Object.freeze(nodes),
        edges: Object.freeze(edges),
        fetchedAt: now(),
      };
      return Object.freeze(snapshot);
    },

    async deleteNode(uuid, graphId) {
      try {
        await retrying(`Deleting node ${uuid}`, () => api.deleteNode(uuid));
        return { status: "success", uuid, alreadyGone: false };
      } catch (error) {
        if (!isGraphApiError(error, "unsupported")) {
          return settleFailure(uuid, error);
        }
      }
      return deleteNodeAfterEdges(uuid, graphId);
    },

    deleteEdge,

    async healthCheck() {
      try {
        await retrying("Health check", () => api.healthCheck());
        logger.debug("Health check passed");
        return true;
      } catch (error) {
        logger.error(`Health check failed: ${describeError(error)}`);
        return false;
      }
    },
  };
};
