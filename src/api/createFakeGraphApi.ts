import { readString } from "../graph/readField.js";
import type { GraphApi, GraphPage, PageRequest } from "./GraphApi.js";
import { GraphApiError } from "./GraphApiError.js";

export type FakeOperation =
  | "listNodes"
  | "listEdges"
  | "deleteNode"
  | "deleteEdge"
  | "healthCheck";

export interface FakeCall {
  operation: FakeOperation;
  /** Graph id for list calls, uuid for deletes, empty for the health check */
  target: string;
}

/**
 * How the fake answers a direct node deletion:
 * - `supported`: deletes it
 * - `unsupported`: always refuses (HTTP 405)
 * - `unsupported-while-connected`: refuses while an edge still references it
 */
export type FakeNodeDeletion =
  | "supported"
  | "unsupported"
  | "unsupported-while-connected";

export interface FakeGraphApiOptions {
  /** Raw node records, in remote order */
  nodes?: unknown[];
  /** Raw edge records, in remote order */
  edges?: unknown[];
  nodeDeletion?: FakeNodeDeletion;
  /** Errors thrown by the next calls of an operation, consumed in order */
  faults?: Partial<Record<FakeOperation, GraphApiError[]>>;
  /** Errors thrown by every delete of the given uuid */
  itemFaults?: Record<string, GraphApiError>;
}

export interface FakeGraphApi extends GraphApi {
  /** Every call received, in order */
  readonly calls: FakeCall[];
  nodeUuids(): string[];
  edgeUuids(): string[];
}

const OPERATIONS: readonly FakeOperation[] = [
  "listNodes",
  "listEdges",
  "deleteNode",
  "deleteEdge",
  "healthCheck",
];

const uuidOf = (record: unknown): string =>
  readString(record, ["uuid", "uuid_", "id"], "");

const endpointsOf = (record: unknown): [string, string] => [
  readString(record, ["source_node_uuid", "source_uuid"], ""),
  readString(record, ["target_node_uuid", "target_uuid"], ""),
];

/**
 * Create an in-memory stand-in for the remote graph API.
 *
 * Pages by uuid cursor like the HTTP API, keeps deletions in memory and can
 * be scripted to fail. Used by tests; never talks to the network.
 *
 * @example
 * const api = createFakeGraphApi({
 *   nodes: [{ uuid: "a" }],
 *   faults: { listEdges: [new GraphApiError("server", "down", { status: 503 })] },
 * });
 */
export const createFakeGraphApi = (
  options: FakeGraphApiOptions = {},
): FakeGraphApi => {
  let nodes = [...(options.nodes ?? [])];
  let edges = [...(options.edges ?? [])];
  const nodeDeletion = options.nodeDeletion ?? "supported";
  const faults = new Map<FakeOperation, GraphApiError[]>(
    OPERATIONS.map(
      (operation) => [operation, [...(options.faults?.[operation] ?? [])]] as const,
    ),
  );
  const itemFaults = options.itemFaults ?? {};
  const calls: FakeCall[] = [];

  const enter = (operation: FakeOperation, target: string): void => {
    calls.push({ operation, target });
    const fault = faults.get(operation)?.shift();
    if (fault) {
      throw fault;
    }
  };

  const page = (records: unknown[], request: PageRequest): GraphPage => {
    const start =
      request.cursor === undefined
        ? 0
        : records.findIndex((record) => uuidOf(record) === request.cursor) + 1;
    const items = records.slice(start, start + request.limit);
    const last = items[items.length - 1];
    return items.length === request.limit && last !== undefined
      ? { items, nextCursor: uuidOf(last) }
      : { items };
  };

  const isConnected = (uuid: string): boolean =>
    edges.some((edge) => endpointsOf(edge).includes(uuid));

  return {
    calls,

    nodeUuids: () => nodes.map(uuidOf),

    edgeUuids: () => edges.map(uuidOf),

    async listNodes(graphId, request) {
      enter("listNodes", graphId);
      return page(nodes, request);
    },

    async listEdges(graphId, request) {
      enter("listEdges", graphId);
      return page(edges, request);
    },

    async deleteNode(uuid) {
      enter("deleteNode", uuid);
      const itemFault = itemFaults[uuid];
      if (itemFault) {
        throw itemFault;
      }
      if (!nodes.some((node) => uuidOf(node) === uuid)) {
        throw new GraphApiError("not-found", `node ${uuid} not found`, { status: 404 });
      }
      if (
        nodeDeletion === "unsupported" ||
        (nodeDeletion === "unsupported-while-connected" && isConnected(uuid))
      ) {
        throw new GraphApiError("unsupported", "node deletion is not supported", {
          status: 405,
        });
      }
      nodes = nodes.filter((node) => uuidOf(node) !== uuid);
    },

    async deleteEdge(uuid) {
      enter("deleteEdge", uuid);
      const itemFault = itemFaults[uuid];
      if (itemFault) {
        throw itemFault;
      }
      if (!edges.some((edge) => uuidOf(edge) === uuid)) {
        throw new GraphApiError("not-found", `edge ${uuid} not found`, { status: 404 });
      }
      edges = edges.filter((edge) => uuidOf(edge) !== uuid);
    },

    async healthCheck() {
      enter("healthCheck", "");
    },
  };
};
