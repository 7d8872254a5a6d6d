import type { GraphEdge, GraphNode, GraphSnapshot } from "../graph/Types.js";

export interface IsolationReport {
  /** Nodes referenced by no edge, in snapshot order */
  isolatedNodes: GraphNode[];
  /** Edges with at least one endpoint missing from the node set, in snapshot order */
  danglingEdges: GraphEdge[];
  /** Identifiers of every node in the snapshot */
  nodeUuids: ReadonlySet<string>;
}

/**
 * Classify isolated nodes and dangling edges of a snapshot.
 *
 * O(N + E): one pass over nodes to build the identifier set, one pass over
 * edges counting references to both endpoints. A self-loop counts as a
 * reference to its node.
 *
 * @example
 * analyzeIsolation(snapshot).isolatedNodes.map((n) => n.uuid) // ["n7"]
 */
export const analyzeIsolation = (snapshot: GraphSnapshot): IsolationReport => {
  const nodeUuids = new Set<string>();
  for (const node of snapshot.nodes) {
    nodeUuids.add(node.uuid);
  }

  const referenceCounts = new Map<string, number>();
  const danglingEdges: GraphEdge[] = [];
  for (const edge of snapshot.edges) {
    referenceCounts.set(edge.sourceUuid, (referenceCounts.get(edge.sourceUuid) ?? 0) + 1);
    referenceCounts.set(edge.targetUuid, (referenceCounts.get(edge.targetUuid) ?? 0) + 1);
    if (!nodeUuids.has(edge.sourceUuid) || !nodeUuids.has(edge.targetUuid)) {
      danglingEdges.push(edge);
    }
  }

  const isolatedNodes = snapshot.nodes.filter(
    (node) => (referenceCounts.get(node.uuid) ?? 0) === 0,
  );

  return { isolatedNodes, danglingEdges, nodeUuids };
};

/**
 * Which endpoints of an edge are absent from the node set.
 *
 * @example
 * missingEndpoints(edge, report.nodeUuids) // ["source"]
 */
export const missingEndpoints = (
  edge: GraphEdge,
  nodeUuids: ReadonlySet<string>,
): Array<"source" | "target"> => {
  const missing: Array<"source" | "target"> = [];
  if (!nodeUuids.has(edge.sourceUuid)) {
    missing.push("source");
  }
  if (!nodeUuids.has(edge.targetUuid)) {
    missing.push("target");
  }
  return missing;
};
