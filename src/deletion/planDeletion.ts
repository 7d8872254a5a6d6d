import { analyzeIsolation } from "../analysis/analyzeIsolation.js";
import type { GraphClient } from "../client/ClientTypes.js";
import type { GraphEdge, GraphItemKind, GraphNode } from "../graph/Types.js";
import type { DeletionCandidate, DeletionPlan } from "./DeletionTypes.js";

const MAX_LABEL_LENGTH = 60;

const truncate = (text: string): string =>
  text.length > MAX_LABEL_LENGTH ? `${text.slice(0, MAX_LABEL_LENGTH - 1)}…` : text;

export const nodeLabel = (node: GraphNode): string => {
  if (node.name !== "") {
    return truncate(node.name);
  }
  return node.labels.length > 0 ? truncate(node.labels.join(", ")) : "(unnamed)";
};

export const edgeLabel = (edge: GraphEdge): string =>
  edge.fact === "" ? "(no fact)" : truncate(edge.fact);

/**
 * Plan the deletion of every isolated node or dangling edge of a graph,
 * from a snapshot read now.
 *
 * @throws SnapshotFetchError when the graph cannot be read completely
 */
export const planIsolatedDeletion = async (
  client: GraphClient,
  kind: GraphItemKind,
  graphId?: string,
): Promise<DeletionPlan> => {
  const snapshot = await client.fetchSnapshot(graphId);
  const report = analyzeIsolation(snapshot);
  const candidates: DeletionCandidate[] =
    kind === "node"
      ? report.isolatedNodes.map((node) => ({ uuid: node.uuid, label: nodeLabel(node) }))
      : report.danglingEdges.map((edge) => ({ uuid: edge.uuid, label: edgeLabel(edge) }));
  return { kind, scope: "isolated", graphId: snapshot.graphId, candidates };
};

/**
 * Plan the deletion of one explicitly requested node or edge.
 */
export const planSingleDeletion = (
  kind: GraphItemKind,
  uuid: string,
  graphId?: string,
): DeletionPlan => ({
  kind,
  scope: "single",
  graphId,
  candidates: [{ uuid, label: "requested by uuid" }],
});
