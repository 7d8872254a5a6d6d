import { missingEndpoints } from "../analysis/analyzeIsolation.js";
import { edgeLabel, nodeLabel } from "../deletion/planDeletion.js";
import type { DeletionSummary } from "../deletion/DeletionTypes.js";
import type { GraphEdge, GraphNode } from "../graph/Types.js";

/**
 * How a run ended, as printed on the last line of its output.
 */
export type Outcome =
  | { status: "completed" }
  | { status: "partial" }
  | { status: "aborted"; reason: string };

export const formatOutcome = (outcome: Outcome): string => {
  switch (outcome.status) {
    case "completed":
      return "Outcome: COMPLETED";
    case "partial":
      return "Outcome: PARTIAL";
    case "aborted":
      return `Outcome: ABORTED (${outcome.reason})`;
  }
};

/**
 * Format the isolated nodes of a graph.
 *
 * Output format:
 * ```
 * Found 2 isolated nodes (nodes with no connections) in graph "kb":
 * 1. UUID: n1, Type: Person, Name: Alice
 * 2. UUID: n7, Type: -, Name: (unnamed)
 * ```
 */
export const formatIsolatedNodes = (graphId: string, nodes: readonly GraphNode[]): string[] => {
  if (nodes.length === 0) {
    return [`No isolated nodes found in graph "${graphId}".`];
  }
  const lines = [
    `Found ${nodes.length} isolated nodes (nodes with no connections) in graph "${graphId}":`,
  ];
  nodes.forEach((node, index) => {
    const type = node.labels.length > 0 ? node.labels.join(", ") : "-";
    lines.push(`${index + 1}. UUID: ${node.uuid}, Type: ${type}, Name: ${nodeLabel(node)}`);
  });
  return lines;
};

/**
 * Format the dangling edges of a graph, with the state of both endpoints.
 *
 * Output format:
 * ```
 * Found 1 dangling edges (edges with missing source/target nodes) in graph "kb":
 * 1. UUID: e4, Fact: Bob works at Acme
 *    Source: n2 (exists)
 *    Target: n9 (missing)
 * ```
 */
export const formatDanglingEdges = (
  graphId: string,
  edges: readonly GraphEdge[],
  nodeUuids: ReadonlySet<string>,
): string[] => {
  if (edges.length === 0) {
    return [`No dangling edges found in graph "${graphId}".`];
  }
  const lines = [
    `Found ${edges.length} dangling edges (edges with missing source/target nodes) in graph "${graphId}":`,
  ];
  edges.forEach((edge, index) => {
    const missing = missingEndpoints(edge, nodeUuids);
    const endpoint = (uuid: string, side: "source" | "target"): string =>
      `${uuid === "" ? "(none)" : uuid} (${missing.includes(side) ? "missing" : "exists"})`;
    lines.push(`${index + 1}. UUID: ${edge.uuid}, Fact: ${edgeLabel(edge)}`);
    lines.push(`   Source: ${endpoint(edge.sourceUuid, "source")}`);
    lines.push(`   Target: ${endpoint(edge.targetUuid, "target")}`);
  });
  return lines;
};

/**
 * Format the account of a deletion run. Failed items are listed with their
 * reason.
 *
 * Output format:
 * ```
 * Deleted 3 of 4 nodes (1 already gone, 2 connected edges removed first)
 * Failed to delete 1 nodes:
 *   n4: locked (HTTP 423)
 * ```
 */
export const formatDeletionSummary = (summary: DeletionSummary): string[] => {
  const kinds = `${summary.kind}s`;
  if (summary.state === "aborted" && summary.abortReason === "declined") {
    return [`Deletion declined; no ${kinds} were deleted.`];
  }

  const details: string[] = [];
  if (summary.alreadyGone.length > 0) {
    details.push(`${summary.alreadyGone.length} already gone`);
  }
  if (summary.edgesRemoved > 0) {
    details.push(`${summary.edgesRemoved} connected edges removed first`);
  }
  const lines = [
    `Deleted ${summary.succeeded.length} of ${summary.total} ${kinds}${details.length > 0 ? ` (${details.join(", ")})` : ""}`,
  ];
  if (summary.skipped > 0) {
    lines.push(`${summary.skipped} ${kinds} were not attempted.`);
  }
  if (summary.failed.length > 0) {
    lines.push(`Failed to delete ${summary.failed.length} ${kinds}:`);
    for (const failure of summary.failed) {
      lines.push(`  ${failure.uuid}: ${failure.reason}`);
    }
  }
  return lines;
};

const abortDescription = (summary: DeletionSummary): string => {
  switch (summary.abortReason) {
    case "cancelled":
      return "cancelled by user";
    case "auth":
      return `authentication failed: ${summary.abortDetail ?? "credentials rejected"}`;
    case "declined":
    case undefined:
      return "declined by user";
  }
};

/** Terminal state of a deletion run as an outcome. */
export const deletionOutcome = (summary: DeletionSummary): Outcome => {
  switch (summary.state) {
    case "completed":
      return { status: "completed" };
    case "partial":
      return { status: "partial" };
    case "aborted":
      return { status: "aborted", reason: abortDescription(summary) };
  }
};
