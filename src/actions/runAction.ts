import { analyzeIsolation } from "../analysis/analyzeIsolation.js";
import { isGraphApiError } from "../api/GraphApiError.js";
import type { GraphClient } from "../client/ClientTypes.js";
import { SnapshotFetchError } from "../client/SnapshotFetchError.js";
import type { Action } from "../cli/parseCliArgs.js";
import type { Confirmer, DeletionPlan } from "../deletion/DeletionTypes.js";
import { executeDeletion } from "../deletion/executeDeletion.js";
import { planIsolatedDeletion, planSingleDeletion } from "../deletion/planDeletion.js";
import { ExportFailedError } from "../export/ExportFailedError.js";
import { exportGraph } from "../export/exportGraph.js";
import type { GraphItemKind } from "../graph/Types.js";
import type { JanitorLogger } from "../logging/JanitorLogger.js";
import {
  deletionOutcome,
  formatDanglingEdges,
  formatDeletionSummary,
  formatIsolatedNodes,
  formatOutcome,
  type Outcome,
} from "./formatReport.js";

export const EXIT_CODES = {
  ok: 0,
  failed: 1,
  usage: 2,
  declined: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface ActionRequest {
  action: Action;
  graphId?: string;
  uuid?: string;
  outputPath?: string;
  keepPartial?: boolean;
}

export interface ActionContext {
  client: GraphClient;
  /** Confirmation gate of deletions; null skips it */
  confirm: Confirmer | null;
  logger: JanitorLogger;
  /** Report sink (listings, summaries, outcome line) */
  out: (line: string) => void;
  /** Cancels a deletion run between items */
  signal?: AbortSignal;
  now?: () => Date;
}

export interface ActionResult {
  outcome: Outcome;
  exitCode: ExitCode;
}

const exitCodeOf = (outcome: Outcome, declined: boolean): ExitCode => {
  if (outcome.status === "completed") {
    return EXIT_CODES.ok;
  }
  return declined ? EXIT_CODES.declined : EXIT_CODES.failed;
};

type Finished = { outcome: Outcome; declined: boolean };

const finished = (outcome: Outcome): Finished => ({ outcome, declined: false });

const isOperationalError = (error: unknown): error is Error =>
  error instanceof SnapshotFetchError ||
  error instanceof ExportFailedError ||
  isGraphApiError(error);

const findIsolated = async (
  kind: GraphItemKind,
  request: ActionRequest,
  context: ActionContext,
): Promise<Outcome> => {
  const snapshot = await context.client.fetchSnapshot(request.graphId);
  const report = analyzeIsolation(snapshot);
  const lines =
    kind === "node"
      ? formatIsolatedNodes(snapshot.graphId, report.isolatedNodes)
      : formatDanglingEdges(snapshot.graphId, report.danglingEdges, report.nodeUuids);
  lines.forEach(context.out);
  return { status: "completed" };
};

const deleteItems = async (
  plan: () => Promise<DeletionPlan>,
  context: ActionContext,
): Promise<Finished> => {
  if (!(await context.client.healthCheck())) {
    return finished({ status: "aborted", reason: "health check failed; nothing was deleted" });
  }
  const summary = await executeDeletion(await plan(), {
    client: context.client,
    confirm: context.confirm,
    logger: context.logger,
    signal: context.signal,
  });
  formatDeletionSummary(summary).forEach(context.out);
  return {
    outcome: deletionOutcome(summary),
    declined: summary.abortReason === "declined",
  };
};

const runExport = async (request: ActionRequest, context: ActionContext): Promise<Outcome> => {
  const outputPath = request.outputPath;
  if (outputPath === undefined) {
    throw new Error("export needs an output path");
  }
  const summary = await exportGraph({
    client: context.client,
    graphId: request.graphId,
    outputPath,
    keepPartial: request.keepPartial,
    logger: context.logger,
    now: context.now,
  });
  context.out(
    `Exported ${summary.nodeCount} nodes and ${summary.edgeCount} edges of graph "${summary.graphId}" to ${summary.outputPath}`,
  );
  return { status: "completed" };
};

const requireUuid = (request: ActionRequest): string => {
  if (request.uuid === undefined) {
    throw new Error(`${request.action} needs a uuid`);
  }
  return request.uuid;
};

const dispatch = async (request: ActionRequest, context: ActionContext): Promise<Finished> => {
  const { client } = context;
  switch (request.action) {
    case "find_isolated_nodes":
      return finished(await findIsolated("node", request, context));
    case "find_isolated_edges":
      return finished(await findIsolated("edge", request, context));
    case "delete_node":
    case "delete_edge": {
      const kind = request.action === "delete_node" ? "node" : "edge";
      const uuid = requireUuid(request);
      return deleteItems(async () => planSingleDeletion(kind, uuid, request.graphId), context);
    }
    case "delete_isolated_nodes":
      return deleteItems(() => planIsolatedDeletion(client, "node", request.graphId), context);
    case "delete_isolated_edges":
      return deleteItems(() => planIsolatedDeletion(client, "edge", request.graphId), context);
    case "export":
      return finished(await runExport(request, context));
  }
};

/**
 * Run one CLI action and print its report, ending with the outcome line.
 *
 * Read failures, export failures and authentication failures end the run
 * as aborted; any other error propagates.
 */
export const runAction = async (
  request: ActionRequest,
  context: ActionContext,
): Promise<ActionResult> => {
  let result: Finished;
  try {
    result = await dispatch(request, context);
  } catch (error) {
    if (!isOperationalError(error)) {
      throw error;
    }
    context.logger.error(error.message);
    result = finished({ status: "aborted", reason: error.message });
  }
  context.out(formatOutcome(result.outcome));
  return { outcome: result.outcome, exitCode: exitCodeOf(result.outcome, result.declined) };
};
