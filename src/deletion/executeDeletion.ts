import { describeError, isGraphApiError } from "../api/GraphApiError.js";
import type { DeleteOutcome, GraphClient } from "../client/ClientTypes.js";
import type { JanitorLogger } from "../logging/JanitorLogger.js";
import {
  type AbortReason,
  type Confirmer,
  type DeletionFailure,
  type DeletionPlan,
  type DeletionState,
  type DeletionSummary,
  MAX_CONFIRMATION_EXAMPLES,
} from "./DeletionTypes.js";

export interface ExecuteDeletionOptions {
  client: GraphClient;
  /** Confirmation gate; null skips it */
  confirm: Confirmer | null;
  logger: JanitorLogger;
  /** Checked between items; an in-flight delete always finishes */
  signal?: AbortSignal;
  onTransition?: (state: DeletionState) => void;
}

/**
 * Drive a plan through planned → confirmed → executing → completed | partial,
 * or to aborted when the gate is declined or the run is cancelled.
 *
 * Items are deleted one at a time; a failed item is recorded and the run
 * goes on. Nothing is retried at this level (the client retries per item)
 * and nothing is rolled back. An authentication failure ends the run as
 * aborted; the summary still lists what was deleted before it.
 *
 * @example
 * const summary = await executeDeletion(plan, { client, confirm, logger });
 * if (summary.state === "partial") {
 *   for (const { uuid, reason } of summary.failed) logger.error(`${uuid}: ${reason}`);
 * }
 */
export const executeDeletion = async (
  plan: DeletionPlan,
  options: ExecuteDeletionOptions,
): Promise<DeletionSummary> => {
  const { client, logger, signal } = options;
  const total = plan.candidates.length;
  const transitions: DeletionState[] = [];
  const succeeded: string[] = [];
  const alreadyGone: string[] = [];
  const failed: DeletionFailure[] = [];
  let skipped = 0;
  let edgesRemoved = 0;

  const move = (state: DeletionState): void => {
    transitions.push(state);
    options.onTransition?.(state);
  };

  const finish = (abortReason?: AbortReason, abortDetail?: string): DeletionSummary => {
    const state =
      abortReason !== undefined ? "aborted" : failed.length === 0 ? "completed" : "partial";
    move(state);
    return {
      kind: plan.kind,
      scope: plan.scope,
      state,
      abortReason,
      abortDetail,
      total,
      succeeded,
      alreadyGone,
      failed,
      skipped,
      edgesRemoved,
      transitions,
    };
  };

  move("planned");
  if (total === 0) {
    logger.info(`No ${plan.kind}s to delete`);
    return finish();
  }

  if (options.confirm !== null) {
    const approved = await options.confirm({
      kind: plan.kind,
      scope: plan.scope,
      total,
      examples: plan.candidates.slice(0, MAX_CONFIRMATION_EXAMPLES),
    });
    if (!approved) {
      logger.info(`Deletion of ${plan.kind}s declined; nothing was deleted`);
      return finish("declined");
    }
  }
  move("confirmed");

  move("executing");
  logger.startProgress(total, `Deleting ${plan.kind}s`);
  for (const [index, candidate] of plan.candidates.entries()) {
    if (signal?.aborted) {
      skipped = total - index;
      logger.warn(`Cancelled: ${skipped} ${plan.kind}s were not attempted`);
      return finish("cancelled");
    }

    let outcome: DeleteOutcome;
    try {
      outcome =
        plan.kind === "node"
          ? await client.deleteNode(candidate.uuid, plan.graphId)
          : await client.deleteEdge(candidate.uuid);
    } catch (error) {
      if (!isGraphApiError(error, "auth")) {
        throw error;
      }
      const reason = describeError(error);
      failed.push({ uuid: candidate.uuid, reason });
      skipped = total - index - 1;
      logger.completeProgress(
        `Deleted ${succeeded.length} of ${total} ${plan.kind}s before authentication failed`,
      );
      return finish("auth", reason);
    }

    edgesRemoved += outcome.edgesRemoved ?? 0;
    if (outcome.status === "success") {
      succeeded.push(candidate.uuid);
      if (outcome.alreadyGone) {
        alreadyGone.push(candidate.uuid);
      }
    } else {
      failed.push({ uuid: candidate.uuid, reason: outcome.reason });
      logger.debug(`Failed to delete ${plan.kind} ${candidate.uuid}: ${outcome.reason}`);
    }
    logger.updateProgress(index + 1);
  }
  logger.completeProgress(
    `Deleted ${succeeded.length} of ${total} ${plan.kind}s${failed.length > 0 ? ` (${failed.length} failed)` : ""}`,
  );
  return finish();
};
