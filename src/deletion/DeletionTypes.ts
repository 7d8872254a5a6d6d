import type { GraphItemKind } from "../graph/Types.js";

/** Something the executor may delete, with a short label for previews. */
export interface DeletionCandidate {
  uuid: string;
  label: string;
}

/**
 * Candidate set of one deletion run.
 * `single` plans hold one explicitly requested uuid; `isolated` plans hold
 * the isolated nodes or dangling edges of a fresh snapshot.
 */
export interface DeletionPlan {
  kind: GraphItemKind;
  scope: "single" | "isolated";
  /** Graph the candidates belong to, when known */
  graphId?: string;
  candidates: DeletionCandidate[];
}

export type TerminalState = "completed" | "partial" | "aborted";

export type DeletionState = "planned" | "confirmed" | "executing" | TerminalState;

/**
 * - `declined`: the confirmation gate was answered negatively
 * - `cancelled`: an interrupt arrived between two items
 * - `auth`: the API rejected the credentials partway through the run
 */
export type AbortReason = "declined" | "cancelled" | "auth";

export interface DeletionFailure {
  uuid: string;
  reason: string;
}

/**
 * Full account of a run, returned whatever the terminal state.
 */
export interface DeletionSummary {
  kind: GraphItemKind;
  scope: DeletionPlan["scope"];
  state: TerminalState;
  abortReason?: AbortReason;
  /** Error that ended an `auth` abort */
  abortDetail?: string;
  /** Number of candidates in the plan */
  total: number;
  /** Uuids deleted, or found already gone */
  succeeded: string[];
  /** Subset of `succeeded` the remote reported as already gone */
  alreadyGone: string[];
  failed: DeletionFailure[];
  /** Candidates never attempted because the run was cancelled or aborted */
  skipped: number;
  /** Edges removed while working around unsupported node deletion */
  edgesRemoved: number;
  /** States visited, in order */
  transitions: DeletionState[];
}

export interface ConfirmationRequest {
  kind: GraphItemKind;
  scope: DeletionPlan["scope"];
  total: number;
  /** At most MAX_CONFIRMATION_EXAMPLES candidates */
  examples: DeletionCandidate[];
}

/** Resolves true when the user approves the deletion. */
export type Confirmer = (request: ConfirmationRequest) => Promise<boolean>;

export const MAX_CONFIRMATION_EXAMPLES = 5;
