/**
 * Failure categories of the remote graph API.
 *
 * - `connection`: network unreachable, timeout, aborted request
 * - `server`: HTTP 5xx
 * - `auth`: HTTP 401 / 403
 * - `not-found`: HTTP 404
 * - `unsupported`: HTTP 405 / 501, the operation is not offered by this API
 * - `client`: any other 4xx
 * - `incompatible`: a successful response the client cannot read as the
 *   expected shape (unknown list wrapper, empty body, page without cursor)
 */
export type GraphApiErrorKind =
  | "connection"
  | "server"
  | "auth"
  | "not-found"
  | "unsupported"
  | "client"
  | "incompatible";

const TRANSIENT_KINDS: ReadonlySet<GraphApiErrorKind> = new Set([
  "connection",
  "server",
]);

/**
 * Error raised by every GraphApi implementation.
 * The `kind` drives retry, fallback and abort decisions upstream.
 */
export class GraphApiError extends Error {
  readonly kind: GraphApiErrorKind;
  readonly status: number | undefined;

  constructor(
    kind: GraphApiErrorKind,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "GraphApiError";
    this.kind = kind;
    this.status = options.status;
  }

  /** Whether retrying the same call may succeed */
  get transient(): boolean {
    return TRANSIENT_KINDS.has(this.kind);
  }
}

/**
 * Map an HTTP status of a failed response to an error kind.
 *
 * @example
 * kindFromStatus(503) // "server"
 * kindFromStatus(403) // "auth"
 */
export const kindFromStatus = (status: number): GraphApiErrorKind => {
  if (status === 401 || status === 403) {
    return "auth";
  }
  if (status === 404) {
    return "not-found";
  }
  if (status === 405 || status === 501) {
    return "unsupported";
  }
  if (status >= 500) {
    return "server";
  }
  return "client";
};

export const isGraphApiError = (
  error: unknown,
  kind?: GraphApiErrorKind,
): error is GraphApiError =>
  error instanceof GraphApiError && (kind === undefined || error.kind === kind);

/**
 * One-line description of any thrown value, for logs and failure reasons.
 */
export const describeError = (error: unknown): string => {
  if (error instanceof GraphApiError) {
    return error.status === undefined
      ? error.message
      : `${error.message} (HTTP ${error.status})`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};
