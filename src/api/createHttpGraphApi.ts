import { readField, readString } from "../graph/readField.js";
import type { GraphApi, GraphPage, PageRequest } from "./GraphApi.js";
import { describeError, GraphApiError, kindFromStatus } from "./GraphApiError.js";

export interface HttpGraphApiOptions {
  /** API root, e.g. https://api.getzep.com/api/v2 */
  baseUrl: string;
  apiKey: string;
  /** Per-request timeout in ms */
  requestTimeoutMs: number;
  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}

type Collection = "nodes" | "edges";

const MAX_ERROR_DETAIL_LENGTH = 200;

const readErrorDetail = async (response: Response): Promise<string> => {
  const text = await response.text().catch(() => "");
  if (text.trim() === "") {
    return "";
  }
  let detail = text;
  try {
    const parsed: unknown = JSON.parse(text);
    detail = readString(parsed, ["message", "error", "detail"], text);
  } catch {
    // Plain-text error body
    detail = text;
  }
  return detail.trim().slice(0, MAX_ERROR_DETAIL_LENGTH);
};

/**
 * Create a GraphApi backed by a Zep-compatible REST API.
 *
 * Every failure is a GraphApiError: network errors and timeouts become
 * `connection`, failed responses are classified by status.
 *
 * @example
 * const api = createHttpGraphApi({
 *   baseUrl: "https://api.getzep.com/api/v2",
 *   apiKey: process.env.GRAPH_JANITOR_API_KEY ?? "",
 *   requestTimeoutMs: 30_000,
 * });
 */
export const createHttpGraphApi = (options: HttpGraphApiOptions): GraphApi => {
  const baseUrl = options.baseUrl.replace(/\/+$/, "");
  const fetchFn = options.fetch ?? fetch;

  const send = async (
    method: "GET" | "POST" | "DELETE",
    path: string,
    body?: unknown,
  ): Promise<Response> => {
    const headers: Record<string, string> = {
      Authorization: `Api-Key ${options.apiKey}`,
      Accept: "application/json",
    };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    let response: Response;
    try {
      response = await fetchFn(`${baseUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(options.requestTimeoutMs),
      });
    } catch (error) {
      throw new GraphApiError(
        "connection",
        `${method} ${path} failed: ${describeError(error)}`,
        { cause: error },
      );
    }

    if (!response.ok) {
      const detail = await readErrorDetail(response);
      throw new GraphApiError(
        kindFromStatus(response.status),
        detail === ""
          ? `${method} ${path} failed`
          : `${method} ${path} failed: ${detail}`,
        { status: response.status },
      );
    }
    return response;
  };

  const readJson = async (response: Response, path: string): Promise<unknown> => {
    const text = await response.text();
    if (text.trim() === "") {
      return null;
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      // A truncated body must not pass for a short page
      throw new GraphApiError("server", `${path} returned a malformed body`, {
        status: response.status,
        cause: error,
      });
    }
  };

  /**
   * Items of a list response. A body the client cannot read as a page is an
   * error: taking it for an empty last page would truncate the snapshot.
   */
  const extractItems = (
    body: unknown,
    collection: Collection,
    path: string,
    status: number,
  ): unknown[] => {
    if (Array.isArray(body)) {
      return body;
    }
    if (body === null) {
      throw new GraphApiError("incompatible", `${path} returned an empty body`, { status });
    }
    for (const name of [collection, "items", "data"]) {
      const value = readField(body, name, undefined);
      if (Array.isArray(value)) {
        return value;
      }
    }
    throw new GraphApiError(
      "incompatible",
      `${path} returned an unrecognised ${collection} page`,
      { status },
    );
  };

  const listPage = async (
    collection: Collection,
    graphId: string,
    request: PageRequest,
  ): Promise<GraphPage> => {
    const segment = collection === "nodes" ? "node" : "edge";
    const path = `/graph/${segment}/graph/${encodeURIComponent(graphId)}`;
    const response = await send("POST", path, {
      limit: request.limit,
      ...(request.cursor === undefined ? {} : { uuid_cursor: request.cursor }),
    });
    const body = await readJson(response, path);
    const items = extractItems(body, collection, path, response.status);

    const explicitCursor = readString(body, ["next_cursor", "nextCursor"], "");
    if (explicitCursor !== "") {
      return { items, nextCursor: explicitCursor };
    }
    if (items.length < request.limit) {
      return { items };
    }
    const lastUuid = readString(items[items.length - 1], ["uuid", "uuid_", "id"], "");
    if (lastUuid === "") {
      throw new GraphApiError(
        "incompatible",
        `${path} returned a full page whose last record has no uuid to continue from`,
        { status: response.status },
      );
    }
    return { items, nextCursor: lastUuid };
  };

  /** Reads a response body nobody needs so its connection is released. */
  const discard = async (response: Response, method: string, path: string): Promise<void> => {
    try {
      await response.text();
    } catch (error) {
      throw new GraphApiError(
        "connection",
        `${method} ${path} failed while reading the response: ${describeError(error)}`,
        { cause: error },
      );
    }
  };

  return {
    listNodes: (graphId, request) => listPage("nodes", graphId, request),

    listEdges: (graphId, request) => listPage("edges", graphId, request),

    async deleteNode(uuid) {
      const path = `/graph/node/${encodeURIComponent(uuid)}`;
      await discard(await send("DELETE", path), "DELETE", path);
    },

    async deleteEdge(uuid) {
      const path = `/graph/edge/${encodeURIComponent(uuid)}`;
      await discard(await send("DELETE", path), "DELETE", path);
    },

    async healthCheck() {
      const path = "/graph/list-all?pageSize=1";
      await discard(await send("GET", path), "GET", path);
    },
  };
};
