import { describe, expect, it } from "vitest";
import { createHttpGraphApi } from "./createHttpGraphApi.js";
import { GraphApiError } from "./GraphApiError.js";

interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: unknown;
}

/**
 * Fetch stand-in that answers from a queue and records every request.
 */
const createQueuedFetch = (responses: Array<Response | Error>) => {
  const requests: RecordedRequest[] = [];
  const fetchFn: typeof fetch = async (input, init) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    requests.push({
      url: String(input),
      method: init?.method ?? "GET",
      headers,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    });
    const next = responses.shift();
    if (next === undefined) {
      throw new Error("unexpected request");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  };
  return { fetchFn, requests };
};

const json = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });

const createApi = (responses: Array<Response | Error>) => {
  const { fetchFn, requests } = createQueuedFetch(responses);
  const api = createHttpGraphApi({
    baseUrl: "https://graph.example.test/api/v2/",
    apiKey: "test-secret",
    requestTimeoutMs: 1_000,
    fetch: fetchFn,
  });
  return { api, requests };
};

const captureError = async (promise: Promise<unknown>): Promise<GraphApiError> => {
  try {
    await promise;
  } catch (error) {
    if (error instanceof GraphApiError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a GraphApiError");
};

describe(createHttpGraphApi.name, () => {
  describe("listNodes", () => {
    it("posts the page request with credentials", async () => {
      const { api, requests } = createApi([json([{ uuid: "n1" }])]);

      await api.listNodes("support kb", { limit: 2 });

      expect(requests).toEqual([
        {
          url: "https://graph.example.test/api/v2/graph/node/graph/support%20kb",
          method: "POST",
          headers: {
            authorization: "Api-Key test-secret",
            accept: "application/json",
            "content-type": "application/json",
          },
          body: { limit: 2 },
        },
      ]);
    });

    it("sends the cursor of the previous page", async () => {
      const { api, requests } = createApi([json([])]);

      await api.listNodes("kb", { limit: 2, cursor: "n2" });

      expect(requests[0]?.body).toEqual({ limit: 2, uuid_cursor: "n2" });
    });

    it("derives the next cursor from the last record of a full page", async () => {
      const { api } = createApi([json([{ uuid: "n1" }, { uuid: "n2" }])]);

      const page = await api.listNodes("kb", { limit: 2 });

      expect(page).toEqual({ items: [{ uuid: "n1" }, { uuid: "n2" }], nextCursor: "n2" });
    });

    it("returns no cursor for a short page", async () => {
      const { api } = createApi([json([{ uuid: "n1" }])]);

      const page = await api.listNodes("kb", { limit: 2 });

      expect(page.nextCursor).toBeUndefined();
    });

    it("unwraps an object-shaped response and its explicit cursor", async () => {
      const { api } = createApi([
        json({ nodes: [{ uuid: "n1" }], next_cursor: "opaque-token" }),
      ]);

      const page = await api.listNodes("kb", { limit: 5 });

      expect(page).toEqual({ items: [{ uuid: "n1" }], nextCursor: "opaque-token" });
    });

    it("rejects an empty body instead of ending the read", async () => {
      const { api } = createApi([new Response("", { status: 200 })]);

      const error = await captureError(api.listNodes("kb", { limit: 5 }));

      expect(error.kind).toBe("incompatible");
      expect(error.transient).toBe(false);
      expect(error.message).toBe("/graph/node/graph/kb returned an empty body");
    });

    it("rejects a null body", async () => {
      const { api } = createApi([json(null)]);

      const error = await captureError(api.listEdges("kb", { limit: 5 }));

      expect(error.message).toBe("/graph/edge/graph/kb returned an empty body");
    });

    it("rejects an unknown page wrapper", async () => {
      const { api } = createApi([
        json({ results: [{ uuid: "e1", source_node_uuid: "a", target_node_uuid: "b" }] }),
      ]);

      const error = await captureError(api.listEdges("kb", { limit: 5 }));

      expect(error.kind).toBe("incompatible");
      expect(error.message).toBe("/graph/edge/graph/kb returned an unrecognised edges page");
      expect(error.status).toBe(200);
    });

    it("rejects a full page it cannot continue from", async () => {
      const { api } = createApi([json([{ uuid: "n1" }, { name: "no uuid" }])]);

      const error = await captureError(api.listNodes("kb", { limit: 2 }));

      expect(error.kind).toBe("incompatible");
      expect(error.message).toBe(
        "/graph/node/graph/kb returned a full page whose last record has no uuid to continue from",
      );
    });

    it("accepts a short page whose last record has no uuid", async () => {
      const { api } = createApi([json([{ name: "no uuid" }])]);

      expect(await api.listNodes("kb", { limit: 2 })).toEqual({ items: [{ name: "no uuid" }] });
    });

    it("rejects a malformed body as a server error", async () => {
      const { api } = createApi([new Response("[{\"uuid\":", { status: 200 })]);

      const error = await captureError(api.listNodes("kb", { limit: 5 }));

      expect(error.kind).toBe("server");
      expect(error.transient).toBe(true);
    });
  });

  describe("listEdges", () => {
    it("reads the edge collection", async () => {
      const { api, requests } = createApi([json({ edges: [{ uuid: "e1" }] })]);

      const page = await api.listEdges("kb", { limit: 10 });

      expect(requests[0]?.url).toBe("https://graph.example.test/api/v2/graph/edge/graph/kb");
      expect(page.items).toEqual([{ uuid: "e1" }]);
    });
  });

  describe("deletes", () => {
    it("sends DELETE for a node", async () => {
      const response = json({ message: "deleted" });
      const { api, requests } = createApi([response]);

      await api.deleteNode("n1");

      expect(response.bodyUsed).toBe(true);
      expect(requests[0]?.method).toBe("DELETE");
      expect(requests[0]?.url).toBe("https://graph.example.test/api/v2/graph/node/n1");
    });

    it("sends DELETE for an edge", async () => {
      const { api, requests } = createApi([new Response(null, { status: 204 })]);

      await api.deleteEdge("e1");

      expect(requests[0]?.url).toBe("https://graph.example.test/api/v2/graph/edge/e1");
    });

    it.each([
      [404, "not-found"],
      [401, "auth"],
      [403, "auth"],
      [405, "unsupported"],
      [501, "unsupported"],
      [502, "server"],
      [422, "client"],
    ] as const)("classifies HTTP %i as %s", async (status, kind) => {
      const { api } = createApi([json({ message: "nope" }, status)]);

      const error = await captureError(api.deleteNode("n1"));

      expect(error.kind).toBe(kind);
      expect(error.status).toBe(status);
    });

    it("includes the error message of the response", async () => {
      const { api } = createApi([json({ message: "node not found" }, 404)]);

      const error = await captureError(api.deleteEdge("e9"));

      expect(error.message).toBe("DELETE /graph/edge/e9 failed: node not found");
    });

    it("maps a network failure to a connection error", async () => {
      const { api } = createApi([new TypeError("fetch failed")]);

      const error = await captureError(api.deleteEdge("e1"));

      expect(error.kind).toBe("connection");
      expect(error.message).toBe("DELETE /graph/edge/e1 failed: fetch failed");
    });
  });

  describe("healthCheck", () => {
    it("checks health through the graph listing", async () => {
      const response = json({ graphs: [] });
      const { api, requests } = createApi([response]);

      await api.healthCheck();

      expect(response.bodyUsed).toBe(true);
      expect(requests[0]?.url).toBe("https://graph.example.test/api/v2/graph/list-all?pageSize=1");
      expect(requests[0]?.method).toBe("GET");
    });
  });
});
