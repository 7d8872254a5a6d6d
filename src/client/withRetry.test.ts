import { describe, expect, it } from "vitest";
import { GraphApiError } from "../api/GraphApiError.js";
import { backoffDelay, type RetryPolicy, withRetry } from "./withRetry.js";

const policy: RetryPolicy = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 250 };

const createScript = (steps: Array<string | Error>) => {
  let calls = 0;
  const operation = async (): Promise<string> => {
    const step = steps[calls];
    calls++;
    if (step === undefined) {
      throw new Error("script exhausted");
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  };
  return { operation, calls: () => calls };
};

const recordSleeps = () => {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
};

describe(backoffDelay.name, () => {
  it("doubles per attempt up to the cap", () => {
    expect(backoffDelay(policy, 1)).toBe(100);
    expect(backoffDelay(policy, 2)).toBe(200);
    expect(backoffDelay(policy, 3)).toBe(250);
  });
});

describe(withRetry.name, () => {
  it("returns the first successful result without waiting", async () => {
    const script = createScript(["ok"]);
    const { delays, sleep } = recordSleeps();

    expect(await withRetry(script.operation, { policy, sleep })).toBe("ok");
    expect(script.calls()).toBe(1);
    expect(delays).toEqual([]);
  });

  it("retries connection and server errors with backoff", async () => {
    const script = createScript([
      new GraphApiError("connection", "timeout"),
      new GraphApiError("server", "bad gateway", { status: 502 }),
      "ok",
    ]);
    const { delays, sleep } = recordSleeps();

    expect(await withRetry(script.operation, { policy, sleep })).toBe("ok");
    expect(script.calls()).toBe(3);
    expect(delays).toEqual([100, 200]);
  });

  it("gives up after the maximum number of attempts", async () => {
    const script = createScript([
      new GraphApiError("server", "down 1", { status: 503 }),
      new GraphApiError("server", "down 2", { status: 503 }),
      new GraphApiError("server", "down 3", { status: 503 }),
      "never reached",
    ]);
    const { sleep } = recordSleeps();

    await expect(withRetry(script.operation, { policy, sleep })).rejects.toThrow("down 3");
    expect(script.calls()).toBe(3);
  });

  it.each(["auth", "client", "not-found", "unsupported"] as const)(
    "does not retry %s errors",
    async (kind) => {
      const script = createScript([new GraphApiError(kind, "refused"), "ok"]);
      const { delays, sleep } = recordSleeps();

      await expect(withRetry(script.operation, { policy, sleep })).rejects.toThrow("refused");
      expect(script.calls()).toBe(1);
      expect(delays).toEqual([]);
    },
  );

  it("does not retry errors foreign to the API", async () => {
    const script = createScript([new RangeError("bug"), "ok"]);
    const { sleep } = recordSleeps();

    await expect(withRetry(script.operation, { policy, sleep })).rejects.toThrow("bug");
    expect(script.calls()).toBe(1);
  });

  it("reports each retry", async () => {
    const script = createScript([new GraphApiError("connection", "timeout"), "ok"]);
    const { sleep } = recordSleeps();
    const retries: Array<[number, number, string]> = [];

    await withRetry(script.operation, {
      policy,
      sleep,
      onRetry: (attempt, delayMs, error) => retries.push([attempt, delayMs, error.message]),
    });

    expect(retries).toEqual([[1, 100, "timeout"]]);
  });
});
