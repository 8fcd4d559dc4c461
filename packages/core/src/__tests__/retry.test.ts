import { describe, it, expect, vi } from "vitest";
import { callCollaborator, computeBackoff, retryAsync, sleepWithAbort, withTimeout } from "../retry.js";
import { CollaboratorError, CollaboratorTimeoutError } from "../errors.js";

const NO_DELAY = { initialMs: 1, jitter: 0 };

function transient(message: string): Error {
  return Object.assign(new Error(message), { code: "ECONNRESET" });
}

describe("computeBackoff", () => {
  it("grows by the factor per attempt", () => {
    const policy = { initialMs: 100, factor: 3, jitter: 0 };
    expect([1, 2, 3].map((attempt) => computeBackoff(policy, attempt))).toEqual([100, 300, 900]);
  });

  it("caps at maxMs", () => {
    expect(computeBackoff({ initialMs: 100, maxMs: 250, jitter: 0 }, 5)).toBe(250);
  });

  it("adds jitter proportional to the base delay", () => {
    expect(computeBackoff({ initialMs: 1_000, jitter: 0.5 }, 1, () => 0.5)).toBe(1_250);
  });
});

describe("sleepWithAbort", () => {
  it("resolves after the delay", async () => {
    await expect(sleepWithAbort(5)).resolves.toBeUndefined();
  });

  it("rejects with the abort reason", async () => {
    const controller = new AbortController();
    const reason = new Error("stop");
    const promise = sleepWithAbort(5_000, controller.signal);
    controller.abort(reason);
    await expect(promise).rejects.toBe(reason);
  });

  it("rejects straight away on an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleepWithAbort(5_000, controller.signal)).rejects.toThrow();
  });
});

describe("retryAsync", () => {
  it("passes the attempt number and stops on success", async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error(`fail ${attempt}`);
      return "ok";
    });
    await expect(retryAsync(fn, { maxAttempts: 3, backoff: NO_DELAY })).resolves.toBe("ok");
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
  });

  it("rethrows the last error once attempts run out", async () => {
    const fn = vi.fn(async () => {
      throw new Error("always");
    });
    await expect(retryAsync(fn, { maxAttempts: 2, backoff: NO_DELAY })).rejects.toThrow("always");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("stops when shouldRetry declines", async () => {
    const fn = vi.fn(async () => {
      throw new Error("permanent");
    });
    await expect(retryAsync(fn, { maxAttempts: 5, backoff: NO_DELAY, shouldRetry: () => false })).rejects.toThrow(
      "permanent",
    );
    expect(fn).toHaveBeenCalledOnce();
  });

  it("gives up when the signal aborts between attempts", async () => {
    const controller = new AbortController();
    const fn = vi.fn(async () => {
      controller.abort(new Error("cancelled"));
      throw new Error("fail");
    });
    await expect(
      retryAsync(fn, { maxAttempts: 3, backoff: { initialMs: 1_000 }, signal: controller.signal }),
    ).rejects.toThrow("cancelled");
    expect(fn).toHaveBeenCalledOnce();
  });
});

describe("withTimeout", () => {
  it("returns the result inside the deadline", async () => {
    await expect(withTimeout("prices", 1_000, async () => 42)).resolves.toBe(42);
  });

  it("rejects with CollaboratorTimeoutError and aborts the signal", async () => {
    let seen: AbortSignal | undefined;
    const call = withTimeout("fees", 20, (signal) => {
      seen = signal;
      return new Promise<never>(() => {});
    });
    await expect(call).rejects.toBeInstanceOf(CollaboratorTimeoutError);
    expect(seen?.aborted).toBe(true);
  });
});

describe("callCollaborator", () => {
  it("retries transient failures", async () => {
    let calls = 0;
    const fn = vi.fn(async (_signal: AbortSignal) => {
      calls += 1;
      if (calls === 1) throw transient("reset");
      return "60000";
    });
    await expect(callCollaborator("prices", fn, { timeoutMs: 1_000, maxAttempts: 2, backoff: NO_DELAY })).resolves.toBe(
      "60000",
    );
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry a permanent failure", async () => {
    const fn = vi.fn(async (_signal: AbortSignal): Promise<string> => {
      throw new CollaboratorError("prices", "No price for XYZ", "UNKNOWN_CURRENCY");
    });
    await expect(callCollaborator("prices", fn, { timeoutMs: 1_000, maxAttempts: 3, backoff: NO_DELAY })).rejects.toThrow(
      "No price for XYZ",
    );
    expect(fn).toHaveBeenCalledOnce();
  });
});
