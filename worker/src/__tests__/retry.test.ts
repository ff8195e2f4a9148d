import { describe, expect, it, vi } from "vitest";
import { AttemptResult, decideRetry, runWithRetry } from "../services/retry";

describe("decideRetry", () => {
  it("returns the value of a successful attempt", () => {
    expect(decideRetry({ kind: "ok", value: 42 }, 1, 3)).toEqual({
      action: "return",
      value: 42,
    });
  });

  it("fails immediately on a terminal result, whatever the budget", () => {
    const cause = new Error("bad status");
    expect(decideRetry({ kind: "terminal", cause }, 1, 3)).toEqual({
      action: "fail",
      cause,
    });
  });

  it("retries a transient result while attempts remain", () => {
    const cause = new Error("reset");
    expect(decideRetry({ kind: "transient", cause }, 2, 3)).toEqual({
      action: "retry",
      cause,
    });
  });

  it("reports exhaustion on the last transient attempt", () => {
    const cause = new Error("reset");
    expect(decideRetry({ kind: "transient", cause }, 3, 3)).toEqual({
      action: "exhausted",
      cause,
    });
  });
});

describe("runWithRetry", () => {
  it("stops after exactly maxAttempts transient failures", async () => {
    const operation = vi.fn(
      async (): Promise<AttemptResult<string>> => ({
        kind: "transient",
        cause: new Error("reset"),
      }),
    );
    const onRetry = vi.fn();

    await expect(
      runWithRetry(operation, {
        maxAttempts: 3,
        onRetry,
        onExhausted: (attempts) => new Error(`gave up after ${attempts}`),
      }),
    ).rejects.toThrow("gave up after 3");

    expect(operation).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(([attempt]) => attempt)).toEqual([2, 3]);
  });

  it("throws the terminal cause without further attempts", async () => {
    const terminal = new Error("checksum mismatch");
    const operation = vi.fn(
      async (): Promise<AttemptResult<string>> => ({ kind: "terminal", cause: terminal }),
    );

    await expect(
      runWithRetry(operation, {
        maxAttempts: 3,
        onExhausted: () => new Error("unexpected"),
      }),
    ).rejects.toBe(terminal);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("returns once a later attempt succeeds", async () => {
    const results: AttemptResult<string>[] = [
      { kind: "transient", cause: new Error("timeout") },
      { kind: "ok", value: "done" },
    ];
    const operation = vi.fn(async (attempt: number) => results[attempt - 1]);

    await expect(
      runWithRetry(operation, { maxAttempts: 3, onExhausted: () => new Error("no") }),
    ).resolves.toBe("done");
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it("rejects a budget below one attempt", async () => {
    await expect(
      runWithRetry<number>(async () => ({ kind: "ok", value: 1 }), {
        maxAttempts: 0,
        onExhausted: () => new Error("no"),
      }),
    ).rejects.toBeInstanceOf(RangeError);
  });
});
