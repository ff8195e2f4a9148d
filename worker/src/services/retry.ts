/**
 * Bounded-attempt retry over tagged results.
 *
 * Operations never throw for expected failures; they classify the outcome as
 * `ok`, `transient` or `terminal` and `decideRetry` turns that into an action.
 */

export type AttemptResult<T> =
  | { kind: "ok"; value: T }
  | { kind: "transient"; cause: unknown }
  | { kind: "terminal"; cause: unknown };

export type RetryDecision<T> =
  | { action: "return"; value: T }
  | { action: "retry"; cause: unknown }
  | { action: "fail"; cause: unknown }
  | { action: "exhausted"; cause: unknown };

export interface RetryOptions {
  maxAttempts: number;
  /** Delay before the second attempt; later attempts multiply it. */
  delayMs?: number;
  backoffMultiplier?: number;
  /** Called before each retry, with the attempt number about to run. */
  onRetry?: (nextAttempt: number, cause: unknown) => void;
  /** Builds the error thrown once every attempt failed transiently. */
  onExhausted: (attempts: number, cause: unknown) => Error;
}

/**
 * @param attempt - 1-based number of the attempt that produced `result`
 */
export function decideRetry<T>(
  result: AttemptResult<T>,
  attempt: number,
  maxAttempts: number,
): RetryDecision<T> {
  switch (result.kind) {
    case "ok":
      return { action: "return", value: result.value };
    case "terminal":
      return { action: "fail", cause: result.cause };
    case "transient":
      return attempt < maxAttempts
        ? { action: "retry", cause: result.cause }
        : { action: "exhausted", cause: result.cause };
  }
}

export async function runWithRetry<T>(
  operation: (attempt: number) => Promise<AttemptResult<T>>,
  options: RetryOptions,
): Promise<T> {
  const { maxAttempts, delayMs = 0, backoffMultiplier = 1 } = options;
  if (maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be at least 1, got ${maxAttempts}`);
  }

  for (let attempt = 1; ; attempt++) {
    const decision = decideRetry(await operation(attempt), attempt, maxAttempts);

    switch (decision.action) {
      case "return":
        return decision.value;
      case "fail":
        throw decision.cause;
      case "exhausted":
        throw options.onExhausted(attempt, decision.cause);
      case "retry":
        options.onRetry?.(attempt + 1, decision.cause);
        if (delayMs > 0) {
          await sleep(delayMs * backoffMultiplier ** (attempt - 1));
        }
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
