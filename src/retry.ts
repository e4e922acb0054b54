/**
 * Bounded retry with exponential backoff, and per-attempt deadlines
 */

import { setTimeout as delay } from "timers/promises";
import { CredentialError, isRetryable, toCredentialError, type ErrorStage } from "./errors.js";
import type { Clock, RetryPolicy } from "./types.js";

/** Waits `ms`, rejecting with an AbortError if the signal fires */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const systemClock: Clock = { now: () => Date.now() };

export const systemSleep: Sleeper = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 30_000,
  jitterRatio: 0.25,
};

/** Info passed to onRetry before each wait */
export interface RetryEvent {
  /** Attempt that just failed (1-based) */
  attempt: number;
  delayMs: number;
  error: CredentialError;
}

export interface RetryOptions {
  stage: ErrorStage;
  signal?: AbortSignal;
  sleep?: Sleeper;
  /** Returns a value in [0, 1) */
  random?: () => number;
  onRetry?: (event: RetryEvent) => void;
}

/** Backoff before attempt `attempt + 1`, without jitter */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
  return Math.min(exponential, policy.maxDelayMs);
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error, or
 * runs out of attempts. Only RateLimited and TransportFailure are retried.
 * Delays never decrease from one attempt to the next and, jitter
 * included, never exceed `maxDelayMs`.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions
): Promise<T> {
  const sleep = options.sleep ?? systemSleep;
  const random = options.random ?? Math.random;
  let previousDelay = 0;

  for (let attempt = 1; ; attempt++) {
    throwIfCancelled(options.signal, options.stage);

    let error: CredentialError;
    try {
      return await operation(attempt);
    } catch (thrown) {
      error = toCredentialError(thrown, options.stage);
    }

    if (!isRetryable(error.kind) || attempt >= policy.maxAttempts) {
      throw error;
    }

    const backoff = backoffDelay(policy, attempt);
    let delayMs = Math.min(backoff + Math.floor(backoff * policy.jitterRatio * random()), policy.maxDelayMs);

    if (error.retryAfterMs !== undefined) {
      if (error.retryAfterMs > policy.maxDelayMs) {
        throw error.withMessage(
          `${error.message} (platform asked to wait ${Math.ceil(error.retryAfterMs / 1000)}s, longer than the ${Math.ceil(policy.maxDelayMs / 1000)}s limit)`
        );
      }
      delayMs = Math.max(delayMs, error.retryAfterMs);
    }

    delayMs = Math.max(delayMs, previousDelay);
    previousDelay = delayMs;

    options.onRetry?.({ attempt, delayMs, error });

    try {
      await sleep(delayMs, options.signal);
    } catch (thrown) {
      throw toCredentialError(thrown, options.stage);
    }
  }
}

export function throwIfCancelled(signal: AbortSignal | undefined, stage: ErrorStage): void {
  if (signal?.aborted) {
    throw new CredentialError("Cancelled", "operation was cancelled", { stage });
  }
}

/** An AbortSignal that fires on the parent signal or after `timeoutMs` */
export interface Deadline {
  signal: AbortSignal;
  /** True once the timeout (not the parent) aborted the signal */
  readonly expired: boolean;
  dispose(): void;
}

export function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let expired = false;

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  return {
    signal: controller.signal,
    get expired() {
      return expired;
    },
    dispose() {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

/**
 * Run one attempt under a deadline. A parent abort becomes Cancelled, an
 * expired deadline becomes TransportFailure.
 */
export async function runWithDeadline<T>(
  timeoutMs: number,
  parent: AbortSignal | undefined,
  stage: ErrorStage,
  operation: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const deadline = createDeadline(timeoutMs, parent);
  try {
    return await operation(deadline.signal);
  } catch (error) {
    if (parent?.aborted) {
      throw new CredentialError("Cancelled", "operation was cancelled", { stage, cause: error });
    }
    if (deadline.expired) {
      throw new CredentialError("TransportFailure", `timed out after ${timeoutMs}ms`, {
        stage,
        cause: error,
      });
    }
    throw toCredentialError(error, stage);
  } finally {
    deadline.dispose();
  }
}
