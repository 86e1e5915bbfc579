import { logEval } from "../logging.js";
import { CompletionError, isRetryable, type FailureKind } from "./errors.js";
import type { CompletionProvider } from "./models/types.js";

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wrap a promise with a timeout.
 * @param promise The promise to await
 * @param ms Timeout in milliseconds
 * @param label Label for error message
 * @returns Result of the promise
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label: string = "operation",
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${label} timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RetryOptions {
  maxAttempts: number;
  initialDelayMs: number;
  timeoutMs: number;
  sleep?: (ms: number) => Promise<void>;
  label?: string;
}

export type CompletionOutcome =
  | { ok: true; text: string; attempts: number }
  | { ok: false; failure: FailureKind; message: string; attempts: number };

/** Delay before the retry that follows the given (1-based) failed attempt. */
export function backoffDelay(initialDelayMs: number, attempt: number): number {
  return initialDelayMs * 2 ** (attempt - 1);
}

export function describeFailure(e: unknown): { kind: FailureKind; message: string } {
  if (e instanceof CompletionError) return { kind: e.kind, message: e.message };
  if (e instanceof TimeoutError) return { kind: "transient", message: e.message };
  return { kind: "rejected", message: e instanceof Error ? e.message : String(e) };
}

/**
 * Send one prompt, retrying rate-limit and transient failures with exponential backoff.
 * Never throws for provider failures: exhausted retries and rejected requests come back
 * as `{ ok: false }` so the caller can degrade the payload and try again.
 */
export async function requestCompletion(
  provider: CompletionProvider,
  prompt: string,
  opts: RetryOptions,
): Promise<CompletionOutcome> {
  const { maxAttempts, initialDelayMs, timeoutMs, label = provider.model } = opts;
  const pause = opts.sleep ?? sleep;

  let last: { kind: FailureKind; message: string } = {
    kind: "rejected",
    message: "no attempts allowed",
  };

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const text = await withTimeout(provider.complete(prompt), timeoutMs, label);
      return { ok: true, text, attempts: attempt };
    } catch (e: unknown) {
      last = describeFailure(e);

      if (!isRetryable(last.kind)) {
        logEval.warn({ model: provider.model, kind: last.kind }, `Request rejected: ${last.message}`);
        return { ok: false, failure: last.kind, message: last.message, attempts: attempt };
      }

      if (attempt === maxAttempts) {
        logEval.warn(
          { model: provider.model, kind: last.kind },
          `${last.kind === "rate_limited" ? "Rate limit exceeded" : "Service error persisted"} after ${maxAttempts} attempts`,
        );
        return { ok: false, failure: last.kind, message: last.message, attempts: attempt };
      }

      const wait = backoffDelay(initialDelayMs, attempt);
      logEval.warn(
        { model: provider.model, kind: last.kind, wait_ms: wait },
        `${label} attempt ${attempt}/${maxAttempts} failed, retrying in ${wait}ms: ${last.message}`,
      );
      await pause(wait);
    }
  }

  return { ok: false, failure: last.kind, message: last.message, attempts: 0 };
}
