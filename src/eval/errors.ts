/**
 * rate_limited and transient failures are retried with backoff; rejected ones
 * (malformed request, bad credentials, unknown model) fail immediately.
 */
export type FailureKind = "rate_limited" | "transient" | "rejected";

export class CompletionError extends Error {
  constructor(
    message: string,
    readonly kind: FailureKind,
    readonly status: number | null = null,
  ) {
    super(message);
    this.name = "CompletionError";
  }
}

export function isRetryable(kind: FailureKind): boolean {
  return kind !== "rejected";
}

/** Map an HTTP status (undefined when the request never got a response) to a failure kind. */
export function classifyStatus(status: number | undefined): FailureKind {
  if (status === undefined) return "transient";
  if (status === 429) return "rate_limited";
  if (status === 408 || status === 409 || status >= 500) return "transient";
  return "rejected";
}
