/**
 * Cooperative cancellation on top of AbortSignal.
 *
 * Long traversals call {@link checkCancelled} at every expansion step. The MCP
 * SDK passes an AbortSignal to each tool handler, so a client cancelling a
 * request stops the traversal at its next step.
 */

export class QueryCancelledError extends Error {
  constructor(message = "Query was cancelled") {
    super(message);
    this.name = "QueryCancelledError";
  }
}

/**
 * Throw {@link QueryCancelledError} if the signal has been aborted.
 */
export function checkCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    const reason: unknown = signal.reason;
    throw new QueryCancelledError(
      reason instanceof Error && reason.message ? `Query was cancelled: ${reason.message}` : undefined
    );
  }
}

export function isCancellation(error: unknown): error is QueryCancelledError {
  return error instanceof QueryCancelledError;
}
