import { AsyncRequestCancelledError, AsyncRequestTimeoutException, toError } from "../errors/dispatch-errors";

export type DeferredOutcome =
  | { kind: "value"; value: unknown }
  | { kind: "error"; error: Error };

export type DeferredResultOptions = {
  /** Overrides the dispatcher's default async timeout. */
  timeoutMs?: number;
  /** Value to complete with on timeout instead of failing. */
  timeoutResult?: unknown;
};

/**
 * A handler result produced later. Returning one from a handler releases
 * the request; the first of `setResult`, `setErrorResult`, `cancel` or the
 * timeout decides the outcome and resumes dispatch, later calls are ignored.
 */
export class DeferredResult<T = unknown> {
  readonly timeoutMs?: number;
  private readonly timeoutResult: unknown;
  private readonly hasTimeoutResult: boolean;
  private outcome: DeferredOutcome | null = null;
  private handler: ((outcome: DeferredOutcome) => void) | null = null;

  constructor(options: DeferredResultOptions = {}) {
    this.timeoutMs = options.timeoutMs;
    this.hasTimeoutResult = "timeoutResult" in options;
    this.timeoutResult = options.timeoutResult;
  }

  /** Settles with the promise's value or rejection. */
  static from<T>(promise: Promise<T>, options?: DeferredResultOptions): DeferredResult<T> {
    const deferred = new DeferredResult<T>(options);
    void promise.then(
      (value) => deferred.setResult(value),
      (error: unknown) => deferred.setErrorResult(error),
    );
    return deferred;
  }

  setResult(value: T): boolean {
    return this.settle({ kind: "value", value });
  }

  setErrorResult(error: unknown): boolean {
    return this.settle({ kind: "error", error: toError(error) });
  }

  cancel(reason?: string): boolean {
    return this.settle({ kind: "error", error: new AsyncRequestCancelledError(reason) });
  }

  /** Called by the async manager when the timeout elapses. */
  expire(timeoutMs: number): boolean {
    if (this.hasTimeoutResult) {
      return this.settle({ kind: "value", value: this.timeoutResult });
    }
    return this.settle({ kind: "error", error: new AsyncRequestTimeoutException(timeoutMs) });
  }

  isSetOrExpired(): boolean {
    return this.outcome !== null;
  }

  /** Receives the outcome once; immediately if it is already known. */
  onSettled(handler: (outcome: DeferredOutcome) => void): void {
    this.handler = handler;
    if (this.outcome) handler(this.outcome);
  }

  private settle(outcome: DeferredOutcome): boolean {
    if (this.outcome) return false;
    this.outcome = outcome;
    this.handler?.(outcome);
    return true;
  }
}
